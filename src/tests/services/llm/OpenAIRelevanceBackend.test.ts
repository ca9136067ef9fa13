import OpenAI from 'openai';
import { OpenAIRelevanceBackend } from '../../../services/llm/OpenAIRelevanceBackend';
import { LlmCallError } from '../../../models/errors';

const mockCreate = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => ({
    chat: { completions: { create: mockCreate } }
  }))
}));

function completion(content: string | null) {
  return { choices: [{ message: { content } }] };
}

describe('OpenAIRelevanceBackend', () => {
  let backend: OpenAIRelevanceBackend;

  beforeEach(() => {
    mockCreate.mockReset();
    backend = new OpenAIRelevanceBackend({ apiKey: 'test-key', baseUrl: 'http://localhost:4000/v1' });
  });

  it('should require an API key', () => {
    expect(() => new OpenAIRelevanceBackend({ apiKey: '' })).toThrow('OpenAI API key is required');
  });

  it('should pass the base URL to the client', () => {
    expect(OpenAI).toHaveBeenLastCalledWith({ apiKey: 'test-key', baseURL: 'http://localhost:4000/v1' });
  });

  it('should request a JSON verdict and parse it', async () => {
    mockCreate.mockResolvedValue(completion('{"score": 8, "reason": "Same crash"}'));

    const verdict = await backend.score({ keywords: ['rust'], detail: 'nightly only', title: 'Rust ICE', content: 'panic' });

    expect(verdict).toEqual({ score: 8, reason: 'Same crash' });
    expect(mockCreate).toHaveBeenCalledWith(expect.objectContaining({
      model: 'gpt-4o-mini',
      temperature: 0.1,
      max_tokens: 200,
      response_format: { type: 'json_object' }
    }));
    const prompt: string = mockCreate.mock.calls[0][0].messages[1].content;
    expect(prompt).toContain('USER KEYWORDS: rust');
    expect(prompt).toContain('USER PREFERENCES: "nightly only"');
  });

  it('should wrap API errors with their transience', async () => {
    mockCreate.mockRejectedValue(Object.assign(new Error('Rate limit reached'), { status: 429 }));

    await expect(backend.score({ keywords: ['rust'], detail: '', title: 't', content: '' })).rejects.toMatchObject({
      backend: 'openai',
      transient: true,
      status: 429
    });
  });

  it('should return the trimmed summary', async () => {
    mockCreate.mockResolvedValue(completion('  Two crash reports on GitHub.  \n'));

    const summary = await backend.summarize([{ source: 'github', title: 'Rust ICE', content: '' }], { keywords: ['rust'], detail: '' });

    expect(summary).toBe('Two crash reports on GitHub.');
  });

  it('should treat an empty summary as a permanent failure', async () => {
    mockCreate.mockResolvedValue(completion(null));

    const error = await backend.summarize([], { keywords: ['rust'], detail: '' }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmCallError);
    expect(error).toMatchObject({ message: 'Empty summary', transient: false });
  });
});
