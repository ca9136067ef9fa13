import fs from 'fs';
import os from 'os';
import path from 'path';
import { AdapterRegistry, loadSelectorSources, createDefaultRegistry } from '../../../services/agents/AdapterRegistry';
import { ConflictError, RequestValidationError } from '../../../models/errors';
import { loadSettings } from '../../../config/settings';
import { FakeAdapter } from '../../helpers/adapters';
import { captureError } from '../../helpers/fixtures';

const lobsters = {
  id: 'lobsters',
  baseUrl: 'https://lobste.rs',
  searchUrl: 'https://lobste.rs/search?q={query}',
  domains: ['https://lobste.rs'],
  selectors: { container: 'li', title: 'a', link: 'a' }
};

describe('AdapterRegistry', () => {
  let registry: AdapterRegistry;
  let tmpDir: string;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    registry = new AdapterRegistry();
    registry.register(new FakeAdapter('google', async () => []), { builtIn: true });
    registry.register(new FakeAdapter('reddit', async () => []), { builtIn: true });
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'issue-radar-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
    jest.restoreAllMocks();
  });

  it('should resolve names case-insensitively in request order', () => {
    const adapters = registry.resolveAll(['Reddit', 'google']);
    expect(adapters.map(a => a.id)).toEqual(['reddit', 'google']);
  });

  it('should list every unknown source in one error', () => {
    const error = captureError(() => registry.resolveAll(['google', 'nope', 'other']));

    expect(error).toBeInstanceOf(RequestValidationError);
    expect(error).toMatchObject({
      message: 'Unknown source(s): nope, other. Available: google, reddit',
      details: ['Unknown source: nope', 'Unknown source: other']
    });
  });

  it('should register selector sources at runtime', () => {
    const adapter = registry.registerSelectorSource(lobsters);

    expect(adapter.id).toBe('lobsters');
    expect(registry.has('LOBSTERS')).toBe(true);
    expect(registry.list()).toEqual([
      { id: 'google', domains: ['https://google.example.com'], builtIn: true },
      { id: 'reddit', domains: ['https://reddit.example.com'], builtIn: true },
      { id: 'lobsters', domains: ['https://lobste.rs'], builtIn: false }
    ]);
  });

  it('should allow replacing a runtime source', () => {
    registry.registerSelectorSource(lobsters);
    registry.registerSelectorSource({ ...lobsters, domains: ['https://lobsters.example.net'] });

    expect(registry.resolve('lobsters')?.domains).toEqual(['https://lobsters.example.net']);
  });

  it('should refuse to replace a built-in source', () => {
    expect(() => registry.registerSelectorSource({ ...lobsters, id: 'google' })).toThrow(ConflictError);
    expect(registry.resolve('google')).toBeInstanceOf(FakeAdapter);
  });

  it('should find the adapter for a URL by domain', () => {
    registry.registerSelectorSource(lobsters);

    expect(registry.findByDomain('https://www.lobste.rs/s/abc')?.id).toBe('lobsters');
    expect(registry.findByDomain('https://old.reddit.example.com/r/rust')?.id).toBe('reddit');
    expect(registry.findByDomain('https://unknown.test')).toBeUndefined();
  });

  describe('loadSelectorSources', () => {
    it('should return nothing for a missing file', () => {
      expect(loadSelectorSources(path.join(tmpDir, 'missing.json'))).toEqual([]);
    });

    it('should keep valid entries and skip invalid ones', () => {
      const file = path.join(tmpDir, 'sources.json');
      fs.writeFileSync(file, JSON.stringify([lobsters, { id: 'broken', baseUrl: 'not a url' }]));

      const configs = loadSelectorSources(file);

      expect(configs.map(c => c.id)).toEqual(['lobsters']);
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    it('should ignore a file that is not an array', () => {
      const file = path.join(tmpDir, 'sources.json');
      fs.writeFileSync(file, JSON.stringify({ sources: [lobsters] }));

      expect(loadSelectorSources(file)).toEqual([]);
    });

    it('should ignore malformed JSON', () => {
      const file = path.join(tmpDir, 'sources.json');
      fs.writeFileSync(file, '[{');

      expect(loadSelectorSources(file)).toEqual([]);
    });
  });

  describe('createDefaultRegistry', () => {
    it('should register the built-in adapters and the configured selector sources', () => {
      const file = path.join(tmpDir, 'sources.json');
      fs.writeFileSync(file, JSON.stringify([lobsters, { ...lobsters, id: 'github' }]));

      const defaults = createDefaultRegistry(loadSettings({ SOURCES_FILE: file }));

      expect(defaults.list().map(s => [s.id, s.builtIn])).toEqual([
        ['google', true],
        ['reddit', true],
        ['github', true],
        ['lobsters', false]
      ]);
    });
  });
});
