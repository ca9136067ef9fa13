import Joi from 'joi';
import { parseHTML } from 'linkedom';
import { Query } from '../types/models';
import { RequestValidationError } from './errors';

/**
 * Validation schemas and functions for request payloads
 */

export interface SearchRequestBody {
  keywords: string[];
  sources: string[];
  detail: string;
  date_range?: {
    start: Date;
    end: Date;
  };
}

export interface SubscriptionRequestBody extends SearchRequestBody {
  email: string;
  notification_time: string;
}

export interface SelectorSourceConfig {
  id: string;
  baseUrl: string;
  searchUrl: string; // must contain '{query}'
  domains: string[];
  selectors: {
    container: string;
    title: string;
    link: string;
    content?: string;
    date?: string;
  };
}

export const NOTIFICATION_TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

const cssSelector = Joi.string().trim().min(1).custom((value: string, helpers) => {
  if (!isValidCssSelector(value)) return helpers.error('any.invalid');
  return value;
}).messages({
  'any.invalid': '{{#label}} is not a valid CSS selector'
});

const queryFields = {
  keywords: Joi.array().items(Joi.string().trim().min(1).max(200)).min(1).max(20).required(),
  sources: Joi.array().items(Joi.string().trim().lowercase().min(1).max(100)).min(1).max(20).required(),
  detail: Joi.string().trim().allow('').max(2000).default(''),
  date_range: Joi.object({
    start: Joi.date().iso().required(),
    end: Joi.date().iso().min(Joi.ref('start')).required().messages({
      'date.min': 'date_range.end must not be before date_range.start'
    })
  }).optional()
};

// Validation schemas
export const searchRequestSchema = Joi.object<SearchRequestBody>(queryFields);

export const subscriptionRequestSchema = Joi.object<SubscriptionRequestBody>({
  ...queryFields,
  email: Joi.string().trim().lowercase().email().required(),
  notification_time: Joi.string().pattern(NOTIFICATION_TIME_PATTERN).required().messages({
    'string.pattern.base': 'notification_time must be HH:MM (24h)'
  })
});

export const selectorSourceSchema = Joi.object<SelectorSourceConfig>({
  id: Joi.string().trim().lowercase().pattern(/^[a-z0-9][a-z0-9._-]*$/).max(100).required(),
  baseUrl: Joi.string().uri({ scheme: ['http', 'https'] }).required(),
  // '{' is not a URI character, so check the URL with the placeholder filled in
  searchUrl: Joi.string().custom((value: string, helpers) => {
    if (!value.includes('{query}')) return helpers.error('string.pattern.base');
    if (!isAbsoluteHttpUrl(value.replace(/\{query\}/g, 'q'))) return helpers.error('string.uri');
    return value;
  }).required().messages({
    'string.pattern.base': 'searchUrl must contain the query placeholder',
    'string.uri': 'searchUrl must be an absolute http(s) URL'
  }),
  domains: Joi.array().items(Joi.string().uri({ scheme: ['http', 'https'] })).min(1).required(),
  selectors: Joi.object({
    container: cssSelector.required(),
    title: cssSelector.required(),
    link: cssSelector.required(),
    content: cssSelector.optional(),
    date: cssSelector.optional()
  }).required()
});

function validateOrThrow<T>(schema: Joi.ObjectSchema<T>, payload: unknown, label: string): T {
  const result = schema.validate(payload, { abortEarly: false, convert: true, stripUnknown: true });
  if (result.error) {
    const details = result.error.details.map(item => item.message.replace(/"/g, ''));
    throw new RequestValidationError(`Invalid ${label}: ${details.join('; ')}`, details);
  }
  return result.value;
}

export function validateSearchRequest(payload: unknown): SearchRequestBody {
  return validateOrThrow(searchRequestSchema, payload, 'search request');
}

export function validateSubscriptionRequest(payload: unknown): SubscriptionRequestBody {
  return validateOrThrow(subscriptionRequestSchema, payload, 'subscription request');
}

export function validateSelectorSource(payload: unknown): SelectorSourceConfig {
  return validateOrThrow(selectorSourceSchema, payload, 'source definition');
}

/**
 * Drop repeated entries, comparing case-insensitively and keeping the first spelling
 */
export function dedupeKeywords(keywords: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of keywords) {
    const keyword = raw.trim();
    const key = keyword.toLowerCase();
    if (!keyword || seen.has(key)) continue;
    seen.add(key);
    result.push(keyword);
  }
  return result;
}

/**
 * Build the immutable Query from an already-validated request body
 */
export function buildQuery(body: SearchRequestBody): Query {
  const keywords = dedupeKeywords(body.keywords);
  if (keywords.length === 0) {
    throw new RequestValidationError('At least one keyword is required');
  }
  const sources = Array.from(new Set(body.sources.map(source => source.trim().toLowerCase())));

  return Object.freeze({
    keywords: Object.freeze(keywords),
    sources: Object.freeze(sources),
    detail: body.detail ?? '',
    ...(body.date_range && {
      dateRange: Object.freeze({ start: body.date_range.start, end: body.date_range.end })
    })
  });
}

export function parseSearchRequest(payload: unknown): Query {
  return buildQuery(validateSearchRequest(payload));
}

const emailSchema = Joi.string().trim().lowercase().email().required();

/**
 * Validate and normalize an email used as a lookup key
 */
export function normalizeEmail(value: unknown): string {
  const result = emailSchema.validate(value);
  if (result.error) {
    throw new RequestValidationError('A valid email is required', ['email must be a valid email']);
  }
  return result.value;
}

export function isValidNotificationTime(value: string): boolean {
  return NOTIFICATION_TIME_PATTERN.test(value);
}

export function isAbsoluteHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

let selectorDocument: ReturnType<typeof parseHTML>['document'] | undefined;

/**
 * True when the selector compiles. Querying a small page is enough to surface syntax errors.
 */
export function isValidCssSelector(selector: string): boolean {
  selectorDocument ??= parseHTML('<html><head></head><body><div></div></body></html>').document;
  try {
    selectorDocument.querySelector(selector);
    return true;
  } catch {
    return false;
  }
}
