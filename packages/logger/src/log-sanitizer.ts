/**
 * Redacts credentials from log messages and context before they are written.
 *
 * Tool-server descriptors routinely carry API keys in `env` and bearer tokens
 * in `headers`, and those objects end up in log context.
 */

export interface SanitizeOptions {
  placeholder?: string;
  preserveLength?: boolean;
  maxStringLength?: number;
  maxDepth?: number;
  redactEmails?: boolean;
}

const DEFAULT_OPTIONS: Required<SanitizeOptions> = {
  placeholder: '[REDACTED]',
  preserveLength: false,
  maxStringLength: 1000,
  maxDepth: 8,
  redactEmails: false
};

const SECRET_PATTERNS: RegExp[] = [
  // Provider style API keys (sk-..., sk-ant-..., gsk_...)
  /\b(?:sk|gsk)[-_][A-Za-z0-9_-]{8,}\b/g,
  // GitHub tokens
  /\bgh[pousr]_[A-Za-z0-9]{20,}\b/g,
  // Bearer credentials
  /\bBearer\s+[A-Za-z0-9._~+/=-]+/gi,
  // key=value and key: value assignments of well-known secret names
  /\b(?:password|passwd|secret|api[_-]?key|access[_-]?token|token)\s*[=:]\s*["']?[^\s"',;]+["']?/gi,
  // Credentials embedded in connection URLs
  /\b[a-z][a-z0-9+.-]*:\/\/[^\s:/@]+:[^\s@/]+@[^\s]+/gi
];

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

const SENSITIVE_KEYS = new Set([
  'password',
  'passwd',
  'secret',
  'token',
  'apikey',
  'api_key',
  'accesstoken',
  'access_token',
  'refreshtoken',
  'authorization',
  'cookie',
  'credentials',
  'privatekey'
]);

const isSensitiveKey = (key: string): boolean => {
  const normalized = key.toLowerCase().replace(/-/g, '_');
  if (SENSITIVE_KEYS.has(normalized) || SENSITIVE_KEYS.has(normalized.replace(/_/g, ''))) {
    return true;
  }
  // Environment variable names such as OPENAI_API_KEY or GITHUB_TOKEN
  return /(?:^|_)(?:api_key|token|secret|password)$/.test(normalized);
};

const redact = (match: string, options: Required<SanitizeOptions>): string =>
  options.preserveLength ? '*'.repeat(match.length) : options.placeholder;

export const sanitizeString = (input: string, options: SanitizeOptions = {}): string => {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let result = input;

  for (const pattern of SECRET_PATTERNS) {
    result = result.replace(pattern, (match) => redact(match, opts));
  }

  if (opts.redactEmails) {
    result = result.replace(EMAIL_PATTERN, (match) => redact(match, opts));
  }

  if (result.length > opts.maxStringLength) {
    result = `${result.substring(0, opts.maxStringLength)}...[TRUNCATED]`;
  }

  return result;
};

export const sanitizeMessage = (message: string, options?: SanitizeOptions): string =>
  sanitizeString(message, options);

export const sanitizeObject = (
  value: unknown,
  options: SanitizeOptions = {},
  depth = 0,
  seen: WeakSet<object> = new WeakSet()
): unknown => {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'string') {
    return sanitizeString(value, opts);
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'function' || typeof value === 'symbol') {
    return String(value);
  }
  if (value instanceof Date) {
    return value;
  }
  if (depth >= opts.maxDepth) {
    return '[MAX_DEPTH]';
  }
  if (seen.has(value)) {
    return '[CIRCULAR]';
  }
  seen.add(value);

  if (value instanceof Error) {
    return {
      name: value.name,
      message: sanitizeString(value.message, opts),
      stack: value.stack
    };
  }

  if (Array.isArray(value)) {
    return value.map((item) => sanitizeObject(item, opts, depth + 1, seen));
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = isSensitiveKey(key) && entry !== undefined && entry !== null
      ? opts.placeholder
      : sanitizeObject(entry, opts, depth + 1, seen);
  }
  return result;
};

/**
 * Sanitize a log context record. Never throws: a value that cannot be walked
 * is replaced by a marker record.
 */
export const sanitizeLogData = (
  data: Record<string, unknown>,
  options?: SanitizeOptions
): Record<string, unknown> => {
  try {
    const sanitized = sanitizeObject(data, options);
    return typeof sanitized === 'object' && sanitized !== null && !Array.isArray(sanitized)
      ? Object.fromEntries(Object.entries(sanitized))
      : { value: sanitized };
  } catch {
    return { _sanitization_error: 'Failed to sanitize log data', _original_type: typeof data };
  }
};
