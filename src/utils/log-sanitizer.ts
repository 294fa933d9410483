/**
 * Log sanitization utilities
 *
 * Owner identifiers, phone numbers and e-mail addresses of emergency
 * contacts, and connection strings must never appear verbatim in logs.
 */

import { createHash } from 'node:crypto';

/**
 * Hash an identifier for logging purposes
 *
 * Keeps the first 4 characters for recognition. Format: "user...a1b2c3d4"
 */
export function hashId(id: unknown): string | null {
  if (!id || typeof id !== 'string') {
    return null;
  }

  const prefix = id.slice(0, 4);
  const hash = createHash('sha256').update(id).digest('hex').slice(0, 8);
  return `${prefix}...${hash}`;
}

export function redact(): string {
  return '[REDACTED]';
}

/**
 * Truncate a string for safe logging
 */
export function truncate(value: unknown, maxLength: number = 100): string | null {
  if (!value || typeof value !== 'string') {
    return null;
  }

  if (value.length <= maxLength) {
    return value;
  }

  return `${value.slice(0, maxLength)}...[truncated]`;
}

/**
 * Mask a phone number down to its last two digits: "***-**42"
 */
export function maskPhone(phone: unknown): string | null {
  if (!phone || typeof phone !== 'string') {
    return null;
  }
  const digits = phone.replace(/\D/g, '');
  return digits.length > 2 ? `***-**${digits.slice(-2)}` : redact();
}

/**
 * Mask an e-mail address, keeping the first character and the domain
 */
export function maskEmail(email: unknown): string | null {
  if (!email || typeof email !== 'string') {
    return null;
  }
  const at = email.indexOf('@');
  if (at < 1) {
    return redact();
  }
  return `${email.slice(0, 1)}***${email.slice(at)}`;
}

type Serializer = (value: unknown) => unknown;

/**
 * Pino serializers for log sanitization
 */
export const logSerializers: Record<string, Serializer> = {
  // Hash owner identifiers
  userId: (id) => hashId(id),
  ownerId: (id) => hashId(id),

  // Contact details of emergency contacts
  phone: (p) => maskPhone(p),
  email: (e) => maskEmail(e),

  // Redact tokens and secrets
  token: () => redact(),
  apiKey: () => redact(),
  secret: () => redact(),
  password: () => redact(),
  authorization: () => redact(),

  // Sanitize error objects
  error: (err) => sanitizeError(err),
  err: (err) => sanitizeError(err),

  // Truncate large payloads
  payload: (p) => {
    if (typeof p === 'string') {
      return truncate(p, 200);
    }
    if (p && typeof p === 'object') {
      return '[object]';
    }
    return p;
  },
};

function readProp(obj: object, prop: string): unknown {
  return Object.getOwnPropertyDescriptor(obj, prop)?.value;
}

/**
 * Sanitize an error for safe logging
 *
 * Extracts name, message, code and status only; stack traces are kept in
 * development with home directories stripped.
 */
export function sanitizeError(error: unknown): Record<string, unknown> | null {
  if (!error) {
    return null;
  }

  if (error instanceof Error) {
    const sanitized: Record<string, unknown> = {
      name: error.name,
      message: sanitizeErrorMessage(error.message),
    };

    const code = readProp(error, 'code');
    if (typeof code === 'string') {
      sanitized['code'] = code;
    }

    const statusCode = readProp(error, 'statusCode');
    if (typeof statusCode === 'number') {
      sanitized['statusCode'] = statusCode;
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      sanitized['stack'] = sanitizeStackTrace(error.stack);
    }

    return sanitized;
  }

  if (typeof error === 'string') {
    return { message: sanitizeErrorMessage(error) };
  }

  if (typeof error === 'object') {
    const sanitized: Record<string, unknown> = {};

    for (const prop of ['name', 'message', 'code', 'status', 'statusCode', 'type']) {
      const value = readProp(error, prop);
      if (typeof value === 'string' || typeof value === 'number') {
        sanitized[prop] = prop === 'message' ? sanitizeErrorMessage(String(value)) : value;
      }
    }

    return Object.keys(sanitized).length > 0 ? sanitized : { type: 'unknown' };
  }

  return { type: typeof error };
}

const SENSITIVE_PATTERNS: RegExp[] = [
  // File paths
  /\/home\/[^\s]+/g,
  /\/Users\/[^\s]+/g,
  // Connection strings
  /postgres(ql)?:\/\/[^\s]+/gi,
  /nats:\/\/[^\s]+/gi,
  // Tokens
  /Bearer\s+[A-Za-z0-9\-._~+/]+=*/gi,
  /api[_-]?key[=:]\s*[^\s]+/gi,
  // E-mail addresses
  /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/g,
  // IP addresses
  /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g,
];

function sanitizeErrorMessage(message: string): string {
  if (!message) {
    return 'Unknown error';
  }

  let sanitized = message;
  for (const pattern of SENSITIVE_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }

  return truncate(sanitized, 500) ?? 'Unknown error';
}

function sanitizeStackTrace(stack: string): string {
  return stack
    .replace(/\/home\/[^/]+\//g, '/~/')
    .replace(/\/Users\/[^/]+\//g, '/~/')
    .split('\n')
    .slice(0, 10)
    .join('\n');
}

/**
 * Apply the serializers by key name, redacting any other token-ish field
 */
export function sanitizeLogObject(obj: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    const serializer = logSerializers[key];
    const lower = key.toLowerCase();
    if (serializer) {
      sanitized[key] = serializer(value);
    } else if (lower.includes('token') || lower.includes('secret') || lower.includes('password')) {
      sanitized[key] = redact();
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}
