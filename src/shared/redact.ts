import { createHash } from 'node:crypto';

// Patterns that indicate secret values (never log these)
const SECRET_PATTERNS = [
  /bearer\s+\S+/gi,
  /authorization:\s*\S+/gi,
  /token['":\s=]+['"]?[A-Za-z0-9_\-./]{20,}['"]?/gi,
  /secret['":\s=]+['"]?[A-Za-z0-9_\-./]{8,}['"]?/gi,
  /password['":\s=]+['"]?[^\s'",]+['"]?/gi,
  /gh[pousr]_[A-Za-z0-9]{20,}/g,
];

/**
 * Redact potential secret values from a string for safe logging.
 */
export function redact(input: string): string {
  let output = input;
  for (const pattern of SECRET_PATTERNS) {
    output = output.replace(pattern, '[REDACTED]');
  }
  return output;
}

/**
 * Replace every occurrence of the given literal values. Used for credentials
 * known at run time, which the generic patterns cannot recognise.
 */
export function redactValues(input: string, values: ReadonlyArray<string>): string {
  let output = input;
  for (const value of values) {
    if (value.length === 0) continue;
    output = output.split(value).join('[REDACTED]');
  }
  return output;
}

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/**
 * SHA-256 hash of a canonical JSON representation of a value.
 * Object keys are sorted at every depth.
 */
export function jsonHash(value: unknown): string {
  return sha256(canonicalJson(value));
}

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Safely stringify an object, redacting known secret keys.
 */
export function safeStringify(obj: unknown, space?: number): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    obj,
    (key: string, value: unknown) => {
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      if (
        typeof value === 'string' &&
        /^(token|secret|password|authorization|bearer|credential)$/i.test(key)
      ) {
        return '[REDACTED]';
      }
      return value;
    },
    space,
  );
}
