// Patterns that indicate secret values (never log these)
const SECRET_PATTERNS = [
  /bearer\s+\S+/gi,
  /authorization:\s*\S+/gi,
  /token['":\s]+['"]?[A-Za-z0-9_\-./]{20,}['"]?/gi,
  /secret['":\s]+['"]?[A-Za-z0-9_\-./]{8,}['"]?/gi,
  /password['":\s]+['"]?\S+['"]?/gi,
  /api[_-]?key['":\s]+['"]?[A-Za-z0-9_\-./]{16,}['"]?/gi,
];

const SECRET_KEY = /^(token|secret|password|api_key|apikey|authorization|bearer)$/i;

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
 * Stringify a value for logs and traces. Circular references become
 * "[Circular]", secret-looking keys are redacted, and values JSON cannot
 * represent (undefined, functions, symbols) fall back to String().
 */
export function safeStringify(obj: unknown, space?: number): string {
  const seen = new WeakSet<object>();
  const json = JSON.stringify(
    obj,
    (key: string, value: unknown) => {
      if (typeof value === 'bigint') return value.toString();
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      if (typeof value === 'string' && SECRET_KEY.test(key)) {
        return '[REDACTED]';
      }
      return value;
    },
    space,
  );
  // JSON.stringify yields undefined at runtime for undefined/function input
  return typeof json === 'string' ? json : String(obj);
}
