// Patterns that indicate secret values (never log these)
const SECRET_PATTERNS = [
  /bearer\s+[^\s"]+/gi,
  /authorization:\s*[^\s"]+/gi,
  /access_token=[^&\s"]+/gi,
  /token['":\s]+['"]?[A-Za-z0-9_\-./]{20,}['"]?/gi,
  /secret['":\s]+['"]?[A-Za-z0-9_\-./]{8,}['"]?/gi,
  /password['":\s]+['"]?\S+['"]?/gi,
  /key['":\s]+['"]?[A-Za-z0-9_\-./]{16,}['"]?/gi,
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
 * Safely stringify an object, redacting known secret keys.
 */
export function safeStringify(obj: unknown, space?: number): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(
    obj,
    (key, value: unknown) => {
      if (typeof value === 'object' && value !== null) {
        if (seen.has(value)) return '[Circular]';
        seen.add(value);
      }
      if (
        typeof value === 'string' &&
        /^(token|secret|password|key|authorization|bearer|access_token)$/i.test(key)
      ) {
        return '[REDACTED]';
      }
      return value;
    },
    space,
  );
}
