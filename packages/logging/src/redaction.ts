/**
 * Fragments that mark a metadata key as carrying caller credentials or
 * relayed payloads. Keys are compared lower-cased with separators removed,
 * so `x-api-key`, `Set-Cookie` and `refresh_token` all match.
 */
const REDACTED_KEY_FRAGMENTS = ['authorization', 'cookie', 'token', 'secret', 'password', 'apikey', 'body'];

const REDACTED = '[REDACTED]';
const MAX_DEPTH = 8;

const compactKey = (key: string) => key.toLowerCase().replace(/[^a-z0-9]/gu, '');

/**
 * Copies log metadata with sensitive keys masked. Errors keep their name,
 * message, stack and cause; byte buffers are reduced to their length.
 */
export const sanitizeForLog = ({
  value,
  extraSensitiveKeys = []
}: {
  value: unknown;
  extraSensitiveKeys?: string[];
}): unknown => {
  const extraKeys = new Set(extraSensitiveKeys.map(compactKey).filter(key => key.length > 0));
  const isSensitive = (key: string) => {
    const compact = compactKey(key);
    return extraKeys.has(compact) || REDACTED_KEY_FRAGMENTS.some(fragment => compact.includes(fragment));
  };

  // objects on the current path; a shared but acyclic reference is copied each time
  const path: object[] = [];

  const visit = (current: unknown, depth: number): unknown => {
    if (typeof current !== 'object' || current === null) {
      return current;
    }

    if (current instanceof Uint8Array) {
      return `[BYTES:${current.byteLength}]`;
    }

    if (depth >= MAX_DEPTH) {
      return '[TRUNCATED]';
    }

    if (path.includes(current)) {
      return '[CIRCULAR]';
    }

    path.push(current);
    try {
      if (current instanceof Error) {
        return {
          name: current.name,
          message: current.message,
          ...(current.stack ? {stack: current.stack} : {}),
          ...(current.cause !== undefined ? {cause: visit(current.cause, depth + 1)} : {})
        };
      }

      if (Array.isArray(current)) {
        return current.map(item => visit(item, depth + 1));
      }

      return Object.fromEntries(
        Object.entries(current).map(([key, entry]) => [key, isSensitive(key) ? REDACTED : visit(entry, depth + 1)])
      );
    } finally {
      path.pop();
    }
  };

  return visit(value, 0);
};
