const REDACT_KEYS = ['answers', 'text', 'payload', 'content', 'email', 'toEmail', 'to', 'html', 'body'];

type LogMeta = Record<string, unknown>;

function redact(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(redact);
  if (value && typeof value === 'object') {
    const copy: LogMeta = {};
    for (const [k, v] of Object.entries(value)) {
      if (REDACT_KEYS.includes(k)) {
        copy[k] = '[REDACTED]';
      } else {
        copy[k] = redact(v);
      }
    }
    return copy;
  }
  return value;
}

export const safeLogger = {
  info(event: string, meta: LogMeta = {}) {
    // eslint-disable-next-line no-console
    console.info(event, redact(meta));
  },
  warn(event: string, meta: LogMeta = {}) {
    // eslint-disable-next-line no-console
    console.warn(event, redact(meta));
  },
  error(event: string, meta: LogMeta = {}) {
    // eslint-disable-next-line no-console
    console.error(event, redact(meta));
  },
};

export function errorMessage(err: unknown, fallback = 'Unknown error'): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') return err.message;
  if (typeof err === 'string' && err) return err;
  return fallback;
}
