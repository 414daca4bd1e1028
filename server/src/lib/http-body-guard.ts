import type { Context } from 'hono';

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

/**
 * 413 when the declared Content-Length is over the limit, otherwise null.
 * A missing or malformed header is left to the route's own checks.
 */
export function rejectOversizedBody(c: Context, maxBytes: number): Response | null {
  const contentLength = c.req.header('content-length');
  if (!contentLength) return null;
  const parsed = Number.parseInt(contentLength, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return null;
  if (parsed <= maxBytes) return null;
  return c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413);
}

/**
 * Parse a JSON body, re-checking the size on the bytes actually received.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const upfront = rejectOversizedBody(c, maxBytes);
  if (upfront) return { ok: false, response: upfront };

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415),
    };
  }

  const raw = await c.req.text();
  if (Buffer.byteLength(raw, 'utf8') > maxBytes) {
    return { ok: false, response: c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413) };
  }
  if (!raw.trim()) {
    return { ok: false, response: c.json({ error: 'Request body is required' }, 400) };
  }

  try {
    return { ok: true, data: JSON.parse(raw) };
  } catch {
    return { ok: false, response: c.json({ error: 'Request body is not valid JSON' }, 400) };
  }
}
