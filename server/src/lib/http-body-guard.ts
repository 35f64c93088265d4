import type { Context } from 'hono';

export type JsonBodyParseResult =
  | { ok: true; data: unknown }
  | { ok: false; response: Response };

function tooLarge(c: Context, maxBytes: number): Response {
  return c.json({ error: `Request too large (max ${maxBytes} bytes)` }, 413);
}

async function readBodyWithLimit(c: Context, maxBytes: number): Promise<
  { ok: true; raw: string } | { ok: false; response: Response }
> {
  const stream = c.req.raw.body;
  if (!stream) return { ok: true, raw: '' };

  const reader = stream.getReader();
  const chunks: Uint8Array[] = [];
  let totalBytes = 0;

  while (true) {
    const { done, value } = await reader.read();
    if (done) break;
    totalBytes += value.byteLength;
    if (totalBytes > maxBytes) {
      await reader.cancel().catch(() => undefined);
      return { ok: false, response: tooLarge(c, maxBytes) };
    }
    chunks.push(value);
  }

  return { ok: true, raw: Buffer.concat(chunks).toString('utf8') };
}

/**
 * Parse a JSON command body with a byte-size guard that holds even when
 * Content-Length is absent or wrong. An empty body parses as `{}`.
 */
export async function parseJsonBodyWithLimit(c: Context, maxBytes: number): Promise<JsonBodyParseResult> {
  const declared = Number.parseInt(c.req.header('content-length') ?? '', 10);
  if (Number.isFinite(declared) && declared > maxBytes) {
    return { ok: false, response: tooLarge(c, maxBytes) };
  }

  const contentType = c.req.header('content-type')?.toLowerCase() ?? '';
  if (contentType && !contentType.includes('application/json')) {
    return {
      ok: false,
      response: c.json({ error: 'Unsupported content type. Use application/json.' }, 415),
    };
  }

  const read = await readBodyWithLimit(c, maxBytes);
  if (!read.ok) return read;
  if (!read.raw.trim()) return { ok: true, data: {} };

  try {
    return { ok: true, data: JSON.parse(read.raw) };
  } catch {
    return { ok: false, response: c.json({ error: 'Request body is not valid JSON' }, 400) };
  }
}
