/**
 * Request and response helpers for the raw http handler
 */

import * as http from 'http';
import { RateLimitedError, ValidationError, toErrorResponse } from '../errors/app-errors';

export const DEFAULT_JSON_LIMIT_BYTES = 1024 * 1024;

export type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Collect the request body as bytes, failing once it passes `limitBytes`
 */
export async function readRawBody(
  req: http.IncomingMessage,
  limitBytes: number = DEFAULT_JSON_LIMIT_BYTES,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let tooLarge = false;

    req.on('data', (chunk: Buffer) => {
      if (tooLarge) return;
      size += chunk.length;
      if (size > limitBytes) {
        tooLarge = true;
        reject(new ValidationError(`Request body exceeds ${limitBytes} bytes`));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!tooLarge) resolve(Buffer.concat(chunks));
    });
    req.on('error', reject);
  });
}

/**
 * Parse a JSON object body. An empty body reads as `{}`.
 */
export async function parseBody(
  req: http.IncomingMessage,
  limitBytes: number = DEFAULT_JSON_LIMIT_BYTES,
): Promise<JsonObject> {
  const raw = (await readRawBody(req, limitBytes)).toString('utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw || '{}');
  } catch {
    throw new ValidationError('Invalid JSON');
  }

  if (!isJsonObject(parsed)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return parsed;
}

/**
 * Send JSON response
 */
export function sendJson(res: http.ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data, null, 2));
}

export function sendNoContent(res: http.ServerResponse): void {
  res.writeHead(204);
  res.end();
}

/**
 * Map a thrown value to its status and body. 5xx are logged with the stack;
 * the client only sees the generic body.
 */
export function sendError(res: http.ServerResponse, error: unknown): void {
  const { status, body } = toErrorResponse(error);

  if (status >= 500) {
    console.error('[Server] Request failed:', error);
  }
  if (error instanceof RateLimitedError) {
    res.setHeader('Retry-After', String(error.details.retryAfter));
  }

  sendJson(res, status, body);
}

export function optionalString(body: JsonObject, key: string): string | undefined {
  const value = body[key];
  return typeof value === 'string' ? value : undefined;
}

export function optionalBoolean(body: JsonObject, key: string): boolean | undefined {
  const value = body[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Positive integer query parameter; undefined when absent or malformed
 */
export function queryInt(params: URLSearchParams, key: string): number | undefined {
  const value = params.get(key);
  if (value === null || !/^\d+$/.test(value)) return undefined;
  return parseInt(value, 10);
}

function unmapAddress(address: string): string {
  return address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address;
}

/**
 * Caller address for rate limiting. X-Forwarded-For is only read when the
 * peer itself is a trusted proxy, and then the nearest untrusted hop wins.
 */
export function clientAddress(req: http.IncomingMessage, trustedProxies: readonly string[] = []): string {
  const peer = req.socket.remoteAddress ? unmapAddress(req.socket.remoteAddress) : 'unknown';
  if (!trustedProxies.includes(peer)) return peer;

  const header = req.headers['x-forwarded-for'];
  const hops = (Array.isArray(header) ? header.join(',') : header ?? '')
    .split(',')
    .map(hop => unmapAddress(hop.trim()))
    .filter(hop => hop.length > 0);

  for (let i = hops.length - 1; i >= 0; i--) {
    if (!trustedProxies.includes(hops[i])) return hops[i];
  }
  return hops[0] ?? peer;
}
