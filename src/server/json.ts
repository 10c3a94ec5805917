import type { IncomingMessage, ServerResponse } from 'node:http';
import logger from '../logger.js';

const MAX_BODY_BYTES = 1024 * 1024;

export class RequestBodyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestBodyError';
  }
}

export function readJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on('data', (chunk: Buffer | string) => {
      const buffer = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      size += buffer.length;
      if (size > MAX_BODY_BYTES) {
        reject(new RequestBodyError('request body too large'));
        req.destroy();
        return;
      }
      chunks.push(buffer);
    });

    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf8');
      if (!raw) {
        resolve({});
        return;
      }

      try {
        resolve(JSON.parse(raw));
      } catch (error) {
        reject(new RequestBodyError(`invalid JSON body: ${error instanceof Error ? error.message : String(error)}`));
      }
    });

    req.on('error', reject);
  });
}

export function sendJson(res: ServerResponse, status: number, payload: Record<string, unknown>) {
  if (!res.headersSent) {
    res.writeHead(status, { 'Content-Type': 'application/json' });
  }
  res.end(JSON.stringify(payload));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseLimit(raw: string | null, fallback?: number): number | undefined {
  if (raw === null || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }
  return parsed;
}

/**
 * Runs an async handler from a synchronous router; a rejection becomes a 500.
 */
export function respondAsync(res: ServerResponse, handler: () => Promise<void>) {
  handler().catch(error => {
    logger.error({ err: error }, 'HTTP handler failed');
    sendJson(res, 500, { error: 'Internal server error' });
  });
}
