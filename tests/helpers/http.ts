import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { RequestInit, Response } from 'node-fetch';

/** Response whose body is a stream, as node-fetch returns it for real requests */
export function streamResponse(content: string, status: number = 200): Response {
  return new Response(Readable.from([Buffer.from(content)]), { status });
}

export function textResponse(content: string, status: number = 200): Response {
  return new Response(content, { status });
}

/**
 * Fetch stand-in serving fixed bodies by URL, 404 for anything else
 */
export function fakeFetch(bodies: Record<string, string>) {
  return jest.fn(async (url: string, _init?: RequestInit): Promise<Response> => {
    const body = bodies[url];
    return body === undefined ? textResponse('not found', 404) : streamResponse(body);
  });
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'token-artifacts-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
