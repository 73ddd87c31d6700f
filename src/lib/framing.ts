import type { Readable } from 'node:stream';
import { Errors } from './errors.js';

const HEADER_TERMINATOR = Buffer.from('\r\n\r\n');

const BODY_METHODS = new Set(['POST', 'PUT', 'PATCH']);

export interface FramingLimits {
  maxHeaderBytes: number;
  maxBodyBytes: number;
}

/**
 * Parsed request line and headers
 */
export interface RequestHead {
  method: string;
  /** Path without the query string */
  path: string;
  query: URLSearchParams;
  /** Header lines in arrival order, names as sent */
  headers: Array<[string, string]>;
}

/**
 * Request head plus whatever body bytes arrived with it
 */
export interface FramedRequest {
  head: RequestHead;
  /** Bytes read past the header terminator */
  initialBody: Buffer;
}

/**
 * Pull-style reader over a readable stream. The stream stays paused
 * between reads, so nothing is consumed until a caller asks for it.
 */
export class StreamReader {
  private chunks: Buffer[] = [];
  private ended = false;
  private failure: Error | null = null;
  private draining = false;
  private wake: (() => void) | null = null;
  private stream: Readable;

  constructor(stream: Readable) {
    this.stream = stream;
    stream.pause();
    stream.on('data', (chunk: Buffer | string) => {
      if (this.draining) return;
      this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
      stream.pause();
      this.notify();
    });
    stream.on('end', () => {
      this.ended = true;
      this.notify();
    });
    stream.on('close', () => {
      this.ended = true;
      this.notify();
    });
    stream.on('error', (err: Error) => {
      this.failure = err;
      this.notify();
    });
  }

  /**
   * Next chunk, or an empty buffer once the stream has ended
   */
  async read(): Promise<Buffer> {
    for (;;) {
      const chunk = this.chunks.shift();
      if (chunk) return chunk;
      if (this.failure) throw this.failure;
      if (this.ended) return Buffer.alloc(0);

      await new Promise<void>((resolve) => {
        this.wake = resolve;
        this.stream.resume();
      });
    }
  }

  /**
   * Discard everything unread from here on and keep the stream flowing
   */
  drain(): void {
    this.draining = true;
    this.chunks = [];
    this.stream.resume();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

/**
 * Read until the header terminator. Returns the buffer and the offset
 * at which the body starts.
 */
export async function readHeaderBlock(
  reader: StreamReader,
  maxHeaderBytes: number
): Promise<{ buffer: Buffer; bodyStart: number }> {
  let buffer = Buffer.alloc(0);

  for (;;) {
    const chunk = await reader.read();
    if (chunk.length === 0) {
      throw Errors.connectionClosed();
    }

    // Rescan the tail of the previous buffer in case the terminator straddles chunks
    const searchFrom = Math.max(0, buffer.length - (HEADER_TERMINATOR.length - 1));
    buffer = Buffer.concat([buffer, chunk]);

    const index = buffer.indexOf(HEADER_TERMINATOR, searchFrom);
    if (index !== -1) {
      if (index > maxHeaderBytes) {
        throw Errors.headerTooLarge(maxHeaderBytes);
      }
      return { buffer, bodyStart: index + HEADER_TERMINATOR.length };
    }

    if (buffer.length > maxHeaderBytes) {
      throw Errors.headerTooLarge(maxHeaderBytes);
    }
  }
}

/**
 * Parse the request line and header lines of a head block
 */
export function parseRequestHead(block: string): RequestHead {
  const lines = block.split('\r\n').filter((line) => line.length > 0);
  const requestLine = lines.shift();
  if (!requestLine) {
    throw Errors.invalidRequest('Empty request');
  }

  const [method, target, version] = requestLine.split(' ');
  if (!method || !target || !version || !version.startsWith('HTTP/')) {
    throw Errors.invalidRequest('Malformed request line');
  }

  const queryIndex = target.indexOf('?');
  const path = queryIndex === -1 ? target : target.substring(0, queryIndex);
  const query = new URLSearchParams(queryIndex === -1 ? '' : target.substring(queryIndex + 1));

  const headers: Array<[string, string]> = [];
  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon <= 0) {
      throw Errors.invalidRequest('Malformed header line');
    }
    headers.push([line.substring(0, colon).trim(), line.substring(colon + 1).trim()]);
  }

  return { method: method.toUpperCase(), path, query, headers };
}

/**
 * Case-insensitive header lookup, first match wins
 */
export function getHeader(head: RequestHead, name: string): string | undefined {
  const wanted = name.toLowerCase();
  return head.headers.find(([key]) => key.toLowerCase() === wanted)?.[1];
}

/**
 * Declared body length, undefined when the header is absent
 */
export function getContentLength(head: RequestHead): number | undefined {
  const raw = getHeader(head, 'content-length');
  if (raw === undefined) return undefined;

  if (!/^\d+$/.test(raw)) {
    throw Errors.invalidRequest(`Invalid Content-Length: ${raw}`);
  }
  return parseInt(raw, 10);
}

/**
 * Read and parse the request head from a stream
 */
export async function readRequestHead(reader: StreamReader, limits: FramingLimits): Promise<FramedRequest> {
  const { buffer, bodyStart } = await readHeaderBlock(reader, limits.maxHeaderBytes);
  const head = parseRequestHead(buffer.subarray(0, bodyStart).toString('latin1'));
  return { head, initialBody: buffer.subarray(bodyStart) };
}

/**
 * Read exactly the declared body, reusing bytes captured with the head.
 * The size limit is enforced before anything more is read.
 */
export async function readRequestBody(
  reader: StreamReader,
  request: FramedRequest,
  limits: FramingLimits
): Promise<Buffer> {
  const contentLength = getContentLength(request.head);

  if (contentLength === undefined) {
    if (BODY_METHODS.has(request.head.method)) {
      throw Errors.missingLength();
    }
    return Buffer.alloc(0);
  }

  if (contentLength > limits.maxBodyBytes) {
    throw Errors.bodyTooLarge(contentLength, limits.maxBodyBytes);
  }

  const initial = request.initialBody.subarray(0, contentLength);
  const parts: Buffer[] = [initial];
  let received = initial.length;

  while (received < contentLength) {
    const chunk = await reader.read();
    if (chunk.length === 0) {
      throw Errors.connectionClosed();
    }
    const needed = contentLength - received;
    const used = chunk.length > needed ? chunk.subarray(0, needed) : chunk;
    parts.push(used);
    received += used.length;
  }

  return Buffer.concat(parts);
}
