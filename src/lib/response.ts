import type { Writable } from 'node:stream';
import { ApiError } from './errors.js';

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  202: 'Accepted',
  400: 'Bad Request',
  404: 'Not Found',
  411: 'Length Required',
  413: 'Payload Too Large',
  431: 'Request Header Fields Too Large',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
};

/**
 * A complete response, written in one go and followed by connection close
 */
export interface HttpResponse {
  status: number;
  contentType: string;
  body: Buffer;
  /** Extra headers, e.g. Content-Encoding */
  headers?: Record<string, string>;
}

export function jsonResponse(status: number, payload: unknown): HttpResponse {
  return {
    status,
    contentType: 'application/json',
    body: Buffer.from(JSON.stringify(payload)),
  };
}

export function errorResponse(error: ApiError): HttpResponse {
  return jsonResponse(error.statusCode, error.toJSON());
}

/**
 * Serialize status line, headers and body
 */
export function serializeResponse(response: HttpResponse): Buffer {
  const reason = STATUS_TEXT[response.status] ?? 'Unknown';
  const lines = [
    `HTTP/1.1 ${response.status} ${reason}`,
    `Content-Type: ${response.contentType}`,
    ...Object.entries(response.headers ?? {}).map(([name, value]) => `${name}: ${value}`),
    `Content-Length: ${response.body.length}`,
    'Connection: close',
  ];
  return Buffer.concat([Buffer.from(`${lines.join('\r\n')}\r\n\r\n`), response.body]);
}

/**
 * Write the response and close the writable side.
 * Resolves once the data is flushed, rejects if the peer is gone.
 */
export function writeResponse(stream: Writable, response: HttpResponse): Promise<void> {
  return new Promise((resolve, reject) => {
    if (stream.destroyed || stream.writableEnded) {
      reject(new Error('Connection is no longer writable'));
      return;
    }

    const onError = (err: Error) => reject(err);
    stream.once('error', onError);
    stream.end(serializeResponse(response), (err?: Error | null) => {
      stream.off('error', onError);
      if (err) {
        reject(err);
        return;
      }
      resolve();
    });
  });
}
