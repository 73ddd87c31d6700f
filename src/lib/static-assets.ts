import { readFileSync } from 'node:fs';
import { gzipSync } from 'node:zlib';
import type { HttpResponse } from './response.js';

export const PUBLIC_DIR = new URL('../../public/', import.meta.url);

const CONTENT_TYPES: Record<string, string> = {
  'index.html': 'text/html; charset=utf-8',
  'style.css': 'text/css; charset=utf-8',
  'script.js': 'application/javascript; charset=utf-8',
};

/**
 * Gzipped copies of the frontend files, built once at startup
 */
export class StaticAssets {
  private assets = new Map<string, HttpResponse>();

  constructor(dir: URL = PUBLIC_DIR) {
    for (const [name, contentType] of Object.entries(CONTENT_TYPES)) {
      this.assets.set(name, {
        status: 200,
        contentType,
        body: gzipSync(readFileSync(new URL(name, dir))),
        headers: { 'Content-Encoding': 'gzip' },
      });
    }
  }

  get(name: string): HttpResponse | undefined {
    return this.assets.get(name);
  }
}
