import { vi } from 'vitest';
import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { ApiError } from '../src/lib/errors.js';
import type { Logger } from '../src/config.js';

export function createMockLogger(): Logger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Await a promise that must reject with an ApiError
 */
export async function captureApiError(promise: Promise<unknown>): Promise<ApiError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ApiError) return error;
    throw error;
  }
  throw new Error('Expected promise to reject');
}

export type FakeReply = { status: number; data: unknown } | Error;

/**
 * axios instance whose requests are answered in process by the handler
 */
export function createFakeHttp(handler: (config: InternalAxiosRequestConfig) => FakeReply): AxiosInstance {
  return axios.create({
    adapter: async (config) => {
      const reply = handler(config);
      if (reply instanceof Error) {
        throw reply;
      }
      return {
        data: typeof reply.data === 'string' ? reply.data : JSON.stringify(reply.data),
        status: reply.status,
        statusText: '',
        headers: {},
        config,
      };
    },
  });
}
