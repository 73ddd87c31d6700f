import { createServer, type AddressInfo, type Server, type Socket } from 'node:net';
import { v4 as uuidv4 } from 'uuid';
import { WorkerPool } from './worker-pool.js';
import { StreamReader, readRequestBody, readRequestHead, type FramingLimits } from './framing.js';
import { errorResponse, writeResponse, type HttpResponse } from './response.js';
import { ApiError, Errors, errorMessage, toApiError } from './errors.js';
import type { RequestContext, Router } from './router.js';
import type { ConnectionWorkItem } from '../types/index.js';
import type { Logger } from '../config.js';

export interface DispatchServerOptions extends FramingLimits {
  host: string;
  port: number;
  workerConcurrency: number;
  maxQueueSize: number;
  /** Inactivity timeout while reading a request or writing a response */
  readWriteTimeoutMs: number;
}

/**
 * TCP front end: accepts connections, hands them to the worker pool
 * and answers each with exactly one response before closing it.
 */
export class DispatchServer {
  readonly pool: WorkerPool<ConnectionWorkItem>;
  private server: Server;
  private options: DispatchServerOptions;
  private router: Router;
  private logger: Logger;
  private connections = new Set<Socket>();

  constructor(options: DispatchServerOptions, router: Router, logger: Logger) {
    this.options = options;
    this.router = router;
    this.logger = logger;

    this.pool = new WorkerPool<ConnectionWorkItem>(
      { concurrency: options.workerConcurrency, maxQueueSize: options.maxQueueSize },
      (item) => this.processConnection(item),
      logger
    );
    this.pool.setDroppedHandler((item) => {
      void this.reject(item.socket, Errors.serverBusy(), item.requestId);
    });

    this.server = createServer((socket) => this.accept(socket));
    this.server.on('error', (err) => {
      this.logger.error('Server error', { error: err.message });
    });
  }

  /**
   * Start listening; resolves with the bound address
   */
  listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off('error', reject);
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP address'));
          return;
        }
        resolve(address);
      });
    });
  }

  /**
   * Stop accepting, let running work finish, then close what is left
   */
  async close(): Promise<void> {
    const closed = new Promise<void>((resolve) => {
      this.server.close(() => resolve());
    });

    await this.pool.shutdown();

    for (const socket of this.connections) {
      socket.destroy();
    }
    await closed;
    this.logger.info('Server closed');
  }

  private accept(socket: Socket): void {
    const requestId = uuidv4();

    this.connections.add(socket);
    socket.on('close', () => this.connections.delete(socket));
    socket.on('error', (err) => {
      this.logger.debug('Socket error', { requestId, error: err.message });
    });
    socket.on('timeout', () => {
      this.logger.warn('Connection timed out, closing', { requestId });
      socket.destroy();
    });

    const result = this.pool.dispatch({ socket, requestId, acceptedAt: Date.now() });

    if (result === 'full') {
      void this.reject(socket, Errors.serverBusy(), requestId);
    } else if (result === 'closed') {
      void this.reject(socket, Errors.poolDisconnected(), requestId);
    }
  }

  /**
   * Answer a connection that never reached a worker
   */
  private async reject(socket: Socket, error: ApiError, requestId: string): Promise<void> {
    this.logger.info('Connection rejected', { requestId, code: error.code });
    const reader = new StreamReader(socket);
    reader.drain();
    await this.send(socket, errorResponse(error), requestId);
  }

  private async processConnection(item: ConnectionWorkItem): Promise<void> {
    const { socket, requestId } = item;
    const startTime = Date.now();
    const reader = new StreamReader(socket);
    let response: HttpResponse;

    try {
      const request = await this.withTimeout(socket, () => readRequestHead(reader, this.options));
      const { method, path } = request.head;

      this.logger.debug('Request received', {
        requestId,
        method,
        path,
        queueWaitMs: startTime - item.acceptedAt,
      });

      let bodyRead = false;
      const ctx: RequestContext = {
        head: request.head,
        requestId,
        readBody: () => {
          if (bodyRead) {
            throw new Error('Request body was already read');
          }
          bodyRead = true;
          return this.withTimeout(socket, () => readRequestBody(reader, request, this.options));
        },
      };

      response = await this.router.handle(ctx);

      this.logger.info('Request handled', {
        requestId,
        method,
        path,
        status: response.status,
        durationMs: Date.now() - startTime,
      });
    } catch (error) {
      const apiError = toApiError(error);
      if (apiError.statusCode >= 500) {
        this.logger.error('Request error', { requestId, code: apiError.code, error: apiError.message });
      } else {
        this.logger.info('Request rejected', { requestId, code: apiError.code, error: apiError.message });
      }
      response = errorResponse(apiError);
    }

    reader.drain();
    await this.send(socket, response, requestId);
  }

  /**
   * Best-effort write of the single response, then close.
   * The timeout stays armed so a peer that never closes its side is dropped.
   */
  private async send(socket: Socket, response: HttpResponse, requestId: string): Promise<void> {
    socket.setTimeout(this.options.readWriteTimeoutMs);
    try {
      await writeResponse(socket, response);
    } catch (error) {
      this.logger.debug('Could not write response', { requestId, error: errorMessage(error) });
      socket.destroy();
    }
  }

  /**
   * Arm the inactivity timeout only around socket I/O, never around handler work
   */
  private async withTimeout<T>(socket: Socket, io: () => Promise<T>): Promise<T> {
    socket.setTimeout(this.options.readWriteTimeoutMs);
    try {
      return await io();
    } finally {
      socket.setTimeout(0);
    }
  }
}
