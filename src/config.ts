/**
 * Application configuration loaded from environment variables
 */
export interface Config {
  /** Listen address */
  host: string;
  /** Listen port */
  port: number;
  /** Log level */
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  /** Number of connections processed concurrently */
  workerConcurrency: number;
  /** Maximum accepted connections waiting for a worker before rejecting */
  maxQueueSize: number;
  /** Maximum size of the request head in bytes */
  maxHeaderBytes: number;
  /** Maximum size of a request body in bytes */
  maxBodyBytes: number;
  /** Socket inactivity timeout for reads and writes in ms */
  readWriteTimeoutMs: number;
  /** Number of background jobs executed concurrently */
  jobConcurrency: number;
  /** Maximum background jobs waiting to run before rejecting */
  maxPendingJobs: number;
  /** How long a finished job stays pollable in ms */
  jobTtlMs: number;
  /** Job cleanup interval in ms */
  jobCleanupIntervalMs: number;
  /** Base URL of the Ollama server */
  ollamaBaseUrl: string;
  /** Model used when a request names none */
  defaultModel: string;
  /** Context window passed to the backend (num_ctx) */
  contextSize: number;
  /** Maximum tokens generated per turn (num_predict) */
  maxTokensPerTurn: number;
  /** Sampling temperature */
  temperature: number;
  /** Repeat penalty */
  repeatPenalty: number;
  /** How many continuation turns may follow a truncated one */
  maxContinuations: number;
  /** Timeout of a single backend call in ms, 0 for none */
  backendTimeoutMs: number;
  /** Caption language requested from the transcript source */
  transcriptLanguage: string;
}

function intFromEnv(name: string, fallback: number): number {
  return parseInt(process.env[name] || String(fallback), 10);
}

function floatFromEnv(name: string, fallback: number): number {
  return parseFloat(process.env[name] || String(fallback));
}

function isLogLevel(value: string): value is Config['logLevel'] {
  return ['debug', 'info', 'warn', 'error'].includes(value);
}

/**
 * Load and validate configuration from environment variables
 */
export function loadConfig(): Config {
  const host = process.env.HOST || '0.0.0.0';
  const port = intFromEnv('PORT', 8001);
  const logLevel = process.env.LOG_LEVEL || 'info';
  const workerConcurrency = intFromEnv('WORKER_CONCURRENCY', 4);
  const maxQueueSize = intFromEnv('MAX_QUEUE_SIZE', 100);
  const maxHeaderBytes = intFromEnv('MAX_HEADER_BYTES', 8 * 1024);
  const maxBodyBytes = intFromEnv('MAX_BODY_BYTES', 10 * 1024 * 1024);
  const readWriteTimeoutMs = intFromEnv('READ_WRITE_TIMEOUT_MS', 15000);
  const jobConcurrency = intFromEnv('JOB_CONCURRENCY', 2);
  const maxPendingJobs = intFromEnv('MAX_PENDING_JOBS', 100);
  const jobTtlMs = intFromEnv('JOB_TTL_MS', 3600000);
  const jobCleanupIntervalMs = intFromEnv('JOB_CLEANUP_INTERVAL_MS', 60000);
  const ollamaBaseUrl = process.env.OLLAMA_BASE_URL || 'http://127.0.0.1:11434';
  const defaultModel = process.env.DEFAULT_MODEL || 'gpt-oss:20b';
  const contextSize = intFromEnv('CONTEXT_SIZE', 8192);
  const maxTokensPerTurn = intFromEnv('MAX_TOKENS_PER_TURN', 2048);
  const temperature = floatFromEnv('TEMPERATURE', 0.2);
  const repeatPenalty = floatFromEnv('REPEAT_PENALTY', 1.1);
  const maxContinuations = intFromEnv('MAX_CONTINUATIONS', 3);
  const backendTimeoutMs = intFromEnv('BACKEND_TIMEOUT_MS', 0);
  const transcriptLanguage = process.env.TRANSCRIPT_LANGUAGE || 'en';

  // Validation
  if (isNaN(port) || port < 0 || port > 65535) {
    throw new Error('PORT must be a valid port number (0-65535)');
  }

  if (!isLogLevel(logLevel)) {
    throw new Error('LOG_LEVEL must be one of: debug, info, warn, error');
  }

  if (isNaN(workerConcurrency) || workerConcurrency < 1) {
    throw new Error('WORKER_CONCURRENCY must be at least 1');
  }

  if (isNaN(maxQueueSize) || maxQueueSize < 1) {
    throw new Error('MAX_QUEUE_SIZE must be at least 1');
  }

  if (isNaN(maxHeaderBytes) || maxHeaderBytes < 256) {
    throw new Error('MAX_HEADER_BYTES must be at least 256');
  }

  if (isNaN(maxBodyBytes) || maxBodyBytes < 1) {
    throw new Error('MAX_BODY_BYTES must be at least 1');
  }

  if (isNaN(readWriteTimeoutMs) || readWriteTimeoutMs < 100) {
    throw new Error('READ_WRITE_TIMEOUT_MS must be at least 100ms');
  }

  if (isNaN(jobConcurrency) || jobConcurrency < 1) {
    throw new Error('JOB_CONCURRENCY must be at least 1');
  }

  if (isNaN(maxPendingJobs) || maxPendingJobs < 1) {
    throw new Error('MAX_PENDING_JOBS must be at least 1');
  }

  if (isNaN(jobTtlMs) || jobTtlMs < 1000) {
    throw new Error('JOB_TTL_MS must be at least 1000ms');
  }

  if (isNaN(jobCleanupIntervalMs) || jobCleanupIntervalMs < 1000) {
    throw new Error('JOB_CLEANUP_INTERVAL_MS must be at least 1000ms');
  }

  if (!/^https?:\/\//.test(ollamaBaseUrl)) {
    throw new Error('OLLAMA_BASE_URL must be an http(s) URL');
  }

  if (isNaN(contextSize) || contextSize < 1) {
    throw new Error('CONTEXT_SIZE must be at least 1');
  }

  if (isNaN(maxTokensPerTurn) || maxTokensPerTurn < 1) {
    throw new Error('MAX_TOKENS_PER_TURN must be at least 1');
  }

  if (isNaN(temperature) || temperature < 0) {
    throw new Error('TEMPERATURE must be a non-negative number');
  }

  if (isNaN(repeatPenalty) || repeatPenalty <= 0) {
    throw new Error('REPEAT_PENALTY must be a positive number');
  }

  if (isNaN(maxContinuations) || maxContinuations < 0) {
    throw new Error('MAX_CONTINUATIONS must be 0 or more');
  }

  if (isNaN(backendTimeoutMs) || backendTimeoutMs < 0) {
    throw new Error('BACKEND_TIMEOUT_MS must be 0 (no timeout) or more');
  }

  return {
    host,
    port,
    logLevel,
    workerConcurrency,
    maxQueueSize,
    maxHeaderBytes,
    maxBodyBytes,
    readWriteTimeoutMs,
    jobConcurrency,
    maxPendingJobs,
    jobTtlMs,
    jobCleanupIntervalMs,
    ollamaBaseUrl,
    defaultModel,
    contextSize,
    maxTokensPerTurn,
    temperature,
    repeatPenalty,
    maxContinuations,
    backendTimeoutMs,
    transcriptLanguage,
  };
}

/**
 * Simple logger that respects log level
 */
export function createLogger(level: Config['logLevel']) {
  const levels = { debug: 0, info: 1, warn: 2, error: 3 };
  const currentLevel = levels[level];

  const log = (msgLevel: Config['logLevel'], message: string, data?: Record<string, unknown>) => {
    if (levels[msgLevel] >= currentLevel) {
      const timestamp = new Date().toISOString();
      const logData = data ? ` ${JSON.stringify(data)}` : '';
      console.log(`[${timestamp}] [${msgLevel.toUpperCase()}] ${message}${logData}`);
    }
  };

  return {
    debug: (message: string, data?: Record<string, unknown>) => log('debug', message, data),
    info: (message: string, data?: Record<string, unknown>) => log('info', message, data),
    warn: (message: string, data?: Record<string, unknown>) => log('warn', message, data),
    error: (message: string, data?: Record<string, unknown>) => log('error', message, data),
  };
}

export type Logger = ReturnType<typeof createLogger>;
