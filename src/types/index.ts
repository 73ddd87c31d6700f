import type { Socket } from 'node:net';

/**
 * Request body for POST /api/summarize and POST /api/submit*
 */
export interface SummarizeRequest {
  /** Video URL */
  url: string;
  /** Ollama model name, the configured default when absent or blank */
  model?: string;
  /** System instruction, the bundled summary prompt when absent */
  system_prompt?: string;
  /** Caption language, the configured default when absent */
  language?: string;
  /** Return canned Markdown without calling any collaborator */
  dry_run?: boolean;
  /** Return the transcript without generating a summary */
  transcript_only?: boolean;
  /** Accepted for client compatibility, never used */
  api_key?: string;
}

/**
 * Successful summary payload, also the result of a finished job
 */
export interface SummarizeResult {
  summary: string;
  subtitles: string;
  video_name: string;
}

/**
 * Lifecycle state of a background job
 */
export type JobState =
  | { status: 'pending' }
  | { status: 'done'; result: SummarizeResult }
  | { status: 'error'; error: string };

export type TerminalJobState = Exclude<JobState, { status: 'pending' }>;

/**
 * One accepted connection waiting for a worker
 */
export interface ConnectionWorkItem {
  socket: Socket;
  /** Request ID for logging/tracking */
  requestId: string;
  acceptedAt: number;
}

/**
 * Outcome of a non-blocking dispatch attempt
 */
export type DispatchResult = 'queued' | 'full' | 'closed';

/**
 * Worker pool statistics
 */
export interface WorkerPoolStats {
  /** Items waiting for a worker */
  queued: number;
  /** Items currently being processed */
  processing: number;
  /** Maximum concurrent workers */
  concurrency: number;
  /** Maximum queue size */
  maxQueueSize: number;
  /** Whether the pool is paused */
  isPaused: boolean;
}

/**
 * Job runner statistics
 */
export interface JobRunnerStats {
  /** Jobs waiting for a slot */
  waiting: number;
  /** Jobs currently running */
  running: number;
  /** Jobs tracked by the registry, any state */
  tracked: number;
}

/**
 * Health check response
 */
export interface HealthResponse {
  /** Server status */
  status: 'ok' | 'degraded';
  /** Server uptime in seconds */
  uptime: number;
  queue: {
    queued: number;
    processing: number;
    concurrency: number;
  };
  jobs: JobRunnerStats;
}

/**
 * Chat roles understood by the completion backend
 */
export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Generation options sent with every turn
 */
export interface GenerationOptions {
  temperature: number;
  repeatPenalty: number;
  contextSize: number;
  maxTokensPerTurn: number;
}

/**
 * Result of one backend round trip
 */
export interface ChatTurnResult {
  text: string;
  /** The backend stopped because it hit the token limit */
  truncated: boolean;
}

/**
 * Completion backend contract
 */
export interface CompletionBackend {
  chat(messages: ChatMessage[], model: string, options: GenerationOptions): Promise<ChatTurnResult>;
  /** Best effort, empty on any failure */
  listModels(): Promise<string[]>;
}

/**
 * Transcript with the video's display name
 */
export interface Transcript {
  text: string;
  title: string;
}

/**
 * Transcript source contract
 */
export interface TranscriptSource {
  fetchTranscript(reference: string, language: string): Promise<Transcript>;
}
