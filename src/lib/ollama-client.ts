import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { Errors, errorMessage } from './errors.js';
import type { ChatMessage, ChatTurnResult, CompletionBackend, GenerationOptions } from '../types/index.js';
import type { Logger } from '../config.js';

/** Timeout for the model listing, which should always be quick */
const LIST_MODELS_TIMEOUT_MS = 5000;

export interface OllamaClientOptions {
  baseUrl: string;
  /** Per-call timeout for chat requests, 0 for none */
  timeoutMs: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text of an error body: Ollama's {"error": "..."} message when present
 */
function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (isRecord(data) && typeof data.error === 'string') return data.error;
  return data === undefined ? '' : JSON.stringify(data);
}

/**
 * Completion backend backed by Ollama's /api/chat and /api/tags
 */
export class OllamaClient implements CompletionBackend {
  private options: OllamaClientOptions;
  private logger: Logger;
  private http: AxiosInstance;

  constructor(options: OllamaClientOptions, logger: Logger, http: AxiosInstance = axios.create()) {
    this.options = options;
    this.logger = logger;
    this.http = http;
    this.logger.info(`Initialized Ollama client with base URL: ${options.baseUrl}`);
  }

  private url(path: string): string {
    return `${this.options.baseUrl.replace(/\/+$/, '')}${path}`;
  }

  async chat(messages: ChatMessage[], model: string, options: GenerationOptions): Promise<ChatTurnResult> {
    const payload = {
      model,
      messages,
      stream: false,
      options: {
        temperature: options.temperature,
        repeat_penalty: options.repeatPenalty,
        num_ctx: options.contextSize,
        num_predict: options.maxTokensPerTurn,
      },
    };

    this.logger.debug('Sending chat request', { model, messageCount: messages.length });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post<unknown>(this.url('/api/chat'), payload, {
        headers: { 'Content-Type': 'application/json' },
        timeout: this.options.timeoutMs,
        validateStatus: () => true,
      });
    } catch (error) {
      throw Errors.backendUnavailable(errorMessage(error));
    }

    if (response.status < 200 || response.status > 299) {
      const text = bodyText(response.data);
      if (text.includes('not found') || response.status === 404) {
        const friendly = await this.describeMissingModel(model);
        if (friendly) {
          throw Errors.backendError(response.status, friendly);
        }
      }
      throw Errors.backendError(response.status, text);
    }

    const data = response.data;
    const message = isRecord(data) && isRecord(data.message) ? data.message : undefined;
    const content = typeof message?.content === 'string' ? message.content : '';
    if (content.length === 0) {
      throw Errors.emptyResponse();
    }

    const doneReason = isRecord(data) && typeof data.done_reason === 'string' ? data.done_reason : undefined;
    return { text: content, truncated: doneReason === 'length' };
  }

  async listModels(): Promise<string[]> {
    try {
      return await this.fetchModelNames();
    } catch (error) {
      this.logger.debug('Model listing failed', { error: errorMessage(error) });
      return [];
    }
  }

  private async fetchModelNames(): Promise<string[]> {
    const response = await this.http.get<unknown>(this.url('/api/tags'), {
      timeout: LIST_MODELS_TIMEOUT_MS,
      validateStatus: () => true,
    });
    if (response.status < 200 || response.status > 299) {
      throw new Error(`Model listing returned status ${response.status}`);
    }

    const data = response.data;
    if (!isRecord(data) || !Array.isArray(data.models)) {
      return [];
    }

    const names: string[] = [];
    for (const item of data.models) {
      if (isRecord(item) && typeof item.name === 'string') {
        names.push(item.name);
      }
    }
    return names;
  }

  /**
   * Friendly message for a missing model, or null if the listing itself failed
   */
  private async describeMissingModel(model: string): Promise<string | null> {
    let names: string[];
    try {
      names = await this.fetchModelNames();
    } catch (error) {
      this.logger.debug('Could not list models for error message', { error: errorMessage(error) });
      return null;
    }

    const suggestion =
      names.length === 0
        ? 'No local models found. Pull one, e.g.: ollama pull llama3:8b'
        : `Installed models: ${names.join(', ')}`;
    return `Model '${model}' not found. Pull it with: ollama pull ${model}. ${suggestion}`;
  }
}
