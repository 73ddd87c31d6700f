import { readFileSync } from 'node:fs';
import { generateWithContinuation, type CompletionSettings } from './completion.js';
import { Errors } from './errors.js';
import type {
  CompletionBackend,
  SummarizeRequest,
  SummarizeResult,
  TranscriptSource,
} from '../types/index.js';
import type { Logger } from '../config.js';

const PROMPTS_DIR = new URL('../../prompts/', import.meta.url);

/**
 * Read a bundled prompt file
 */
export function loadPrompt(name: string): string {
  return readFileSync(new URL(name, PROMPTS_DIR), 'utf8').trim();
}

export interface SummaryServiceOptions {
  defaultModel: string;
  defaultLanguage: string;
  defaultSystemPrompt: string;
  /** Returned as both summary and subtitles for dry runs */
  dryRunSample: string;
  completion: CompletionSettings;
}

/**
 * Validate a parsed JSON body as a summarize request
 */
export function parseSummarizeRequest(body: unknown): SummarizeRequest {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw Errors.invalidRequest('Request body must be a JSON object');
  }
  const fields: Record<string, unknown> = { ...body };

  if (fields.dry_run !== undefined && typeof fields.dry_run !== 'boolean') {
    throw Errors.invalidRequest('dry_run must be a boolean');
  }
  if (fields.transcript_only !== undefined && typeof fields.transcript_only !== 'boolean') {
    throw Errors.invalidRequest('transcript_only must be a boolean');
  }

  const dryRun = fields.dry_run === true;
  const url = fields.url;
  if (typeof url !== 'string' || (!dryRun && url.trim().length === 0)) {
    throw Errors.invalidRequest('Request body must include a "url" string');
  }

  for (const key of ['model', 'system_prompt', 'language', 'api_key'] as const) {
    if (fields[key] !== undefined && fields[key] !== null && typeof fields[key] !== 'string') {
      throw Errors.invalidRequest(`${key} must be a string`);
    }
  }

  const optionalString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

  return {
    url,
    model: optionalString(fields.model),
    system_prompt: optionalString(fields.system_prompt),
    language: optionalString(fields.language),
    dry_run: dryRun,
    transcript_only: fields.transcript_only === true,
    api_key: optionalString(fields.api_key),
  };
}

/**
 * Transcript retrieval plus summary generation, shared by the
 * synchronous endpoint and background jobs
 */
export class SummaryService {
  private transcripts: TranscriptSource;
  private backend: CompletionBackend;
  private options: SummaryServiceOptions;
  private logger: Logger;

  constructor(
    transcripts: TranscriptSource,
    backend: CompletionBackend,
    options: SummaryServiceOptions,
    logger: Logger
  ) {
    this.transcripts = transcripts;
    this.backend = backend;
    this.options = options;
    this.logger = logger;
  }

  async summarize(request: SummarizeRequest): Promise<SummarizeResult> {
    if (request.dry_run) {
      return {
        summary: this.options.dryRunSample,
        subtitles: this.options.dryRunSample,
        video_name: 'Dry Run',
      };
    }

    const language = request.language?.trim() || this.options.defaultLanguage;
    const transcript = await this.transcripts.fetchTranscript(request.url, language);

    if (request.transcript_only) {
      return {
        summary: transcript.text,
        subtitles: transcript.text,
        video_name: transcript.title,
      };
    }

    const model = request.model?.trim() || this.options.defaultModel;
    const system = request.system_prompt ?? this.options.defaultSystemPrompt;

    this.logger.debug('Generating summary', {
      model,
      videoName: transcript.title,
      transcriptLength: transcript.text.length,
    });

    const completion = await generateWithContinuation(
      this.backend,
      { system, user: transcript.text, model },
      this.options.completion,
      this.logger
    );

    this.logger.info('Summary generated', {
      model,
      turns: completion.turns,
      truncated: completion.truncated,
      summaryLength: completion.text.length,
    });

    return {
      summary: completion.text,
      subtitles: transcript.text,
      video_name: transcript.title,
    };
  }

  async listModels(): Promise<string[]> {
    return this.backend.listModels();
  }
}
