import { Errors } from './errors.js';
import type { ChatMessage, CompletionBackend, GenerationOptions } from '../types/index.js';
import type { Logger } from '../config.js';

/**
 * Sent as a user message after a turn the backend cut short
 */
export const CONTINUATION_PROMPT =
  'Continue exactly where you stopped. Finish any unfinished sections and keep the same Markdown formatting.';

export interface CompletionRequest {
  system: string;
  user: string;
  model: string;
}

export interface CompletionSettings extends GenerationOptions {
  /** Continuation turns allowed after the first one */
  maxContinuations: number;
}

export interface AccumulatedCompletion {
  text: string;
  turns: number;
  /** The last turn was still cut short when the budget ran out */
  truncated: boolean;
}

/**
 * Generate text for a system/user pair, resuming the conversation
 * while the backend reports truncation and the budget allows.
 *
 * Every turn's text is kept, including a final truncated one.
 */
export async function generateWithContinuation(
  backend: CompletionBackend,
  request: CompletionRequest,
  settings: CompletionSettings,
  logger: Logger
): Promise<AccumulatedCompletion> {
  const { maxContinuations, ...options } = settings;
  const messages: ChatMessage[] = [
    { role: 'system', content: request.system },
    { role: 'user', content: request.user },
  ];

  let output = '';
  let turns = 0;

  for (;;) {
    const turn = await backend.chat(messages, request.model, options);
    turns++;

    if (turn.text.length === 0) {
      throw Errors.emptyResponse();
    }
    output += turn.text;

    if (!turn.truncated) {
      return { text: output, turns, truncated: false };
    }

    if (turns > maxContinuations) {
      logger.warn('Continuation budget exhausted, returning truncated output', {
        model: request.model,
        turns,
        outputLength: output.length,
      });
      return { text: output, turns, truncated: true };
    }

    logger.debug('Backend stopped at the token limit, continuing', {
      model: request.model,
      turn: turns,
      outputLength: output.length,
    });

    messages.push({ role: 'assistant', content: turn.text }, { role: 'user', content: CONTINUATION_PROMPT });
  }
}
