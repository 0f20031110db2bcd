import {
  GenerationError,
  UpstreamContentError,
  err,
  errorMessage,
  ok,
  type Result,
} from '../errors.js';
import type { MusicalParameters } from '../types/params.js';
import { composerSystemPrompt } from './prompts.js';
import type { GenerationService } from './service.js';

/** Substrings that mean the service answered in prose rather than notation. */
export const CONVERSATIONAL_MARKERS = ['sorry', 'apologize', 'here is', 'here are'] as const;

export function findConversationalMarker(text: string): string | null {
  const lower = text.toLowerCase();
  return CONVERSATIONAL_MARKERS.find(marker => lower.includes(marker)) ?? null;
}

export async function generateNotation(
  service: GenerationService,
  prompt: string,
  params: MusicalParameters,
): Promise<Result<string, UpstreamContentError | GenerationError>> {
  let content: string;
  try {
    content = (await service.complete({
      system: composerSystemPrompt(params),
      prompt,
      maxTokens: 1000,
      temperature: 0.7,
      topP: 0.9,
    })).trim();
  } catch (e) {
    return err(e instanceof GenerationError ? e : new GenerationError(errorMessage(e), { cause: e }));
  }

  const marker = findConversationalMarker(content);
  if (marker) return err(new UpstreamContentError(marker));
  if (!content) return err(new GenerationError('Empty notation response'));
  return ok(content);
}
