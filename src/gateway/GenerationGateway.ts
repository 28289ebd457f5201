import type { ChatMessage } from '../llm/types.js';

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const fail = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export type GenerationFailureKind = 'provider' | 'timeout' | 'malformed' | 'disabled';

export interface GenerationFailure {
  kind: GenerationFailureKind;
  detail: string;
  status?: number;
}

export interface AudioRef {
  mimeType: string;
  data: Buffer;
  voice: string;
}

export interface ImageRef {
  mimeType: string;
  prompt: string;
  url?: string;
  base64?: string;
}

export interface TextGenerationRequest {
  /** Agent issuing the call; selects the LLM profile and sampler overrides. */
  agent: string;
  messages: ChatMessage[];
}

/**
 * Capability boundary to the model providers. Requests arrive fully formed;
 * nothing here builds prompts or retries.
 */
export interface GenerationGateway {
  generateText(request: TextGenerationRequest): Promise<Result<string, GenerationFailure>>;
  generateSpeech(text: string): Promise<Result<AudioRef, GenerationFailure>>;
  generateImage(description: string): Promise<Result<ImageRef, GenerationFailure>>;
}
