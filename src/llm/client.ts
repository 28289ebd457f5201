import OpenAI from 'openai';
import { LLMProfile } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { ChatMessage } from './types.js';

const llmLog = createLogger(NAMESPACES.llm.client);

export type { ChatMessage } from './types.js';

/** The provider answered, but not with anything usable. */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedResponseError';
  }
}

export interface ChatCompletionOptions {
  timeout?: number;
}

function cleanPromptBackslashes(text: string): string {
  // Replace all instances of \\\ with \
  return text.replace(/\\\\\\/g, '\\');
}

export function createOpenAIClient(profile: LLMProfile, timeout?: number): OpenAI {
  return new OpenAI({
    apiKey: profile.apiKey || 'dummy',
    baseURL: profile.baseURL,
    // Retry policy belongs to the caller
    maxRetries: 0,
    timeout,
  });
}

/**
 * One chat completion against an OpenAI-compatible endpoint. Errors from the
 * SDK propagate unchanged so the gateway can classify them.
 */
export async function chatCompletion(
  profile: LLMProfile,
  messages: ChatMessage[],
  options: ChatCompletionOptions = {}
): Promise<string> {
  const client = createOpenAIClient(profile, options.timeout);
  const model = profile.model || 'gpt-4o-mini';

  const cleanedMessages = messages.map(msg => ({
    ...msg,
    content: cleanPromptBackslashes(msg.content)
  }));

  const sampler = profile.sampler;

  llmLog('[LLM] Making call to %s at %s (%d messages)', model, profile.baseURL, cleanedMessages.length);
  const response = await client.chat.completions.create({
    model,
    messages: cleanedMessages,
    temperature: sampler?.temperature,
    top_p: sampler?.topP,               // correct name for the API
    max_tokens: sampler?.max_completion_tokens,
    frequency_penalty: sampler?.frequencyPenalty,
    presence_penalty: sampler?.presencePenalty,
    stop: sampler?.stop,
  });

  const content = response.choices[0]?.message?.content;
  if (typeof content !== 'string') {
    throw new MalformedResponseError(`No message content in completion from ${model}`);
  }
  return content;
}
