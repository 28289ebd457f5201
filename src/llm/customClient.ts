import axios from 'axios';
import { LLMProfile } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { MalformedResponseError } from './client.js';

const customLog = createLogger(NAMESPACES.llm.custom);

export interface CustomClientOptions {
  timeout?: number;
}

interface CompletionChoice {
  text?: string;
  message?: { content?: string };
}

interface CompletionResponse {
  choices?: CompletionChoice[];
  result?: string;
}

/**
 * Custom LLM client using axios for non-OpenAI compatible endpoints.
 * Sends raw rendered prompts directly to the LLM backend.
 */
export async function customLLMRequest(
  profile: LLMProfile,
  renderedPrompt: string,
  options: CustomClientOptions = {}
): Promise<string> {
  const { timeout = 120000 } = options;

  customLog('[Custom LLM] Posting to %s with model %s', profile.baseURL, profile.model);

  // Construct request body based on common LLM API patterns
  const requestBody = {
    prompt: renderedPrompt,
    model: profile.model,
    max_tokens: profile.sampler?.max_completion_tokens || 512,
    temperature: profile.sampler?.temperature || 0.7,
    top_p: profile.sampler?.topP || 0.9,
    ...(profile.sampler?.frequencyPenalty !== undefined && { frequency_penalty: profile.sampler.frequencyPenalty }),
    ...(profile.sampler?.presencePenalty !== undefined && { presence_penalty: profile.sampler.presencePenalty }),
    ...(profile.sampler?.stop && profile.sampler.stop.length > 0 && { stop: profile.sampler.stop }),
  };

  const response = await axios.post<CompletionResponse>(`${profile.baseURL}/completions`, requestBody, {
    timeout,
    headers: {
      'Content-Type': 'application/json',
      ...(profile.apiKey && { Authorization: `Bearer ${profile.apiKey}` }),
    },
  });

  // Handle various response formats
  const data = response.data;
  if (data.choices && data.choices.length > 0) {
    const choice = data.choices[0];
    // Support both 'text' (completions API) and 'message.content' (chat format)
    const text = choice.text ?? choice.message?.content;
    if (typeof text === 'string') return text;
  }

  if (typeof data.result === 'string') {
    return data.result;
  }

  throw new MalformedResponseError(`Unexpected response format from ${profile.baseURL}`);
}
