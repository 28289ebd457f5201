import OpenAI from 'openai';
import axios from 'axios';
import * as nunjucks from 'nunjucks';
import { ConfigManager } from '../configManager.js';
import { chatCompletion, MalformedResponseError } from '../llm/client.js';
import { customLLMRequest } from '../llm/customClient.js';
import { generateImage, synthesizeSpeech } from '../llm/mediaClient.js';
import { renderChatTemplate } from '../llm/messageBuilder.js';
import { createLogger, NAMESPACES } from '../logging.js';
import {
  AudioRef,
  fail,
  GenerationFailure,
  GenerationGateway,
  ImageRef,
  ok,
  Result,
  TextGenerationRequest
} from './GenerationGateway.js';

const gatewayLog = createLogger(NAMESPACES.gateway);

/**
 * Map anything thrown by the transports onto the gateway's failure kinds.
 */
export function normalizeFailure(error: unknown): GenerationFailure {
  if (error instanceof MalformedResponseError) {
    return { kind: 'malformed', detail: error.message };
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return { kind: 'timeout', detail: error.message };
  }
  if (error instanceof OpenAI.APIError) {
    return { kind: 'provider', detail: error.message, status: error.status };
  }
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return { kind: 'timeout', detail: error.message };
    }
    return { kind: 'provider', detail: error.message, status: error.response?.status };
  }
  if (error instanceof Error) {
    return { kind: 'provider', detail: error.message };
  }
  return { kind: 'provider', detail: String(error) };
}

export class LlmGenerationGateway implements GenerationGateway {
  constructor(
    private readonly configManager: ConfigManager,
    private readonly env: nunjucks.Environment
  ) {}

  private get timeout(): number {
    return this.configManager.getFeatures().requestTimeoutMs;
  }

  async generateText(request: TextGenerationRequest): Promise<Result<string, GenerationFailure>> {
    try {
      const profile = this.configManager.resolveAgentProfile(request.agent);
      let raw: string;
      if (profile.type === 'custom') {
        const prompt = renderChatTemplate(request.messages, profile.template || 'chatml', this.env);
        raw = await customLLMRequest(profile, prompt, { timeout: this.timeout });
      } else {
        raw = await chatCompletion(profile, request.messages, { timeout: this.timeout });
      }
      if (!raw.trim()) {
        return fail({ kind: 'malformed', detail: `Empty completion for agent ${request.agent}` });
      }
      return ok(raw);
    } catch (error) {
      const failure = normalizeFailure(error);
      gatewayLog('[TEXT] agent=%s failed kind=%s detail=%s', request.agent, failure.kind, failure.detail);
      return fail(failure);
    }
  }

  async generateSpeech(text: string): Promise<Result<AudioRef, GenerationFailure>> {
    const settings = this.configManager.getSpeechSettings();
    if (!settings) {
      return fail({ kind: 'disabled', detail: 'No speech settings configured' });
    }
    try {
      const profile = this.configManager.getProfile(settings.profile);
      return ok(await synthesizeSpeech(profile, settings, text, this.timeout));
    } catch (error) {
      const failure = normalizeFailure(error);
      gatewayLog('[SPEECH] failed kind=%s detail=%s', failure.kind, failure.detail);
      return fail(failure);
    }
  }

  async generateImage(description: string): Promise<Result<ImageRef, GenerationFailure>> {
    const settings = this.configManager.getImageSettings();
    if (!settings) {
      return fail({ kind: 'disabled', detail: 'No image settings configured' });
    }
    try {
      const profile = this.configManager.getProfile(settings.profile);
      return ok(await generateImage(profile, settings, description, this.timeout));
    } catch (error) {
      const failure = normalizeFailure(error);
      gatewayLog('[IMAGE] failed kind=%s detail=%s', failure.kind, failure.detail);
      return fail(failure);
    }
  }
}
