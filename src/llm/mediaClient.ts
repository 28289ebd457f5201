import { ImageSettings, LLMProfile, SpeechSettings } from '../configManager.js';
import type { AudioRef, ImageRef } from '../gateway/GenerationGateway.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { createOpenAIClient, MalformedResponseError } from './client.js';

const mediaLog = createLogger(NAMESPACES.llm.media);

const AUDIO_MIME: Record<SpeechSettings['format'], string> = {
  mp3: 'audio/mpeg',
  opus: 'audio/ogg',
  aac: 'audio/aac',
  flac: 'audio/flac',
  wav: 'audio/wav'
};

export async function synthesizeSpeech(
  profile: LLMProfile,
  settings: SpeechSettings,
  text: string,
  timeout?: number
): Promise<AudioRef> {
  const client = createOpenAIClient(profile, timeout);
  mediaLog('[TTS] %s voice=%s chars=%d', settings.model, settings.voice, text.length);
  const response = await client.audio.speech.create({
    model: settings.model,
    voice: settings.voice,
    input: text,
    response_format: settings.format,
  });
  const data = Buffer.from(await response.arrayBuffer());
  if (data.length === 0) {
    throw new MalformedResponseError('Speech endpoint returned no audio');
  }
  return { mimeType: AUDIO_MIME[settings.format], data, voice: settings.voice };
}

export async function generateImage(
  profile: LLMProfile,
  settings: ImageSettings,
  prompt: string,
  timeout?: number
): Promise<ImageRef> {
  const client = createOpenAIClient(profile, timeout);
  const finalPrompt = settings.stylePrefix ? `${settings.stylePrefix} ${prompt}`.trim() : prompt;
  mediaLog('[IMAGE] %s size=%s prompt=%s', settings.model, settings.size, finalPrompt.slice(0, 120));
  const response = await client.images.generate({
    model: settings.model,
    prompt: finalPrompt,
    n: 1,
    size: settings.size,
    response_format: 'b64_json',
  });
  const image = response.data?.[0];
  if (image?.b64_json) {
    return { mimeType: 'image/png', prompt: finalPrompt, base64: image.b64_json };
  }
  if (image?.url) {
    return { mimeType: 'image/png', prompt: finalPrompt, url: image.url };
  }
  throw new MalformedResponseError('Image endpoint returned no image data');
}
