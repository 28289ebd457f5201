import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import * as nunjucks from 'nunjucks';
import { MessageContext, ChatMessage } from './types.js';

const templatesDir = path.join(dirname(fileURLToPath(import.meta.url)), '..', 'llm_templates');

/**
 * Builds an OpenAI-compatible messages array from structured message context.
 * Everything the model should treat as standing instructions or story state goes
 * into a single system message; the turn's request is the user message.
 */
export function buildOpenAIMessages(context: MessageContext): ChatMessage[] {
  const messages: ChatMessage[] = [];
  const systemParts: string[] = [];

  if (context.preSystemPrompt) {
    systemParts.push(context.preSystemPrompt);
  }

  if (context.storyContext) {
    systemParts.push('## STORY SO FAR\n' + context.storyContext);
  }

  if (context.finalSystemPrompt) {
    systemParts.push(context.finalSystemPrompt);
  }

  if (context.jsonExample) {
    systemParts.push('## OUTPUT FORMAT\nRespond with JSON matching this structure:\n```json\n' + JSON.stringify(context.jsonExample, null, 2) + '\n```');
  }

  if (systemParts.length > 0) {
    messages.push({ role: 'system', content: systemParts.join('\n\n') });
  }

  // Some backends reject a conversation with no user turn
  messages.push({ role: 'user', content: context.userInput?.trim() || 'Continue.' });

  return messages;
}

/**
 * Render chat messages into a raw prompt string with a named chat template
 * (llm_templates/<name>.njk). Falls back to chatml when the template is missing.
 */
export function renderChatTemplate(messages: ChatMessage[], templateName: string, env: nunjucks.Environment): string {
  let templatePath = path.join(templatesDir, `${templateName}.njk`);
  if (!fs.existsSync(templatePath)) {
    templatePath = path.join(templatesDir, 'chatml.njk');
  }
  const template = fs.readFileSync(templatePath, 'utf-8');
  return env.renderString(template, { messages });
}
