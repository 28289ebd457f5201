/**
 * Structured message context that separates content from formatting.
 * This allows us to build messages differently for OpenAI vs custom LLM backends.
 */
export interface MessageContext {
  /** Pre-system prompt for the agent (role definition, base instructions) */
  preSystemPrompt?: string;

  /** Rendered story context (setting, quest, party, scene history) */
  storyContext?: string;

  /** Final system prompt for the agent (specific instructions for this turn) */
  finalSystemPrompt?: string;

  /** User input/prompt that triggered this agent */
  userInput?: string;

  /** JSON example the response must follow */
  jsonExample?: Record<string, unknown>;
}

/**
 * Chat message format for LLM APIs
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}
