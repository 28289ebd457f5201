import * as nunjucks from 'nunjucks';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { dirname } from 'path';
import type { ValidateFunction } from 'ajv';
import { ConfigManager } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { GenerationGateway } from '../gateway/GenerationGateway.js';
import { GenerationError } from '../engine/errors.js';
import { MessageContext, ChatMessage } from '../llm/types.js';
import { buildOpenAIMessages } from '../llm/messageBuilder.js';
import { describeErrors, parseModelJson } from './context/jsonValidation.js';
import type { Character } from '../types/Character.js';
import type { ScenarioOption } from '../types/Scenario.js';

export interface AgentContext {
  storyContext?: string;
  count?: number; // For option agents - how many candidates to ask for
  partySize?: number; // For CharacterAgent
  excludeNames?: readonly string[]; // For CharacterAgent - names already taken by earlier players
  scenario?: ScenarioOption; // For CharacterAgent
  setting?: string; // For VisualAgent
  party?: readonly Character[]; // For NarratorAgent
  action?: string; // For NarratorAgent - the submitted player action
  actingCharacter?: Character; // For NarratorAgent - who took the action
  rotationCandidate?: Character; // For NarratorAgent - who acts next if the story doesn't say
  sceneNumber?: number; // For NarratorAgent
  sceneText?: string; // For VisualAgent
}

const promptsDir = path.join(dirname(fileURLToPath(import.meta.url)), '..', 'prompts');

export abstract class BaseAgent {
  protected configManager: ConfigManager;
  protected env: nunjucks.Environment;
  protected gateway: GenerationGateway;
  readonly agentName: string;
  protected readonly log: ReturnType<typeof createLogger>;
  private readonly baseAgentLog = createLogger(NAMESPACES.agents.base);

  constructor(agentName: string, configManager: ConfigManager, env: nunjucks.Environment, gateway: GenerationGateway) {
    this.agentName = agentName;
    this.configManager = configManager;
    this.env = env;
    this.gateway = gateway;
    this.log = createLogger(`adventure:agents:${agentName}`);
    this.env.addFilter('json', (obj: unknown) => JSON.stringify(obj, null, 2));
  }

  protected renderTemplate(templateName: string, context: AgentContext): string {
    const templatePath = path.join(promptsDir, `${templateName}.njk`);
    const template = fs.readFileSync(templatePath, 'utf-8');
    const result = this.env.renderString(template, context);
    const preview = result.substring(0, 500) + (result.length > 500 ? '...' : '');
    this.baseAgentLog('Rendered template for %s: %s', templateName, preview);
    return result;
  }

  protected buildMessages(context: MessageContext): ChatMessage[] {
    return buildOpenAIMessages(context);
  }

  /**
   * Plain-text call. Gateway failures surface as GenerationError for the step.
   */
  protected async generate(messages: ChatMessage[], step: string): Promise<string> {
    const result = await this.gateway.generateText({ agent: this.agentName, messages });
    if (!result.ok) {
      throw new GenerationError(step, result.error);
    }
    return this.cleanResponse(result.value);
  }

  /**
   * JSON call validated against a compiled schema. An invalid reply is asked
   * for again (up to features.jsonValidationMaxRetries) with the validation
   * errors appended; after that the step fails as malformed.
   */
  protected async generateJson<T>(context: MessageContext, validator: ValidateFunction<T>, step: string): Promise<T> {
    const maxValidationRetries = Math.max(0, this.configManager.getFeatures().jsonValidationMaxRetries);
    let errors: string[] = [];

    for (let attempt = 0; attempt <= maxValidationRetries; attempt++) {
      const contextForAttempt: MessageContext = attempt === 0
        ? context
        : {
            ...context,
            userInput: `${context.userInput ?? ''}\n\n[VALIDATION RETRY]\nPrevious response had invalid JSON (${errors.join('; ') || 'invalid format'}). Return valid JSON only, matching the expected structure. No commentary.`
          };

      const raw = await this.generate(this.buildMessages(contextForAttempt), step);
      const parsed = parseModelJson(raw);
      if (!parsed) {
        errors = ['parse_failed'];
      } else if (validator(parsed.parsed)) {
        if (parsed.repaired) {
          this.baseAgentLog('[JSON VALIDATION] agent=%s accepted repaired JSON', this.agentName);
        }
        return parsed.parsed;
      } else {
        errors = describeErrors(validator);
      }
      this.baseAgentLog('[JSON VALIDATION] agent=%s attempt=%d errors=%o', this.agentName, attempt + 1, errors);
    }

    throw new GenerationError(step, {
      kind: 'malformed',
      detail: `Invalid JSON after ${maxValidationRetries + 1} attempts: ${errors.join('; ')}`
    });
  }

  protected cleanResponse(response: string): string {
    // Reasoning models sometimes leak their scratchpad
    return response.replace(/<think(?:ing)?>[\s\S]*?<\/think(?:ing)?>/gi, '').trim();
  }
}
