import * as nunjucks from 'nunjucks';
import { BaseAgent, AgentContext } from './BaseAgent.js';
import { ConfigManager } from '../configManager.js';
import { GenerationGateway } from '../gateway/GenerationGateway.js';
import { OptionSource } from '../services/SelectionSetService.js';
import { validateCharacter, validateOptionsEnvelope } from './context/schemas.js';
import type { Character } from '../types/Character.js';

const characterExample = {
  options: [
    {
      name: 'Thalion',
      description: 'A quiet ranger from the northern pines who tracks by moonlight.',
      abilities: ['tracking', 'longbow', 'herbalism'],
      strength: 12,
      intelligence: 11,
      agility: 16,
      maximumHealth: 90
    }
  ]
};

export class CharacterAgent extends BaseAgent implements OptionSource<'character'> {
  readonly kind = 'character';

  constructor(configManager: ConfigManager, env: nunjucks.Environment, gateway: GenerationGateway) {
    super('character', configManager, env, gateway);
  }

  async requestCandidates(context: AgentContext, count: number): Promise<unknown[]> {
    const systemPrompt = this.renderTemplate('characters', { ...context, count });
    const envelope = await this.generateJson({
      preSystemPrompt: systemPrompt,
      userInput: `Generate ${count} characters.`,
      jsonExample: characterExample
    }, validateOptionsEnvelope, 'character');
    return envelope.options;
  }

  toOption(candidate: unknown): Character | null {
    if (!validateCharacter(candidate)) return null;
    return {
      name: candidate.name.trim(),
      description: candidate.description.trim(),
      abilities: candidate.abilities.map(a => a.trim()).filter(a => a.length > 0),
      strength: candidate.strength,
      intelligence: candidate.intelligence,
      agility: candidate.agility,
      maximumHealth: candidate.maximumHealth,
      currentHealth: candidate.maximumHealth
    };
  }

  keyOf(option: Character): string {
    return option.name.toLowerCase();
  }
}
