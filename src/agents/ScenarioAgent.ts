import * as nunjucks from 'nunjucks';
import { BaseAgent, AgentContext } from './BaseAgent.js';
import { ConfigManager } from '../configManager.js';
import { GenerationGateway } from '../gateway/GenerationGateway.js';
import { OptionSource } from '../services/SelectionSetService.js';
import { validateOptionsEnvelope, validateScenario } from './context/schemas.js';
import type { ScenarioOption } from '../types/Scenario.js';

const scenarioExample = {
  options: [
    {
      title: 'The Drowned Bell',
      hook: 'A church bell rings beneath the lake every night, and each time a villager vanishes.',
      details: '## The Setting\n...\n## The Plot\n...\n## Main Quest\n...\n## Important NPCs\n- **Name** – role\n## Key Locations\n- **Name** – what is there'
    }
  ]
};

export class ScenarioAgent extends BaseAgent implements OptionSource<'scenario'> {
  readonly kind = 'scenario';

  constructor(configManager: ConfigManager, env: nunjucks.Environment, gateway: GenerationGateway) {
    super('scenario', configManager, env, gateway);
  }

  async requestCandidates(context: AgentContext, count: number): Promise<unknown[]> {
    const systemPrompt = this.renderTemplate('scenarios', { ...context, count });
    const envelope = await this.generateJson({
      preSystemPrompt: systemPrompt,
      userInput: `Generate ${count} scenarios.`,
      jsonExample: scenarioExample
    }, validateOptionsEnvelope, 'scenario');
    return envelope.options;
  }

  toOption(candidate: unknown): ScenarioOption | null {
    if (!validateScenario(candidate)) return null;
    return {
      title: candidate.title.trim(),
      hook: candidate.hook.trim(),
      details: candidate.details.trim()
    };
  }

  keyOf(option: ScenarioOption): string {
    return option.title.toLowerCase();
  }
}
