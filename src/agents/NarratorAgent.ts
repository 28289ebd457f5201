import * as nunjucks from 'nunjucks';
import { BaseAgent, AgentContext } from './BaseAgent.js';
import { ConfigManager } from '../configManager.js';
import { GenerationGateway } from '../gateway/GenerationGateway.js';
import { NarratorPayload, validateNarrator } from './context/schemas.js';

const sceneExample = {
  title: 'Fog on the Causeway',
  text: 'The causeway sinks into fog as lanterns gutter behind you...',
  dmNotes: 'The ferryman is in the cult\'s pay.',
  prompt: { kind: 'action', text: 'Mira, the ferryman reaches for his hook. What do you do?', targetCharacter: 'Mira' },
  nextActor: 'Mira',
  adventureComplete: false,
  newNpcs: ['The Ferryman'],
  newLocations: ['Blackwater Causeway'],
  imageDescription: 'A foggy stone causeway at dusk, lantern light, a hooded ferryman.'
};

export class NarratorAgent extends BaseAgent {
  constructor(configManager: ConfigManager, env: nunjucks.Environment, gateway: GenerationGateway) {
    super('narrator', configManager, env, gateway);
  }

  /** Opening scene when no action is given, otherwise the scene the action produces. */
  async run(context: AgentContext): Promise<NarratorPayload> {
    const opening = context.action === undefined;
    const systemPrompt = this.renderTemplate(opening ? 'narrator-opening' : 'narrator-turn', context);
    const userInput = opening
      ? 'Begin the adventure.'
      : `${context.actingCharacter?.name ?? 'The party'}: ${context.action}`;
    this.log('Generating scene %d (%s)', context.sceneNumber, opening ? 'opening' : 'turn');
    return this.generateJson({
      preSystemPrompt: systemPrompt,
      storyContext: context.storyContext,
      userInput,
      jsonExample: sceneExample
    }, validateNarrator, 'scene');
  }
}
