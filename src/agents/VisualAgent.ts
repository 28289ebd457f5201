import * as nunjucks from 'nunjucks';
import { BaseAgent, AgentContext } from './BaseAgent.js';
import { ConfigManager } from '../configManager.js';
import { GenerationGateway } from '../gateway/GenerationGateway.js';

export class VisualAgent extends BaseAgent {
  constructor(configManager: ConfigManager, env: nunjucks.Environment, gateway: GenerationGateway) {
    super('visual', configManager, env, gateway);
  }

  /** Turn scene narration into an illustrator prompt. */
  async run(context: AgentContext): Promise<string> {
    const systemPrompt = this.renderTemplate('visual', context);
    const response = await this.generate(this.buildMessages({
      preSystemPrompt: systemPrompt,
      userInput: 'Write the image description.'
    }), 'image-description');
    const prompt = response.replace(/^["']|["']$/g, '').trim();
    this.log('Image description: %s', prompt);
    return prompt;
  }
}
