import * as nunjucks from 'nunjucks';
import { ConfigManager } from './configManager.js';
import { applyDebugSettings } from './logging.js';
import type { GenerationGateway } from './gateway/GenerationGateway.js';
import { LlmGenerationGateway } from './gateway/LlmGenerationGateway.js';
import { TurnEngine, type TurnEngineAgents } from './engine/TurnEngine.js';
import { SessionRegistry } from './services/SessionRegistry.js';

export * from './engine/errors.js';
export * from './engine/AdventureSession.js';
export * from './engine/AdventureOrchestrator.js';
export * from './engine/TurnEngine.js';
export * from './services/SessionRegistry.js';
export * from './services/SelectionSetService.js';
export * from './services/StoryState.js';
export * from './services/NarrationCoordinator.js';
export * from './gateway/GenerationGateway.js';
export { LlmGenerationGateway, normalizeFailure } from './gateway/LlmGenerationGateway.js';
export { ConfigManager } from './configManager.js';
export type { Config, FeatureSettings, LLMProfile } from './configManager.js';
export type { Character } from './types/Character.js';
export type { ScenarioOption, NamedEntity } from './types/Scenario.js';
export type { Scene, ScenePrompt, ScenePromptKind, EnrichmentMedia } from './types/Scene.js';

export interface AdventureRuntime {
  configManager: ConfigManager;
  gateway: GenerationGateway;
  engine: TurnEngine;
  registry: SessionRegistry;
}

export interface RuntimeOptions {
  configManager?: ConfigManager;
  gateway?: GenerationGateway;
  agents?: Partial<TurnEngineAgents>;
}

/**
 * Wire config, logging, the generation gateway and the turn engine into a
 * registry ready to host adventures.
 */
export function createAdventureRuntime(options: RuntimeOptions = {}): AdventureRuntime {
  const configManager = options.configManager ?? new ConfigManager();
  applyDebugSettings(configManager.getConfig().debug);

  const env = new nunjucks.Environment(null, { autoescape: false });
  const gateway = options.gateway ?? new LlmGenerationGateway(configManager, env);
  const engine = new TurnEngine(configManager, env, gateway, options.agents);
  const registry = new SessionRegistry(engine, configManager);

  return { configManager, gateway, engine, registry };
}
