import debug from 'debug';

export const NAMESPACES = {
  engine: {
    turn: 'adventure:engine:turn',
    orchestrator: 'adventure:engine:orchestrator'
  },
  services: {
    selection: 'adventure:services:selection',
    story: 'adventure:services:story',
    narration: 'adventure:services:narration',
    registry: 'adventure:services:registry'
  },
  agents: {
    base: 'adventure:agents:base',
    scenario: 'adventure:agents:scenario',
    character: 'adventure:agents:character',
    narrator: 'adventure:agents:narrator',
    visual: 'adventure:agents:visual'
  },
  gateway: 'adventure:gateway',
  llm: {
    client: 'adventure:llm:client',
    custom: 'adventure:llm:custom',
    media: 'adventure:llm:media'
  },
  config: 'adventure:config'
} as const;

export const createLogger = (namespace: string) => debug(namespace);

/**
 * Turn on the namespaces named in config. An explicit DEBUG env var wins.
 */
export function applyDebugSettings(settings?: { enabledNamespaces?: string }): void {
  if (process.env.DEBUG) return;
  if (settings?.enabledNamespaces) {
    debug.enable(settings.enabledNamespaces);
  }
}
