import { describe, it, expect } from 'vitest';
import { createAdventureRuntime } from '../index.js';
import { ScriptedGateway } from './fixtures/scriptedGateway.js';
import { charactersReply, sceneReply, scenariosReply, testConfig } from './fixtures/payloads.js';

function runtime() {
  const gateway = new ScriptedGateway();
  const { registry } = createAdventureRuntime({ configManager: testConfig(), gateway });
  return { gateway, registry };
}

describe('SessionRegistry', () => {
  it('creates independent sessions and looks them up by id', () => {
    const { registry } = runtime();
    const first = registry.create();
    const second = registry.create({ id: 'table-2' });

    expect(second.id).toBe('table-2');
    expect(first.id).not.toBe(second.id);
    expect(registry.get('table-2')).toBe(second);
    expect(registry.get('missing')).toBeUndefined();
    expect(() => registry.create({ id: 'table-2' })).toThrow('Session table-2 already exists');
  });

  it('summarises live sessions', async () => {
    const { gateway, registry } = runtime();
    const idle = registry.create({ id: 'idle' });
    const playing = registry.create({ id: 'playing' });
    gateway.reply('scenario', scenariosReply(['The Sunken Vault', 'Ashes of Varn', 'The Glass Road']));
    gateway.reply('character', charactersReply(['Ana', 'Bo', 'Cy', 'Di', 'Ed', 'Flo']));
    gateway.reply('narrator', sceneReply());

    await playing.submitPlayerCount(1);
    await playing.submitScenarioChoice(0);
    await playing.submitCharacterChoice(0, 4);

    expect(idle.phase.kind).toBe('AwaitingPlayerCount');
    expect(registry.list()).toEqual([
      { id: 'idle', players: [], scenes: 0, phase: 'AwaitingPlayerCount' },
      { id: 'playing', title: 'The Sunken Vault', players: ['Ed'], scenes: 1, phase: 'AwaitingAction(0)' }
    ]);
  });

  it('abandons a session when it is removed', () => {
    const { registry } = runtime();
    const adventure = registry.create({ id: 'gone' });

    expect(registry.remove('gone')).toBe(true);
    expect(adventure.session.abandoned).toBe(true);
    expect(registry.get('gone')).toBeUndefined();
    expect(registry.remove('gone')).toBe(false);
    expect(registry.size).toBe(0);
  });
});
