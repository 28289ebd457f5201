import { describe, it, expect } from 'vitest';
import { TurnEngine } from '../engine/TurnEngine.js';
import { AdventureOrchestrator } from '../engine/AdventureOrchestrator.js';
import { AdventureSession, describePhase } from '../engine/AdventureSession.js';
import {
  ChoiceError,
  GenerationError,
  InsufficientOptions,
  InvalidStateTransition,
  MalformedScenario,
  ValidationError,
  WrongTurn
} from '../engine/errors.js';
import { fail } from '../gateway/GenerationGateway.js';
import type { FeatureSettings } from '../configManager.js';
import { ScriptedGateway, TEST_AUDIO, TEST_IMAGE } from './fixtures/scriptedGateway.js';
import { charactersReply, sceneReply, scenariosReply, testConfig, testEnv } from './fixtures/payloads.js';

const SCENARIOS = ['The Sunken Vault', 'Ashes of Varn', 'The Glass Road'];

function setup(features: Partial<FeatureSettings> = {}) {
  const gateway = new ScriptedGateway();
  const config = testConfig(features);
  const engine = new TurnEngine(config, testEnv(), gateway);
  const adventure = new AdventureOrchestrator(engine, config);
  return { gateway, engine, adventure };
}

/** Six distinct candidates with `name` first. */
function characterSetFor(name: string) {
  return charactersReply([name, ...['One', 'Two', 'Three', 'Four', 'Five'].map(n => `${name} Alt ${n}`)]);
}

/** Queue everything up to and including the opening scene, then play it through. */
async function assemble(gateway: ScriptedGateway, adventure: AdventureOrchestrator, names: string[], opening = sceneReply()) {
  gateway.reply('scenario', scenariosReply(SCENARIOS));
  names.forEach(name => gateway.reply('character', characterSetFor(name)));
  gateway.reply('narrator', opening);

  await adventure.submitPlayerCount(names.length);
  await adventure.submitScenarioChoice(0);
  for (let p = 0; p < names.length; p++) {
    await adventure.submitCharacterChoice(p, 0);
  }
}

describe('TurnEngine', () => {
  it('runs a two-player adventure from player count to completion', async () => {
    const { gateway, adventure } = setup();
    const phases: string[] = [];
    adventure.onPhaseChange(phase => phases.push(describePhase(phase)));

    await assemble(gateway, adventure, ['Ana', 'Bo']);

    expect(phases).toEqual([
      'AwaitingScenarioChoice',
      'AwaitingCharacterChoice(0)',
      'AwaitingCharacterChoice(1)',
      'PartyAssembled',
      'AwaitingAction(0)'
    ]);
    const opening = adventure.session.sceneHistory[0];
    expect(opening.prompt).toEqual({ kind: 'action', text: 'Ana, what do you do?', targetCharacter: 'Ana' });
    expect(opening.promptingCharacterIndex).toBe(0);
    expect(gateway.callsFor('narrator')[0].messages[1].content).toBe('Begin the adventure.');

    gateway.reply('narrator', sceneReply({ title: 'Below', text: 'You sink into cold water.' }));
    const second = await adventure.submitAction(0, '  I dive in ');

    expect(second).toMatchObject({ id: 2, title: 'Below', action: 'I dive in', actingCharacterIndex: 0, promptingCharacterIndex: 1 });
    expect(second.prompt?.targetCharacter).toBe('Bo');
    expect(adventure.phase).toEqual({ kind: 'AwaitingAction', characterIndex: 1 });
    const turnCall = gateway.callsFor('narrator')[1];
    expect(turnCall.messages[1].content).toBe('Ana: I dive in');
    expect(turnCall.messages[0].content).toContain('## STORY SO FAR\n# The Sunken Vault');
    expect(turnCall.messages[0].content).toContain('### Scene 1: At the Gate');

    gateway.reply('narrator', sceneReply({ title: 'Sealed', text: 'The vault door grinds shut.', adventureComplete: true }));
    const last = await adventure.submitAction(1, 'I seal the vault');

    expect(last.prompt).toBeUndefined();
    expect(last.promptingCharacterIndex).toBeUndefined();
    expect(adventure.phase).toEqual({ kind: 'Completed' });
    expect(adventure.session.sceneHistory.map(s => s.id)).toEqual([1, 2, 3]);
    await expect(adventure.submitAction(0, 'one more thing')).rejects.toBeInstanceOf(InvalidStateTransition);

    const outcomes = await adventure.settle();
    expect(outcomes.map(o => [o.sceneId, o.narration, o.image])).toEqual([
      [1, 'attached', 'attached'],
      [2, 'attached', 'attached'],
      [3, 'attached', 'attached']
    ]);
    expect(adventure.session.sceneHistory[2].narrationAudio).toBe(TEST_AUDIO);
  });

  it('stops at PartyAssembled when driven without the orchestrator', async () => {
    const { gateway, engine } = setup();
    const session = new AdventureSession({ maxPlayers: 4 });
    gateway.reply('scenario', scenariosReply(SCENARIOS));
    gateway.reply('character', characterSetFor('Ana'));
    gateway.reply('narrator', sceneReply());

    await engine.submitPlayerCount(session, 1);
    await engine.submitScenarioChoice(session, 2);
    await engine.submitCharacterChoice(session, 0, 3);

    expect(session.phase).toEqual({ kind: 'PartyAssembled' });
    expect(session.party.map(c => c.name)).toEqual(['Ana Alt Three']);
    expect(session.story.title).toBe('The Glass Road');

    const opening = await engine.startAdventure(session);
    expect(opening.id).toBe(1);
    expect(session.phase).toEqual({ kind: 'AwaitingAction', characterIndex: 0 });
  });

  it('puts the scene text in the story before narration and imagery finish', async () => {
    const { gateway, adventure } = setup();
    const release = gateway.holdMedia();

    await assemble(gateway, adventure, ['Ana']);

    const scene = adventure.session.sceneHistory[0];
    expect(scene.text).toBe('Water laps at the broken gate.');
    expect(scene.enrichment).toBe('pending');
    expect(scene.narrationAudio).toBeUndefined();

    release();
    await adventure.settle();
    expect(scene.enrichment).toBe('complete');
    expect(scene.image).toBe(TEST_IMAGE);
  });

  it('finishes enriching a scene before the next one is appended', async () => {
    const { gateway, adventure } = setup();
    const release = gateway.holdMedia();
    await assemble(gateway, adventure, ['Ana']);

    gateway.reply('narrator', sceneReply({ title: 'Onward' }));
    const pending = adventure.submitAction(0, 'I wade through');
    await new Promise(resolve => setTimeout(resolve, 0));

    expect(adventure.session.sceneHistory).toHaveLength(1);
    expect(adventure.session.sceneHistory[0].enrichment).toBe('pending');

    release();
    const next = await pending;
    const first = adventure.session.sceneHistory[0];

    expect(next.title).toBe('Onward');
    expect(adventure.session.sceneHistory).toHaveLength(2);
    expect(first.enrichment).toBe('complete');
    expect(first.narrationAudio).toBe(TEST_AUDIO);
    expect(first.image).toBe(TEST_IMAGE);

    const outcomes = await adventure.settle();
    expect(outcomes.map(o => o.sceneId)).toEqual([1, 2]);
    expect(first.narrationAudio).toBe(TEST_AUDIO);
    expect(first.degraded).toEqual([]);
  });

  it('rejects an invalid player count without leaving AwaitingPlayerCount', async () => {
    const { gateway, adventure } = setup();

    for (const count of [0, 5, 1.5]) {
      await expect(adventure.submitPlayerCount(count)).rejects.toBeInstanceOf(ValidationError);
    }
    expect(adventure.phase).toEqual({ kind: 'AwaitingPlayerCount' });
    expect(adventure.session.playerCount).toBeUndefined();
    expect(gateway.callsFor('scenario')).toHaveLength(0);
  });

  it('rejects operations made in the wrong phase', async () => {
    const { adventure } = setup();

    await expect(adventure.submitScenarioChoice(0)).rejects.toBeInstanceOf(InvalidStateTransition);
    await expect(adventure.submitCharacterChoice(0, 0)).rejects.toBeInstanceOf(InvalidStateTransition);
    await expect(adventure.submitAction(0, 'look around')).rejects.toBeInstanceOf(InvalidStateTransition);
    expect(adventure.phase).toEqual({ kind: 'AwaitingPlayerCount' });
  });

  it('lets the player retry after an out-of-range choice', async () => {
    const { gateway, adventure } = setup();
    gateway.reply('scenario', scenariosReply(SCENARIOS));
    gateway.reply('character', characterSetFor('Ana'));
    await adventure.submitPlayerCount(1);

    await expect(adventure.submitScenarioChoice(3)).rejects.toBeInstanceOf(ChoiceError);
    expect(adventure.phase).toEqual({ kind: 'AwaitingScenarioChoice' });

    await adventure.submitScenarioChoice(1);
    expect(adventure.session.scenario?.title).toBe('Ashes of Varn');
    expect(adventure.phase).toEqual({ kind: 'AwaitingCharacterChoice', playerIndex: 0 });
  });

  it('rejects a character choice from the wrong player', async () => {
    const { gateway, adventure } = setup();
    gateway.reply('scenario', scenariosReply(SCENARIOS));
    gateway.reply('character', characterSetFor('Ana'));
    await adventure.submitPlayerCount(2);
    await adventure.submitScenarioChoice(0);

    await expect(adventure.submitCharacterChoice(1, 0)).rejects.toBeInstanceOf(WrongTurn);
    expect(adventure.session.pendingParty).toEqual([]);
    expect(adventure.phase).toEqual({ kind: 'AwaitingCharacterChoice', playerIndex: 0 });
  });

  it('keeps characters already taken out of later players\' options', async () => {
    const { gateway, adventure } = setup();
    gateway.reply('scenario', scenariosReply(SCENARIOS));
    gateway.reply('character', characterSetFor('Ana'));
    gateway.reply('character', charactersReply(['Ana', 'Bo', 'Cy', 'Di', 'Ed', 'Flo', 'Gus']));
    await adventure.submitPlayerCount(2);
    await adventure.submitScenarioChoice(0);
    await adventure.submitCharacterChoice(0, 0);

    const { options } = adventure.view({ showDmNotes: false });
    expect(options?.kind).toBe('character');
    const names = options?.kind === 'character' ? options.options.map(c => c.name) : [];
    expect(names).toEqual(['Bo', 'Cy', 'Di', 'Ed', 'Flo', 'Gus']);
    expect(options).toMatchObject({ playerIndex: 1 });
    expect(gateway.callsFor('character')[1].messages[0].content)
      .toContain('These names are already taken by other players and must not be used: Ana.');
  });

  it('rejects an action from a character whose turn it is not, leaving history unchanged', async () => {
    const { gateway, adventure } = setup();
    await assemble(gateway, adventure, ['Ana', 'Bo']);

    let thrown: unknown;
    try {
      await adventure.submitAction(1, 'I steal the turn');
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(WrongTurn);
    expect(thrown).toMatchObject({ expected: 0, received: 1 });
    expect(adventure.session.sceneHistory).toHaveLength(1);
    expect(adventure.phase).toEqual({ kind: 'AwaitingAction', characterIndex: 0 });
    expect(gateway.callsFor('narrator')).toHaveLength(1);
  });

  it('rejects an empty action', async () => {
    const { gateway, adventure } = setup();
    await assemble(gateway, adventure, ['Ana']);

    await expect(adventure.submitAction(0, '   ')).rejects.toBeInstanceOf(ValidationError);
    expect(gateway.callsFor('narrator')).toHaveLength(1);
  });

  it('rejects a second request while one is in flight', async () => {
    const { gateway, adventure } = setup();
    await assemble(gateway, adventure, ['Ana']);
    gateway.reply('narrator', sceneReply({ title: 'Waiting' }));

    const first = adventure.submitAction(0, 'I wait');
    await expect(adventure.submitAction(0, 'I wait again')).rejects.toThrow(/busy/);
    await first;

    expect(adventure.session.sceneHistory.map(s => s.title)).toEqual(['At the Gate', 'Waiting']);
  });

  it('rotates the turn through the party in order', async () => {
    const { gateway, adventure } = setup();
    await assemble(gateway, adventure, ['Ana', 'Bo', 'Cy']);

    const prompted: number[] = [];
    for (const actor of [0, 1, 2]) {
      gateway.reply('narrator', sceneReply());
      const scene = await adventure.submitAction(actor, 'I press on');
      prompted.push(scene.promptingCharacterIndex ?? -1);
    }

    expect(prompted).toEqual([1, 2, 0]);
  });

  it('lets the narrative hand the turn to a named party member for one turn', async () => {
    const { gateway, adventure } = setup();
    await assemble(gateway, adventure, ['Ana', 'Bo', 'Cy'], sceneReply({ nextActor: 'Cy' }));

    expect(adventure.phase).toEqual({ kind: 'AwaitingAction', characterIndex: 2 });
    expect(adventure.session.sceneHistory[0].prompt).toEqual({ kind: 'action', text: 'Cy, what do you do?', targetCharacter: 'Cy' });

    gateway.reply('narrator', sceneReply({
      prompt: { kind: 'dice_check', text: 'Bo, roll to leap the gap.', targetCharacter: 'bo' }
    }));
    const scene = await adventure.submitAction(2, 'I light the torch');

    expect(scene.prompt).toEqual({ kind: 'dice_check', text: 'Bo, roll to leap the gap.', targetCharacter: 'Bo', diceType: 'd20', diceCount: 1 });
    expect(adventure.phase).toEqual({ kind: 'AwaitingAction', characterIndex: 1 });

    gateway.reply('narrator', sceneReply());
    await adventure.submitAction(1, 'I leap');
    expect(adventure.phase).toEqual({ kind: 'AwaitingAction', characterIndex: 2 });
  });

  it('marks narration as degraded when speech fails and carries on', async () => {
    const { gateway, adventure } = setup();
    gateway.speechResult = fail({ kind: 'provider', detail: 'voice unavailable', status: 503 });

    await assemble(gateway, adventure, ['Ana']);
    await adventure.settle();

    const scene = adventure.session.sceneHistory[0];
    expect(scene.degraded).toEqual(['narration']);
    expect(scene.image).toBe(TEST_IMAGE);
    expect(adventure.phase).toEqual({ kind: 'AwaitingAction', characterIndex: 0 });
    expect(adventure.view().latestScene?.degraded).toEqual(['narration']);
  });

  it('discards enrichment that lands after the adventure is abandoned', async () => {
    const { gateway, adventure } = setup();
    const release = gateway.holdMedia();
    await assemble(gateway, adventure, ['Ana']);

    adventure.abandon();
    release();
    const [outcome] = await adventure.settle();

    expect(outcome).toEqual({ sceneId: 1, narration: 'skipped', image: 'skipped' });
    expect(adventure.session.sceneHistory[0].narrationAudio).toBeUndefined();
  });

  describe('failures at mandatory steps', () => {
    it('fails the session when too few scenarios come back', async () => {
      const { gateway, adventure } = setup();
      gateway.reply('scenario', scenariosReply(['The Sunken Vault', 'the sunken vault', 'Ashes of Varn']));

      await expect(adventure.submitPlayerCount(2)).rejects.toBeInstanceOf(InsufficientOptions);

      expect(adventure.phase).toEqual({ kind: 'Failed', reason: 'Expected 3 distinct options, model produced 2' });
      expect(adventure.view().error).toBe('Expected 3 distinct options, model produced 2');
      await expect(adventure.submitPlayerCount(2)).rejects.toBeInstanceOf(InvalidStateTransition);
    });

    it('fails the session when the chosen scenario has no main quest', async () => {
      const { gateway, adventure } = setup();
      gateway.reply('scenario', {
        options: SCENARIOS.map(title => ({ title, hook: 'A hook.', details: '## The Setting\nA marsh.\n## The Plot\nA witch.' }))
      });
      await adventure.submitPlayerCount(1);

      await expect(adventure.submitScenarioChoice(0)).rejects.toBeInstanceOf(MalformedScenario);
      expect(adventure.phase.kind).toBe('Failed');
      expect(gateway.callsFor('character')).toHaveLength(0);
    });

    it('fails the session when the opening scene cannot be generated', async () => {
      const { gateway, adventure } = setup();
      gateway.reply('scenario', scenariosReply(SCENARIOS));
      gateway.reply('character', characterSetFor('Ana'));
      gateway.failText('narrator', { kind: 'timeout', detail: 'no answer in time' });
      await adventure.submitPlayerCount(1);
      await adventure.submitScenarioChoice(0);

      let thrown: unknown;
      try {
        await adventure.submitCharacterChoice(0, 0);
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(GenerationError);
      expect(thrown).toMatchObject({ step: 'scene', failure: { kind: 'timeout' } });
      expect(adventure.phase).toEqual({ kind: 'Failed', reason: 'scene generation failed (timeout): no answer in time' });
      expect(adventure.session.sceneHistory).toHaveLength(0);
      expect(adventure.session.party.map(c => c.name)).toEqual(['Ana']);
      expect(gateway.callsFor('narrator')).toHaveLength(1);
    });

    it('asks once more when the scene does not match the expected format', async () => {
      const { gateway, adventure } = setup();
      await assemble(gateway, adventure, ['Ana']);
      gateway.reply('narrator', { title: 'No text here' }, sceneReply({ title: 'Second Try' }));

      const scene = await adventure.submitAction(0, 'I listen');

      expect(scene.title).toBe('Second Try');
      const calls = gateway.callsFor('narrator');
      expect(calls).toHaveLength(3);
      expect(calls[2].messages[1].content).toContain('[VALIDATION RETRY]');
    });

    it('fails the session when the scene stays malformed', async () => {
      const { gateway, adventure } = setup();
      await assemble(gateway, adventure, ['Ana']);
      gateway.reply('narrator', { title: 'No text' }, { title: 'Still no text' });

      await expect(adventure.submitAction(0, 'I listen')).rejects.toMatchObject({ failure: { kind: 'malformed' } });
      expect(adventure.phase.kind).toBe('Failed');
      expect(adventure.session.sceneHistory).toHaveLength(1);
    });
  });
});

describe('AdventureOrchestrator.view', () => {
  it('hides DM notes unless asked for them', async () => {
    const { gateway, adventure } = setup();
    gateway.reply('scenario', scenariosReply(SCENARIOS));
    await adventure.submitPlayerCount(1);

    expect(adventure.session.selection?.presented).toBe(false);
    const hidden = adventure.view({ showDmNotes: false });
    expect(adventure.session.selection?.presented).toBe(true);
    expect(hidden.options).toEqual({
      kind: 'scenario',
      options: SCENARIOS.map(title => ({ title, hook: `Hook for ${title}.` }))
    });

    const shown = adventure.view({ showDmNotes: true });
    expect(shown.options?.kind === 'scenario' && shown.options.options[0].details).toContain('## Main Quest');
  });

  it('shows scene and story DM notes only with the toggle', async () => {
    const { gateway, adventure } = setup();
    await assemble(gateway, adventure, ['Ana'], sceneReply({ dmNotes: 'The gate is trapped.' }));

    const hidden = adventure.view({ showDmNotes: false });
    expect(hidden.title).toBe('The Sunken Vault');
    expect(hidden.options).toBeUndefined();
    expect(hidden.dmNotes).toBeUndefined();
    expect(hidden.scenes[0].dmNotes).toBeUndefined();
    expect(hidden.scenes[0].promptingCharacter).toBe('Ana');

    const shown = adventure.view({ showDmNotes: true });
    expect(shown.scenes[0].dmNotes).toBe('The gate is trapped.');
    expect(shown.dmNotes).toContain('## The Setting');
  });
});
