import * as nunjucks from 'nunjucks';
import { ConfigManager } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { GenerationGateway } from '../gateway/GenerationGateway.js';
import { AgentContext } from '../agents/BaseAgent.js';
import { ScenarioAgent } from '../agents/ScenarioAgent.js';
import { CharacterAgent } from '../agents/CharacterAgent.js';
import { NarratorAgent } from '../agents/NarratorAgent.js';
import { VisualAgent } from '../agents/VisualAgent.js';
import type { NarratorPayload } from '../agents/context/schemas.js';
import { choose, OptionSource, SelectionSetService } from '../services/SelectionSetService.js';
import { EnrichmentOutcome, EnrichOptions, NarrationCoordinator } from '../services/NarrationCoordinator.js';
import type { StoryState } from '../services/StoryState.js';
import type { Scene, ScenePrompt } from '../types/Scene.js';
import { AdventureSession, describePhase, Phase, PhaseKind } from './AdventureSession.js';
import { AdventureError, InvalidStateTransition, ValidationError, WrongTurn } from './errors.js';
import { extractSceneSignals, nextRotationIndex, SceneSignals } from './narrativeSignals.js';

const turnLog = createLogger(NAMESPACES.engine.turn);

export interface SceneGenerator {
  run(context: AgentContext): Promise<NarratorPayload>;
}

export interface SceneEnricher {
  enrich(scene: Scene, story: StoryState, options?: EnrichOptions): Promise<EnrichmentOutcome>;
}

export interface TurnEngineAgents {
  scenario: OptionSource<'scenario'>;
  character: OptionSource<'character'>;
  narrator: SceneGenerator;
  enricher: SceneEnricher;
}

/**
 * The adventure state machine:
 *
 *   AwaitingPlayerCount -> AwaitingScenarioChoice -> AwaitingCharacterChoice(0..n-1)
 *     -> PartyAssembled -> AwaitingAction(i) -> ... -> Completed
 *
 * with Failed reachable from any mandatory generation step. The engine holds
 * no adventure state of its own; every operation takes the session it acts on.
 *
 * Prompting-character policy: the opening scene prompts party index 0, and
 * each later scene prompts the round-robin successor of the character who
 * acted. When the generated scene names a party member as the next actor,
 * that member is prompted instead, for that turn only.
 */
export class TurnEngine {
  private readonly configManager: ConfigManager;
  private readonly selection = new SelectionSetService();
  private readonly agents: TurnEngineAgents;

  constructor(configManager: ConfigManager, env: nunjucks.Environment, gateway: GenerationGateway, agents?: Partial<TurnEngineAgents>) {
    this.configManager = configManager;
    this.agents = {
      scenario: agents?.scenario ?? new ScenarioAgent(configManager, env, gateway),
      character: agents?.character ?? new CharacterAgent(configManager, env, gateway),
      narrator: agents?.narrator ?? new NarratorAgent(configManager, env, gateway),
      enricher: agents?.enricher
        ?? new NarrationCoordinator(gateway, new VisualAgent(configManager, env, gateway), configManager)
    };
  }

  async submitPlayerCount(session: AdventureSession, count: number): Promise<void> {
    await this.transition(session, 'AwaitingPlayerCount', async () => {
      if (!Number.isInteger(count) || count < 1 || count > session.maxPlayers) {
        throw new ValidationError(`Player count must be a whole number from 1 to ${session.maxPlayers}, got ${count}`);
      }
      session.playerCount = count;

      const features = this.configManager.getFeatures();
      const set = await this.mandatory(session, () => this.selection.buildSelectionSet(
        this.agents.scenario,
        { partySize: count },
        features.scenarioOptionCount
      ));

      session.selection = set;
      this.moveTo(session, { kind: 'AwaitingScenarioChoice' });
    });
  }

  async submitScenarioChoice(session: AdventureSession, index: number): Promise<void> {
    await this.transition(session, 'AwaitingScenarioChoice', async () => {
      const set = session.selection;
      if (!set || set.kind !== 'scenario') {
        throw new InvalidStateTransition('No scenario options are on offer');
      }
      const scenario = choose(set, index);
      session.scenario = scenario;
      turnLog('[TURN] session=%s chose scenario %d "%s"', session.id, index, scenario.title);

      const characterSet = await this.mandatory(session, async () => {
        session.story.initialize(scenario);
        return this.buildCharacterSet(session);
      });

      session.selection = characterSet;
      this.moveTo(session, { kind: 'AwaitingCharacterChoice', playerIndex: 0 });
    });
  }

  async submitCharacterChoice(session: AdventureSession, playerIndex: number, index: number): Promise<void> {
    await this.transition(session, 'AwaitingCharacterChoice', async phase => {
      if (phase.kind !== 'AwaitingCharacterChoice') {
        throw new InvalidStateTransition(`Cannot choose a character while ${describePhase(phase)}`);
      }
      if (playerIndex !== phase.playerIndex) {
        throw new WrongTurn(phase.playerIndex, playerIndex);
      }
      const set = session.selection;
      if (!set || set.kind !== 'character') {
        throw new InvalidStateTransition('No character options are on offer');
      }
      const character = choose(set, index);
      session.pendingParty.push(character);
      turnLog('[TURN] session=%s player %d chose %s', session.id, playerIndex, character.name);

      const playerCount = session.playerCount ?? 1;
      if (playerIndex + 1 < playerCount) {
        const nextSet = await this.mandatory(session, () => this.buildCharacterSet(session));
        session.selection = nextSet;
        this.moveTo(session, { kind: 'AwaitingCharacterChoice', playerIndex: playerIndex + 1 });
        return;
      }

      session.story.addParty(session.pendingParty);
      session.selection = undefined;
      this.moveTo(session, { kind: 'PartyAssembled' });
    });
  }

  /**
   * PartyAssembled -> opening scene. Takes no player input; the orchestrator
   * calls it as soon as the party is complete.
   */
  async startAdventure(session: AdventureSession): Promise<Scene> {
    return this.transition(session, 'PartyAssembled', async () => {
      const party = session.story.party;
      return this.advance(session, {
        party,
        rotationCandidate: party[0],
        sceneNumber: 1
      }, 0);
    });
  }

  async submitAction(session: AdventureSession, characterIndex: number, text: string): Promise<Scene> {
    return this.transition(session, 'AwaitingAction', async phase => {
      if (phase.kind !== 'AwaitingAction') {
        throw new InvalidStateTransition(`Cannot act while ${describePhase(phase)}`);
      }
      if (characterIndex !== phase.characterIndex) {
        throw new WrongTurn(phase.characterIndex, characterIndex);
      }
      const action = text.trim();
      if (!action) {
        throw new ValidationError('Action text must not be empty');
      }

      const party = session.story.party;
      const rotation = nextRotationIndex(characterIndex, party.length);
      return this.advance(session, {
        party,
        action,
        actingCharacter: party[characterIndex],
        actingIndex: characterIndex,
        rotationCandidate: party[rotation],
        sceneNumber: session.sceneHistory.length + 1
      }, rotation);
    });
  }

  /**
   * Generate, record and hand off one scene, then pick who is prompted next.
   * The scene's text is in the story before enrichment is even started, and
   * the previous scene's enrichment has finished before it is appended.
   */
  private async advance(
    session: AdventureSession,
    context: AgentContext & { actingIndex?: number },
    rotationIndex: number
  ): Promise<Scene> {
    const { story } = session;
    const sceneId = story.scenes.length + 1;

    const signals = await this.mandatory(session, async () => {
      const payload = await this.agents.narrator.run({
        ...context,
        storyContext: story.renderContext({ maxTokens: this.configManager.getFeatures().contextTokenBudget })
      });
      return extractSceneSignals(payload, story.party, `Scene ${sceneId}`);
    });

    // A scene stops changing once the next one exists, so its media must land first
    const previous = story.lastScene();
    const previousEnrichment = previous && session.enrichmentOf(previous.id);
    if (previousEnrichment) {
      await previousEnrichment;
    }

    const promptingIndex = signals.completed ? undefined : signals.designatedActorIndex ?? rotationIndex;
    const scene = this.buildScene(sceneId, signals, story, promptingIndex, context);

    story.appendScene(scene);
    const newNpcs = story.introduceNpcs(signals.newNpcs);
    const newLocations = story.introduceLocations(signals.newLocations);
    turnLog('[TURN] session=%s scene %d "%s" appended (npcs+%d locations+%d)',
      session.id, scene.id, scene.title, newNpcs.length, newLocations.length);

    session.trackEnrichment(scene.id, this.agents.enricher.enrich(scene, story, { isActive: () => !session.abandoned }));

    if (promptingIndex === undefined) {
      this.moveTo(session, { kind: 'Completed' });
    } else {
      if (signals.designatedActorIndex !== undefined && signals.designatedActorIndex !== rotationIndex) {
        turnLog('[TURN] narrative hands the turn to %d instead of %d', signals.designatedActorIndex, rotationIndex);
      }
      this.moveTo(session, { kind: 'AwaitingAction', characterIndex: promptingIndex });
    }
    return scene;
  }

  private buildScene(
    id: number,
    signals: SceneSignals,
    story: StoryState,
    promptingIndex: number | undefined,
    context: AgentContext & { actingIndex?: number }
  ): Scene {
    let prompt: ScenePrompt | undefined;
    if (promptingIndex !== undefined) {
      const target = story.party[promptingIndex].name;
      prompt = signals.prompt
        ? { ...signals.prompt, targetCharacter: target }
        : { kind: 'action', text: `${target}, what do you do?`, targetCharacter: target };
    }

    return {
      id,
      title: signals.title,
      text: signals.text,
      ...(signals.dmNotes !== undefined && { dmNotes: signals.dmNotes }),
      ...(prompt && { prompt: Object.freeze(prompt) }),
      ...(promptingIndex !== undefined && { promptingCharacterIndex: promptingIndex }),
      ...(context.action !== undefined && { action: context.action }),
      ...(context.actingIndex !== undefined && { actingCharacterIndex: context.actingIndex }),
      ...(signals.imageDescription !== undefined && { imageDescription: signals.imageDescription }),
      enrichment: 'pending',
      degraded: []
    };
  }

  private buildCharacterSet(session: AdventureSession) {
    const taken = session.pendingParty.map(c => c.name);
    return this.selection.buildSelectionSet(
      this.agents.character,
      {
        scenario: session.scenario,
        storyContext: session.story.renderContext(),
        partySize: session.playerCount,
        excludeNames: taken
      },
      this.configManager.getFeatures().characterOptionCount,
      taken.map(name => name.toLowerCase())
    );
  }

  /**
   * Run a phase transition: reject it unless the session is idle and in the
   * expected phase, and keep it exclusive while it runs.
   */
  private async transition<T>(session: AdventureSession, expected: PhaseKind, work: (phase: Phase) => Promise<T>): Promise<T> {
    if (session.busy) {
      throw new InvalidStateTransition(`Session ${session.id} is busy with another request`);
    }
    if (session.phase.kind !== expected) {
      throw new InvalidStateTransition(`Expected ${expected} but session is ${describePhase(session.phase)}`);
    }
    session.busy = true;
    try {
      return await work(session.phase);
    } finally {
      session.busy = false;
    }
  }

  /**
   * A generation step the adventure cannot continue without. Any failure moves
   * the session to Failed and is rethrown to the caller.
   */
  private async mandatory<T>(session: AdventureSession, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      if (error instanceof AdventureError && !error.fatal) throw error;
      const failure = error instanceof Error ? error : new Error(String(error));
      session.failure = failure;
      this.moveTo(session, { kind: 'Failed', reason: failure.message });
      throw failure;
    }
  }

  private moveTo(session: AdventureSession, next: Phase): void {
    turnLog('[TURN] session=%s %s -> %s', session.id, describePhase(session.phase), describePhase(next));
    session.setPhase(next);
  }
}
