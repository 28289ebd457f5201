import { ConfigManager } from '../configManager.js';
import { createLogger, NAMESPACES } from '../logging.js';
import { markPresented } from '../services/SelectionSetService.js';
import type { EnrichmentOutcome } from '../services/NarrationCoordinator.js';
import type { AudioRef, ImageRef } from '../gateway/GenerationGateway.js';
import type { Character } from '../types/Character.js';
import type { EnrichmentMedia, Scene, ScenePrompt } from '../types/Scene.js';
import { AdventureSession, Phase, PhaseListener } from './AdventureSession.js';
import { TurnEngine } from './TurnEngine.js';

const orchestratorLog = createLogger(NAMESPACES.engine.orchestrator);

export interface ScenarioCard {
  title: string;
  hook: string;
  details?: string; // DM notes, only with the diagnostics toggle
}

export type OptionsView =
  | { kind: 'scenario'; options: ScenarioCard[] }
  | { kind: 'character'; playerIndex: number; options: Character[] };

export interface SceneView {
  id: number;
  title: string;
  text: string;
  prompt?: ScenePrompt;
  promptingCharacter?: string;
  action?: string;
  actingCharacter?: string;
  narrationAudio?: AudioRef;
  image?: ImageRef;
  enrichment: Scene['enrichment'];
  degraded: EnrichmentMedia[];
  dmNotes?: string;
}

export interface SessionView {
  id: string;
  phase: Phase;
  playerCount?: number;
  maxPlayers: number;
  title?: string;
  options?: OptionsView;
  party: Character[];
  scenes: SceneView[];
  latestScene?: SceneView;
  error?: string;
  dmNotes?: string;
}

export interface ViewOptions {
  showDmNotes?: boolean;
}

/**
 * One per adventure: owns the session and exposes the presentation-facing
 * operations. The opening scene follows party assembly without further input.
 */
export class AdventureOrchestrator {
  readonly session: AdventureSession;

  constructor(
    private readonly engine: TurnEngine,
    private readonly configManager: ConfigManager,
    session?: AdventureSession
  ) {
    this.session = session ?? new AdventureSession({ maxPlayers: configManager.getFeatures().maxPlayers });
  }

  get id(): string {
    return this.session.id;
  }

  get phase(): Phase {
    return this.session.phase;
  }

  onPhaseChange(listener: PhaseListener): void {
    this.session.onPhaseChange(listener);
  }

  async submitPlayerCount(count: number): Promise<void> {
    await this.engine.submitPlayerCount(this.session, count);
  }

  async submitScenarioChoice(index: number): Promise<void> {
    await this.engine.submitScenarioChoice(this.session, index);
  }

  async submitCharacterChoice(playerIndex: number, index: number): Promise<void> {
    await this.engine.submitCharacterChoice(this.session, playerIndex, index);
    if (this.session.phase.kind === 'PartyAssembled') {
      orchestratorLog('[ORCHESTRATOR] session=%s party assembled, generating opening scene', this.session.id);
      await this.engine.startAdventure(this.session);
    }
  }

  async submitAction(characterIndex: number, text: string): Promise<Scene> {
    return this.engine.submitAction(this.session, characterIndex, text);
  }

  /** Wait for narration and imagery of every scene generated so far. */
  async settle(): Promise<EnrichmentOutcome[]> {
    return this.session.settle();
  }

  /** Drop the adventure. Enrichment still in flight is discarded when it lands. */
  abandon(): void {
    this.session.abandoned = true;
    orchestratorLog('[ORCHESTRATOR] session=%s abandoned in %s', this.session.id, this.session.phase.kind);
  }

  view(options: ViewOptions = {}): SessionView {
    const showDmNotes = options.showDmNotes ?? this.configManager.isDmNotesEnabled();
    const { session } = this;
    const party = [...session.party];
    const scenes = session.sceneHistory.map(scene => this.sceneView(scene, party, showDmNotes));

    return {
      id: session.id,
      phase: session.phase,
      playerCount: session.playerCount,
      maxPlayers: session.maxPlayers,
      ...(session.story.isInitialized && { title: session.story.title }),
      ...(this.optionsView(showDmNotes) ?? {}),
      party,
      scenes,
      ...(scenes.length > 0 && { latestScene: scenes[scenes.length - 1] }),
      ...(session.failure && { error: session.failure.message }),
      ...(showDmNotes && session.story.isInitialized && { dmNotes: session.story.dmNotes })
    };
  }

  private optionsView(showDmNotes: boolean): { options: OptionsView } | undefined {
    const { selection, phase } = this.session;
    if (!selection || selection.chosenIndex !== undefined) return undefined;
    markPresented(selection);
    if (selection.kind === 'scenario') {
      return {
        options: {
          kind: 'scenario',
          options: selection.options.map(o => (showDmNotes ? { ...o } : { title: o.title, hook: o.hook }))
        }
      };
    }
    return {
      options: {
        kind: 'character',
        playerIndex: phase.kind === 'AwaitingCharacterChoice' ? phase.playerIndex : 0,
        options: [...selection.options]
      }
    };
  }

  private sceneView(scene: Scene, party: Character[], showDmNotes: boolean): SceneView {
    const nameAt = (index: number | undefined) => (index === undefined ? undefined : party[index]?.name);
    return {
      id: scene.id,
      title: scene.title,
      text: scene.text,
      prompt: scene.prompt,
      promptingCharacter: nameAt(scene.promptingCharacterIndex),
      action: scene.action,
      actingCharacter: nameAt(scene.actingCharacterIndex),
      narrationAudio: scene.narrationAudio,
      image: scene.image,
      enrichment: scene.enrichment,
      degraded: [...scene.degraded],
      ...(showDmNotes && scene.dmNotes !== undefined && { dmNotes: scene.dmNotes })
    };
  }
}
