import { randomUUID } from 'crypto';
import { StoryState } from '../services/StoryState.js';
import type { AnySelectionSet } from '../services/SelectionSetService.js';
import type { EnrichmentOutcome } from '../services/NarrationCoordinator.js';
import type { Character } from '../types/Character.js';
import type { ScenarioOption } from '../types/Scenario.js';
import type { Scene } from '../types/Scene.js';
import type { AdventureError } from './errors.js';

export type Phase =
  | { kind: 'AwaitingPlayerCount' }
  | { kind: 'AwaitingScenarioChoice' }
  | { kind: 'AwaitingCharacterChoice'; playerIndex: number }
  | { kind: 'PartyAssembled' }
  | { kind: 'AwaitingAction'; characterIndex: number }
  | { kind: 'Completed' }
  | { kind: 'Failed'; reason: string };

export type PhaseKind = Phase['kind'];

export type PhaseListener = (phase: Phase, session: AdventureSession) => void;

export function describePhase(phase: Phase): string {
  switch (phase.kind) {
    case 'AwaitingCharacterChoice':
      return `AwaitingCharacterChoice(${phase.playerIndex})`;
    case 'AwaitingAction':
      return `AwaitingAction(${phase.characterIndex})`;
    default:
      return phase.kind;
  }
}

/**
 * Root aggregate for one adventure. Everything the turn engine reads or
 * writes lives here; nothing is shared between sessions.
 */
export class AdventureSession {
  readonly id: string;
  readonly createdAt: Date;
  readonly maxPlayers: number;
  readonly story = new StoryState();

  playerCount?: number;
  scenario?: ScenarioOption;
  selection?: AnySelectionSet;
  failure?: AdventureError | Error;
  /** Characters picked so far, before the party is handed to the story. */
  readonly pendingParty: Character[] = [];
  /** Set while a transition is in flight. */
  busy = false;
  abandoned = false;

  private _phase: Phase = { kind: 'AwaitingPlayerCount' };
  private readonly listeners: PhaseListener[] = [];
  private readonly enrichments = new Map<number, Promise<EnrichmentOutcome>>();

  constructor(options: { maxPlayers: number; id?: string }) {
    this.id = options.id ?? randomUUID();
    this.createdAt = new Date();
    this.maxPlayers = options.maxPlayers;
  }

  get phase(): Phase {
    return this._phase;
  }

  setPhase(next: Phase): void {
    this._phase = next;
    for (const listener of this.listeners) listener(next, this);
  }

  onPhaseChange(listener: PhaseListener): void {
    this.listeners.push(listener);
  }

  get isTerminal(): boolean {
    return this._phase.kind === 'Completed' || this._phase.kind === 'Failed';
  }

  get party(): readonly Character[] {
    return this.story.hasParty ? this.story.party : this.pendingParty;
  }

  get sceneHistory(): readonly Scene[] {
    return this.story.scenes;
  }

  trackEnrichment(sceneId: number, task: Promise<EnrichmentOutcome>): void {
    this.enrichments.set(sceneId, task);
  }

  /** The enrichment started for a scene, if any. It never rejects. */
  enrichmentOf(sceneId: number): Promise<EnrichmentOutcome> | undefined {
    return this.enrichments.get(sceneId);
  }

  /** Resolves once every enrichment started so far has finished, in scene order. */
  async settle(): Promise<EnrichmentOutcome[]> {
    return Promise.all(this.enrichments.values());
  }
}
