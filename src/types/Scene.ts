import type { AudioRef, ImageRef } from '../gateway/GenerationGateway.js';

export type ScenePromptKind = 'action' | 'dialogue' | 'dice_check';

export interface ScenePrompt {
  readonly kind: ScenePromptKind;
  readonly text: string;
  readonly targetCharacter?: string;
  readonly diceType?: string;   // e.g. "d20"
  readonly diceCount?: number;
}

export type EnrichmentMedia = 'narration' | 'image';

export interface Scene {
  readonly id: number;
  readonly title: string;
  readonly text: string;
  readonly dmNotes?: string;
  readonly prompt?: ScenePrompt;
  readonly promptingCharacterIndex?: number;
  readonly action?: string;
  readonly actingCharacterIndex?: number;
  readonly imageDescription?: string;

  // Written by the narration/imagery coordinator, add-only
  narrationAudio?: AudioRef;
  image?: ImageRef;
  enrichment: 'pending' | 'complete';
  degraded: EnrichmentMedia[];
}
