import type { NarratorPayload } from '../agents/context/schemas.js';
import type { Character } from '../types/Character.js';
import type { ScenePrompt } from '../types/Scene.js';
import { GenerationError } from './errors.js';

/**
 * What the turn engine needs from a generated scene, with every piece of
 * narrative-driven control flow (completion, next actor) made explicit.
 */
export interface SceneSignals {
  title: string;
  /** Player-facing text with control markers removed. */
  text: string;
  dmNotes?: string;
  prompt?: ScenePrompt;
  completed: boolean;
  /** Party index the narrative explicitly hands the next turn to. */
  designatedActorIndex?: number;
  newNpcs: string[];
  newLocations: string[];
  imageDescription?: string;
}

const COMPLETION_MARKER = /\[\s*(?:adventure\s+complete|the\s+end)\s*\]/gi;
const TRAILING_THE_END = /\n\s*(?:\*\*|_)?the end\.?(?:\*\*|_)?\s*$/i;
const INLINE_DM_NOTE = /\[\s*dm(?:\s+notes?)?\s*:\s*([^\]]+)\]/gi;
const NEXT_MARKER = /\[\s*next\s*:\s*([^\]]+)\]/gi;

/**
 * Party index for a name: exact (case-insensitive) match first, then a unique
 * match on the first word ("Mira" for "Mira the Mage").
 */
export function findPartyIndex(name: string | null | undefined, party: readonly Character[]): number | undefined {
  const wanted = name?.trim().toLowerCase();
  if (!wanted) return undefined;
  const exact = party.findIndex(c => c.name.toLowerCase() === wanted);
  if (exact >= 0) return exact;
  const firstWord = (value: string) => value.split(/\s+/)[0].replace(/[,.]$/, '');
  const byFirst = party
    .map((c, i) => ({ i, first: firstWord(c.name.toLowerCase()) }))
    .filter(entry => entry.first === firstWord(wanted));
  return byFirst.length === 1 ? byFirst[0].i : undefined;
}

export function nextRotationIndex(currentIndex: number, partySize: number): number {
  return (currentIndex + 1) % partySize;
}

function cleanList(values: readonly string[] | undefined): string[] {
  return (values ?? []).map(v => v.trim()).filter(v => v.length > 0);
}

export function extractSceneSignals(payload: NarratorPayload, party: readonly Character[], fallbackTitle: string): SceneSignals {
  let text = payload.text;
  const inlineNotes: string[] = [];
  let markedNext: string | undefined;

  const markerComplete = text.match(COMPLETION_MARKER) !== null || TRAILING_THE_END.test(text);

  text = text
    .replace(INLINE_DM_NOTE, (_, note: string) => {
      inlineNotes.push(note.trim());
      return '';
    })
    .replace(NEXT_MARKER, (_, name: string) => {
      markedNext ??= name.trim();
      return '';
    })
    .replace(COMPLETION_MARKER, '')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();

  if (!text) {
    throw new GenerationError('scene', { kind: 'malformed', detail: 'Scene contained no narrative text' });
  }

  const completed = payload.adventureComplete === true || markerComplete;
  const dmNotes = [payload.dmNotes?.trim(), ...inlineNotes].filter((n): n is string => !!n).join('\n') || undefined;

  let prompt: ScenePrompt | undefined;
  let designatedActorIndex: number | undefined;
  if (!completed) {
    if (payload.prompt) {
      const isDice = payload.prompt.kind === 'dice_check';
      prompt = {
        kind: payload.prompt.kind,
        text: payload.prompt.text.trim(),
        ...(payload.prompt.targetCharacter ? { targetCharacter: payload.prompt.targetCharacter.trim() } : {}),
        ...(isDice ? { diceType: payload.prompt.diceType?.trim() || 'd20', diceCount: payload.prompt.diceCount ?? 1 } : {})
      };
    }
    designatedActorIndex = findPartyIndex(payload.nextActor, party)
      ?? findPartyIndex(markedNext, party)
      ?? findPartyIndex(payload.prompt?.targetCharacter, party);
  }

  return {
    title: payload.title?.trim() || fallbackTitle,
    text,
    dmNotes,
    prompt,
    completed,
    designatedActorIndex,
    newNpcs: cleanList(payload.newNpcs),
    newLocations: cleanList(payload.newLocations),
    imageDescription: payload.imageDescription?.trim() || undefined
  };
}
