import type { SchemaObject } from 'ajv';
import type { ScenePromptKind } from '../../types/Scene.js';
import { compileValidator } from './jsonValidation.js';

export interface OptionsEnvelope {
  options: unknown[];
}

export interface ScenarioPayload {
  title: string;
  hook: string;
  details: string;
}

export interface CharacterPayload {
  name: string;
  description: string;
  abilities: string[];
  strength: number;
  intelligence: number;
  agility: number;
  maximumHealth: number;
}

export interface NarratorPromptPayload {
  kind: ScenePromptKind;
  text: string;
  targetCharacter?: string | null;
  diceType?: string | null;
  diceCount?: number | null;
}

export interface NarratorPayload {
  title?: string;
  text: string;
  dmNotes?: string | null;
  prompt?: NarratorPromptPayload | null;
  nextActor?: string | null;
  adventureComplete?: boolean;
  newNpcs?: string[];
  newLocations?: string[];
  imageDescription?: string | null;
}

const nonEmpty = { type: 'string', minLength: 1 };

export const optionsEnvelopeSchema: SchemaObject = {
  type: 'object',
  properties: { options: { type: 'array' } },
  required: ['options']
};

export const scenarioSchema: SchemaObject = {
  type: 'object',
  properties: { title: nonEmpty, hook: { type: 'string' }, details: nonEmpty },
  required: ['title', 'hook', 'details']
};

export const characterSchema: SchemaObject = {
  type: 'object',
  properties: {
    name: nonEmpty,
    description: { type: 'string' },
    abilities: { type: 'array', items: { type: 'string' } },
    strength: { type: 'integer', minimum: 0 },
    intelligence: { type: 'integer', minimum: 0 },
    agility: { type: 'integer', minimum: 0 },
    maximumHealth: { type: 'integer', minimum: 1 }
  },
  required: ['name', 'description', 'abilities', 'strength', 'intelligence', 'agility', 'maximumHealth']
};

export const narratorSchema: SchemaObject = {
  type: 'object',
  properties: {
    title: { type: 'string' },
    text: nonEmpty,
    dmNotes: { type: ['string', 'null'] },
    prompt: {
      type: ['object', 'null'],
      properties: {
        kind: { enum: ['action', 'dialogue', 'dice_check'] },
        text: nonEmpty,
        targetCharacter: { type: ['string', 'null'] },
        diceType: { type: ['string', 'null'] },
        diceCount: { type: ['integer', 'null'], minimum: 1 }
      },
      required: ['kind', 'text']
    },
    nextActor: { type: ['string', 'null'] },
    adventureComplete: { type: 'boolean' },
    newNpcs: { type: 'array', items: { type: 'string' } },
    newLocations: { type: 'array', items: { type: 'string' } },
    imageDescription: { type: ['string', 'null'] }
  },
  required: ['text']
};

export const validateOptionsEnvelope = compileValidator<OptionsEnvelope>(optionsEnvelopeSchema);
export const validateScenario = compileValidator<ScenarioPayload>(scenarioSchema);
export const validateCharacter = compileValidator<CharacterPayload>(characterSchema);
export const validateNarrator = compileValidator<NarratorPayload>(narratorSchema);
