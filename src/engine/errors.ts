import type { GenerationFailure } from '../gateway/GenerationGateway.js';

export type AdventureErrorCode =
  | 'ValidationError'
  | 'ChoiceError'
  | 'GenerationError'
  | 'InsufficientOptions'
  | 'MalformedScenario'
  | 'InvalidStateTransition'
  | 'WrongTurn';

export abstract class AdventureError extends Error {
  abstract readonly code: AdventureErrorCode;

  /** Mandatory-step failures end the adventure; everything else is a rejected request. */
  get fatal(): boolean {
    return false;
  }
}

export class ValidationError extends AdventureError {
  readonly code = 'ValidationError';

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export type ChoiceErrorReason = 'OutOfRange' | 'AlreadyChosen';

export class ChoiceError extends AdventureError {
  readonly code = 'ChoiceError';

  constructor(readonly reason: ChoiceErrorReason, message: string) {
    super(message);
    this.name = 'ChoiceError';
  }
}

export class GenerationError extends AdventureError {
  readonly code = 'GenerationError';

  constructor(readonly step: string, readonly failure: GenerationFailure) {
    super(`${step} generation failed (${failure.kind}): ${failure.detail}`);
    this.name = 'GenerationError';
  }

  override get fatal(): boolean {
    return true;
  }
}

export class InsufficientOptions extends AdventureError {
  readonly code = 'InsufficientOptions';

  constructor(readonly requested: number, readonly received: number) {
    super(`Expected ${requested} distinct options, model produced ${received}`);
    this.name = 'InsufficientOptions';
  }

  override get fatal(): boolean {
    return true;
  }
}

export class MalformedScenario extends AdventureError {
  readonly code = 'MalformedScenario';

  constructor(readonly missing: string[]) {
    super(`Scenario is missing required sections: ${missing.join(', ')}`);
    this.name = 'MalformedScenario';
  }

  override get fatal(): boolean {
    return true;
  }
}

export class InvalidStateTransition extends AdventureError {
  readonly code = 'InvalidStateTransition';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidStateTransition';
  }
}

export class WrongTurn extends AdventureError {
  readonly code = 'WrongTurn';

  constructor(readonly expected: number, readonly received: number) {
    super(`Turn belongs to index ${expected}, got ${received}`);
    this.name = 'WrongTurn';
  }
}
