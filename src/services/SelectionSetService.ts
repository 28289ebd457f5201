import { createLogger, NAMESPACES } from '../logging.js';
import { AgentContext } from '../agents/BaseAgent.js';
import { ChoiceError, InsufficientOptions } from '../engine/errors.js';
import type { Character } from '../types/Character.js';
import type { ScenarioOption } from '../types/Scenario.js';

const selectionLog = createLogger(NAMESPACES.services.selection);

export interface OptionKinds {
  scenario: ScenarioOption;
  character: Character;
}

export type SelectionKind = keyof OptionKinds;

/**
 * A fixed batch of generated, mutually exclusive options awaiting one pick.
 * `chosenIndex` is written once, by `choose`.
 */
export interface SelectionSet<K extends SelectionKind> {
  readonly kind: K;
  readonly options: readonly OptionKinds[K][];
  chosenIndex?: number;
  presented: boolean;
}

export type AnySelectionSet = SelectionSet<'scenario'> | SelectionSet<'character'>;

/**
 * Where a selection set's candidates come from: asks the model for them and
 * turns each raw candidate into a typed option (or rejects it).
 */
export interface OptionSource<K extends SelectionKind> {
  readonly kind: K;
  requestCandidates(context: AgentContext, count: number): Promise<unknown[]>;
  toOption(candidate: unknown): OptionKinds[K] | null;
  /** Identity used for de-duplication. */
  keyOf(option: OptionKinds[K]): string;
}

export class SelectionSetService {
  /**
   * Build a set of exactly `count` distinct options. Extra candidates are
   * dropped; too few valid distinct ones is an InsufficientOptions error.
   * Options whose key is in `excludeKeys` count as duplicates.
   */
  async buildSelectionSet<K extends SelectionKind>(
    source: OptionSource<K>,
    context: AgentContext,
    count: number,
    excludeKeys: Iterable<string> = []
  ): Promise<SelectionSet<K>> {
    const candidates = await source.requestCandidates(context, count);

    const seen = new Set<string>(excludeKeys);
    const options: OptionKinds[K][] = [];
    let rejected = 0;
    for (const candidate of candidates) {
      const option = source.toOption(candidate);
      if (!option) {
        rejected++;
        continue;
      }
      const key = source.keyOf(option);
      if (seen.has(key)) {
        rejected++;
        continue;
      }
      seen.add(key);
      options.push(option);
    }

    selectionLog('[SELECTION] kind=%s requested=%d candidates=%d valid=%d rejected=%d',
      source.kind, count, candidates.length, options.length, rejected);

    if (options.length < count) {
      throw new InsufficientOptions(count, options.length);
    }

    return {
      kind: source.kind,
      options: Object.freeze(options.slice(0, count)),
      presented: false
    };
  }
}

export function choose<K extends SelectionKind>(set: SelectionSet<K>, index: number): OptionKinds[K] {
  if (set.chosenIndex !== undefined) {
    throw new ChoiceError('AlreadyChosen', `A ${set.kind} has already been chosen from this set`);
  }
  if (!Number.isInteger(index) || index < 0 || index >= set.options.length) {
    throw new ChoiceError('OutOfRange', `Choice ${index} is outside 0..${set.options.length - 1}`);
  }
  set.chosenIndex = index;
  return set.options[index];
}

export function markPresented(set: AnySelectionSet): void {
  set.presented = true;
}
