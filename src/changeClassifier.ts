import type { Changes } from './model';
import { DestructiveChangeBlockedError } from './errors';

export type DestructiveReason = 'type-change' | 'nullable-to-required';

export interface DestructiveChange {
  readonly tableName: string;
  readonly column: string;
  readonly reason: DestructiveReason;
  readonly from: string;
  readonly to: string;
}

/**
 * Column modifications likely to lose data or break existing rows:
 * a type change, or a nullable column becoming required with its type unchanged.
 */
export function findDestructiveChanges(changes: readonly Changes[]): DestructiveChange[] {
  const typeChanges: DestructiveChange[] = [];
  const narrowings: DestructiveChange[] = [];

  for (const change of changes) {
    for (const [before, after] of change.modifiedColumns) {
      if (before.colType !== after.colType) {
        typeChanges.push({
          tableName: change.tableName,
          column: before.name,
          reason: 'type-change',
          from: before.colType,
          to: after.colType,
        });
      } else if (before.nullable && !after.nullable) {
        narrowings.push({
          tableName: change.tableName,
          column: after.name,
          reason: 'nullable-to-required',
          from: 'nullable',
          to: 'not_null',
        });
      }
    }
  }

  return [...typeChanges, ...narrowings];
}

export function formatDestructiveChange(change: DestructiveChange): string {
  if (change.reason === 'type-change') {
    return `${change.tableName}.${change.column}: type ${change.from} -> ${change.to}`;
  }
  return `${change.tableName}.${change.column}: nullable -> not_null (requires a default or backfill)`;
}

/**
 * Asks the operator about destructive changes. Any non-empty answer is taken
 * as acknowledgement; an empty one aborts.
 */
export type DecisionProvider = (question: string, changes: readonly DestructiveChange[]) => Promise<string>;

export interface GuardOptions {
  /** Skip the question entirely */
  readonly force?: boolean;
  readonly decide?: DecisionProvider;
}

export type GuardOutcome =
  | { readonly kind: 'clean' }
  | { readonly kind: 'forced'; readonly destructive: readonly DestructiveChange[] }
  | { readonly kind: 'acknowledged'; readonly destructive: readonly DestructiveChange[]; readonly answer: string };

export const DESTRUCTIVE_QUESTION = 'Provide a default value for migration, or use --force to skip: ';

/**
 * Evaluate every pending change of a run at once. Throws
 * {@link DestructiveChangeBlockedError} when destructive changes are present
 * and neither `force` nor a non-empty answer lets them through.
 */
export async function guardDestructiveChanges(
  changes: readonly Changes[],
  options: GuardOptions
): Promise<GuardOutcome> {
  const destructive = findDestructiveChanges(changes);
  if (destructive.length === 0) {
    return { kind: 'clean' };
  }
  if (options.force) {
    return { kind: 'forced', destructive };
  }

  const messages = destructive.map(formatDestructiveChange);
  if (options.decide === undefined) {
    throw new DestructiveChangeBlockedError(messages);
  }

  const answer = (await options.decide(DESTRUCTIVE_QUESTION, destructive)).trim();
  if (answer === '') {
    throw new DestructiveChangeBlockedError(messages);
  }
  return { kind: 'acknowledged', destructive, answer };
}
