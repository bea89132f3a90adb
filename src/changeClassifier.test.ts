import { describe, test, expect, vi } from 'vitest';
import {
  DESTRUCTIVE_QUESTION,
  findDestructiveChanges,
  formatDestructiveChange,
  guardDestructiveChanges,
  type DecisionProvider,
} from './changeClassifier';
import { DestructiveChangeBlockedError } from './errors';
import { createColumn } from './model';
import type { Changes, ModifiedColumn } from './model';

function changesWith(tableName: string, modifiedColumns: ModifiedColumn[]): Changes {
  return {
    tableName,
    addedColumns: [],
    droppedColumns: [],
    modifiedColumns,
    addedFks: [],
    droppedFks: [],
    addedIndexes: [],
    droppedIndexes: [],
    isNewTable: false,
  };
}

const typeChange = changesWith('users', [
  [createColumn('age', 'Integer'), createColumn('age', 'Text')],
]);

const narrowing = changesWith('posts', [
  [createColumn('title', 'String', { nullable: true }), createColumn('title', 'String')],
]);

describe('findDestructiveChanges', () => {
  test('reports type changes before nullability narrowing', () => {
    const destructive = findDestructiveChanges([narrowing, typeChange]);

    expect(destructive).toEqual([
      { tableName: 'users', column: 'age', reason: 'type-change', from: 'Integer', to: 'Text' },
      { tableName: 'posts', column: 'title', reason: 'nullable-to-required', from: 'nullable', to: 'not_null' },
    ]);
  });

  test('widening and uniqueness changes are safe', () => {
    const safe = changesWith('users', [
      [createColumn('bio', 'Text'), createColumn('bio', 'Text', { nullable: true })],
      [createColumn('email', 'String'), createColumn('email', 'String', { unique: true })],
    ]);

    expect(findDestructiveChanges([safe])).toEqual([]);
  });

  test('a type change that also narrows is reported once', () => {
    const both = changesWith('users', [
      [createColumn('age', 'Integer', { nullable: true }), createColumn('age', 'BigInteger')],
    ]);

    expect(findDestructiveChanges([both]).map(d => d.reason)).toEqual(['type-change']);
  });
});

describe('formatDestructiveChange', () => {
  test('renders both reasons', () => {
    const [type, narrow] = findDestructiveChanges([typeChange, narrowing]);

    expect(formatDestructiveChange(type)).toBe('users.age: type Integer -> Text');
    expect(formatDestructiveChange(narrow)).toBe('posts.title: nullable -> not_null (requires a default or backfill)');
  });
});

describe('guardDestructiveChanges', () => {
  test('clean changes never ask', async () => {
    const decide = vi.fn<DecisionProvider>(async () => 'yes');
    const outcome = await guardDestructiveChanges([changesWith('users', [])], { decide });

    expect(outcome).toEqual({ kind: 'clean' });
    expect(decide).not.toHaveBeenCalled();
  });

  test('force skips the question', async () => {
    const decide = vi.fn<DecisionProvider>(async () => '');
    const outcome = await guardDestructiveChanges([typeChange], { force: true, decide });

    expect(outcome.kind).toBe('forced');
    expect(decide).not.toHaveBeenCalled();
  });

  test('asks once for all tables and accepts a non-empty answer', async () => {
    const decide = vi.fn<DecisionProvider>(async () => '  0  ');
    const outcome = await guardDestructiveChanges([typeChange, narrowing], { decide });

    expect(decide).toHaveBeenCalledTimes(1);
    expect(decide.mock.calls[0]).toEqual([DESTRUCTIVE_QUESTION, findDestructiveChanges([typeChange, narrowing])]);
    expect(outcome).toEqual({
      kind: 'acknowledged',
      destructive: findDestructiveChanges([typeChange, narrowing]),
      answer: '0',
    });
  });

  test('an empty answer blocks the run', async () => {
    await expect(guardDestructiveChanges([typeChange], { decide: async () => '   ' }))
      .rejects.toBeInstanceOf(DestructiveChangeBlockedError);
  });

  test('without a decision provider destructive changes are blocked', async () => {
    const error = await guardDestructiveChanges([narrowing], {}).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DestructiveChangeBlockedError);
    expect(error).toMatchObject({
      code: 'DESTRUCTIVE_CHANGE_BLOCKED',
      changes: ['posts.title: nullable -> not_null (requires a default or backfill)'],
    });
  });
});
