import type { Changes, ModifiedColumn, ParsedColumn, ParsedFk, ParsedIndex, ParsedSchema } from './model';
import { dbColumns, fkKey } from './model';

/**
 * Changes for a table that has no snapshot yet: everything is added.
 */
export function newTableChanges(schema: ParsedSchema): Changes {
  return {
    tableName: schema.tableName,
    addedColumns: dbColumns(schema),
    droppedColumns: [],
    modifiedColumns: [],
    addedFks: [...schema.foreignKeys],
    droppedFks: [],
    addedIndexes: [...schema.indexes],
    droppedIndexes: [],
    isNewTable: true,
  };
}

/**
 * Compute the changes between the last snapshot of a table and its current definition.
 *
 * Columns present in both revisions are reported as modified when their type,
 * nullability or uniqueness differ. Foreign keys and indexes are only ever
 * added or dropped; one whose attributes changed shows up as a drop plus an
 * add under the same key.
 */
export function diffSchemas(previous: ParsedSchema, current: ParsedSchema): Changes {
  const previousColumns = indexByName(dbColumns(previous));
  const currentColumns = indexByName(dbColumns(current));

  const addedColumns: ParsedColumn[] = [];
  const modifiedColumns: ModifiedColumn[] = [];

  for (const [name, column] of currentColumns) {
    const before = previousColumns.get(name);
    if (before === undefined) {
      addedColumns.push(column);
    } else if (columnChanged(before, column)) {
      modifiedColumns.push([before, column]);
    }
  }

  const droppedColumns = [...previousColumns.keys()].filter(name => !currentColumns.has(name));

  const fks = diffByKey(previous.foreignKeys, current.foreignKeys, fkKey);
  const indexes = diffByKey(previous.indexes, current.indexes, (idx: ParsedIndex) => idx.name);

  return {
    tableName: current.tableName,
    addedColumns,
    droppedColumns,
    modifiedColumns,
    addedFks: fks.added,
    droppedFks: fks.dropped,
    addedIndexes: indexes.added,
    droppedIndexes: indexes.dropped,
    isNewTable: false,
  };
}

function indexByName(columns: readonly ParsedColumn[]): Map<string, ParsedColumn> {
  return new Map<string, ParsedColumn>(columns.map(c => [c.name, c]));
}

function columnChanged(before: ParsedColumn, after: ParsedColumn): boolean {
  return before.colType !== after.colType
    || before.nullable !== after.nullable
    || before.unique !== after.unique;
}

function diffByKey<T extends ParsedFk | ParsedIndex>(
  previous: readonly T[],
  current: readonly T[],
  key: (item: T) => string
): { added: T[]; dropped: T[] } {
  const previousByKey = new Map<string, T>(previous.map(item => [key(item), item]));
  const currentByKey = new Map<string, T>(current.map(item => [key(item), item]));

  const unchanged = (item: T, others: Map<string, T>): boolean => {
    const other = others.get(key(item));
    return other !== undefined && sameAttributes(item, other);
  };

  return {
    added: current.filter(item => !unchanged(item, previousByKey)),
    dropped: previous.filter(item => !unchanged(item, currentByKey)),
  };
}

function sameAttributes(a: ParsedFk | ParsedIndex, b: ParsedFk | ParsedIndex): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}
