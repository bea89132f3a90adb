/**
 * Core data model types for entity-migrator.
 *
 * Design principle: Immutable, readonly types. No methods that mutate.
 */

// === Column Types ===

export const COLUMN_TYPES = [
  'TinyInteger',
  'SmallInteger',
  'Integer',
  'BigInteger',
  'Unsigned',
  'BigUnsigned',
  'Float',
  'Double',
  'Decimal',
  'Boolean',
  'String',
  'Text',
  'Char',
  'DateTime',
  'Timestamp',
  'TimestampWithTimeZone',
  'Date',
  'Time',
  'Uuid',
  'Json',
  'JsonBinary',
  'Binary',
  'VarBinary',
  'Blob',
  'Inet',
  'Cidr',
  'MacAddr',
  'Interval',
  'Enum',
] as const;

export type ColumnType = (typeof COLUMN_TYPES)[number];

export const FK_ACTIONS = ['Cascade', 'SetNull', 'SetDefault', 'Restrict', 'NoAction'] as const;

export type FkAction = (typeof FK_ACTIONS)[number];

export function isFkAction(value: string): value is FkAction {
  return FK_ACTIONS.some(action => action === value);
}

// === Schema Types ===

export interface ParsedSchema {
  readonly tableName: string;
  readonly primaryKey: ParsedColumn | undefined;
  readonly columns: readonly ParsedColumn[];
  readonly foreignKeys: readonly ParsedFk[];
  readonly indexes: readonly ParsedIndex[];
}

export interface ParsedColumn {
  readonly name: string;
  readonly colType: ColumnType;
  readonly nullable: boolean;
  readonly unique: boolean;
  /** Tracked by the model binding, never emitted as DDL */
  readonly ignored: boolean;
}

export interface ParsedFk {
  readonly fromColumn: string;
  readonly toTable: string;
  readonly toColumn: string;
  readonly onDelete: FkAction;
  readonly onUpdate: FkAction;
}

export interface ParsedIndex {
  readonly name: string;
  readonly columns: readonly string[];
  readonly unique: boolean;
}

// === Change Types ===

export type ModifiedColumn = readonly [previous: ParsedColumn, current: ParsedColumn];

export interface Changes {
  readonly tableName: string;
  readonly addedColumns: readonly ParsedColumn[];
  readonly droppedColumns: readonly string[];
  readonly modifiedColumns: readonly ModifiedColumn[];
  readonly addedFks: readonly ParsedFk[];
  readonly droppedFks: readonly ParsedFk[];
  readonly addedIndexes: readonly ParsedIndex[];
  readonly droppedIndexes: readonly ParsedIndex[];
  readonly isNewTable: boolean;
}

// === Helpers ===

export function createColumn(
  name: string,
  colType: ColumnType,
  attributes: Partial<Pick<ParsedColumn, 'nullable' | 'unique' | 'ignored'>> = {}
): ParsedColumn {
  return {
    name,
    colType,
    nullable: attributes.nullable ?? false,
    unique: attributes.unique ?? false,
    ignored: attributes.ignored ?? false,
  };
}

/**
 * Columns that exist in the database: not ignored and not the primary key.
 */
export function dbColumns(schema: ParsedSchema): ParsedColumn[] {
  const pkName = schema.primaryKey?.name;
  return schema.columns.filter(c => !c.ignored && c.name !== pkName);
}

export function isEmptyChanges(changes: Changes): boolean {
  return !changes.isNewTable
    && changes.addedColumns.length === 0
    && changes.droppedColumns.length === 0
    && changes.modifiedColumns.length === 0
    && changes.addedFks.length === 0
    && changes.droppedFks.length === 0
    && changes.addedIndexes.length === 0
    && changes.droppedIndexes.length === 0;
}

export function fkKey(fk: ParsedFk): string {
  return `${fk.fromColumn}->${fk.toTable}:${fk.toColumn}`;
}

/**
 * Name given to a foreign key constraint when the artifact creates or drops it.
 */
export function fkConstraintName(tableName: string, fk: ParsedFk): string {
  return `fk_${tableName}_${fk.fromColumn}`;
}
