import type { ColumnType, FkAction } from './model';
import { columnTypeSql, isIntegerType } from './columnTypes';

export interface ColumnDefinition {
  readonly name: string;
  readonly type: ColumnType;
  /** `undefined` leaves nullability to the database default */
  readonly nullable: boolean | undefined;
  readonly unique: boolean;
  readonly primaryKey: boolean;
  readonly autoIncrement: boolean;
}

export interface ForeignKeyDefinition {
  readonly name: string | undefined;
  readonly fromTable: string | undefined;
  readonly fromColumn: string;
  readonly toTable: string;
  readonly toColumn: string;
  readonly onDelete: FkAction;
  readonly onUpdate: FkAction;
}

export interface IndexDefinition {
  readonly name: string;
  readonly table: string | undefined;
  readonly columns: readonly string[];
  readonly unique: boolean;
}

export type AlterOperation =
  | { readonly type: 'addColumn'; readonly column: ColumnDefinition }
  | { readonly type: 'dropColumn'; readonly name: string }
  | { readonly type: 'modifyColumn'; readonly column: ColumnDefinition };

/**
 * Escape a PostgreSQL identifier (table or column name).
 * Doubles any embedded double-quotes to prevent SQL injection.
 */
export function escapeIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

const FK_ACTION_SQL: Readonly<Record<FkAction, string>> = {
  Cascade: 'CASCADE',
  SetNull: 'SET NULL',
  SetDefault: 'SET DEFAULT',
  Restrict: 'RESTRICT',
  NoAction: 'NO ACTION',
};

/**
 * Name PostgreSQL gives to an inline UNIQUE column constraint.
 */
export function uniqueConstraintName(table: string, column: string): string {
  return `${table}_${column}_key`;
}

export function generateColumnSql(column: ColumnDefinition): string {
  const parts = [escapeIdentifier(column.name), columnTypeSql(column.type)];

  if (column.autoIncrement && isIntegerType(column.type)) {
    parts.push('GENERATED BY DEFAULT AS IDENTITY');
  }
  if (column.nullable === true && !column.primaryKey) {
    parts.push('NULL');
  } else if (column.nullable === false || column.primaryKey) {
    parts.push('NOT NULL');
  }
  if (column.unique && !column.primaryKey) {
    parts.push('UNIQUE');
  }
  if (column.primaryKey) {
    parts.push('PRIMARY KEY');
  }

  return parts.join(' ');
}

function generateReferencesSql(fk: ForeignKeyDefinition): string {
  return `FOREIGN KEY (${escapeIdentifier(fk.fromColumn)}) REFERENCES ${escapeIdentifier(fk.toTable)} (${escapeIdentifier(fk.toColumn)}) ON DELETE ${FK_ACTION_SQL[fk.onDelete]} ON UPDATE ${FK_ACTION_SQL[fk.onUpdate]}`;
}

function foreignKeyName(table: string, fk: ForeignKeyDefinition): string {
  return fk.name ?? `fk_${table}_${fk.fromColumn}`;
}

/**
 * Generate a CREATE TABLE statement. Foreign keys are emitted as named table constraints.
 */
export function generateCreateTableSql(
  table: string,
  columns: readonly ColumnDefinition[],
  foreignKeys: readonly ForeignKeyDefinition[],
  ifNotExists: boolean
): string {
  const lines = columns.map(c => `  ${generateColumnSql(c)}`);

  for (const fk of foreignKeys) {
    lines.push(`  CONSTRAINT ${escapeIdentifier(foreignKeyName(table, fk))} ${generateReferencesSql(fk)}`);
  }

  const guard = ifNotExists ? 'IF NOT EXISTS ' : '';
  return `CREATE TABLE ${guard}${escapeIdentifier(table)} (\n${lines.join(',\n')}\n);`;
}

export function generateDropTableSql(table: string, ifExists: boolean): string {
  return `DROP TABLE ${ifExists ? 'IF EXISTS ' : ''}${escapeIdentifier(table)};`;
}

/**
 * Generate one statement per alter operation.
 * Column modifications rewrite type, nullability and the unique constraint.
 */
export function generateAlterTableSql(table: string, operations: readonly AlterOperation[]): string[] {
  const prefix = `ALTER TABLE ${escapeIdentifier(table)}`;
  const statements: string[] = [];

  for (const op of operations) {
    switch (op.type) {
      case 'addColumn':
        statements.push(`${prefix} ADD COLUMN ${generateColumnSql(op.column)};`);
        break;
      case 'dropColumn':
        statements.push(`${prefix} DROP COLUMN ${escapeIdentifier(op.name)};`);
        break;
      case 'modifyColumn': {
        const column = escapeIdentifier(op.column.name);
        const type = columnTypeSql(op.column.type);
        statements.push(`${prefix} ALTER COLUMN ${column} TYPE ${type} USING ${column}::${type};`);
        statements.push(`${prefix} ALTER COLUMN ${column} ${op.column.nullable === true ? 'DROP' : 'SET'} NOT NULL;`);

        const constraint = escapeIdentifier(uniqueConstraintName(table, op.column.name));
        statements.push(`${prefix} DROP CONSTRAINT IF EXISTS ${constraint};`);
        if (op.column.unique) {
          statements.push(`${prefix} ADD CONSTRAINT ${constraint} UNIQUE (${column});`);
        }
        break;
      }
    }
  }

  return statements;
}

export function generateAddForeignKeySql(fk: ForeignKeyDefinition): string {
  const table = requireTable(fk.fromTable, 'foreign key');
  return `ALTER TABLE ${escapeIdentifier(table)} ADD CONSTRAINT ${escapeIdentifier(foreignKeyName(table, fk))} ${generateReferencesSql(fk)};`;
}

export function generateDropForeignKeySql(table: string, name: string): string {
  return `ALTER TABLE ${escapeIdentifier(table)} DROP CONSTRAINT IF EXISTS ${escapeIdentifier(name)};`;
}

export function generateCreateIndexSql(index: IndexDefinition): string {
  const table = requireTable(index.table, 'index');
  const columns = index.columns.map(c => escapeIdentifier(c)).join(', ');
  return `CREATE ${index.unique ? 'UNIQUE ' : ''}INDEX ${escapeIdentifier(index.name)} ON ${escapeIdentifier(table)} (${columns});`;
}

export function generateDropIndexSql(name: string): string {
  return `DROP INDEX IF EXISTS ${escapeIdentifier(name)};`;
}

function requireTable(table: string | undefined, what: string): string {
  if (table === undefined) {
    throw new Error(`Cannot generate SQL for a ${what} without a table`);
  }
  return table;
}
