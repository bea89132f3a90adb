import * as fs from 'fs';
import * as path from 'path';
import type { Changes, ParsedColumn, ParsedFk, ParsedIndex, ParsedSchema } from './model';
import { dbColumns, fkConstraintName } from './model';
import { columnTypeMethod, isIntegerType } from './columnTypes';
import { WriteFailureError } from './errors';
import {
  alterFilePath,
  batchDownPath,
  batchUpPath,
  createFilePath,
  createModuleName,
  snapshotFilePath,
} from './paths';

export interface GeneratorOptions {
  /** Module the generated files import the statement builders from */
  readonly runtimeModule: string;
}

/**
 * Pending work for one table in a run.
 */
export interface TableChange {
  readonly changes: Changes;
  readonly current: ParsedSchema;
  /** Last snapshot; undefined for a new table */
  readonly previous: ParsedSchema | undefined;
}

/**
 * `YYYYMMDD_HHMMSS` in UTC. Chosen once per run and shared by every file it writes.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`
    + `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

const str = (value: string): string => JSON.stringify(value);

const BUILDERS = ['ColumnDef', 'ForeignKey', 'Index', 'Table'] as const;

function header(lines: readonly string[], options: GeneratorOptions, note: string): string[] {
  const body = lines.join('\n');
  const used = BUILDERS.filter(name => body.includes(`${name}.`));
  const names = [...used, 'type SchemaManager'].join(', ');
  return [
    `// ${note}`,
    `import { ${names} } from ${str(options.runtimeModule)};`,
    '',
  ];
}

function fn(name: 'up' | 'down', statements: readonly string[]): string[] {
  return [
    `export async function ${name}(manager: SchemaManager): Promise<void> {`,
    ...statements,
    '}',
  ];
}

function statement(call: string, chain: readonly string[]): string {
  const [first, ...rest] = chain;
  if (rest.length === 0) {
    return `  await manager.${call}(${first});`;
  }
  return [
    `  await manager.${call}(`,
    `    ${first}`,
    ...rest.map(line => `      ${line}`),
    '  );',
  ].join('\n');
}

// === Building blocks ===

function renderColumn(column: ParsedColumn): string {
  const parts = [`ColumnDef.create(${str(column.name)})`, `${columnTypeMethod(column.colType)}()`];
  parts.push(column.nullable ? 'null()' : 'notNull()');
  if (column.unique) {
    parts.push('unique()');
  }
  return parts.join('.');
}

function renderPrimaryKey(pk: ParsedColumn): string {
  const parts = [`ColumnDef.create(${str(pk.name)})`, `${columnTypeMethod(pk.colType)}()`, 'notNull()'];
  if (isIntegerType(pk.colType)) {
    parts.push('autoIncrement()');
  }
  parts.push('primaryKey()');
  return parts.join('.');
}

function createForeignKey(tableName: string, fk: ParsedFk): string {
  return statement('createForeignKey', [
    'ForeignKey.create()',
    `.name(${str(fkConstraintName(tableName, fk))})`,
    `.from(${str(tableName)}, ${str(fk.fromColumn)})`,
    `.to(${str(fk.toTable)}, ${str(fk.toColumn)})`,
    `.onDelete(${str(fk.onDelete)})`,
    `.onUpdate(${str(fk.onUpdate)})`,
  ]);
}

function dropForeignKey(tableName: string, fk: ParsedFk): string {
  return statement('dropForeignKey', [
    `ForeignKey.drop().name(${str(fkConstraintName(tableName, fk))}).table(${str(tableName)})`,
  ]);
}

function createIndex(tableName: string, index: ParsedIndex): string {
  return statement('createIndex', [
    'Index.create()',
    `.name(${str(index.name)})`,
    `.table(${str(tableName)})`,
    ...index.columns.map(c => `.col(${str(c)})`),
    ...(index.unique ? ['.unique()'] : []),
  ]);
}

function dropIndex(index: ParsedIndex): string {
  return statement('dropIndex', [`Index.drop().name(${str(index.name)})`]);
}

function alterTable(tableName: string, operations: readonly string[]): string[] {
  if (operations.length === 0) {
    return [];
  }
  return [statement('alterTable', ['Table.alter()', `.table(${str(tableName)})`, ...operations])];
}

// === Create module / snapshot ===

/**
 * Module creating the table from nothing. Also used as the snapshot content,
 * so it must stay readable by the statement front-end.
 */
export function generateCreateFile(schema: ParsedSchema, options: GeneratorOptions): string {
  const columns = [
    ...(schema.primaryKey ? [renderPrimaryKey(schema.primaryKey)] : []),
    ...dbColumns(schema).map(renderColumn),
  ];

  const up = [
    statement('createTable', [
      'Table.create()',
      `.table(${str(schema.tableName)})`,
      '.ifNotExists()',
      ...columns.map(c => `.col(${c})`),
    ]),
    ...schema.foreignKeys.map(fk => createForeignKey(schema.tableName, fk)),
    ...schema.indexes.map(idx => createIndex(schema.tableName, idx)),
  ];
  const down = [statement('dropTable', [`Table.drop().table(${str(schema.tableName)}).ifExists()`])];

  const body = [...fn('up', up), '', ...fn('down', down)];
  return [...header(body, options, `Creates table ${schema.tableName}`), ...body, ''].join('\n');
}

// === Alter module and batch fragments ===

function alterUpStatements(change: TableChange): string[] {
  const { changes } = change;
  const table = changes.tableName;

  const operations = [
    ...changes.addedColumns.map(c => `.addColumn(${renderColumn(c)})`),
    ...changes.droppedColumns.map(name => `.dropColumn(${str(name)})`),
    ...changes.modifiedColumns.map(([, after]) => `.modifyColumn(${renderColumn(after)})`),
  ];

  return [
    ...alterTable(table, operations),
    ...changes.droppedFks.map(fk => dropForeignKey(table, fk)),
    ...changes.addedFks.map(fk => createForeignKey(table, fk)),
    ...changes.droppedIndexes.map(dropIndex),
    ...changes.addedIndexes.map(idx => createIndex(table, idx)),
  ];
}

function alterDownStatements(change: TableChange): string[] {
  const { changes, previous } = change;
  const table = changes.tableName;
  const previousColumns = new Map<string, ParsedColumn>(
    (previous ? dbColumns(previous) : []).map(c => [c.name, c])
  );

  const restored = changes.droppedColumns
    .map(name => previousColumns.get(name))
    .filter((c): c is ParsedColumn => c !== undefined);

  const operations = [
    ...changes.addedColumns.map(c => `.dropColumn(${str(c.name)})`),
    ...restored.map(c => `.addColumn(${renderColumn(c)})`),
    ...changes.modifiedColumns.map(([before]) => `.modifyColumn(${renderColumn(before)})`),
  ];

  return [
    ...alterTable(table, operations),
    ...changes.addedFks.map(fk => dropForeignKey(table, fk)),
    ...changes.droppedFks.map(fk => createForeignKey(table, fk)),
    ...changes.addedIndexes.map(dropIndex),
    ...changes.droppedIndexes.map(idx => createIndex(table, idx)),
  ];
}

/**
 * Incremental changes for an existing table, with `down` reversing `up`.
 */
export function generateAlterFile(change: TableChange, options: GeneratorOptions): string {
  const body = [
    ...fn('up', alterUpStatements(change)),
    '',
    ...fn('down', alterDownStatements(change)),
  ];
  return [...header(body, options, `Alters table ${change.changes.tableName}`), ...body, ''].join('\n');
}

export function generateBatchUpFile(changes: readonly TableChange[], timestamp: string, options: GeneratorOptions): string {
  const body = fn('up', changes.flatMap(alterUpStatements));
  return [...header(body, options, `Batch ${timestamp} (up)`), ...body, ''].join('\n');
}

/**
 * Tables are reverted in the opposite order they were applied.
 */
export function generateBatchDownFile(changes: readonly TableChange[], timestamp: string, options: GeneratorOptions): string {
  const body = fn('down', [...changes].reverse().flatMap(alterDownStatements));
  return [...header(body, options, `Batch ${timestamp} (down)`), ...body, ''].join('\n');
}

// === Writing ===

export interface WrittenArtifacts {
  readonly snapshot: string;
  /** Module identifier of the create module, for the registrar */
  readonly createModule?: string;
  readonly files: readonly string[];
}

export interface WriteArtifactOptions {
  /** Fail instead of replacing an existing file */
  readonly exclusive?: boolean;
}

/**
 * Write a file, creating its directory first.
 */
export function writeArtifact(filePath: string, content: string, options: WriteArtifactOptions = {}): void {
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, { flag: options.exclusive ? 'wx' : 'w' });
  } catch (error) {
    throw new WriteFailureError(filePath, error);
  }
}

/**
 * Runs once the create module of a new table is on disk, before its snapshot.
 * Returns the files it wrote.
 */
export type RegisterCreateModule = (moduleName: string) => readonly string[];

/**
 * Write the files for one table. Create, alter and batch modules never replace
 * an existing file. The snapshot is written last so that a failure part-way
 * leaves the previous snapshot, and the next run regenerates this table's
 * artifacts.
 */
export function writeTableArtifacts(
  migrationsDir: string,
  change: TableChange,
  timestamp: string,
  options: GeneratorOptions,
  register?: RegisterCreateModule
): WrittenArtifacts {
  const table = change.changes.tableName;
  const snapshot = snapshotFilePath(migrationsDir, table);
  const files: string[] = [];
  const historical = { exclusive: true };

  if (change.changes.isNewTable) {
    const createPath = createFilePath(migrationsDir, timestamp, table);
    const createModule = createModuleName(timestamp, table);
    writeArtifact(createPath, generateCreateFile(change.current, options), historical);
    files.push(createPath);
    if (register) {
      files.push(...register(createModule));
    }
    writeArtifact(snapshot, generateCreateFile(change.current, options));
    files.push(snapshot);
    return { snapshot, createModule, files };
  }

  const alterPath = alterFilePath(migrationsDir, table, timestamp);
  writeArtifact(alterPath, generateAlterFile(change, options), historical);
  files.push(alterPath);

  const upPath = batchUpPath(migrationsDir, table, timestamp);
  writeArtifact(upPath, generateBatchUpFile([change], timestamp, options), historical);
  files.push(upPath);

  const downPath = batchDownPath(migrationsDir, table, timestamp);
  writeArtifact(downPath, generateBatchDownFile([change], timestamp, options), historical);
  files.push(downPath);

  writeArtifact(snapshot, generateCreateFile(change.current, options));
  files.push(snapshot);

  return { snapshot, files };
}
