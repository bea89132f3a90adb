import * as fs from 'fs';
import * as path from 'path';
import { readMigrations } from './historyLedger';
import {
  appliedDir,
  batchDir,
  batchUpDir,
  registrarPath,
  snapshotDir,
  stripExtension,
  tableAppliedDir,
} from './paths';

export interface TableHistory {
  readonly tableName: string;
  /** Alter module file names, oldest first */
  readonly alterations: readonly string[];
  /** Batch timestamps, oldest first */
  readonly batches: readonly string[];
  readonly hasSnapshot: boolean;
}

export interface MigrationHistory {
  readonly tables: readonly TableHistory[];
  /** Create modules listed in the registrar */
  readonly registered: readonly string[];
}

function listFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs.readdirSync(dir, { withFileTypes: true })
    .filter(entry => entry.isFile() && entry.name.endsWith('.ts'))
    .map(entry => entry.name)
    .sort();
}

function listDirs(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs.readdirSync(dir, { withFileTypes: true })
    .filter(entry => entry.isDirectory())
    .map(entry => entry.name);
}

/**
 * What a migrations directory holds, per table.
 */
export function listHistory(migrationsDir: string): MigrationHistory {
  const snapshots = new Set(listFiles(snapshotDir(migrationsDir)).map(stripExtension));
  const byTime = path.basename(batchDir(migrationsDir));
  const applied = listDirs(appliedDir(migrationsDir)).filter(name => name !== byTime);

  const tableNames = [...new Set([...snapshots, ...applied])].sort();

  const tables = tableNames.map(tableName => ({
    tableName,
    alterations: listFiles(tableAppliedDir(migrationsDir, tableName)),
    batches: listFiles(batchUpDir(migrationsDir, tableName)).map(stripExtension),
    hasSnapshot: snapshots.has(tableName),
  }));

  return { tables, registered: readMigrations(registrarPath(migrationsDir)) };
}
