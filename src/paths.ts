import * as path from 'path';

/**
 * On-disk layout of a migrations directory.
 *
 * ```
 * <migrations>/lib.ts                                        registrar
 * <migrations>/m<ts>_create_<table>_table.ts                 create modules
 * <migrations>/snapshots/<table>.ts                          last generated truth
 * <migrations>/applied/<table>/<ts>_alter_<table>_table.ts   alter modules
 * <migrations>/applied/by_time/<table>/{up,down}/<ts>.ts     batch fragments
 * ```
 */

const EXT = '.ts';

export function createModuleName(timestamp: string, tableName: string): string {
  return `m${timestamp}_create_${tableName}_table`;
}

export function createFilePath(migrationsDir: string, timestamp: string, tableName: string): string {
  return path.join(migrationsDir, createModuleName(timestamp, tableName) + EXT);
}

export function snapshotDir(migrationsDir: string): string {
  return path.join(migrationsDir, 'snapshots');
}

export function snapshotFilePath(migrationsDir: string, tableName: string): string {
  return path.join(snapshotDir(migrationsDir), tableName + EXT);
}

export function appliedDir(migrationsDir: string): string {
  return path.join(migrationsDir, 'applied');
}

export function tableAppliedDir(migrationsDir: string, tableName: string): string {
  return path.join(appliedDir(migrationsDir), tableName);
}

export function alterFileName(timestamp: string, tableName: string): string {
  return `${timestamp}_alter_${tableName}_table${EXT}`;
}

export function alterFilePath(migrationsDir: string, tableName: string, timestamp: string): string {
  return path.join(tableAppliedDir(migrationsDir, tableName), alterFileName(timestamp, tableName));
}

export function batchDir(migrationsDir: string): string {
  return path.join(appliedDir(migrationsDir), 'by_time');
}

export function batchUpDir(migrationsDir: string, tableName: string): string {
  return path.join(batchDir(migrationsDir), tableName, 'up');
}

export function batchDownDir(migrationsDir: string, tableName: string): string {
  return path.join(batchDir(migrationsDir), tableName, 'down');
}

export function batchUpPath(migrationsDir: string, tableName: string, timestamp: string): string {
  return path.join(batchUpDir(migrationsDir, tableName), timestamp + EXT);
}

export function batchDownPath(migrationsDir: string, tableName: string, timestamp: string): string {
  return path.join(batchDownDir(migrationsDir, tableName), timestamp + EXT);
}

export function registrarPath(migrationsDir: string): string {
  return path.join(migrationsDir, 'lib' + EXT);
}

export function stripExtension(fileName: string): string {
  return fileName.endsWith(EXT) ? fileName.slice(0, -EXT.length) : fileName;
}
