import * as fs from 'fs';
import ts from 'typescript';
import { parseSource } from './astHelpers';
import { writeArtifact } from './artifactGenerator';
import { RegistrarFormatError } from './errors';
import { readSource } from './sourceExtractor';

export interface RegistrarOptions {
  /** Module the registrar imports the `Migration` type from */
  readonly runtimeModule: string;
}

const CLOSING = '\n];';

function headerImport(runtimeModule: string): string {
  return `import type { Migration } from ${JSON.stringify(runtimeModule)};`;
}

function moduleImport(moduleName: string): string {
  return `import * as ${moduleName} from "./${moduleName}";`;
}

function moduleEntry(moduleName: string): string {
  return `  ${moduleName},`;
}

export function registrarSkeleton(moduleNames: readonly string[], options: RegistrarOptions): string {
  return [
    headerImport(options.runtimeModule),
    ...moduleNames.map(moduleImport),
    '',
    'export const migrations: Migration[] = [',
    ...moduleNames.map(moduleEntry),
    '];',
    '',
  ].join('\n');
}

function lastImportLine(lines: readonly string[]): number {
  let lastImport = -1;
  lines.forEach((l, i) => {
    if (l.startsWith('import ')) {
      lastImport = i;
    }
  });
  return lastImport;
}

function checkMarkers(registrarPath: string, content: string): void {
  if (!content.includes(CLOSING)) {
    throw new RegistrarFormatError(registrarPath, 'closing "];"');
  }
  if (lastImportLine(content.split('\n')) === -1) {
    throw new RegistrarFormatError(registrarPath, 'header import');
  }
}

/**
 * Insert `line` after the last `import` line.
 */
function insertImport(content: string, line: string): string {
  const lines = content.split('\n');
  lines.splice(lastImportLine(lines) + 1, 0, line);
  return lines.join('\n');
}

function insertEntry(content: string, line: string): string {
  const closing = content.lastIndexOf(CLOSING);
  return `${content.slice(0, closing)}\n${line}${content.slice(closing)}`;
}

/**
 * Throw when an existing registrar lacks the markers new entries are inserted
 * at. A missing registrar passes, since the first insert creates it.
 */
export function checkRegistrar(registrarPath: string): void {
  if (fs.existsSync(registrarPath)) {
    checkMarkers(registrarPath, readSource(registrarPath));
  }
}

/**
 * Register a create module with the registrar, creating the registrar when it
 * does not exist. Registering a module twice leaves the file unchanged.
 *
 * @returns whether the file was written
 */
export function insertMigration(registrarPath: string, moduleName: string, options: RegistrarOptions): boolean {
  if (!fs.existsSync(registrarPath)) {
    writeArtifact(registrarPath, registrarSkeleton([moduleName], options));
    return true;
  }

  const original = readSource(registrarPath);
  checkMarkers(registrarPath, original);
  let content = original;

  const importLine = moduleImport(moduleName);
  if (!content.split('\n').includes(importLine)) {
    content = insertImport(content, importLine);
  }

  const entryLine = moduleEntry(moduleName);
  if (!content.split('\n').includes(entryLine)) {
    content = insertEntry(content, entryLine);
  }

  if (content === original) {
    return false;
  }
  writeArtifact(registrarPath, content);
  return true;
}

/**
 * Module names listed in the registrar's `migrations` array, in order.
 * Empty when the registrar does not exist.
 */
export function readMigrations(registrarPath: string): string[] {
  if (!fs.existsSync(registrarPath)) {
    return [];
  }

  const file = parseSource(readSource(registrarPath), registrarPath);
  for (const statement of file.statements) {
    if (!ts.isVariableStatement(statement)) {
      continue;
    }
    for (const decl of statement.declarationList.declarations) {
      if (
        ts.isIdentifier(decl.name)
        && decl.name.text === 'migrations'
        && decl.initializer !== undefined
        && ts.isArrayLiteralExpression(decl.initializer)
      ) {
        return decl.initializer.elements.filter(ts.isIdentifier).map(e => e.text);
      }
    }
  }

  throw new RegistrarFormatError(registrarPath, 'migrations array');
}
