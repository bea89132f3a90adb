import * as fs from 'fs';
import * as path from 'path';
import type { ParsedSchema } from './model';
import { BuilderSchemaSource } from './builderSource';
import { StatementSchemaSource } from './statementSource';
import { ExtractionError, SourceReadError } from './errors';
import type { Logger } from './logger';

/**
 * A front-end that recognizes one way of writing a table definition.
 * Returns null when the source does not have its shape.
 */
export interface SchemaSource {
  readonly name: string;
  extract(source: string, fileName?: string): ParsedSchema | null;
}

export const defaultSchemaSources: readonly SchemaSource[] = [
  new BuilderSchemaSource(),
  new StatementSchemaSource(),
];

export interface ExtractedSchema {
  readonly schema: ParsedSchema;
  /** Name of the front-end that recognized the source */
  readonly sourceName: string;
}

/**
 * Try each front-end in turn and keep the first result.
 */
export function extractSchema(
  source: string,
  fileName?: string,
  sources: readonly SchemaSource[] = defaultSchemaSources
): ExtractedSchema | null {
  for (const front of sources) {
    const schema = front.extract(source, fileName);
    if (schema !== null) {
      return { schema, sourceName: front.name };
    }
  }
  return null;
}

export function readSource(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new SourceReadError(filePath, error);
  }
}

/**
 * Parse a generated create module or snapshot. Unlike entity scanning, a file
 * without a table name is an error here.
 */
export function parseCreateFile(filePath: string): ParsedSchema {
  const schema = new StatementSchemaSource().extract(readSource(filePath), filePath);
  if (schema === null) {
    throw new ExtractionError(filePath, 'cannot extract table name');
  }
  return schema;
}

export interface EntityDefinition {
  readonly filePath: string;
  readonly schema: ParsedSchema;
}

export function isDefinitionFile(fileName: string): boolean {
  return fileName.endsWith('.ts')
    && !fileName.endsWith('.d.ts')
    && !fileName.endsWith('.test.ts')
    && fileName !== 'index.ts';
}

/**
 * Read every definition file in `entitiesDir`, in file-name order.
 * Unreadable and unrecognized files are reported and skipped.
 */
export function scanEntities(
  entitiesDir: string,
  logger: Logger,
  sources: readonly SchemaSource[] = defaultSchemaSources
): EntityDefinition[] {
  let entries: string[];
  try {
    entries = fs.readdirSync(entitiesDir).filter(isDefinitionFile).sort();
  } catch (error) {
    throw new SourceReadError(entitiesDir, error);
  }

  const definitions: EntityDefinition[] = [];

  for (const entry of entries) {
    const filePath = path.join(entitiesDir, entry);

    let source: string;
    try {
      source = readSource(filePath);
    } catch (error) {
      if (!(error instanceof SourceReadError)) {
        throw error;
      }
      logger.warn(error.message);
      continue;
    }

    const extracted = extractSchema(source, filePath, sources);
    if (extracted === null) {
      logger.step(`Skipped ${entry}: no schema definition found`);
      continue;
    }

    logger.step(`Found schema: ${extracted.schema.tableName} (${entry})`);
    definitions.push({ filePath, schema: extracted.schema });
  }

  return definitions;
}
