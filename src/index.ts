// Runtime statement builders, imported by generated migration modules
export {
  ColumnDef,
  ForeignKey,
  ForeignKeyAction,
  Index,
  Table,
  SqlSchemaManager,
  TableCreateStatement,
  TableAlterStatement,
  TableDropStatement,
  ForeignKeyCreateStatement,
  ForeignKeyDropStatement,
  IndexCreateStatement,
  IndexDropStatement,
} from './ddl';
export type { SchemaManager, Migration } from './ddl';

// Core data model
export type {
  ColumnType,
  FkAction,
  ParsedSchema,
  ParsedColumn,
  ParsedFk,
  ParsedIndex,
  ModifiedColumn,
  Changes,
} from './model';
export { COLUMN_TYPES, FK_ACTIONS, createColumn, dbColumns, isEmptyChanges } from './model';

export type { ModelField, ModelBinding } from './schemaModel';
export { SchemaModel } from './schemaModel';

// Source extraction
export type { SchemaSource, ExtractedSchema, EntityDefinition } from './sourceExtractor';
export { extractSchema, parseCreateFile, scanEntities, defaultSchemaSources } from './sourceExtractor';
export { BuilderSchemaSource } from './builderSource';
export { StatementSchemaSource } from './statementSource';

// Diff and destructive-change gate
export { diffSchemas, newTableChanges } from './diff';
export type { DestructiveChange, DecisionProvider, GuardOptions, GuardOutcome } from './changeClassifier';
export { findDestructiveChanges, formatDestructiveChange, guardDestructiveChanges } from './changeClassifier';

// Artifacts and history
export type {
  GeneratorOptions,
  RegisterCreateModule,
  TableChange,
  WrittenArtifacts,
} from './artifactGenerator';
export {
  formatTimestamp,
  generateCreateFile,
  generateAlterFile,
  generateBatchUpFile,
  generateBatchDownFile,
  writeTableArtifacts,
} from './artifactGenerator';
export { checkRegistrar, insertMigration, readMigrations } from './historyLedger';
export type { MigrationHistory, TableHistory } from './history';
export { listHistory } from './history';

// Orchestration
export type { MigrationGeneratorOptions, MigrationRunResult, TableResult } from './migrationGenerator';
export { MigrationGenerator } from './migrationGenerator';
export type { MigratorConfig, LoadConfigOptions } from './config';
export { loadConfig, DEFAULT_CONFIG } from './config';
export type { Logger } from './logger';
export { consoleLogger, silentLogger } from './logger';
export * from './errors';
