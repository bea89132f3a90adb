export type MigrationErrorCode =
  | 'SOURCE_READ'
  | 'EXTRACTION'
  | 'MISSING_PRIMARY_KEY'
  | 'DESTRUCTIVE_CHANGE_BLOCKED'
  | 'WRITE_FAILURE'
  | 'REGISTRAR_FORMAT'
  | 'CONFIG';

/**
 * Base class for every failure the migration engine reports.
 */
export class MigrationError extends Error {
  constructor(
    readonly code: MigrationErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SourceReadError extends MigrationError {
  constructor(readonly path: string, cause: unknown) {
    super('SOURCE_READ', `Cannot read file: ${path}`, { cause });
  }
}

export class ExtractionError extends MigrationError {
  constructor(readonly path: string, reason: string) {
    super('EXTRACTION', `Cannot parse ${path}: ${reason}`);
  }
}

export class MissingPrimaryKeyError extends MigrationError {
  constructor(readonly tableName: string) {
    super('MISSING_PRIMARY_KEY', `Schema '${tableName}' has no primary key`);
  }
}

export class DestructiveChangeBlockedError extends MigrationError {
  constructor(readonly changes: readonly string[]) {
    super(
      'DESTRUCTIVE_CHANGE_BLOCKED',
      'Destructive changes require a default value or --force. Aborting.'
    );
  }
}

export class WriteFailureError extends MigrationError {
  constructor(readonly path: string, cause: unknown) {
    super('WRITE_FAILURE', `Failed to write: ${path}`, { cause });
  }
}

export class RegistrarFormatError extends MigrationError {
  constructor(readonly path: string, marker: string) {
    super('REGISTRAR_FORMAT', `Registrar ${path} is missing its ${marker}`);
  }
}

export class ConfigError extends MigrationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
  }
}
