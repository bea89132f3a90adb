import * as fs from 'fs';
import * as path from 'path';
import Ajv, { type JSONSchemaType } from 'ajv';
import { ConfigError } from './errors';

export const CONFIG_FILE_NAME = 'entity-migrator.json';

export interface MigratorConfig {
  /** Directory of table definition files */
  entitiesDir: string;
  /** Directory the artifacts are written to */
  migrationsDir: string;
  /** Module generated files import the statement builders from */
  runtimeModule: string;
}

export const DEFAULT_CONFIG: Readonly<MigratorConfig> = {
  entitiesDir: 'src/entities',
  migrationsDir: 'migrations',
  runtimeModule: 'entity-migrator',
};

type ConfigFile = Partial<MigratorConfig>;

const configSchema: JSONSchemaType<ConfigFile> = {
  type: 'object',
  properties: {
    entitiesDir: { type: 'string', minLength: 1, nullable: true },
    migrationsDir: { type: 'string', minLength: 1, nullable: true },
    runtimeModule: { type: 'string', minLength: 1, nullable: true },
  },
  required: [],
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true });
const validateConfigFile = ajv.compile(configSchema);

export function parseConfig(json: string, filePath: string): ConfigFile {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${filePath}`, { cause: error });
  }
  if (!validateConfigFile(data)) {
    throw new ConfigError(`Invalid config ${filePath}: ${ajv.errorsText(validateConfigFile.errors, { dataVar: 'config' })}`);
  }
  return data;
}

export interface LoadConfigOptions {
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Directory the default config file and relative paths are resolved against */
  cwd?: string;
  /** Values taking precedence over the file, typically CLI options */
  overrides?: Partial<MigratorConfig>;
}

/**
 * Defaults, then the config file, then overrides. Directories come back absolute.
 */
export function loadConfig(options: LoadConfigOptions = {}): MigratorConfig {
  const cwd = options.cwd ?? process.cwd();
  const filePath = path.resolve(cwd, options.configPath ?? CONFIG_FILE_NAME);

  let fromFile: ConfigFile = {};
  if (fs.existsSync(filePath)) {
    fromFile = parseConfig(fs.readFileSync(filePath, 'utf-8'), filePath);
  } else if (options.configPath !== undefined) {
    throw new ConfigError(`Config file not found: ${filePath}`);
  }

  const overrides = options.overrides ?? {};
  const merged: MigratorConfig = {
    entitiesDir: overrides.entitiesDir ?? fromFile.entitiesDir ?? DEFAULT_CONFIG.entitiesDir,
    migrationsDir: overrides.migrationsDir ?? fromFile.migrationsDir ?? DEFAULT_CONFIG.migrationsDir,
    runtimeModule: overrides.runtimeModule ?? fromFile.runtimeModule ?? DEFAULT_CONFIG.runtimeModule,
  };

  return {
    ...merged,
    entitiesDir: path.resolve(cwd, merged.entitiesDir),
    migrationsDir: path.resolve(cwd, merged.migrationsDir),
  };
}
