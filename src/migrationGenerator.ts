import * as fs from "fs";
import * as path from "path";
import type { ParsedSchema } from "./model";
import { isEmptyChanges } from "./model";
import { SchemaModel } from "./schemaModel";
import { diffSchemas, newTableChanges } from "./diff";
import {
	findDestructiveChanges,
	formatDestructiveChange,
	guardDestructiveChanges,
	type DecisionProvider,
	type GuardOutcome,
} from "./changeClassifier";
import {
	formatTimestamp,
	writeTableArtifacts,
	type TableChange,
} from "./artifactGenerator";
import { checkRegistrar, insertMigration } from "./historyLedger";
import { registrarPath, snapshotFilePath } from "./paths";
import { parseCreateFile, scanEntities, type SchemaSource, defaultSchemaSources } from "./sourceExtractor";
import { consoleLogger, type Logger } from "./logger";

export interface MigrationGeneratorOptions {
	/** Directory of table definition files */
	entitiesDir: string;
	/** Directory artifacts, snapshots and the registrar are written to */
	migrationsDir: string;
	/** Module generated files import the statement builders from */
	runtimeModule: string;
	/** Let destructive changes through without asking */
	force?: boolean;
	decide?: DecisionProvider;
	logger?: Logger;
	/** Clock used for the run timestamp */
	now?: () => Date;
	sources?: readonly SchemaSource[];
}

export interface TableResult {
	tableName: string;
	kind: "created" | "altered";
	files: string[];
}

export interface MigrationRunResult {
	/** Undefined when nothing was written */
	timestamp: string | undefined;
	tables: TableResult[];
	/** Tables whose definition matches their snapshot */
	unchanged: string[];
	guard: GuardOutcome;
}

/**
 * Turns the table definitions in a directory into migration artifacts.
 * Coordinates source extraction, diffing, the destructive-change gate and file output.
 */
export class MigrationGenerator {
	private readonly _logger: Logger;

	constructor(private readonly _options: MigrationGeneratorOptions) {
		this._logger = _options.logger ?? consoleLogger;
	}

	/**
	 * Definitions found in the entities directory, each validated.
	 * Throws before anything is written when a definition has no primary key.
	 */
	loadSchemas(): ParsedSchema[] {
		const { entitiesDir } = this._options;
		this._logger.info(`Scanning ${entitiesDir}`);

		const definitions = scanEntities(entitiesDir, this._logger, this._options.sources ?? defaultSchemaSources);
		const schemas: ParsedSchema[] = [];
		const seen = new Map<string, string>();

		for (const { filePath, schema } of definitions) {
			const first = seen.get(schema.tableName);
			if (first !== undefined) {
				this._logger.warn(
					`Table ${schema.tableName} in ${path.basename(filePath)} is already defined in ${path.basename(first)}; skipped`
				);
				continue;
			}
			SchemaModel.fromParsed(schema).validate();
			seen.set(schema.tableName, filePath);
			schemas.push(schema);
		}

		return schemas;
	}

	/**
	 * Compare one definition with its snapshot, if there is one.
	 */
	planTable(schema: ParsedSchema): TableChange {
		const snapshot = snapshotFilePath(this._options.migrationsDir, schema.tableName);
		if (!fs.existsSync(snapshot)) {
			return { changes: newTableChanges(schema), current: schema, previous: undefined };
		}
		const previous = parseCreateFile(snapshot);
		return { changes: diffSchemas(previous, schema), current: schema, previous };
	}

	async run(): Promise<MigrationRunResult> {
		const { migrationsDir, runtimeModule } = this._options;
		const schemas = this.loadSchemas();

		const pending: TableChange[] = [];
		const unchanged: string[] = [];
		for (const schema of schemas) {
			const plan = this.planTable(schema);
			if (isEmptyChanges(plan.changes)) {
				unchanged.push(schema.tableName);
			} else {
				pending.push(plan);
			}
		}

		if (pending.length === 0) {
			this._logger.info("No changes detected");
			return { timestamp: undefined, tables: [], unchanged, guard: { kind: "clean" } };
		}

		const registrar = registrarPath(migrationsDir);
		if (pending.some(p => p.changes.isNewTable)) {
			checkRegistrar(registrar);
		}

		const changes = pending.map(p => p.changes);
		for (const destructive of findDestructiveChanges(changes)) {
			this._logger.warn(`Destructive change: ${formatDestructiveChange(destructive)}`);
		}
		const guard = await guardDestructiveChanges(changes, {
			force: this._options.force,
			decide: this._options.decide,
		});
		if (guard.kind === "forced") {
			this._logger.warn("Proceeding with destructive changes (--force)");
		}

		const timestamp = formatTimestamp((this._options.now ?? (() => new Date()))());
		const tables: TableResult[] = [];

		for (const plan of pending) {
			const tableName = plan.changes.tableName;
			const written = writeTableArtifacts(migrationsDir, plan, timestamp, { runtimeModule }, (moduleName) =>
				insertMigration(registrar, moduleName, { runtimeModule }) ? [registrar] : []
			);
			const files = [...written.files];

			const kind = plan.changes.isNewTable ? "created" : "altered";
			this._logger.success(`${kind === "created" ? "Created" : "Altered"} ${tableName}`);
			files.forEach(f => this._logger.file(f));
			tables.push({ tableName, kind, files });
		}

		return { timestamp, tables, unchanged, guard };
	}
}
