import { Command } from "commander";
import * as readline from "readline";
import { loadConfig, type MigratorConfig } from "./config";
import { MigrationGenerator } from "./migrationGenerator";
import { listHistory, type MigrationHistory } from "./history";
import { parseCreateFile } from "./sourceExtractor";
import { snapshotFilePath } from "./paths";
import { SchemaModel } from "./schemaModel";
import { formatDestructiveChange, type DecisionProvider } from "./changeClassifier";
import { MigrationError } from "./errors";
import { consoleLogger, type Logger } from "./logger";

/**
 * Read one line from the user. Input that ends before a line arrives answers "".
 */
export function ask(
	question: string,
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stdout
): Promise<string> {
	const rl = readline.createInterface({ input, output });

	return new Promise((resolve) => {
		rl.on("close", () => resolve(""));
		rl.question(question, (answer) => {
			resolve(answer);
			rl.close();
		});
	});
}

const promptDecision: DecisionProvider = async (question, changes) => {
	console.log("Destructive changes detected:");
	for (const change of changes) {
		console.log(`  ${formatDestructiveChange(change)}`);
	}
	return ask(question);
};

export interface CliContext {
	logger: Logger;
	/** Receives command output, one line at a time */
	write: (line: string) => void;
	decide: DecisionProvider;
	cwd: string;
}

interface ConfigOptions {
	config?: string;
	entities?: string;
	migrations?: string;
	runtime?: string;
}

interface MakeMigrationsOptions extends ConfigOptions {
	force?: boolean;
}

function resolveConfig(options: ConfigOptions, cwd: string): MigratorConfig {
	return loadConfig({
		cwd,
		configPath: options.config,
		overrides: {
			entitiesDir: options.entities,
			migrationsDir: options.migrations,
			runtimeModule: options.runtime,
		},
	});
}

export function printHistory(history: MigrationHistory, write: (line: string) => void): void {
	if (history.tables.length === 0) {
		write("No migrations yet.");
		return;
	}
	for (const table of history.tables) {
		write(`${table.tableName}${table.hasSnapshot ? "" : " (no snapshot)"}`);
		for (const alteration of table.alterations) {
			write(`  alter ${alteration}`);
		}
		for (const batch of table.batches) {
			write(`  batch ${batch}`);
		}
	}
	write(`Registered: ${history.registered.length} create module(s)`);
	for (const moduleName of history.registered) {
		write(`  ${moduleName}`);
	}
}

export function createProgram(context: Partial<CliContext> = {}): Command {
	const logger = context.logger ?? consoleLogger;
	const write = context.write ?? ((line: string) => console.log(line));
	const decide = context.decide ?? promptDecision;
	const cwd = context.cwd ?? process.cwd();

	const program = new Command();

	program
		.name("entity-migrator")
		.description("Generate schema migrations from table definitions")
		.version("1.0.0");

	program
		.command("makemigrations")
		.description("Diff table definitions against their snapshots and write migration artifacts")
		.option("-e, --entities <dir>", "Directory of table definition files")
		.option("-m, --migrations <dir>", "Directory migrations are written to")
		.option("-c, --config <file>", "Config file (defaults to entity-migrator.json)")
		.option("--runtime <module>", "Module generated files import from")
		.option("--force", "Write destructive changes without asking")
		.action(async (options: MakeMigrationsOptions) => {
			const config = resolveConfig(options, cwd);
			const generator = new MigrationGenerator({
				...config,
				force: options.force,
				decide,
				logger,
			});
			const result = await generator.run();
			if (result.tables.length > 0) {
				logger.success(`Wrote migrations for ${result.tables.length} table(s) at ${result.timestamp}`);
			}
		});

	program
		.command("status")
		.description("List the artifacts in the migrations directory")
		.option("-m, --migrations <dir>", "Directory migrations are written to")
		.option("-c, --config <file>", "Config file (defaults to entity-migrator.json)")
		.action((options: ConfigOptions) => {
			const config = resolveConfig(options, cwd);
			printHistory(listHistory(config.migrationsDir), write);
		});

	program
		.command("sql <table>")
		.description("Print the CREATE TABLE SQL of a table's snapshot")
		.option("-m, --migrations <dir>", "Directory migrations are written to")
		.option("-c, --config <file>", "Config file (defaults to entity-migrator.json)")
		.action((table: string, options: ConfigOptions) => {
			const config = resolveConfig(options, cwd);
			const schema = parseCreateFile(snapshotFilePath(config.migrationsDir, table));
			for (const sql of SchemaModel.fromParsed(schema).toCreateTableSql()) {
				write(sql);
			}
		});

	program
		.command("model <table>")
		.description("Print the model interface of a table's snapshot")
		.option("-m, --migrations <dir>", "Directory migrations are written to")
		.option("-c, --config <file>", "Config file (defaults to entity-migrator.json)")
		.action((table: string, options: ConfigOptions) => {
			const config = resolveConfig(options, cwd);
			const schema = parseCreateFile(snapshotFilePath(config.migrationsDir, table));
			write(SchemaModel.fromParsed(schema).renderModelInterface());
		});

	return program;
}

/**
 * Run the CLI. Engine errors are printed and turn into a non-zero exit code.
 */
export async function main(argv: readonly string[], context: Partial<CliContext> = {}): Promise<void> {
	const logger = context.logger ?? consoleLogger;
	try {
		await createProgram(context).parseAsync(argv);
	} catch (error) {
		if (!(error instanceof MigrationError)) {
			throw error;
		}
		logger.error(error.message);
		process.exitCode = 1;
	}
}
