import { describe, test, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { PassThrough } from "stream";
import { ask, main, type CliContext } from "./cli";
import { silentLogger, type Logger } from "./logger";

describe("CLI", () => {
	let cwd: string;
	let output: string[];
	let errors: string[];

	function context(overrides: Partial<CliContext> = {}): Partial<CliContext> {
		const logger: Logger = { ...silentLogger, error: (m) => errors.push(m) };
		return {
			cwd,
			logger,
			write: (line) => output.push(line),
			decide: async () => "",
			...overrides,
		};
	}

	function run(...args: string[]): Promise<void> {
		return main(["node", "entity-migrator", ...args], context());
	}

	beforeEach(() => {
		cwd = fs.mkdtempSync(path.join(os.tmpdir(), "cli-"));
		output = [];
		errors = [];
		fs.mkdirSync(path.join(cwd, "src", "entities"), { recursive: true });
		fs.writeFileSync(
			path.join(cwd, "src", "entities", "users.ts"),
			`export const users = model("User").tableName("users")
				.primaryKey(PrimaryKeyDef.create("id").i32())
				.column(ColumnDef.create("email").string().unique())
				.build();`
		);
	});

	afterEach(() => {
		fs.rmSync(cwd, { recursive: true, force: true });
		process.exitCode = undefined;
	});

	test("makemigrations writes to the default directories", async () => {
		await run("makemigrations");

		const files = fs.readdirSync(path.join(cwd, "migrations"));
		expect(files.filter((f) => /^m\d{8}_\d{6}_create_users_table\.ts$/.test(f))).toHaveLength(1);
		expect(files).toContain("lib.ts");
		expect(fs.existsSync(path.join(cwd, "migrations", "snapshots", "users.ts"))).toBe(true);
	});

	test("directories can come from the config file and options", async () => {
		fs.writeFileSync(path.join(cwd, "entity-migrator.json"), JSON.stringify({ migrationsDir: "db" }));

		await run("makemigrations", "--runtime", "../runtime");

		const snapshot = fs.readFileSync(path.join(cwd, "db", "snapshots", "users.ts"), "utf-8");
		expect(snapshot.split("\n")[1]).toBe('import { ColumnDef, Table, type SchemaManager } from "../runtime";');
	});

	test("sql prints the create statement of a snapshot", async () => {
		await run("makemigrations");
		await run("sql", "users");

		expect(output).toEqual([
			[
				'CREATE TABLE IF NOT EXISTS "users" (',
				'  "id" integer GENERATED BY DEFAULT AS IDENTITY NOT NULL PRIMARY KEY,',
				'  "email" varchar NOT NULL UNIQUE',
				");",
			].join("\n"),
		]);
	});

	test("model prints the model interface", async () => {
		await run("makemigrations");
		await run("model", "users");

		expect(output).toEqual(["export interface Users {\n  id: number;\n  email: string;\n}"]);
	});

	test("status lists tables and registered modules", async () => {
		await run("makemigrations");
		await run("status");

		expect(output).toHaveLength(3);
		expect(output[0]).toBe("users");
		expect(output[1]).toBe("Registered: 1 create module(s)");
		expect(output[2]).toMatch(/^ {2}m\d{8}_\d{6}_create_users_table$/);
	});

	test("status on an empty directory", async () => {
		await run("status");
		expect(output).toEqual(["No migrations yet."]);
	});

	test("engine errors are printed and set the exit code", async () => {
		await run("sql", "missing");

		expect(errors).toEqual([`Cannot read file: ${path.join(cwd, "migrations", "snapshots", "missing.ts")}`]);
		expect(process.exitCode).toBe(1);
	});

	test("a declined destructive change aborts", async () => {
		await run("makemigrations");
		fs.writeFileSync(
			path.join(cwd, "src", "entities", "users.ts"),
			`export const users = model("User").tableName("users")
				.primaryKey(PrimaryKeyDef.create("id").i32())
				.column(ColumnDef.create("email").text().unique())
				.build();`
		);

		await run("makemigrations");

		expect(errors).toEqual(["Destructive changes require a default value or --force. Aborting."]);
		expect(fs.existsSync(path.join(cwd, "migrations", "applied"))).toBe(false);
	});
});

describe("ask", () => {
	test("returns the typed line", async () => {
		const input = new PassThrough();
		const answer = ask("Continue? ", input, new PassThrough());
		input.write("yes\n");

		await expect(answer).resolves.toBe("yes");
	});

	test("end of input answers empty", async () => {
		const input = new PassThrough();
		const answer = ask("Continue? ", input, new PassThrough());
		input.end();

		await expect(answer).resolves.toBe("");
	});
});
