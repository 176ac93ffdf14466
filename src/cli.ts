import { Command } from "commander";
import * as fs from "fs";
import { parseSettings } from "./settings.ts";
import { InvalidSettingsError, errorMessage } from "./errors.ts";
import { driverFor, supportedDatabaseTypes } from "./databaseRegistry.ts";
import { supportedTaggers } from "./taggers.ts";
import { generate, writeStructFiles } from "./codegen.ts";
import { isRow } from "./model.ts";

interface CliOptions {
	type?: string;
	user?: string;
	password?: string;
	host?: string;
	port?: number;
	dbName?: string;
	schema?: string;
	socket?: string;
	sslmode?: string;
	tables?: string[];
	tags?: string[];
	format?: string;
	null?: string;
	initialism: boolean;
	package?: string;
	prefix?: string;
	suffix?: string;
	output?: string;
	stdout?: boolean;
	config?: string;
	verbose?: boolean;
	listDatabases?: boolean;
}

function parseList(value: string): string[] {
	return value.split(",").map((item) => item.trim()).filter((item) => item !== "");
}

function parsePort(value: string): number {
	const port = Number(value);
	if (!Number.isInteger(port)) {
		throw new InvalidSettingsError([`port must be an integer, got "${value}"`]);
	}
	return port;
}

const program = new Command();

program
	.name("table-structs")
	.description("Generate Go structs from the tables of a database")
	.version("0.1.0")
	.option("-t, --type <dbType>", `database type (${supportedDatabaseTypes().join(", ")})`)
	.option("-u, --user <user>", "user to connect with")
	.option("-p, --password <password>", "password of the user")
	.option("--host <host>", "host of the database")
	.option("--port <port>", "port of the database (defaults per database type)", parsePort)
	.option("-d, --db-name <name>", "database name, file (sqlite3) or data directory (pglite)")
	.option("-s, --schema <schema>", "schema (pg) or owner (oracle) to inspect")
	.option("--socket <path>", "unix socket to connect through")
	.option("--sslmode <mode>", "ssl mode (pg)")
	.option("--tables <names>", "comma separated tables to generate, all if omitted", parseList)
	.option("--tags <names>", `comma separated tag generators in order (${supportedTaggers().join(", ")})`, parseList)
	.option("-f, --format <format>", "field name format: camelCase or original")
	.option("--null <type>", "type of nullable fields: sql, native or primitive")
	.option("--no-initialism", "do not upper-case initialisms such as ID or URL")
	.option("--package <name>", "package name of the generated files")
	.option("--prefix <prefix>", "prefix of struct names")
	.option("--suffix <suffix>", "suffix of struct names")
	.option("-o, --output <dir>", "directory to write the files to")
	.option("--stdout", "print the files instead of writing them")
	.option("-c, --config <file>", "JSON file with settings; flags take precedence")
	.option("-v, --verbose", "print diagnostics")
	.option("--list-databases", "list supported database types and their drivers");

function readConfigFile(file: string): Record<string, unknown> {
	const content: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
	if (!isRow(content)) {
		throw new InvalidSettingsError([`${file} must contain a JSON object`]);
	}
	return content;
}

function flagSettings(options: CliOptions): Record<string, unknown> {
	const entries: [string, unknown][] = [
		["dbType", options.type],
		["user", options.user],
		["password", options.password],
		["host", options.host],
		["port", options.port],
		["dbName", options.dbName],
		["schema", options.schema],
		["socket", options.socket],
		["sslMode", options.sslmode],
		["tables", options.tables],
		["tags", options.tags],
		["outputFormat", options.format],
		["nullType", options.null],
		["noInitialism", options.initialism ? undefined : true],
		["packageName", options.package],
		["prefix", options.prefix],
		["suffix", options.suffix],
		["outputPath", options.output],
		["verbose", options.verbose],
	];
	return Object.fromEntries(entries.filter(([, value]) => value !== undefined));
}

async function main(): Promise<void> {
	await program.parseAsync();
	const options = program.opts<CliOptions>();

	if (options.listDatabases) {
		for (const dbType of supportedDatabaseTypes()) {
			console.log(`${dbType}\t${driverFor(dbType)}`);
		}
		return;
	}

	const fileSettings = options.config ? readConfigFile(options.config) : {};
	const settings = parseSettings({ ...fileSettings, ...flagSettings(options) });

	const files = await generate(settings);
	if (options.stdout) {
		for (const file of files) {
			console.log(`// ${file.fileName}`);
			console.log(file.content);
		}
		return;
	}

	const written = writeStructFiles(files, settings.outputPath);
	console.log(`Wrote ${written.length} file(s) to ${settings.outputPath}`);
}

main().catch((error: unknown) => {
	console.error(`Error: ${errorMessage(error)}`);
	process.exitCode = 1;
});
