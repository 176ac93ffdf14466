import type { Column, Row, Table, TypeCategory } from "./model.ts";
import { createTable } from "./model.ts";
import type { DbClient } from "./clients.ts";
import type { Settings } from "./settings.ts";
import type { Logger } from "./logger.ts";
import { silentLogger } from "./logger.ts";
import { ConnectionError, PrepareError, QueryError, errorMessage } from "./errors.ts";
import { classifyColumn } from "./typeCategory.ts";

/**
 * The capability set every supported database product implements.
 */
export interface Database {
	readonly settings: Settings;
	readonly driver: string;

	dsn(): string;
	connect(): Promise<void>;
	close(): Promise<void>;

	/** Base tables in the configured scope, ordered by name, without columns */
	getTables(tableNames?: readonly string[]): Promise<Table[]>;
	prepareGetColumnsOfTableStmt(): void;
	/** Returns the table with its columns attached, ordered by ordinal position */
	getColumnsOfTable(table: Table): Promise<Table>;

	isPrimaryKey(column: Column): boolean;
	isAutoIncrement(column: Column): boolean;
	isNullable(column: Column): boolean;

	getStringDatatypes(): readonly string[];
	isString(column: Column): boolean;
	getTextDatatypes(): readonly string[];
	isText(column: Column): boolean;
	getIntegerDatatypes(): readonly string[];
	isInteger(column: Column): boolean;
	getFloatDatatypes(): readonly string[];
	isFloat(column: Column): boolean;
	getTemporalDatatypes(): readonly string[];
	isTemporal(column: Column): boolean;

	classify(column: Column): TypeCategory;
}

export interface DatabaseOptions {
	/** Use this client instead of opening one from the DSN */
	readonly client?: DbClient;
	readonly logger?: Logger;
}

/** How a product writes bind parameters in SQL text */
export type PlaceholderStyle = "dollar" | "question" | "colon";

/**
 * A column query checked once against the number of parameters it will be
 * bound with.
 */
export class PreparedStatement {
	constructor(
		readonly sql: string,
		readonly parameterCount: number
	) { }

	async select(client: DbClient, params: readonly unknown[]): Promise<Row[]> {
		if (params.length !== this.parameterCount) {
			throw new PrepareError(
				`Statement expects ${this.parameterCount} parameter(s), got ${params.length}`
			);
		}
		const result = await client.query(this.sql, params);
		return result.rows;
	}
}

/**
 * Connection handling and catalog plumbing shared by all backends.
 * Catalog SQL, scoping and the type rules stay with each product.
 */
export abstract class GeneralDatabase implements Database {
	protected readonly logger: Logger;
	protected getColumnsOfTableStmt: PreparedStatement | undefined;
	private readonly _injectedClient: DbClient | undefined;
	private _client: DbClient | undefined;

	constructor(
		readonly settings: Settings,
		readonly driver: string,
		private readonly _placeholders: PlaceholderStyle,
		options: DatabaseOptions = {}
	) {
		this._injectedClient = options.client;
		this.logger = options.logger ?? silentLogger;
	}

	abstract dsn(): string;
	protected abstract openClient(dsn: string): Promise<DbClient>;
	/** Description of where the connection goes, without credentials */
	protected abstract describeTarget(): string;

	abstract getTables(tableNames?: readonly string[]): Promise<Table[]>;
	abstract prepareGetColumnsOfTableStmt(): void;
	abstract getColumnsOfTable(table: Table): Promise<Table>;

	abstract isPrimaryKey(column: Column): boolean;
	abstract isAutoIncrement(column: Column): boolean;
	abstract isNullable(column: Column): boolean;

	abstract getStringDatatypes(): readonly string[];
	abstract getTextDatatypes(): readonly string[];
	abstract getIntegerDatatypes(): readonly string[];
	abstract getFloatDatatypes(): readonly string[];
	abstract getTemporalDatatypes(): readonly string[];

	protected pingQuery(): string {
		return "SELECT 1";
	}

	async connect(): Promise<void> {
		if (this._client) {
			return;
		}

		let client: DbClient;
		try {
			client = this._injectedClient ?? await this.openClient(this.dsn());
		} catch (error) {
			throw new ConnectionError(
				`Could not connect to ${this.describeTarget()}: ${errorMessage(error)}`,
				{ cause: error }
			);
		}

		try {
			await client.query(this.pingQuery());
		} catch (error) {
			await client.close().catch((closeError: unknown) => {
				this.logger.debug(`> Error at close(): ${errorMessage(closeError)}`);
			});
			throw new ConnectionError(
				`Could not connect to ${this.describeTarget()}: ${errorMessage(error)}`,
				{ cause: error }
			);
		}

		this._client = client;
	}

	async close(): Promise<void> {
		const client = this._client;
		this._client = undefined;
		this.getColumnsOfTableStmt = undefined;
		if (client) {
			await client.close();
		}
	}

	isString(column: Column): boolean {
		return isDatatypeInList(column.dataType, this.getStringDatatypes());
	}

	isText(column: Column): boolean {
		return isDatatypeInList(column.dataType, this.getTextDatatypes());
	}

	isInteger(column: Column): boolean {
		return isDatatypeInList(column.dataType, this.getIntegerDatatypes());
	}

	isFloat(column: Column): boolean {
		return isDatatypeInList(column.dataType, this.getFloatDatatypes());
	}

	isTemporal(column: Column): boolean {
		return isDatatypeInList(column.dataType, this.getTemporalDatatypes());
	}

	classify(column: Column): TypeCategory {
		return classifyColumn(this, column);
	}

	protected client(): DbClient {
		if (!this._client) {
			throw new ConnectionError(`Not connected to ${this.describeTarget()}; call connect() first`);
		}
		return this._client;
	}

	/**
	 * Check a statement's placeholders against the parameters it will be
	 * bound with.
	 */
	protected prepare(sql: string, parameterCount: number): PreparedStatement {
		if (sql.trim() === "") {
			throw new PrepareError("Statement is empty");
		}
		const declared = countPlaceholders(sql, this._placeholders);
		if (declared !== parameterCount) {
			throw new PrepareError(
				`Statement declares ${declared} placeholder(s) but is bound with ${parameterCount} parameter(s)`
			);
		}
		return new PreparedStatement(sql, parameterCount);
	}

	/**
	 * Run a table listing query and map it to column-less tables.
	 */
	protected async selectTables(
		sql: string,
		params: readonly unknown[],
		scope: { readonly kind: string; readonly name: string }
	): Promise<Table[]> {
		const client = this.client();
		try {
			const result = await client.query(sql, params);
			return result.rows.map((row) => createTable(readRequiredString(row, "table_name")));
		} catch (error) {
			this.logger.debug("> Error at getTables()");
			this.logger.debug(`> ${scope.kind}: ${JSON.stringify(scope.name)}`);
			throw new QueryError(
				`Could not list tables (${scope.kind} "${scope.name}"): ${errorMessage(error)}`,
				{ scope: scope.name, cause: error }
			);
		}
	}

	/**
	 * Run the prepared column query and attach the scanned columns.
	 */
	protected async selectColumns(
		table: Table,
		params: readonly unknown[],
		scope: { readonly kind: string; readonly name: string }
	): Promise<Table> {
		const statement = this.getColumnsOfTableStmt;
		if (!statement) {
			throw new PrepareError("Column statement is not prepared; call prepareGetColumnsOfTableStmt() first");
		}
		const client = this.client();

		try {
			const rows = await statement.select(client, params);
			return createTable(table.name, rows.map(scanColumn));
		} catch (error) {
			if (error instanceof PrepareError) {
				throw error;
			}
			this.logger.debug(`> Error at getColumnsOfTable(${table.name})`);
			this.logger.debug(`> ${scope.kind}: ${JSON.stringify(scope.name)}`);
			throw new QueryError(
				`Could not fetch columns of table "${table.name}" (${scope.kind} "${scope.name}"): ${errorMessage(error)}`,
				{ scope: scope.name, table: table.name, cause: error }
			);
		}
	}
}

/**
 * Build `AND <field> IN (...)` for a table filter, appending the normalized
 * names to `args`. Returns an empty string for an empty filter.
 */
export function andInClause(
	field: string,
	names: readonly string[],
	args: unknown[],
	placeholder: (position: number) => string,
	normalize: (name: string) => string
): string {
	if (names.length === 0) {
		return "";
	}
	const placeholders = names.map((name) => {
		args.push(normalize(name));
		return placeholder(args.length);
	});
	return `AND ${field} IN (${placeholders.join(", ")})`;
}

/**
 * Case-insensitive membership; type arguments such as `(100)` are ignored.
 */
export function isDatatypeInList(dataType: string, datatypes: readonly string[]): boolean {
	const needle = normalizeDatatype(dataType);
	return datatypes.some((candidate) => normalizeDatatype(candidate) === needle);
}

export function normalizeDatatype(dataType: string): string {
	return dataType.replace(/\([^)]*\)/g, " ").replace(/\s+/g, " ").trim().toLowerCase();
}

export function countPlaceholders(sql: string, style: PlaceholderStyle): number {
	const code = stripStringLiterals(sql);
	switch (style) {
		case "dollar":
			return new Set(code.match(/\$\d+/g) ?? []).size;
		case "question":
			return (code.match(/\?/g) ?? []).length;
		case "colon":
			return new Set(code.match(/(?<!:):[a-zA-Z]\w*/g) ?? []).size;
	}
}

function stripStringLiterals(sql: string): string {
	return sql.replace(/'(?:[^']|'')*'/g, "''");
}

/**
 * Map one row of a column query to the canonical column. Keys are matched
 * case-insensitively since some catalogs return upper-case names.
 */
export function scanColumn(row: Row): Column {
	const values = lowercaseKeys(row);
	const ordinalPosition = readOptionalNumber(values, "ordinal_position");
	if (ordinalPosition === null) {
		throw new Error("Column row is missing ordinal_position");
	}
	return {
		ordinalPosition,
		name: readRequiredString(values, "column_name"),
		dataType: readRequiredString(values, "data_type"),
		defaultValue: readOptionalString(values, "column_default"),
		isNullable: readOptionalString(values, "is_nullable") ?? "",
		characterMaximumLength: readOptionalNumber(values, "character_maximum_length"),
		numericPrecision: readOptionalNumber(values, "numeric_precision"),
		constraintName: readOptionalString(values, "constraint_name"),
		constraintType: readOptionalString(values, "constraint_type"),
		extra: readOptionalString(values, "extra"),
	};
}

function lowercaseKeys(row: Row): Row {
	return Object.fromEntries(Object.entries(row).map(([key, value]) => [key.toLowerCase(), value]));
}

function readRequiredString(row: Row, key: string): string {
	const value = readOptionalString(lowercaseKeys(row), key);
	if (value === null || value === "") {
		throw new Error(`Catalog row is missing ${key}`);
	}
	return value;
}

function readOptionalString(row: Row, key: string): string | null {
	const value = row[key];
	if (value === null || value === undefined) {
		return null;
	}
	if (typeof value === "string") {
		return value;
	}
	if (typeof value === "number" || typeof value === "bigint" || typeof value === "boolean") {
		return String(value);
	}
	if (Buffer.isBuffer(value)) {
		return value.toString("utf8");
	}
	throw new Error(`Catalog value ${key} has unexpected type ${typeof value}`);
}

function readOptionalNumber(row: Row, key: string): number | null {
	const value = row[key];
	if (value === null || value === undefined) {
		return null;
	}
	const numeric = typeof value === "number" ? value : Number(value);
	if (!Number.isFinite(numeric)) {
		throw new Error(`Catalog value ${key} is not a number: ${String(value)}`);
	}
	return numeric;
}
