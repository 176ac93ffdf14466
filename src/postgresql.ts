import type { Column, Table } from "./model.ts";
import type { Settings } from "./settings.ts";
import { createPgClient, type DbClient } from "./clients.ts";
import { GeneralDatabase, andInClause, type DatabaseOptions } from "./generalDatabase.ts";

/**
 * PostgreSQL backend, reading `information_schema`.
 */
export class Postgresql extends GeneralDatabase {
	protected readonly defaultUserName: string = "postgres";
	protected readonly defaultPort: number = 5432;

	constructor(settings: Settings, driver: string, options?: DatabaseOptions) {
		super(settings, driver, "dollar", options);
	}

	dsn(): string {
		const s = this.settings;
		const user = encodeURIComponent(s.user || this.defaultUserName);
		const password = encodeURIComponent(s.password);
		const port = s.port ?? this.defaultPort;
		const db = encodeURIComponent(s.dbName);
		if (s.socket !== "") {
			return `postgres://${user}:${password}@/${db}?host=${encodeURIComponent(s.socket)}&port=${port}&sslmode=${s.sslMode}`;
		}
		return `postgres://${user}:${password}@${s.host}:${port}/${db}?sslmode=${s.sslMode}`;
	}

	protected openClient(dsn: string): Promise<DbClient> {
		return createPgClient(dsn);
	}

	protected describeTarget(): string {
		const s = this.settings;
		return s.socket !== "" ? `postgres via ${s.socket}` : `postgres at ${s.host}:${s.port ?? this.defaultPort}`;
	}

	get schema(): string {
		return this.settings.schema || "public";
	}

	async getTables(tableNames: readonly string[] = []): Promise<Table[]> {
		const args: unknown[] = [this.schema];
		const inClause = andInClause("LOWER(table_name)", tableNames, args, (n) => `$${n}`, (name) => name.toLowerCase());

		return this.selectTables(`
			SELECT table_name
			FROM information_schema.tables
			WHERE table_type = 'BASE TABLE'
			AND table_schema = $1
			${inClause}
			ORDER BY table_name
		`, args, { kind: "schema", name: this.schema });
	}

	prepareGetColumnsOfTableStmt(): void {
		this.getColumnsOfTableStmt = this.prepare(`
			SELECT
				ic.ordinal_position,
				ic.column_name,
				ic.data_type,
				ic.column_default,
				ic.is_nullable,
				ic.character_maximum_length,
				ic.numeric_precision,
				pk.constraint_name,
				pk.constraint_type
			FROM information_schema.columns AS ic
				LEFT JOIN (
					SELECT ikcu.table_schema, ikcu.table_name, ikcu.column_name, itc.constraint_name, itc.constraint_type
					FROM information_schema.key_column_usage AS ikcu
						JOIN information_schema.table_constraints AS itc ON ikcu.constraint_schema = itc.constraint_schema
						AND ikcu.constraint_name = itc.constraint_name
						AND ikcu.table_name = itc.table_name
					WHERE itc.constraint_type = 'PRIMARY KEY'
				) AS pk ON ic.table_schema = pk.table_schema
				AND ic.table_name = pk.table_name
				AND ic.column_name = pk.column_name
			WHERE ic.table_name = $1
			AND ic.table_schema = $2
			ORDER BY ic.ordinal_position
		`, 2);
	}

	getColumnsOfTable(table: Table): Promise<Table> {
		return this.selectColumns(table, [table.name, this.schema], { kind: "schema", name: this.schema });
	}

	isPrimaryKey(column: Column): boolean {
		return (column.constraintType ?? "").includes("PRIMARY KEY");
	}

	isAutoIncrement(column: Column): boolean {
		return (column.defaultValue ?? "").includes("nextval");
	}

	isNullable(column: Column): boolean {
		return column.isNullable === "YES";
	}

	getStringDatatypes(): readonly string[] {
		return ["character varying", "varchar", "character", "char", "uuid"];
	}

	getTextDatatypes(): readonly string[] {
		return ["text"];
	}

	getIntegerDatatypes(): readonly string[] {
		return ["smallint", "integer", "bigint", "smallserial", "serial", "bigserial"];
	}

	getFloatDatatypes(): readonly string[] {
		return ["numeric", "decimal", "real", "double precision"];
	}

	getTemporalDatatypes(): readonly string[] {
		return [
			"time",
			"timestamp",
			"time with time zone",
			"timestamp with time zone",
			"time without time zone",
			"timestamp without time zone",
			"date",
		];
	}
}
