import type { Column, Table } from "./model.ts";
import type { Settings } from "./settings.ts";
import { openSqliteClient, type DbClient } from "./clients.ts";
import { GeneralDatabase, andInClause, type DatabaseOptions } from "./generalDatabase.ts";

const scope = { kind: "database", name: "main" } as const;

/**
 * SQLite backend. There is no information_schema; tables come from
 * `sqlite_master` and columns from the `pragma_table_info` function.
 */
export class Sqlite extends GeneralDatabase {
	constructor(settings: Settings, driver: string, options?: DatabaseOptions) {
		super(settings, driver, "question", options);
	}

	dsn(): string {
		return this.settings.dbName || ":memory:";
	}

	protected openClient(dsn: string): Promise<DbClient> {
		return openSqliteClient(dsn);
	}

	protected describeTarget(): string {
		return `sqlite3 file ${this.dsn()}`;
	}

	async getTables(tableNames: readonly string[] = []): Promise<Table[]> {
		const args: unknown[] = [];
		const inClause = andInClause("LOWER(name)", tableNames, args, () => "?", (name) => name.toLowerCase());

		return this.selectTables(`
			SELECT name AS table_name
			FROM sqlite_master
			WHERE type = 'table'
			AND name NOT LIKE 'sqlite\\_%' ESCAPE '\\'
			${inClause}
			ORDER BY name
		`, args, scope);
	}

	/**
	 * A single-column INTEGER primary key aliases the rowid and is reported
	 * as `autoincrement` in `extra`. Primary key columns are reported as not
	 * nullable.
	 */
	prepareGetColumnsOfTableStmt(): void {
		this.getColumnsOfTableStmt = this.prepare(`
			SELECT
				p.cid + 1 AS ordinal_position,
				p.name AS column_name,
				COALESCE(NULLIF(p.type, ''), 'BLOB') AS data_type,
				p.dflt_value AS column_default,
				CASE WHEN p."notnull" = 0 AND p.pk = 0 THEN 'YES' ELSE 'NO' END AS is_nullable,
				NULL AS character_maximum_length,
				NULL AS numeric_precision,
				NULL AS constraint_name,
				CASE WHEN p.pk > 0 THEN 'PRIMARY KEY' END AS constraint_type,
				CASE
					WHEN p.pk = 1 AND UPPER(p.type) = 'INTEGER'
						AND (SELECT COUNT(*) FROM pragma_table_info(?) WHERE pk > 0) = 1
					THEN 'autoincrement'
				END AS extra
			FROM pragma_table_info(?) AS p
			ORDER BY p.cid
		`, 2);
	}

	getColumnsOfTable(table: Table): Promise<Table> {
		return this.selectColumns(table, [table.name, table.name], scope);
	}

	isPrimaryKey(column: Column): boolean {
		return (column.constraintType ?? "").includes("PRIMARY KEY");
	}

	isAutoIncrement(column: Column): boolean {
		return column.extra === "autoincrement";
	}

	isNullable(column: Column): boolean {
		return column.isNullable === "YES";
	}

	getStringDatatypes(): readonly string[] {
		return [
			"character",
			"varchar",
			"varying character",
			"nchar",
			"native character",
			"nvarchar",
			"char",
		];
	}

	getTextDatatypes(): readonly string[] {
		return ["text", "clob", "blob"];
	}

	getIntegerDatatypes(): readonly string[] {
		return [
			"int",
			"integer",
			"tinyint",
			"smallint",
			"mediumint",
			"bigint",
			"unsigned big int",
			"int2",
			"int8",
		];
	}

	getFloatDatatypes(): readonly string[] {
		return ["real", "double", "double precision", "float", "numeric", "decimal"];
	}

	getTemporalDatatypes(): readonly string[] {
		return ["date", "datetime", "timestamp", "time"];
	}
}
