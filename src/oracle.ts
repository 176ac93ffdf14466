import type { Column, Table } from "./model.ts";
import type { Settings } from "./settings.ts";
import { openOracleClient, type DbClient } from "./clients.ts";
import { GeneralDatabase, andInClause, type DatabaseOptions } from "./generalDatabase.ts";

/**
 * Oracle backend, reading the `ALL_*` data dictionary views of one owner.
 * Oracle stores unquoted identifiers upper-case, so the owner and the table
 * filter are upper-cased.
 */
export class Oracle extends GeneralDatabase {
	private readonly defaultUserName = "system";
	private readonly defaultPort = 1521;

	constructor(settings: Settings, driver: string, options?: DatabaseOptions) {
		super(settings, driver, "colon", options);
	}

	/** Easy Connect string; credentials are passed separately */
	dsn(): string {
		const s = this.settings;
		return `${s.host}:${s.port ?? this.defaultPort}/${s.dbName}`;
	}

	protected openClient(dsn: string): Promise<DbClient> {
		return openOracleClient({
			user: this.user,
			password: this.settings.password,
			connectString: dsn,
		});
	}

	protected describeTarget(): string {
		return `oracle at ${this.dsn()}`;
	}

	protected override pingQuery(): string {
		return "SELECT 1 FROM DUAL";
	}

	get user(): string {
		return this.settings.user || this.defaultUserName;
	}

	/** The schema if configured, else the connecting user */
	get owner(): string {
		return (this.settings.schema || this.user).toUpperCase();
	}

	async getTables(tableNames: readonly string[] = []): Promise<Table[]> {
		const args: unknown[] = [this.owner];
		const inClause = andInClause("OBJECT_NAME", tableNames, args, (n) => `:v${n - 1}`, (name) => name.toUpperCase());

		return this.selectTables(`
			SELECT DISTINCT OBJECT_NAME AS "table_name"
			FROM ALL_OBJECTS
			WHERE OBJECT_TYPE = 'TABLE'
			AND OWNER = :owner
			${inClause}
			ORDER BY OBJECT_NAME
		`, args, { kind: "owner", name: this.owner });
	}

	prepareGetColumnsOfTableStmt(): void {
		this.getColumnsOfTableStmt = this.prepare(`
			SELECT
				c.COLUMN_ID AS "ordinal_position",
				c.COLUMN_NAME AS "column_name",
				c.DATA_TYPE AS "data_type",
				c.DATA_DEFAULT AS "column_default",
				c.NULLABLE AS "is_nullable",
				c.DATA_LENGTH AS "character_maximum_length",
				c.DATA_PRECISION AS "numeric_precision",
				pk.CONSTRAINT_NAME AS "constraint_name",
				CASE WHEN pk.CONSTRAINT_NAME IS NOT NULL THEN 'PRI' END AS "constraint_type"
			FROM ALL_TAB_COLUMNS c
				LEFT JOIN (
					SELECT cc.OWNER, cc.TABLE_NAME, cc.COLUMN_NAME, cc.CONSTRAINT_NAME
					FROM ALL_CONS_COLUMNS cc
						JOIN ALL_CONSTRAINTS ac ON ac.OWNER = cc.OWNER
						AND ac.CONSTRAINT_NAME = cc.CONSTRAINT_NAME
					WHERE ac.CONSTRAINT_TYPE = 'P'
				) pk ON pk.OWNER = c.OWNER
				AND pk.TABLE_NAME = c.TABLE_NAME
				AND pk.COLUMN_NAME = c.COLUMN_NAME
			WHERE c.TABLE_NAME = :name
			AND c.OWNER = :owner
			ORDER BY c.COLUMN_ID
		`, 2);
	}

	getColumnsOfTable(table: Table): Promise<Table> {
		return this.selectColumns(table, [table.name, this.owner], { kind: "owner", name: this.owner });
	}

	isPrimaryKey(column: Column): boolean {
		return (column.constraintType ?? "").includes("PRI");
	}

	/**
	 * Oracle has no auto increment flag; sequences and triggers are
	 * invisible here.
	 */
	isAutoIncrement(_column: Column): boolean {
		return false;
	}

	isNullable(column: Column): boolean {
		return column.isNullable === "Y";
	}

	getStringDatatypes(): readonly string[] {
		return ["CHAR", "VARCHAR2", "NCHAR", "NVARCHAR2"];
	}

	getTextDatatypes(): readonly string[] {
		return ["CLOB", "NCLOB"];
	}

	getIntegerDatatypes(): readonly string[] {
		return ["NUMBER", "INTEGER", "SMALLINT"];
	}

	// TODO: tell NUMBER(p,0) from NUMBER(p,s) by DATA_SCALE; until then NUMBER
	// is listed here too and loses to the integer list.
	getFloatDatatypes(): readonly string[] {
		return ["FLOAT", "BINARY_FLOAT", "BINARY_DOUBLE", "DECIMAL", "NUMBER", "REAL", "DOUBLE PRECISION"];
	}

	getTemporalDatatypes(): readonly string[] {
		return ["DATE", "TIMESTAMP", "TIMESTAMP WITH TIME ZONE", "TIMESTAMP WITH LOCAL TIME ZONE"];
	}
}
