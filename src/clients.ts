import pg from "pg";
import { PGlite } from "@electric-sql/pglite";
import mysql from "mysql2/promise";
import type { RowDataPacket } from "mysql2/promise";
import sqlite3 from "sqlite3";
import oracledb from "oracledb";
import { isRow, type Row } from "./model.ts";

/**
 * Database client interface - the one capability every backend needs:
 * run a query with positional parameters and get rows back.
 */
export interface DbClient {
	query(sql: string, params?: readonly unknown[]): Promise<{ rows: Row[] }>;
	close(): Promise<void>;
}

export async function createPgClient(connectionString: string): Promise<DbClient> {
	const client = new pg.Client({ connectionString });
	await client.connect();
	return {
		async query(sql, params = []) {
			const result = await client.query(sql, [...params]);
			return { rows: result.rows.filter(isRow) };
		},
		close: () => client.end(),
	};
}

/**
 * @param dataDir `memory://` or an empty string for an in-memory database
 */
export function createPgliteClient(dataDir: string): DbClient {
	return fromPglite(new PGlite(dataDir || undefined));
}

/**
 * Wrap an existing PGlite instance (useful for testing).
 */
export function fromPglite(db: PGlite): DbClient {
	return {
		async query(sql, params = []) {
			const result = await db.query<Row>(sql, [...params]);
			return { rows: result.rows };
		},
		close: () => db.close(),
	};
}

export function createMysqlClient(uri: string): DbClient {
	const pool = mysql.createPool({ uri, connectionLimit: 1 });
	return {
		async query(sql, params = []) {
			const [rows] = await pool.query<RowDataPacket[]>(sql, [...params]);
			return { rows: rows.filter(isRow) };
		},
		close: () => pool.end(),
	};
}

export function openSqliteClient(filename: string): Promise<DbClient> {
	return new Promise((resolve, reject) => {
		const db = new sqlite3.Database(filename, sqlite3.OPEN_READONLY, (err) => {
			if (err) {
				reject(err);
				return;
			}
			resolve(fromSqlite(db));
		});
	});
}

/**
 * Wrap an existing sqlite3 database (useful for testing).
 */
export function fromSqlite(db: sqlite3.Database): DbClient {
	return {
		query(sql, params = []) {
			return new Promise((resolve, reject) => {
				db.all(sql, [...params], (err: Error | null, rows: unknown[]) => {
					if (err) {
						reject(err);
						return;
					}
					resolve({ rows: rows.filter(isRow) });
				});
			});
		},
		close() {
			return new Promise((resolve, reject) => {
				db.close((err) => (err ? reject(err) : resolve()));
			});
		},
	};
}

export interface OracleCredentials {
	readonly user: string;
	readonly password: string;
	/** Easy Connect string, `host:port/service` */
	readonly connectString: string;
}

export async function openOracleClient(credentials: OracleCredentials): Promise<DbClient> {
	const pool = await oracledb.createPool({
		user: credentials.user,
		password: credentials.password,
		connectString: credentials.connectString,
		poolMin: 0,
		poolMax: 1,
	});
	return {
		async query(sql, params = []) {
			const connection = await pool.getConnection();
			try {
				const result = await connection.execute<Row>(sql, [...params], {
					outFormat: oracledb.OUT_FORMAT_OBJECT,
				});
				return { rows: (result.rows ?? []).filter(isRow) };
			} finally {
				await connection.close();
			}
		},
		close: () => pool.close(0),
	};
}
