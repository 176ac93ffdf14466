import type { Settings } from "./settings.ts";
import type { Database, DatabaseOptions } from "./generalDatabase.ts";
import { UnsupportedDatabaseError } from "./errors.ts";
import { Postgresql } from "./postgresql.ts";
import { Pglite } from "./pglite.ts";
import { Mysql } from "./mysql.ts";
import { Sqlite } from "./sqlite.ts";
import { Oracle } from "./oracle.ts";

type DatabaseConstructor = new (settings: Settings, driver: string, options?: DatabaseOptions) => Database;

export interface DatabaseRegistration {
	/** npm driver package used to talk to the product */
	readonly driver: string;
	create(settings: Settings, options?: DatabaseOptions): Database;
}

function register(driver: string, ctor: DatabaseConstructor): DatabaseRegistration {
	return Object.freeze({
		driver,
		create: (settings: Settings, options?: DatabaseOptions) => new ctor(settings, driver, options),
	});
}

/**
 * Supported database types, keyed by the `dbType` setting. Built once, never
 * modified.
 */
const databases: ReadonlyMap<string, DatabaseRegistration> = new Map([
	["pg", register("pg", Postgresql)],
	["pglite", register("pglite", Pglite)],
	["mysql", register("mysql2", Mysql)],
	["sqlite3", register("sqlite3", Sqlite)],
	["oracle", register("oracledb", Oracle)],
]);

export function supportedDatabaseTypes(): string[] {
	return [...databases.keys()];
}

function lookup(dbType: string): DatabaseRegistration {
	const registration = databases.get(dbType);
	if (!registration) {
		throw new UnsupportedDatabaseError(dbType, supportedDatabaseTypes());
	}
	return registration;
}

export function driverFor(dbType: string): string {
	return lookup(dbType).driver;
}

/**
 * Create the backend for `settings.dbType`.
 */
export function newDatabase(settings: Settings, options?: DatabaseOptions): Database {
	return lookup(settings.dbType).create(settings, options);
}
