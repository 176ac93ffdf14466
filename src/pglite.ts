import { createPgliteClient, type DbClient } from "./clients.ts";
import { Postgresql } from "./postgresql.ts";

/**
 * Embedded PostgreSQL (PGlite). Same catalog as PostgreSQL; the database
 * name is the data directory, empty for an in-memory database.
 */
export class Pglite extends Postgresql {
	override dsn(): string {
		return this.settings.dbName || "memory://";
	}

	protected override openClient(dsn: string): Promise<DbClient> {
		return Promise.resolve(createPgliteClient(dsn));
	}

	protected override describeTarget(): string {
		return `pglite at ${this.dsn()}`;
	}
}
