/**
 * The database could not be reached or refused the credentials.
 */
export class ConnectionError extends Error {
	override readonly name = "ConnectionError";

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
	}
}

export class UnsupportedDatabaseError extends Error {
	override readonly name = "UnsupportedDatabaseError";

	constructor(readonly dbType: string, supported: readonly string[]) {
		super(`Database type "${dbType}" is not supported (expected one of: ${supported.join(", ")})`);
	}
}

/**
 * A metadata statement is malformed. This is a defect in a backend, not a
 * problem with the database being inspected.
 */
export class PrepareError extends Error {
	override readonly name = "PrepareError";

	constructor(message: string) {
		super(message);
	}
}

export interface QueryErrorOptions {
	/** Schema, owner or database the query was scoped to */
	readonly scope: string;
	readonly table?: string;
	readonly cause?: unknown;
}

export class QueryError extends Error {
	override readonly name = "QueryError";
	readonly scope: string;
	readonly table: string | undefined;

	constructor(message: string, options: QueryErrorOptions) {
		super(message, { cause: options.cause });
		this.scope = options.scope;
		this.table = options.table;
	}
}

export class UnknownTagGeneratorError extends Error {
	override readonly name = "UnknownTagGeneratorError";

	constructor(readonly tagger: string, known: readonly string[]) {
		super(`Unknown tag generator "${tagger}" (expected one of: ${known.join(", ")})`);
	}
}

export class InvalidSettingsError extends Error {
	override readonly name = "InvalidSettingsError";

	constructor(readonly details: readonly string[]) {
		super(`Invalid settings: ${details.join("; ")}`);
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
