import type { DbClient } from "./clients.ts";
import type { Column, Row } from "./model.ts";
import { parseSettings, type Settings } from "./settings.ts";

export interface RecordedQuery {
	readonly sql: string;
	readonly params: readonly unknown[];
}

/**
 * In-process client answering queries from a handler and recording them.
 */
export class FakeClient implements DbClient {
	readonly queries: RecordedQuery[] = [];
	closed = false;

	constructor(
		private readonly _handler: (sql: string, params: readonly unknown[]) => Row[],
		private readonly _closeError?: Error
	) { }

	async query(sql: string, params: readonly unknown[] = []): Promise<{ rows: Row[] }> {
		this.queries.push({ sql, params });
		return { rows: this._handler(sql, params) };
	}

	async close(): Promise<void> {
		this.closed = true;
		if (this._closeError) {
			throw this._closeError;
		}
	}
}

export function testSettings(overrides: Record<string, unknown> = {}): Settings {
	return parseSettings({ dbType: "pg", ...overrides });
}

export function testColumn(overrides: Partial<Column> = {}): Column {
	return {
		ordinalPosition: 1,
		name: "id",
		dataType: "integer",
		defaultValue: null,
		isNullable: "NO",
		characterMaximumLength: null,
		numericPrecision: null,
		constraintName: null,
		constraintType: null,
		extra: null,
		...overrides,
	};
}
