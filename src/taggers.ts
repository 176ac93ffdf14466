import type { Column } from "./model.ts";
import type { Database } from "./generalDatabase.ts";
import { UnknownTagGeneratorError } from "./errors.ts";

/**
 * Produces one tag fragment, e.g. `db:"customer_id"`, for a struct field.
 */
export interface Tagger {
	generateTag(db: Database, column: Column): string;
}

/** The standard `db` tag */
export const dbTagger: Tagger = {
	generateTag: (_db, column) => `db:"${column.name}"`,
};

/** Tag for the Masterminds structable library */
export const stblTagger: Tagger = {
	generateTag(db, column) {
		const primaryKey = db.isPrimaryKey(column) ? ",PRIMARY_KEY" : "";
		const autoIncrement = db.isAutoIncrement(column) ? ",SERIAL,AUTO_INCREMENT" : "";
		return `stbl:"${column.name}${primaryKey}${autoIncrement}"`;
	},
};

export const jsonTagger: Tagger = {
	generateTag: (db, column) => `json:"${column.name}${db.isNullable(column) ? ",omitempty" : ""}"`,
};

const taggers: ReadonlyMap<string, Tagger> = new Map([
	["db", dbTagger],
	["stbl", stblTagger],
	["json", jsonTagger],
]);

export function supportedTaggers(): string[] {
	return [...taggers.keys()];
}

/**
 * Resolve configured tagger names, keeping their order.
 */
export function resolveTaggers(names: readonly string[]): Tagger[] {
	return names.map((name) => {
		const tagger = taggers.get(name);
		if (!tagger) {
			throw new UnknownTagGeneratorError(name, supportedTaggers());
		}
		return tagger;
	});
}

/**
 * Space separated fragments of all taggers; empty fragments are skipped.
 */
export function generateTags(taggers: readonly Tagger[], db: Database, column: Column): string {
	return taggers
		.map((tagger) => tagger.generateTag(db, column))
		.filter((fragment) => fragment !== "")
		.join(" ");
}
