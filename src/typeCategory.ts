import type { Column, TypeCategory } from "./model.ts";
import type { Database } from "./generalDatabase.ts";

type CategoryTest = (db: Database, column: Column) => boolean;

/**
 * Evaluated top to bottom; the first matching category wins. Some products
 * list a type twice (Oracle's NUMBER is both integer and float), so the
 * order decides the result.
 */
export const categoryTests: ReadonlyArray<readonly [TypeCategory, CategoryTest]> = [
	["string", (db, column) => db.isString(column)],
	["text", (db, column) => db.isText(column)],
	["integer", (db, column) => db.isInteger(column)],
	["float", (db, column) => db.isFloat(column)],
	["temporal", (db, column) => db.isTemporal(column)],
];

export function classifyColumn(db: Database, column: Column): TypeCategory {
	for (const [category, test] of categoryTests) {
		if (test(db, column)) {
			return category;
		}
	}
	return "unknown";
}
