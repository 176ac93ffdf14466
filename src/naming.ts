import _ from "lodash";
import initialisms from "./initialisms.json";
import type { OutputFormat } from "./settings.ts";

const initialismSet = new Set<string>(initialisms);

export interface NamingOptions {
	readonly outputFormat: OutputFormat;
	readonly noInitialism: boolean;
}

/**
 * Turn a table or column name into an exported Go identifier.
 *
 * `camelCase`: `customer_id` → `CustomerID` (`CustomerId` without initialisms).
 * `original`: `customer_id` → `Customer_id`.
 */
export function toGoIdentifier(name: string, options: NamingOptions): string {
	const identifier = options.outputFormat === "original"
		? _.upperFirst(name.replace(/[^\p{L}\p{N}_]/gu, "_"))
		: _.words(name).map((word) => {
			const upper = word.toUpperCase();
			if (!options.noInitialism && initialismSet.has(upper)) {
				return upper;
			}
			return _.upperFirst(word.toLowerCase());
		}).join("");

	if (identifier === "" || /^\d/.test(identifier)) {
		return `X${identifier}`;
	}
	return identifier;
}
