import Ajv from "ajv";
import { InvalidSettingsError } from "./errors.ts";

export type OutputFormat = "camelCase" | "original";

/**
 * How nullable columns are typed in the generated structs.
 * - `sql`: `sql.NullString`, `sql.NullInt64`, ...
 * - `native`: pointers, `*string`, `*int`, ...
 * - `primitive`: nullability is ignored
 */
export type NullType = "sql" | "native" | "primitive";

export interface Settings {
	readonly dbType: string;
	readonly user: string;
	readonly password: string;
	readonly host: string;
	/** Falls back to the product's default port */
	readonly port?: number;
	readonly dbName: string;
	/** Schema (PostgreSQL) or owner (Oracle) to inspect */
	readonly schema: string;
	readonly socket: string;
	readonly sslMode: string;
	/** Restrict generation to these tables; empty means all */
	readonly tables: readonly string[];
	readonly verbose: boolean;
	/** Active tag generators, in output order */
	readonly tags: readonly string[];
	readonly outputFormat: OutputFormat;
	readonly nullType: NullType;
	readonly noInitialism: boolean;
	readonly packageName: string;
	readonly prefix: string;
	readonly suffix: string;
	readonly outputPath: string;
}

const settingsSchema = {
	type: "object",
	additionalProperties: false,
	properties: {
		dbType: { type: "string", minLength: 1, default: "pg" },
		user: { type: "string", default: "" },
		password: { type: "string", default: "" },
		host: { type: "string", default: "127.0.0.1" },
		port: { type: "integer", minimum: 1, maximum: 65535 },
		dbName: { type: "string", default: "" },
		schema: { type: "string", default: "" },
		socket: { type: "string", default: "" },
		sslMode: { type: "string", enum: ["disable", "allow", "prefer", "require", "verify-ca", "verify-full"], default: "disable" },
		tables: { type: "array", items: { type: "string", minLength: 1 }, default: [] },
		verbose: { type: "boolean", default: false },
		tags: { type: "array", items: { type: "string", minLength: 1 }, default: ["db"] },
		outputFormat: { type: "string", enum: ["camelCase", "original"], default: "camelCase" },
		nullType: { type: "string", enum: ["sql", "native", "primitive"], default: "sql" },
		noInitialism: { type: "boolean", default: false },
		packageName: { type: "string", pattern: "^[a-z_][a-z0-9_]*$", default: "dto" },
		prefix: { type: "string", default: "" },
		suffix: { type: "string", default: "" },
		outputPath: { type: "string", minLength: 1, default: "." },
	},
} as const;

const ajv = new Ajv({ allErrors: true, useDefaults: true });
const validateSettings = ajv.compile<Settings>(settingsSchema);

/**
 * Validate raw settings (parsed flags, a config file) and fill in defaults.
 * The input is not modified.
 */
export function parseSettings(input: unknown): Settings {
	const data: unknown = structuredClone(input ?? {});
	if (!validateSettings(data)) {
		const details = (validateSettings.errors ?? []).map(
			(error) => `${error.instancePath || "/"} ${error.message ?? "is invalid"}`
		);
		throw new InvalidSettingsError(details);
	}
	return data;
}
