import type { Table, TypeCategory } from "./model.ts";
import type { Database } from "./generalDatabase.ts";
import type { NullType, Settings } from "./settings.ts";
import type { Logger } from "./logger.ts";
import { silentLogger } from "./logger.ts";
import { generateTags, type Tagger } from "./taggers.ts";
import { toGoIdentifier } from "./naming.ts";

export interface StructField {
	readonly name: string;
	readonly type: string;
	/** Combined tag, without the surrounding backticks; empty when no tagger is active */
	readonly tag: string;
}

export interface StructDeclaration {
	readonly name: string;
	readonly tableName: string;
	readonly fields: readonly StructField[];
	/** Sorted Go import paths the field types need */
	readonly imports: readonly string[];
}

export interface StructFile {
	readonly fileName: string;
	readonly content: string;
}

export type StructOptions = Pick<
	Settings,
	"nullType" | "outputFormat" | "noInitialism" | "prefix" | "suffix" | "packageName"
> & {
	readonly taggers: readonly Tagger[];
	readonly logger?: Logger;
};

interface GoTypes {
	readonly plain: string;
	readonly sql: string;
	readonly native: string;
}

const goTypes: Readonly<Record<Exclude<TypeCategory, "unknown">, GoTypes>> = {
	string: { plain: "string", sql: "sql.NullString", native: "*string" },
	text: { plain: "string", sql: "sql.NullString", native: "*string" },
	integer: { plain: "int", sql: "sql.NullInt64", native: "*int" },
	float: { plain: "float64", sql: "sql.NullFloat64", native: "*float64" },
	temporal: { plain: "time.Time", sql: "sql.NullTime", native: "*time.Time" },
};

const unknownGoType = "interface{}";

/**
 * Generate one struct declaration per table, keeping table and column order.
 * A struct name already taken by an earlier table gets a number appended.
 */
export function generateStructs(
	db: Database,
	tables: readonly Table[],
	options: StructOptions
): StructDeclaration[] {
	const logger = options.logger ?? silentLogger;
	const usedNames = new Set<string>();

	return tables.map((table) => {
		const declaration = generateStruct(db, table, options);
		const name = claimName(declaration.name, usedNames, (n) => `${declaration.name}${n}`);
		if (name === declaration.name) {
			return declaration;
		}
		logger.warn(`> Struct name "${declaration.name}" of table "${table.name}" is taken, using ${name}`);
		return { ...declaration, name };
	});
}

/** First of `name`, `variant(2)`, `variant(3)`, ... not in `used`; adds it to `used` */
function claimName(name: string, used: Set<string>, variant: (n: number) => string): string {
	let candidate = name;
	for (let n = 2; used.has(candidate); n++) {
		candidate = variant(n);
	}
	used.add(candidate);
	return candidate;
}

function generateStruct(db: Database, table: Table, options: StructOptions): StructDeclaration {
	const logger = options.logger ?? silentLogger;
	const usedNames = new Set<string>();
	const fields: StructField[] = [];

	for (const column of table.columns) {
		let name = toGoIdentifier(column.name, options);
		if (usedNames.has(name)) {
			name = `${name}${column.ordinalPosition}`;
		}
		usedNames.add(name);

		const category = db.classify(column);
		if (category === "unknown") {
			logger.warn(
				`> Unknown type "${column.dataType}" of column "${column.name}" in table "${table.name}", using ${unknownGoType}`
			);
		}

		fields.push({
			name,
			type: mapGoType(category, db.isNullable(column), options.nullType),
			tag: generateTags(options.taggers, db, column),
		});
	}

	return {
		name: `${options.prefix}${toGoIdentifier(table.name, options)}${options.suffix}`,
		tableName: table.name,
		fields,
		imports: collectImports(fields),
	};
}

export function mapGoType(category: TypeCategory, nullable: boolean, nullType: NullType): string {
	if (category === "unknown") {
		return unknownGoType;
	}
	const types = goTypes[category];
	if (!nullable || nullType === "primitive") {
		return types.plain;
	}
	return nullType === "sql" ? types.sql : types.native;
}

function collectImports(fields: readonly StructField[]): string[] {
	const imports = new Set<string>();
	for (const field of fields) {
		if (field.type.startsWith("sql.")) {
			imports.add("database/sql");
		}
		if (/\btime\./.test(field.type)) {
			imports.add("time");
		}
	}
	return [...imports].sort();
}

/**
 * Render a declaration as a complete Go source file. Field names, types and
 * tags are aligned in columns.
 */
export function renderStruct(declaration: StructDeclaration, packageName: string): string {
	const lines: string[] = [`package ${packageName}`, ""];

	const { imports, fields } = declaration;
	if (imports.length === 1) {
		lines.push(`import "${imports[0]}"`, "");
	} else if (imports.length > 1) {
		lines.push("import (", ...imports.map((path) => `\t"${path}"`), ")", "");
	}

	lines.push(`type ${declaration.name} struct {`);
	const nameWidth = Math.max(0, ...fields.map((field) => field.name.length));
	const typeWidth = Math.max(0, ...fields.filter((field) => field.tag !== "").map((field) => field.type.length));
	for (const field of fields) {
		const head = `\t${field.name.padEnd(nameWidth)} `;
		lines.push(
			field.tag === ""
				? `${head}${field.type}`
				: `${head}${field.type.padEnd(typeWidth)} \`${field.tag}\``
		);
	}
	lines.push("}", "");

	return lines.join("\n");
}

function fileStem(tableName: string): string {
	return tableName.toLowerCase().replace(/[^a-z0-9_]/g, "_");
}

export function structFileName(tableName: string): string {
	return `${fileStem(tableName)}.go`;
}

/**
 * One rendered file per table. Tables whose names map to the same file get
 * `_2`, `_3`, ... appended to the later file names.
 */
export function generateStructFiles(
	db: Database,
	tables: readonly Table[],
	options: StructOptions
): StructFile[] {
	const logger = options.logger ?? silentLogger;
	const usedFileNames = new Set<string>();

	return generateStructs(db, tables, options).map((declaration) => {
		const preferred = structFileName(declaration.tableName);
		const fileName = claimName(preferred, usedFileNames, (n) => `${fileStem(declaration.tableName)}_${n}.go`);
		if (fileName !== preferred) {
			logger.warn(`> File name "${preferred}" of table "${declaration.tableName}" is taken, using ${fileName}`);
		}
		return {
			fileName,
			content: renderStruct(declaration, options.packageName),
		};
	});
}
