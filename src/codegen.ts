import * as fs from "fs";
import * as path from "path";
import type { Settings } from "./settings.ts";
import type { DbClient } from "./clients.ts";
import type { Logger } from "./logger.ts";
import { createLogger } from "./logger.ts";
import { newDatabase } from "./databaseRegistry.ts";
import { loadSchema } from "./schemaLoader.ts";
import { resolveTaggers } from "./taggers.ts";
import { generateStructFiles, type StructFile } from "./goStructGenerator.ts";

export interface CodegenOptions {
	/** Use this client instead of connecting with the settings */
	readonly client?: DbClient;
	readonly logger?: Logger;
}

/**
 * Inspect the configured database and render one Go file per table.
 * Taggers and the database type are checked before connecting.
 */
export async function generate(settings: Settings, options: CodegenOptions = {}): Promise<StructFile[]> {
	const logger = options.logger ?? createLogger(settings.verbose);
	const taggers = resolveTaggers(settings.tags);
	const db = newDatabase(settings, { client: options.client, logger });

	logger.debug(`> Database: ${settings.dbType} (driver ${db.driver})`);
	const tables = await loadSchema(db, settings.tables, logger);

	return generateStructFiles(db, tables, { ...settings, taggers, logger });
}

/**
 * Write files into `outputPath`, creating it if needed. Returns the written paths.
 */
export function writeStructFiles(files: readonly StructFile[], outputPath: string): string[] {
	fs.mkdirSync(outputPath, { recursive: true });
	return files.map((file) => {
		const filePath = path.join(outputPath, file.fileName);
		fs.writeFileSync(filePath, file.content);
		return filePath;
	});
}
