import type { Table } from './model.ts';
import type { Database } from './generalDatabase.ts';
import type { Logger } from './logger.ts';
import { silentLogger } from './logger.ts';
import { errorMessage } from './errors.ts';

/**
 * Load tables with their columns from a database.
 *
 * Tables keep the order the backend lists them in (name ascending). Columns
 * are fetched one table at a time. Any error aborts the whole load. The
 * connection is closed on every path; when loading failed, a failure to
 * close is only logged and the loading error is rethrown.
 */
export async function loadSchema(
  db: Database,
  tableNames: readonly string[] = [],
  logger: Logger = silentLogger
): Promise<Table[]> {
  await db.connect();
  let loaded: Table[];
  try {
    loaded = await loadTables(db, tableNames, logger);
  } catch (error) {
    await db.close().catch((closeError: unknown) => {
      logger.debug(`> Error at close(): ${errorMessage(closeError)}`);
    });
    throw error;
  }
  await db.close();
  return loaded;
}

async function loadTables(db: Database, tableNames: readonly string[], logger: Logger): Promise<Table[]> {
  const tables = await db.getTables(tableNames);
  logger.debug(`> Number of tables: ${tables.length}`);

  db.prepareGetColumnsOfTableStmt();

  const loaded: Table[] = [];
  for (const table of tables) {
    logger.debug(`> Processing table: ${table.name}`);
    loaded.push(await db.getColumnsOfTable(table));
  }
  return loaded;
}
