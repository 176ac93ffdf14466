// Core data model
export type { Table, Column, TypeCategory, Row } from './model.ts';
export { createTable } from './model.ts';

// Settings, errors and logging
export type { Settings, OutputFormat, NullType } from './settings.ts';
export { parseSettings } from './settings.ts';
export {
  ConnectionError,
  UnsupportedDatabaseError,
  PrepareError,
  QueryError,
  UnknownTagGeneratorError,
  InvalidSettingsError,
} from './errors.ts';
export type { Logger } from './logger.ts';
export { createLogger, silentLogger } from './logger.ts';

// Database backends
export type { DbClient } from './clients.ts';
export type { Database, DatabaseOptions } from './generalDatabase.ts';
export { GeneralDatabase } from './generalDatabase.ts';
export { Postgresql } from './postgresql.ts';
export { Pglite } from './pglite.ts';
export { Mysql } from './mysql.ts';
export { Sqlite } from './sqlite.ts';
export { Oracle } from './oracle.ts';
export { newDatabase, driverFor, supportedDatabaseTypes } from './databaseRegistry.ts';
export { classifyColumn } from './typeCategory.ts';

// Schema loading
export { loadSchema } from './schemaLoader.ts';

// Tag generators
export type { Tagger } from './taggers.ts';
export { resolveTaggers, supportedTaggers, generateTags } from './taggers.ts';

// Go code generation
export type { StructDeclaration, StructField, StructFile, StructOptions } from './goStructGenerator.ts';
export { generateStructs, generateStructFiles, renderStruct, mapGoType } from './goStructGenerator.ts';
export { toGoIdentifier } from './naming.ts';
export { generate, writeStructFiles } from './codegen.ts';
