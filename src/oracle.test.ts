import { describe, test, expect } from 'vitest';
import { Oracle } from './oracle.ts';
import { QueryError } from './errors.ts';
import { createTable } from './model.ts';
import { FakeClient, testColumn, testSettings } from './testUtils.ts';

const app = testSettings({ dbType: 'oracle', user: 'app', password: 'test-secret', dbName: 'XEPDB1' });

function appClient(): FakeClient {
  return new FakeClient((sql, params) => {
    if (sql.includes('ALL_OBJECTS')) {
      return [{ table_name: 'ORDERS' }, { table_name: 'PRODUCTS' }];
    }
    if (sql.includes('ALL_TAB_COLUMNS')) {
      if (params[0] === 'ORDERS') {
        throw new Error('ORA-00942: table or view does not exist');
      }
      return [
        {
          ordinal_position: 1,
          column_name: 'ID',
          data_type: 'NUMBER',
          column_default: null,
          is_nullable: 'N',
          character_maximum_length: 22,
          numeric_precision: 10,
          constraint_name: 'PRODUCTS_PK',
          constraint_type: 'PRI',
        },
        {
          ordinal_position: 2,
          column_name: 'NAME',
          data_type: 'VARCHAR2',
          column_default: null,
          is_nullable: 'Y',
          character_maximum_length: 100,
          numeric_precision: null,
          constraint_name: null,
          constraint_type: null,
        },
      ];
    }
    return [];
  });
}

describe('Oracle', () => {
  test('pings through DUAL', async () => {
    const client = appClient();
    const db = new Oracle(app, 'oracledb', { client });

    await db.connect();

    expect(client.queries[0].sql).toBe('SELECT 1 FROM DUAL');
  });

  test('lists tables of the owner with an upper-cased filter', async () => {
    const client = appClient();
    const db = new Oracle(app, 'oracledb', { client });
    await db.connect();

    const tables = await db.getTables(['orders', 'Products']);

    expect(tables.map(t => t.name)).toEqual(['ORDERS', 'PRODUCTS']);
    expect(client.queries[1].sql).toContain('AND OBJECT_NAME IN (:v1, :v2)');
    expect(client.queries[1].params).toEqual(['APP', 'ORDERS', 'PRODUCTS']);
  });

  test('reads columns with the Y/N nullability sentinel', async () => {
    const client = appClient();
    const db = new Oracle(app, 'oracledb', { client });
    await db.connect();
    db.prepareGetColumnsOfTableStmt();

    const table = await db.getColumnsOfTable(createTable('PRODUCTS'));
    const [id, name] = table.columns;

    expect(client.queries[1].params).toEqual(['PRODUCTS', 'APP']);
    expect([db.isPrimaryKey(id), db.isNullable(id), db.classify(id)]).toEqual([true, false, 'integer']);
    expect([db.isPrimaryKey(name), db.isNullable(name), db.classify(name)]).toEqual([false, true, 'string']);
    expect(db.isAutoIncrement(id)).toBe(false);
  });

  test('reports the owner a column query failed for', async () => {
    const db = new Oracle(app, 'oracledb', { client: appClient() });
    await db.connect();
    db.prepareGetColumnsOfTableStmt();

    const error = await db.getColumnsOfTable(createTable('ORDERS')).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QueryError);
    expect(error).toMatchObject({
      message: 'Could not fetch columns of table "ORDERS" (owner "APP"): ORA-00942: table or view does not exist',
      scope: 'APP',
      table: 'ORDERS',
    });
  });

  test('uses the schema as owner, else the user, else SYSTEM', () => {
    expect(new Oracle(testSettings({ dbType: 'oracle', user: 'app', schema: 'sales' }), 'oracledb').owner).toBe('SALES');
    expect(new Oracle(app, 'oracledb').owner).toBe('APP');
    expect(new Oracle(testSettings({ dbType: 'oracle' }), 'oracledb').owner).toBe('SYSTEM');
  });

  test('classifies NUMBER as integer although it is also listed as float', () => {
    const db = new Oracle(app, 'oracledb');
    const classify = (dataType: string) => db.classify(testColumn({ dataType }));

    expect(db.isFloat(testColumn({ dataType: 'NUMBER' }))).toBe(true);
    expect(classify('NUMBER')).toBe('integer');
    expect(classify('NVARCHAR2')).toBe('string');
    expect(classify('CLOB')).toBe('text');
    expect(classify('BINARY_DOUBLE')).toBe('float');
    expect(classify('TIMESTAMP(6) WITH TIME ZONE')).toBe('temporal');
    expect(classify('RAW')).toBe('unknown');
  });

  test('only Y means nullable', () => {
    const db = new Oracle(app, 'oracledb');

    expect(db.isNullable(testColumn({ isNullable: 'Y' }))).toBe(true);
    expect(db.isNullable(testColumn({ isNullable: 'YES' }))).toBe(false);
    expect(db.isNullable(testColumn({ isNullable: 'N' }))).toBe(false);
  });

  test('builds an Easy Connect string', () => {
    expect(new Oracle(app, 'oracledb').dsn()).toBe('127.0.0.1:1521/XEPDB1');
    expect(new Oracle(testSettings({ dbType: 'oracle', host: 'db.internal', port: 1522, dbName: 'ORCL' }), 'oracledb').dsn()).toBe(
      'db.internal:1522/ORCL'
    );
  });
});
