import { describe, test, expect } from 'vitest';
import { Pglite } from './pglite.ts';
import { loadSchema } from './schemaLoader.ts';
import { testSettings } from './testUtils.ts';

describe('Pglite', () => {
  test('uses an in-memory database without a data directory', () => {
    expect(new Pglite(testSettings({ dbType: 'pglite' }), 'pglite').dsn()).toBe('memory://');
    expect(new Pglite(testSettings({ dbType: 'pglite', dbName: './data/shop' }), 'pglite').dsn()).toBe('./data/shop');
  });

  test('connects to its own embedded database', async () => {
    const db = new Pglite(testSettings({ dbType: 'pglite' }), 'pglite');

    expect(await loadSchema(db)).toEqual([]);
  });
});
