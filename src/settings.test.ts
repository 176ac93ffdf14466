import { describe, test, expect } from 'vitest';
import { parseSettings } from './settings.ts';
import { InvalidSettingsError } from './errors.ts';

describe('parseSettings', () => {
  test('fills in defaults', () => {
    expect(parseSettings({})).toEqual({
      dbType: 'pg',
      user: '',
      password: '',
      host: '127.0.0.1',
      dbName: '',
      schema: '',
      socket: '',
      sslMode: 'disable',
      tables: [],
      verbose: false,
      tags: ['db'],
      outputFormat: 'camelCase',
      nullType: 'sql',
      noInitialism: false,
      packageName: 'dto',
      prefix: '',
      suffix: '',
      outputPath: '.',
    });
    expect(parseSettings(undefined).dbType).toBe('pg');
  });

  test('keeps given values and leaves the input untouched', () => {
    const input = { dbType: 'mysql', port: 3307, tags: ['json', 'db'] };

    const settings = parseSettings(input);

    expect(settings).toMatchObject({ dbType: 'mysql', port: 3307, tags: ['json', 'db'], packageName: 'dto' });
    expect(input).toEqual({ dbType: 'mysql', port: 3307, tags: ['json', 'db'] });
  });

  test('reports every invalid value', () => {
    const error = (() => {
      try {
        parseSettings({ port: 70000, nullType: 'pointer' });
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(InvalidSettingsError);
    expect(error).toHaveProperty('details', [
      '/port must be <= 65535',
      '/nullType must be equal to one of the allowed values',
    ]);
  });

  test('rejects unknown keys', () => {
    expect(() => parseSettings({ database: 'shop' })).toThrow(
      'Invalid settings: / must NOT have additional properties'
    );
  });

  test('rejects package names Go does not accept', () => {
    expect(() => parseSettings({ packageName: 'My-Models' })).toThrow(
      'Invalid settings: /packageName must match pattern "^[a-z_][a-z0-9_]*$"'
    );
  });
});
