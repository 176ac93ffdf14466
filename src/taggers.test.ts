import { describe, test, expect } from 'vitest';
import { dbTagger, generateTags, jsonTagger, resolveTaggers, stblTagger, supportedTaggers, type Tagger } from './taggers.ts';
import { Postgresql } from './postgresql.ts';
import { Mysql } from './mysql.ts';
import { UnknownTagGeneratorError } from './errors.ts';
import { testColumn, testSettings } from './testUtils.ts';

const pg = new Postgresql(testSettings(), 'pg');

const serialId = testColumn({
  name: 'id',
  constraintName: 'customers_pkey',
  constraintType: 'PRIMARY KEY',
  defaultValue: "nextval('customers_id_seq'::regclass)",
});
const nickname = testColumn({ ordinalPosition: 2, name: 'nickname', dataType: 'text', isNullable: 'YES' });

describe('taggers', () => {
  test('db tags the column name', () => {
    expect(dbTagger.generateTag(pg, testColumn({ name: 'customer_id' }))).toBe('db:"customer_id"');
  });

  test('stbl marks primary keys and auto increment', () => {
    expect(stblTagger.generateTag(pg, serialId)).toBe('stbl:"id,PRIMARY_KEY,SERIAL,AUTO_INCREMENT"');
    expect(stblTagger.generateTag(pg, testColumn({ constraintType: 'PRIMARY KEY' }))).toBe('stbl:"id,PRIMARY_KEY"');
    expect(stblTagger.generateTag(pg, nickname)).toBe('stbl:"nickname"');
  });

  test('stbl reads the flags the backend way', () => {
    const mysql = new Mysql(testSettings({ dbType: 'mysql' }), 'mysql2');
    const id = testColumn({ constraintType: 'PRI', extra: 'auto_increment' });

    expect(stblTagger.generateTag(mysql, id)).toBe('stbl:"id,PRIMARY_KEY,SERIAL,AUTO_INCREMENT"');
    expect(stblTagger.generateTag(pg, id)).toBe('stbl:"id"');
  });

  test('json omits empty nullable values', () => {
    expect(jsonTagger.generateTag(pg, nickname)).toBe('json:"nickname,omitempty"');
    expect(jsonTagger.generateTag(pg, serialId)).toBe('json:"id"');
  });
});

describe('resolveTaggers', () => {
  test('keeps the configured order', () => {
    expect(resolveTaggers(['json', 'db'])).toEqual([jsonTagger, dbTagger]);
    expect(supportedTaggers()).toEqual(['db', 'stbl', 'json']);
  });

  test('rejects unknown names', () => {
    expect(() => resolveTaggers(['db', 'xml'])).toThrow(
      new UnknownTagGeneratorError('xml', ['db', 'stbl', 'json'])
    );
    expect(() => resolveTaggers(['xml'])).toThrow('Unknown tag generator "xml" (expected one of: db, stbl, json)');
  });
});

describe('generateTags', () => {
  test('joins fragments with a space and skips empty ones', () => {
    const silent: Tagger = { generateTag: () => '' };

    expect(generateTags([dbTagger, silent, jsonTagger], pg, nickname)).toBe('db:"nickname" json:"nickname,omitempty"');
  });

  test('is empty without taggers', () => {
    expect(generateTags([], pg, nickname)).toBe('');
  });
});
