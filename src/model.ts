/**
 * Canonical schema model shared by every database backend.
 *
 * Design principle: Immutable, readonly types. Backends produce new values,
 * nothing mutates a loaded table.
 */

// === Schema Types ===

export interface Table {
  readonly name: string;
  /** Ordered by ordinal position */
  readonly columns: readonly Column[];
}

export interface Column {
  /** 1-based, contiguous within a table */
  readonly ordinalPosition: number;
  readonly name: string;
  /** Native type name as reported by the catalog, e.g. `varchar` or `NUMBER` */
  readonly dataType: string;
  readonly defaultValue: string | null;
  /** Raw nullability sentinel; only the backend knows how to read it */
  readonly isNullable: string;
  readonly characterMaximumLength: number | null;
  readonly numericPrecision: number | null;
  readonly constraintName: string | null;
  readonly constraintType: string | null;
  /** Product specific column flags, e.g. MySQL's `auto_increment` */
  readonly extra: string | null;
}

export type TypeCategory = 'string' | 'text' | 'integer' | 'float' | 'temporal' | 'unknown';

// === Catalog rows ===

export type Row = Readonly<Record<string, unknown>>;

// === Helpers ===

export function createTable(name: string, columns: readonly Column[] = []): Table {
  return {
    name,
    columns: [...columns].sort((a, b) => a.ordinalPosition - b.ordinalPosition),
  };
}

export function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
