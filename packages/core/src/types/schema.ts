/**
 * Schema snapshot types for describing dataset structure
 */

/** Statistic family a column belongs to, derived from its declared type */
export type ColumnCategory = 'numeric' | 'string' | 'temporal' | 'other';

export interface ColumnDescriptor {
  name: string;
  /** Type as reported by the catalog or inferred from values (e.g. "integer", "character varying") */
  declaredType: string;
  nullable: boolean;
  /** 1-based position within the dataset */
  ordinalPosition: number;
  /** Character maximum length, where the catalog reports one */
  maxLength?: number | null;
}

/**
 * How a snapshot was obtained.
 * 'fallback' snapshots carry only caller-supplied column names.
 */
export type SchemaOrigin = 'catalog' | 'inferred' | 'fallback';

export interface SchemaSnapshot {
  /** Dataset name the snapshot describes */
  dataset: string;
  /** Columns in ordinal order */
  columns: ColumnDescriptor[];
  capturedAt: Date;
  origin: SchemaOrigin;
  /** Catalog dialect the declared types come from (e.g. "postgresql") */
  dialect?: string;
}

const NUMERIC_TYPES = [
  'numeric', 'int', 'integer', 'float', 'decimal', 'number', 'double', 'real', 'bigint', 'smallint', 'tinyint', 'mediumint',
];
const STRING_TYPES = ['string', 'varchar', 'text', 'char', 'character', 'uuid', 'enum'];
const TEMPORAL_TYPES = ['date', 'timestamp', 'timestamptz', 'datetime'];

/**
 * Map a declared type to its statistic family.
 * Matches on the base type name, so "character varying(255)" is a string
 * and "timestamp with time zone" is temporal.
 */
export function categorizeType(declaredType: string): ColumnCategory {
  const normalized = declaredType.trim().toLowerCase();
  const base = normalized.split(/[\s(]/)[0] ?? '';

  if (NUMERIC_TYPES.includes(base) || /^(int|float)\d+$/.test(base)) {
    return 'numeric';
  }
  if (TEMPORAL_TYPES.includes(base)) {
    return 'temporal';
  }
  if (STRING_TYPES.includes(base) || base.endsWith('char') || base.endsWith('text')) {
    return 'string';
  }
  return 'other';
}

/**
 * Find a column by name, case-insensitively
 */
export function findColumn(
  snapshot: SchemaSnapshot,
  name: string
): ColumnDescriptor | undefined {
  const wanted = name.toLowerCase();
  return snapshot.columns.find((column) => column.name.toLowerCase() === wanted);
}

/**
 * Build a snapshot from bare column names when no catalog is available
 */
export function fallbackSnapshot(dataset: string, columnNames: string[]): SchemaSnapshot {
  return {
    dataset,
    columns: columnNames.map((name, index) => ({
      name,
      declaredType: 'unknown',
      nullable: true,
      ordinalPosition: index + 1,
    })),
    capturedAt: new Date(),
    origin: 'fallback',
  };
}
