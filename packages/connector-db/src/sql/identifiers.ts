/**
 * Identifier validation shared by the SQL clients.
 * Every identifier that ends up in generated SQL passes through here.
 */

import { ConnectorError } from '@driftcheck/core';

/** Valid SQL identifier pattern (alphanumeric + underscore, must start with letter/underscore) */
const VALID_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Validate that a string is a safe SQL identifier
 */
export function validateIdentifier(name: string, type: string): void {
  if (!VALID_IDENTIFIER.test(name)) {
    throw new ConnectorError({
      code: 'READ_FAILED',
      message: `Invalid ${type} name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
      suggestion: `Use only valid SQL identifiers for ${type} names.`,
    });
  }
}

/**
 * Validate column names against a whitelist from the catalog
 */
export function validateColumns(columns: string[], allowedColumns: Set<string>, context: string): void {
  for (const col of columns) {
    if (!allowedColumns.has(col)) {
      throw new ConnectorError({
        code: 'SCHEMA_MISMATCH',
        message: `Invalid column "${col}" in ${context}. Column does not exist in table schema.`,
        suggestion: `Valid columns: ${Array.from(allowedColumns).join(', ')}`,
      });
    }
  }
}
