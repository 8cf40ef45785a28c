const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function assertValidIdentifier(value: string): void {
  if (!IDENTIFIER_PATTERN.test(value)) {
    throw new Error(`Invalid SQL identifier: ${value}`);
  }
}

export function quoteIdentifier(value: string): string {
  assertValidIdentifier(value);
  return `"${value}"`;
}

export interface StoreTables {
  prefix: string;
  lists: string;
  entries: string;
  positionSequence: string;
  listIndex: string;
  expiryIndex: string;
}

/** Quoted identifiers for every relation the Postgres store owns. */
export function storeTables(prefix: string): StoreTables {
  assertValidIdentifier(prefix);
  return {
    prefix,
    lists: quoteIdentifier(`${prefix}_lists`),
    entries: quoteIdentifier(`${prefix}_entries`),
    positionSequence: quoteIdentifier(`${prefix}_position_seq`),
    listIndex: quoteIdentifier(`${prefix}_lists_key_position_idx`),
    expiryIndex: quoteIdentifier(`${prefix}_entries_expires_at_idx`),
  };
}
