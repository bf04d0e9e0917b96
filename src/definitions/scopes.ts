import type { FamilyOption } from '../migrations/index.js';

/**
 * The schema file itself, then every custom file of its family.
 * Each has its own ledger entry, so a change meant for both is applied in both scopes.
 */
export const SCHEMA_AND_CUSTOM: readonly FamilyOption[] = [
  { expandSchema: false },
  { expandSchema: true }
];
