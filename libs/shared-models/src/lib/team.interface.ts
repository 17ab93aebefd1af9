/**
 * Team roster definition as stored in configuration data.
 */
export interface TeamDefinition {
  /** Short tag used in queries, e.g. "B2C" */
  tag: string;

  /** Display label */
  label: string;

  /** Canonical agent names */
  members: string[];
}

/**
 * A team roster ready for fuzzy matching.
 */
export interface TeamRoster extends TeamDefinition {
  /** Members after name normalization, same order as members */
  normalizedMembers: readonly string[];
}
