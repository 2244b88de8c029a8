import type { SourceName } from "@shared/schema";

export interface MissingField {
  source: SourceName;
  field: string;
  column: string;
}

/**
 * Raised before any stage runs when the configuration is malformed or maps a
 * field onto a column the supplied table does not have.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public missingFields: MissingField[],
    public issues: string[] = []
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Raised when a source table is unreadable or not shaped like a table.
 */
export class SourceTableError extends Error {
  constructor(
    message: string,
    public source: SourceName | null,
    public issues: string[] = []
  ) {
    super(message);
    this.name = "SourceTableError";
  }
}
