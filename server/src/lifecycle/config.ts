/**
 * Configuration resolution for the lifecycle pipeline.
 *
 * Runs once, before any stage: validates the configuration and the three
 * source tables, then checks every mapped field against the columns the
 * tables actually carry.
 */

import type { ZodError } from "zod";
import {
  pipelineConfigSchema,
  sourceNameSchema,
  sourceTablesSchema,
  type ColumnMapping,
  type PipelineConfig,
  type SourceName,
  type SourceTables,
} from "@shared/schema";
import { ConfigurationError, SourceTableError, type MissingField } from "./errors";
import { validateDateFormats } from "./engines/dateNormalizer";

export interface DateColumnRef {
  source: SourceName;
  field: string;
  column: string;
}

export interface ResolvedColumnMapping {
  columns: ColumnMapping;
  dateColumns: DateColumnRef[];
}

const DATE_FIELDS: Record<SourceName, string[]> = {
  installations: ["fabricationDate", "installationDate", "lastConnectionDate"],
  incidents: ["incidentDate"],
  returns: ["returnDate"],
};

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

export function parsePipelineConfig(raw: unknown): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(`Invalid pipeline configuration: ${issues.join("; ")}`, [], issues);
  }

  const patternProblems = validateDateFormats(result.data.dates.formats);
  if (patternProblems.length > 0) {
    throw new ConfigurationError(`Invalid pipeline configuration: ${patternProblems.join("; ")}`, [], patternProblems);
  }
  return result.data;
}

export function validateSourceTables(raw: unknown): SourceTables {
  const result = sourceTablesSchema.safeParse(raw);
  if (!result.success) {
    const issues = formatIssues(result.error);
    const firstSource = sourceNameSchema.safeParse(result.error.issues[0]?.path[0]);
    throw new SourceTableError(
      `Malformed source tables: ${issues.join("; ")}`,
      firstSource.success ? firstSource.data : null,
      issues
    );
  }
  return result.data;
}

function mappedEntries(mapping: Record<string, string | undefined>): Array<[string, string]> {
  const entries: Array<[string, string]> = [];
  for (const [field, column] of Object.entries(mapping)) {
    if (column !== undefined) entries.push([field, column]);
  }
  return entries;
}

/**
 * Checks every mapped field against the table it belongs to.
 * @throws ConfigurationError listing every field whose column is absent
 */
export function resolveColumnMapping(columns: ColumnMapping, tables: SourceTables): ResolvedColumnMapping {
  const missingFields: MissingField[] = [];
  const dateColumns: DateColumnRef[] = [];

  for (const source of sourceNameSchema.options) {
    const available = new Set(tables[source].columns);
    for (const [field, column] of mappedEntries(columns[source])) {
      if (!available.has(column)) {
        missingFields.push({ source, field, column });
        continue;
      }
      if (DATE_FIELDS[source].includes(field)) {
        dateColumns.push({ source, field, column });
      }
    }
  }

  if (missingFields.length > 0) {
    const list = missingFields.map((m) => `${m.source}.${m.field} -> "${m.column}"`).join(", ");
    throw new ConfigurationError(`Mapped columns missing from source tables: ${list}`, missingFields);
  }

  return { columns, dateColumns };
}
