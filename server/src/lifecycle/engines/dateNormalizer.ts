/**
 * DATE NORMALIZER
 *
 * Turns heterogeneous date cells (typed dates, spreadsheet serial numbers,
 * strings in assorted layouts) into canonical yyyy-MM-dd strings.
 *
 * The candidate pattern list is ordered configuration: "03/04/2020" resolves
 * to whichever of day-first or month-first comes first in that list. Cells no
 * pattern can read become null and are counted, never thrown.
 *
 * The permissive fallback only reads text that spells its month out
 * ("June 1, 2019"), and only when the parsed date still carries the day, month
 * and year written in the cell. Numeric layouts go through the patterns alone.
 */

import { format, isValid, parse } from "date-fns";
import type { CellValue, DateOptions } from "@shared/schema";
import type { IsoDate } from "../lifecycleContract";

// ============================================================================
// TYPES
// ============================================================================

export type DateParseOutcome =
  | { status: "parsed"; date: IsoDate; via: string }
  | { status: "missing" }
  | { status: "invalid"; raw: string };

export interface DateColumnStats {
  total: number;
  parsed: number;
  missing: number;
  invalid: number;
  patternUsage: Record<string, number>;
  columnPattern: string | null;
  invalidSamples: string[];
}

export interface NormalizedDateColumn {
  values: Array<IsoDate | null>;
  stats: DateColumnStats;
}

const CANONICAL_FORMAT = "yyyy-MM-dd";
const EXCEL_EPOCH_MS = Date.UTC(1899, 11, 30);
const MS_PER_DAY = 86_400_000;
const MAX_INVALID_SAMPLES = 5;

// Missing components (time of day, mostly) are taken from here.
const PARSE_REFERENCE = new Date(2000, 0, 1);

// ============================================================================
// HELPERS
// ============================================================================

function isPlausible(date: Date, options: DateOptions): boolean {
  if (!isValid(date)) return false;
  const year = date.getFullYear();
  return year >= options.plausibleYears.min && year <= options.plausibleYears.max;
}

function tryPattern(value: string, pattern: string, options: DateOptions): IsoDate | null {
  const date = parse(value, pattern, PARSE_REFERENCE);
  return isPlausible(date, options) ? format(date, CANONICAL_FORMAT) : null;
}

function fromExcelSerial(value: number, options: DateOptions): IsoDate | null {
  if (!Number.isFinite(value)) return null;
  const utc = new Date(EXCEL_EPOCH_MS + Math.floor(value) * MS_PER_DAY);
  const year = utc.getUTCFullYear();
  if (year < options.plausibleYears.min || year > options.plausibleYears.max) return null;
  return utc.toISOString().slice(0, 10);
}

const MONTH_WORD = /[a-z]{3,}/i;

/**
 * Free-form text read by the runtime's own date parser. Rejected unless the
 * result names the calendar date the text names: rolled-over days ("February
 * 30") and time-zone shifts fail the day check.
 */
function fromMonthName(text: string, options: DateOptions): IsoDate | null {
  if (!MONTH_WORD.test(text)) return null;
  const date = new Date(text);
  if (!isPlausible(date, options)) return null;

  const numbers = (text.match(/\d+/g) ?? []).map(Number);
  const sameDay = numbers.includes(date.getDate()) && numbers.includes(date.getFullYear());
  const sameMonth = text.toLowerCase().includes(format(date, "MMM").toLowerCase());
  return sameDay && sameMonth ? format(date, CANONICAL_FORMAT) : null;
}

function isBlank(value: CellValue): boolean {
  return value === null || (typeof value === "string" && value.trim() === "");
}

/**
 * Returns one message per pattern date-fns refuses to use.
 */
export function validateDateFormats(formats: string[]): string[] {
  const problems: string[] = [];
  for (const pattern of formats) {
    try {
      format(PARSE_REFERENCE, pattern);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      problems.push(`Unusable date pattern "${pattern}": ${reason}`);
    }
  }
  return problems;
}

// ============================================================================
// SINGLE VALUE
// ============================================================================

/**
 * Normalizes one cell. `patterns` defaults to the configured list; column
 * resolution passes a single winning pattern instead.
 */
export function normalizeDate(
  value: CellValue,
  options: DateOptions,
  patterns: string[] = options.formats
): DateParseOutcome {
  if (isBlank(value)) return { status: "missing" };

  if (value instanceof Date) {
    return isPlausible(value, options)
      ? { status: "parsed", date: format(value, CANONICAL_FORMAT), via: "date" }
      : { status: "invalid", raw: String(value) };
  }

  if (typeof value === "number") {
    const date = options.excelSerialDates ? fromExcelSerial(value, options) : null;
    return date ? { status: "parsed", date, via: "excel-serial" } : { status: "invalid", raw: String(value) };
  }

  if (typeof value !== "string") {
    return { status: "invalid", raw: String(value) };
  }

  const text = value.trim();
  for (const pattern of patterns) {
    const date = tryPattern(text, pattern, options);
    if (date) return { status: "parsed", date, via: pattern };
  }

  const loose = options.permissiveFallback ? fromMonthName(text, options) : null;
  if (loose) return { status: "parsed", date: loose, via: "fallback" };

  return { status: "invalid", raw: text };
}

// ============================================================================
// COLUMN
// ============================================================================

/**
 * First configured pattern that reads every non-blank string cell, or null.
 */
export function detectColumnPattern(values: CellValue[], options: DateOptions): string | null {
  const candidates = values
    .filter((v): v is string => typeof v === "string" && v.trim() !== "")
    .map((v) => v.trim());
  if (candidates.length === 0) return null;

  for (const pattern of options.formats) {
    if (candidates.every((c) => tryPattern(c, pattern, options) !== null)) {
      return pattern;
    }
  }
  return null;
}

export function normalizeDateColumn(values: CellValue[], options: DateOptions): NormalizedDateColumn {
  const columnPattern = options.resolution === "column" ? detectColumnPattern(values, options) : null;
  const patterns = columnPattern ? [columnPattern] : options.formats;

  const stats: DateColumnStats = {
    total: values.length,
    parsed: 0,
    missing: 0,
    invalid: 0,
    patternUsage: {},
    columnPattern,
    invalidSamples: [],
  };

  const normalized = values.map((value) => {
    const outcome = normalizeDate(value, options, patterns);
    switch (outcome.status) {
      case "parsed":
        stats.parsed++;
        stats.patternUsage[outcome.via] = (stats.patternUsage[outcome.via] ?? 0) + 1;
        return outcome.date;
      case "missing":
        stats.missing++;
        return null;
      case "invalid":
        stats.invalid++;
        if (stats.invalidSamples.length < MAX_INVALID_SAMPLES && !stats.invalidSamples.includes(outcome.raw)) {
          stats.invalidSamples.push(outcome.raw);
        }
        return null;
    }
  });

  return { values: normalized, stats };
}
