/**
 * RECORD MERGER
 *
 * Collapses incident and return rows into one summary per serial, then
 * left-joins both summaries onto the installation table. Pre-aggregating
 * keeps the join one-to-one: the output has exactly one row per installation
 * row, matched or not.
 */

import type {
  CellValue,
  IncidentColumns,
  InstallationColumns,
  ReturnColumns,
  SourceTable,
} from "@shared/schema";
import {
  MERGED_RECORD_COLUMNS,
  type ColumnCollision,
  type DeviceRecord,
  type FlatTable,
  type IncidentEvent,
  type IncidentSummary,
  type IsoDate,
  type JoinedRecord,
  type MergeReport,
  type MergedRecord,
  type ReturnSummary,
  type SerialCode,
} from "../lifecycleContract";

// ============================================================================
// TYPES
// ============================================================================

export interface ParsedDevice extends DeviceRecord {
  serialCode: SerialCode;
}

export interface SummaryResult<T> {
  summaries: Map<string, T>;
  rowCount: number;
  rowsWithoutSerial: number;
  multiRowSerials: number;
}

export const EMPTY_INCIDENT_SUMMARY: IncidentSummary = {
  incidentCount: 0,
  firstIncidentDate: null,
  lastIncidentDate: null,
  lastIncidentDescription: null,
};

export const EMPTY_RETURN_SUMMARY: ReturnSummary = {
  returnCount: 0,
  lastReturnDate: null,
  lastRmaId: null,
};

// ============================================================================
// CELL HELPERS
// ============================================================================

export function cellText(value: CellValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  const text = String(value).trim();
  return text === "" ? null : text;
}

export function serialKey(value: CellValue | undefined): string {
  return cellText(value) ?? "";
}

/** Date columns hold canonical strings once the normalizer has run. */
function isoCell(row: Record<string, CellValue>, column: string | undefined): IsoDate | null {
  if (column === undefined) return null;
  const value = row[column];
  return typeof value === "string" ? value : null;
}

function optionalText(row: Record<string, CellValue>, column: string | undefined): string | null {
  return column === undefined ? null : cellText(row[column]);
}

// ============================================================================
// DEVICES
// ============================================================================

export function extractDevices(table: SourceTable, columns: InstallationColumns): DeviceRecord[] {
  return table.rows.map((row, rowIndex) => ({
    rowIndex,
    serial: serialKey(row[columns.serial]),
    model: cellText(row[columns.model]),
    subsidiary: cellText(row[columns.subsidiary]),
    countryRef: optionalText(row, columns.countryRef),
    fabricationDate: isoCell(row, columns.fabricationDate),
    installationDate: isoCell(row, columns.installationDate),
    lastConnectionDate: isoCell(row, columns.lastConnectionDate),
    attributes: { ...row },
  }));
}

// ============================================================================
// PER-SERIAL SUMMARIES
// ============================================================================

interface LatestValue {
  date: IsoDate | null;
  value: string | null;
}

/**
 * A dated row beats an undated one; among dated rows the latest wins, ties
 * going to the later row. Without any date the last non-null value wins.
 */
function pickLatest(current: LatestValue, candidate: LatestValue): LatestValue {
  if (candidate.date !== null) {
    return current.date === null || candidate.date >= current.date ? candidate : current;
  }
  if (current.date === null && candidate.value !== null) return candidate;
  return current;
}

function minDate(a: IsoDate | null, b: IsoDate | null): IsoDate | null {
  if (a === null) return b;
  if (b === null) return a;
  return b < a ? b : a;
}

function maxDate(a: IsoDate | null, b: IsoDate | null): IsoDate | null {
  if (a === null) return b;
  if (b === null) return a;
  return b > a ? b : a;
}

function summarizeBySerial<T>(
  table: SourceTable,
  serialColumn: string,
  fold: (current: T | undefined, row: Record<string, CellValue>) => T,
  count: (summary: T) => number
): SummaryResult<T> {
  const summaries = new Map<string, T>();
  let rowsWithoutSerial = 0;

  for (const row of table.rows) {
    const serial = serialKey(row[serialColumn]);
    if (serial === "") {
      rowsWithoutSerial++;
      continue;
    }
    summaries.set(serial, fold(summaries.get(serial), row));
  }

  let multiRowSerials = 0;
  summaries.forEach((summary) => {
    if (count(summary) > 1) multiRowSerials++;
  });

  return { summaries, rowCount: table.rows.length, rowsWithoutSerial, multiRowSerials };
}

export function summarizeIncidents(table: SourceTable, columns: IncidentColumns): SummaryResult<IncidentSummary> {
  const latest = new Map<string, LatestValue>();

  return summarizeBySerial<IncidentSummary>(
    table,
    columns.serial,
    (current, row) => {
      const serial = serialKey(row[columns.serial]);
      const date = isoCell(row, columns.incidentDate);
      const pick = pickLatest(latest.get(serial) ?? { date: null, value: null }, {
        date,
        value: optionalText(row, columns.description),
      });
      latest.set(serial, pick);

      const base = current ?? EMPTY_INCIDENT_SUMMARY;
      return {
        incidentCount: base.incidentCount + 1,
        firstIncidentDate: minDate(base.firstIncidentDate, date),
        lastIncidentDate: maxDate(base.lastIncidentDate, date),
        lastIncidentDescription: pick.value,
      };
    },
    (s) => s.incidentCount
  );
}

export function summarizeReturns(table: SourceTable, columns: ReturnColumns): SummaryResult<ReturnSummary> {
  const latest = new Map<string, LatestValue>();

  return summarizeBySerial<ReturnSummary>(
    table,
    columns.serial,
    (current, row) => {
      const serial = serialKey(row[columns.serial]);
      const date = isoCell(row, columns.returnDate);
      const pick = pickLatest(latest.get(serial) ?? { date: null, value: null }, {
        date,
        value: optionalText(row, columns.rmaId),
      });
      latest.set(serial, pick);

      const base = current ?? EMPTY_RETURN_SUMMARY;
      return {
        returnCount: base.returnCount + 1,
        lastReturnDate: maxDate(base.lastReturnDate, date),
        lastRmaId: pick.value,
      };
    },
    (s) => s.returnCount
  );
}

// ============================================================================
// INCIDENT ROWS
// ============================================================================

/**
 * One event per incident row, tagged with the model and subsidiary of the
 * first device carrying its serial.
 */
export function extractIncidentEvents(
  table: SourceTable,
  columns: IncidentColumns,
  devices: DeviceRecord[]
): IncidentEvent[] {
  const bySerial = new Map<string, DeviceRecord>();
  for (const device of devices) {
    if (!bySerial.has(device.serial)) bySerial.set(device.serial, device);
  }

  return table.rows.map((row, rowIndex) => {
    const serial = cellText(row[columns.serial]);
    const device = serial === null ? undefined : bySerial.get(serial);
    return {
      rowIndex,
      serial,
      incidentDate: isoCell(row, columns.incidentDate),
      description: optionalText(row, columns.description),
      model: device?.model ?? null,
      subsidiary: device?.subsidiary ?? null,
      matched: device !== undefined,
    };
  });
}

// ============================================================================
// JOIN
// ============================================================================

/**
 * Left join on serial. Output length always equals `devices.length`.
 */
export function mergeRecords(
  devices: ParsedDevice[],
  incidents: Map<string, IncidentSummary>,
  returns: Map<string, ReturnSummary>
): JoinedRecord[] {
  return devices.map((device) => ({
    ...device,
    incidents: incidents.get(device.serial) ?? { ...EMPTY_INCIDENT_SUMMARY },
    returns: returns.get(device.serial) ?? { ...EMPTY_RETURN_SUMMARY },
  }));
}

function unmatched<T>(summaries: Map<string, T>, known: Set<string>): string[] {
  return Array.from(summaries.keys())
    .filter((serial) => !known.has(serial))
    .sort();
}

export function buildMergeReport(
  devices: DeviceRecord[],
  incidents: SummaryResult<IncidentSummary>,
  returns: SummaryResult<ReturnSummary>
): MergeReport {
  const known = new Set(devices.map((d) => d.serial));
  return {
    installationRows: devices.length,
    incidentRows: incidents.rowCount,
    returnRows: returns.rowCount,
    incidentRowsWithoutSerial: incidents.rowsWithoutSerial,
    returnRowsWithoutSerial: returns.rowsWithoutSerial,
    devicesWithIncidents: devices.filter((d) => incidents.summaries.has(d.serial)).length,
    devicesWithReturns: devices.filter((d) => returns.summaries.has(d.serial)).length,
    multiIncidentSerials: incidents.multiRowSerials,
    multiReturnSerials: returns.multiRowSerials,
    unmatchedIncidentSerials: unmatched(incidents.summaries, known),
    unmatchedReturnSerials: unmatched(returns.summaries, known),
  };
}

// ============================================================================
// FLAT OUTPUT
// ============================================================================

export interface MergedColumnPlan {
  columns: string[];
  derived: Array<{ outputName: string; value: (record: MergedRecord) => CellValue }>;
  collisions: ColumnCollision[];
}

/**
 * Installation columns keep their names; a derived column that would reuse
 * one is renamed with its source suffix.
 */
export function planMergedColumns(installationColumns: string[]): MergedColumnPlan {
  const taken = new Set(installationColumns);
  const collisions: ColumnCollision[] = [];
  const derived: MergedColumnPlan["derived"] = [];

  for (const column of MERGED_RECORD_COLUMNS) {
    let outputName = column.name;
    if (taken.has(outputName)) {
      outputName = `${column.name}_${column.source}`;
      for (let n = 2; taken.has(outputName); n++) {
        outputName = `${column.name}_${column.source}_${n}`;
      }
      collisions.push({ column: column.name, renamedTo: outputName });
    }
    taken.add(outputName);
    derived.push({ outputName, value: column.value });
  }

  return {
    columns: [...installationColumns, ...derived.map((d) => d.outputName)],
    derived,
    collisions,
  };
}

export function toMergedTable(records: MergedRecord[], plan: MergedColumnPlan, installationColumns: string[]): FlatTable {
  const rows = records.map((record) => {
    const row: Record<string, CellValue> = {};
    for (const column of installationColumns) {
      row[column] = record.attributes[column] ?? null;
    }
    for (const column of plan.derived) {
      row[column.outputName] = column.value(record);
    }
    return row;
  });
  return { columns: plan.columns, rows };
}
