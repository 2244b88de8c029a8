/**
 * Writes a pipeline result to an .xlsx workbook: the merged device table,
 * the global summary, one sheet per device and incident aggregate and the
 * date-parsing report.
 */

import * as XLSX from "xlsx";
import type { CellValue } from "@shared/schema";
import type { AggregateResult, IncidentAggregateResult, LifecycleRunResult } from "../lifecycleContract";

const MAX_SHEET_NAME = 31;

export function aggregateSheetName(aggregate: AggregateResult): string {
  return `By ${aggregate.dimensions.join(" x ")}`.slice(0, MAX_SHEET_NAME);
}

export function incidentSheetName(aggregate: IncidentAggregateResult): string {
  return `Incidents by ${aggregate.dimensions.join(" x ")}`.slice(0, MAX_SHEET_NAME);
}

function incidentRows(aggregate: IncidentAggregateResult): Array<Record<string, CellValue>> {
  return aggregate.buckets.map((bucket) => {
    const row: Record<string, CellValue> = {};
    aggregate.dimensions.forEach((dimension, i) => {
      row[dimension] = bucket.groupKey[i] ?? null;
    });
    return {
      ...row,
      incidentCount: bucket.incidentCount,
      deviceCount: bucket.deviceCount,
      unmatchedCount: bucket.unmatchedCount,
      share: bucket.share,
    };
  });
}

function aggregateRows(aggregate: AggregateResult): Array<Record<string, CellValue>> {
  return aggregate.buckets.map((bucket) => {
    const row: Record<string, CellValue> = {};
    aggregate.dimensions.forEach((dimension, i) => {
      row[dimension] = bucket.groupKey[i] ?? null;
    });
    return {
      ...row,
      count: bucket.count,
      ttfCount: bucket.ttfCount,
      [`meanTtf (${bucket.unit})`]: bucket.meanTtf,
      [`minTtf (${bucket.unit})`]: bucket.minTtf,
      [`maxTtf (${bucket.unit})`]: bucket.maxTtf,
      [`meanAge (${bucket.unit})`]: bucket.meanAge,
      incidentCount: bucket.incidentCount,
      returnCount: bucket.returnCount,
      incidentWithoutReturnCount: bucket.incidentWithoutReturnCount,
    };
  });
}

export function renderLifecycleWorkbook(result: LifecycleRunResult): Buffer {
  const workbook = XLSX.utils.book_new();

  XLSX.utils.book_append_sheet(
    workbook,
    XLSX.utils.json_to_sheet(result.table.rows, { header: result.table.columns }),
    "Devices"
  );

  const summaryRows = Object.entries(result.summary).map(([metric, value]) => ({ metric, value }));
  summaryRows.push(
    { metric: "referenceDate", value: result.report.referenceDate },
    { metric: "duplicatesRemoved", value: result.report.dedupe.removedCount }
  );
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(summaryRows), "Summary");

  const usedNames = new Set(["Devices", "Summary", "Date report"]);
  const appendUnique = (baseName: string, rows: Array<Record<string, CellValue>>) => {
    let name = baseName;
    for (let n = 2; usedNames.has(name); n++) {
      name = `${baseName.slice(0, MAX_SHEET_NAME - 3)} ${n}`;
    }
    usedNames.add(name);
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(rows), name);
  };

  for (const aggregate of result.aggregates) {
    appendUnique(aggregateSheetName(aggregate), aggregateRows(aggregate));
  }
  for (const aggregate of result.incidentAggregates) {
    appendUnique(incidentSheetName(aggregate), incidentRows(aggregate));
  }

  const dateRows = result.report.dateColumns.map((r) => ({
    source: r.source,
    field: r.field,
    column: r.column,
    total: r.total,
    parsed: r.parsed,
    missing: r.missing,
    invalid: r.invalid,
    columnPattern: r.columnPattern,
    invalidSamples: r.invalidSamples.join(" | "),
  }));
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(dateRows), "Date report");

  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return buffer;
}
