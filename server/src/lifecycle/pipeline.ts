/**
 * LIFECYCLE PIPELINE
 *
 * Linear orchestration of the lifecycle engines. Each stage takes the previous
 * stage's output and returns a new value; nothing is shared or mutated
 * between stages, so a run is a pure function of (tables, config, clock).
 * The clock is read once per run; every age in the result is measured to
 * that single reference date.
 *
 * Configuration and source problems abort the run before any stage executes.
 */

import type { DateOptions, PipelineConfig, SourceTable, SourceTables } from "@shared/schema";
import { parsePipelineConfig, resolveColumnMapping, validateSourceTables, type DateColumnRef } from "./config";
import { normalizeDateColumn } from "./engines/dateNormalizer";
import { parseSerialCode, summarizeSerialCodes } from "./engines/serialCode";
import {
  buildMergeReport,
  extractDevices,
  extractIncidentEvents,
  mergeRecords,
  planMergedColumns,
  summarizeIncidents,
  summarizeReturns,
  toMergedTable,
  type ParsedDevice,
} from "./engines/recordMerger";
import { dedupeRecords } from "./engines/deduplicator";
import { computeMetrics } from "./engines/metricsCalculator";
import { aggregateAll, aggregateIncidentsAll, mean, present, summarizeRecords } from "./engines/aggregator";
import { fingerprintRun, type PipelineCache } from "./pipelineCache";
import {
  CALCULATION_FORMULAS,
  type CalculationLogEntry,
  type DateColumnReport,
  type IsoDate,
  type LifecycleMetrics,
  type LifecycleRunResult,
  type LifecycleSummary,
  type MergedRecord,
  type ReferenceClock,
} from "./lifecycleContract";

// ============================================================================
// DATE STAGE
// ============================================================================

export interface NormalizedTables {
  tables: SourceTables;
  reports: DateColumnReport[];
}

export function normalizeTableDates(
  tables: SourceTables,
  dateColumns: DateColumnRef[],
  options: DateOptions
): NormalizedTables {
  const copy = (table: SourceTable): SourceTable => ({
    columns: [...table.columns],
    rows: table.rows.map((row) => ({ ...row })),
  });
  const next: SourceTables = {
    installations: copy(tables.installations),
    incidents: copy(tables.incidents),
    returns: copy(tables.returns),
  };

  const reports = dateColumns.map(({ source, field, column }): DateColumnReport => {
    const rows = next[source].rows;
    const { values, stats } = normalizeDateColumn(
      rows.map((row) => row[column] ?? null),
      options
    );
    rows.forEach((row, i) => {
      row[column] = values[i];
    });
    return { source, field, column, ...stats };
  });

  return { tables: next, reports };
}

// ============================================================================
// STAGES
// ============================================================================

type DayMetric = keyof Pick<
  LifecycleMetrics,
  "timeToFailureDays" | "ageSinceInstallationDays" | "ageSinceFabricationDays" | "stockDurationDays" | "inactivityDays"
>;

/** Fleet mean of one per-device metric, in days. */
function deviceMetricEntry(
  calculationId: string,
  formula: string,
  records: MergedRecord[],
  metric: DayMetric,
  inputs: Record<string, number | string>
): CalculationLogEntry {
  const values = present(records.map((r) => r.metrics[metric]));
  return {
    calculationId,
    formula,
    inputs: { ...inputs, devices_with_value: values.length },
    output: mean(values),
    outputUnit: "days",
  };
}

function buildCalculationLog(
  records: MergedRecord[],
  summary: LifecycleSummary,
  referenceDate: IsoDate
): CalculationLogEntry[] {
  return [
    deviceMetricEntry("CALC_TIME_TO_FAILURE", CALCULATION_FORMULAS.TIME_TO_FAILURE, records, "timeToFailureDays", {
      anomalous_ttf: summary.anomalousTtfCount,
    }),
    deviceMetricEntry(
      "CALC_AGE_SINCE_INSTALLATION",
      CALCULATION_FORMULAS.AGE_SINCE_INSTALLATION,
      records,
      "ageSinceInstallationDays",
      { reference_date: referenceDate }
    ),
    deviceMetricEntry(
      "CALC_AGE_SINCE_FABRICATION",
      CALCULATION_FORMULAS.AGE_SINCE_FABRICATION,
      records,
      "ageSinceFabricationDays",
      { reference_date: referenceDate }
    ),
    deviceMetricEntry("CALC_STOCK_DURATION", CALCULATION_FORMULAS.STOCK_DURATION, records, "stockDurationDays", {}),
    deviceMetricEntry("CALC_INACTIVITY", CALCULATION_FORMULAS.INACTIVITY, records, "inactivityDays", {
      reference_date: referenceDate,
    }),
    {
      calculationId: "CALC_MEAN_TTF",
      formula: CALCULATION_FORMULAS.MEAN_TTF,
      inputs:
        summary.unit === "months"
          ? { devices_with_ttf: summary.ttfCount, unit_conversion: CALCULATION_FORMULAS.DAYS_TO_MONTHS }
          : { devices_with_ttf: summary.ttfCount },
      output: summary.meanTtf,
      outputUnit: summary.unit,
    },
    {
      calculationId: "CALC_INCIDENT_RATE",
      formula: CALCULATION_FORMULAS.INCIDENT_RATE,
      inputs: { devices_with_incidents: summary.devicesWithIncidents, device_count: summary.deviceCount },
      output: summary.incidentRate,
      outputUnit: "ratio",
    },
    {
      calculationId: "CALC_RETURN_RATE",
      formula: CALCULATION_FORMULAS.RETURN_RATE,
      inputs: { devices_returned: summary.devicesReturned, device_count: summary.deviceCount },
      output: summary.returnRate,
      outputUnit: "ratio",
    },
  ];
}

function executeStages(
  tables: SourceTables,
  config: PipelineConfig,
  referenceDate: IsoDate,
  fingerprint: string
): LifecycleRunResult {
  const mapping = resolveColumnMapping(config.columns, tables);

  const dated = normalizeTableDates(tables, mapping.dateColumns, config.dates);
  for (const report of dated.reports) {
    if (report.invalid > 0) {
      console.warn(
        `[LifecyclePipeline] ${report.invalid} unparseable dates in ${report.source}.${report.column} ` +
          `(e.g. ${report.invalidSamples.map((s) => JSON.stringify(s)).join(", ")})`
      );
    }
  }

  const installationColumns = config.columns.installations;
  const devices: ParsedDevice[] = extractDevices(dated.tables.installations, installationColumns).map((device) => ({
    ...device,
    serialCode: parseSerialCode(device.attributes[installationColumns.serial] ?? null, config.serialCode),
  }));

  const incidents = summarizeIncidents(dated.tables.incidents, config.columns.incidents);
  const returns = summarizeReturns(dated.tables.returns, config.columns.returns);
  const joined = mergeRecords(devices, incidents.summaries, returns.summaries);

  const deduped = dedupeRecords(joined, config.dedupeKey);
  if (deduped.removedCount > 0) {
    console.log(`[LifecyclePipeline] Removed ${deduped.removedCount} duplicate rows on (${config.dedupeKey.join(", ")})`);
  }

  const records = deduped.records.map((record) => computeMetrics(record, referenceDate, config.metrics));
  const aggregates = aggregateAll(records, config.aggregation);
  const incidentEvents = extractIncidentEvents(dated.tables.incidents, config.columns.incidents, records);
  const incidentAggregates = aggregateIncidentsAll(incidentEvents, config.aggregation.incidents);
  const summary = summarizeRecords(records, config.aggregation);

  const plan = planMergedColumns(tables.installations.columns);
  const table = toMergedTable(records, plan, tables.installations.columns);

  return {
    fingerprint,
    records,
    table,
    aggregates,
    incidentAggregates,
    summary,
    report: {
      referenceDate,
      dateColumns: dated.reports,
      serials: summarizeSerialCodes(devices.map((d) => d.serialCode)),
      merge: buildMergeReport(devices, incidents, returns),
      dedupe: deduped.report,
      columnCollisions: plan.collisions,
      calculationLog: buildCalculationLog(records, summary, referenceDate),
    },
  };
}

// ============================================================================
// PIPELINE
// ============================================================================

export class LifecyclePipeline {
  readonly config: PipelineConfig;

  /**
   * @throws ConfigurationError when the configuration does not validate
   */
  constructor(
    config: unknown,
    private readonly clock: ReferenceClock,
    private readonly cache?: PipelineCache
  ) {
    this.config = parsePipelineConfig(config);
  }

  /**
   * Runs every stage over one snapshot of the three source tables.
   * Returns a complete result or throws; there is no partial output.
   * @throws SourceTableError for malformed tables
   * @throws ConfigurationError for mapped columns the tables lack
   */
  run(rawTables: unknown): LifecycleRunResult {
    const tables = validateSourceTables(rawTables);
    const referenceDate = this.clock.today();
    const fingerprint = fingerprintRun(tables, this.config, referenceDate);

    const cached = this.cache?.get(fingerprint);
    if (cached) {
      console.log(`[LifecyclePipeline] Cache hit ${fingerprint.slice(0, 12)}`);
      return cached;
    }

    console.log(
      `[LifecyclePipeline] RUN START installations=${tables.installations.rows.length} ` +
        `incidents=${tables.incidents.rows.length} returns=${tables.returns.rows.length}`
    );
    const result = executeStages(tables, this.config, referenceDate, fingerprint);
    console.log(
      `[LifecyclePipeline] RUN COMPLETE devices=${result.summary.deviceCount} ` +
        `withIncidents=${result.summary.devicesWithIncidents} returned=${result.summary.devicesReturned}`
    );

    this.cache?.set(fingerprint, result);
    return result;
  }
}

export function runLifecyclePipeline(rawTables: unknown, config: unknown, clock: ReferenceClock): LifecycleRunResult {
  return new LifecyclePipeline(config, clock).run(rawTables);
}
