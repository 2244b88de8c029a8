/**
 * AGGREGATOR
 *
 * Groups merged records by one or more dimensions (model, subsidiary,
 * model × subsidiary, ...) and computes per-bucket reliability statistics,
 * plus the global summary for the whole fleet. Incident rows get their own
 * groupings (per month, per description, per subsidiary × model).
 *
 * TTF statistics of a bucket without any TTF-bearing record are null, never 0.
 */

import type {
  AggregateDimension,
  AggregationOptions,
  IncidentAggregationOptions,
  IncidentDimension,
  MetricUnit,
} from "@shared/schema";
import type {
  AggregateBucket,
  AggregateResult,
  GroupKey,
  IncidentAggregateBucket,
  IncidentAggregateResult,
  IncidentEvent,
  LifecycleSummary,
  MergedRecord,
} from "../lifecycleContract";

export type AggregateOptions = Pick<AggregationOptions, "ageBasis" | "unit" | "longTail">;

// ============================================================================
// VALUE ACCESSORS
// ============================================================================

export function dimensionValue(record: MergedRecord, dimension: AggregateDimension): string | null {
  switch (dimension) {
    case "model":
      return record.model;
    case "subsidiary":
      return record.subsidiary;
    case "countryRef":
      return record.countryRef;
    case "serialStatus":
      return record.serialCode.validity.status;
    case "installationMonth":
      return record.installationDate ? record.installationDate.slice(0, 7) : null;
  }
}

function ttfValue(record: MergedRecord, unit: MetricUnit): number | null {
  return unit === "days" ? record.metrics.timeToFailureDays : record.metrics.timeToFailureMonths;
}

function ageValue(record: MergedRecord, options: AggregateOptions): number | null {
  const m = record.metrics;
  if (options.ageBasis === "installation") {
    return options.unit === "days" ? m.ageSinceInstallationDays : m.ageSinceInstallationMonths;
  }
  return options.unit === "days" ? m.ageSinceFabricationDays : m.ageSinceFabricationMonths;
}

export function present(values: Array<number | null>): number[] {
  return values.filter((v): v is number => v !== null);
}

export function mean(values: number[]): number | null {
  return values.length === 0 ? null : values.reduce((sum, v) => sum + v, 0) / values.length;
}

function min(values: number[]): number | null {
  return values.length === 0 ? null : values.reduce((a, b) => (b < a ? b : a));
}

function max(values: number[]): number | null {
  return values.length === 0 ? null : values.reduce((a, b) => (b > a ? b : a));
}

function ratio(part: number, whole: number): number | null {
  return whole === 0 ? null : part / whole;
}

// ============================================================================
// BUCKETS
// ============================================================================

function buildBucket(
  groupKey: GroupKey,
  records: MergedRecord[],
  options: AggregateOptions,
  collapsed: boolean
): AggregateBucket {
  const ttf = present(records.map((r) => ttfValue(r, options.unit)));
  const ages = present(records.map((r) => ageValue(r, options)));

  return {
    groupKey,
    count: records.length,
    ttfCount: ttf.length,
    meanTtf: mean(ttf),
    minTtf: min(ttf),
    maxTtf: max(ttf),
    meanAge: mean(ages),
    incidentCount: records.reduce((sum, r) => sum + r.incidents.incidentCount, 0),
    returnCount: records.reduce((sum, r) => sum + r.returns.returnCount, 0),
    incidentWithoutReturnCount: records.filter((r) => r.metrics.incidentWithoutReturn).length,
    unit: options.unit,
    collapsed,
  };
}

function sameKey(a: GroupKey, b: GroupKey): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

function compareKeys(a: GroupKey, b: GroupKey): number {
  for (let i = 0; i < a.length; i++) {
    const x = a[i];
    const y = b[i];
    if (x === y) continue;
    if (x === null) return 1;
    if (y === null) return -1;
    return x < y ? -1 : 1;
  }
  return 0;
}

function compareBuckets(a: AggregateBucket, b: AggregateBucket): number {
  return b.count - a.count || compareKeys(a.groupKey, b.groupKey);
}

export function aggregateRecords(
  records: MergedRecord[],
  dimensions: AggregateDimension[],
  options: AggregateOptions
): AggregateBucket[] {
  const groups = new Map<string, { key: GroupKey; records: MergedRecord[] }>();

  for (const record of records) {
    const key = dimensions.map((d) => dimensionValue(record, d));
    const id = JSON.stringify(key);
    const group = groups.get(id);
    if (group) {
      group.records.push(record);
    } else {
      groups.set(id, { key, records: [record] });
    }
  }

  const grouped = Array.from(groups.values());
  const buckets = grouped
    .map((g) => buildBucket(g.key, g.records, options, false))
    .sort(compareBuckets);

  const { longTail } = options;
  if (!longTail.enabled || buckets.length <= longTail.minBuckets || records.length === 0) {
    return buckets;
  }

  // Presentation-only: the records themselves are left untouched.
  const isSmall = (count: number) => count / records.length < longTail.threshold;
  if (!buckets.some((b) => isSmall(b.count))) return buckets;

  // A real category already named like the tail label joins the tail.
  const otherKey = dimensions.map(() => longTail.label);
  const inTail = (key: GroupKey, count: number) => isSmall(count) || sameKey(key, otherKey);
  const kept = buckets.filter((b) => !inTail(b.groupKey, b.count));
  const tailRecords = grouped.filter((g) => inTail(g.key, g.records.length)).flatMap((g) => g.records);
  return [...kept, buildBucket(otherKey, tailRecords, options, true)];
}

export function aggregateAll(records: MergedRecord[], options: AggregationOptions): AggregateResult[] {
  return options.dimensions.map((dimensions) => ({
    dimensions,
    buckets: aggregateRecords(records, dimensions, options),
  }));
}

// ============================================================================
// INCIDENTS
// ============================================================================

const TEMPORAL_DIMENSIONS: ReadonlySet<IncidentDimension> = new Set<IncidentDimension>(["incidentMonth", "incidentYear"]);

export function incidentDimensionValue(event: IncidentEvent, dimension: IncidentDimension): string | null {
  switch (dimension) {
    case "incidentMonth":
      return event.incidentDate ? event.incidentDate.slice(0, 7) : null;
    case "incidentYear":
      return event.incidentDate ? event.incidentDate.slice(0, 4) : null;
    case "description":
      return event.description;
    case "model":
      return event.model;
    case "subsidiary":
      return event.subsidiary;
  }
}

/**
 * Counts incident rows per key. Time series (month, year) come back in
 * chronological order, every other grouping by count descending. `top`
 * truncates after sorting.
 */
export function aggregateIncidents(
  events: IncidentEvent[],
  dimensions: IncidentDimension[],
  top: number | null = null
): IncidentAggregateBucket[] {
  const groups = new Map<string, { key: GroupKey; events: IncidentEvent[] }>();
  for (const event of events) {
    const key = dimensions.map((d) => incidentDimensionValue(event, d));
    const id = JSON.stringify(key);
    const group = groups.get(id);
    if (group) {
      group.events.push(event);
    } else {
      groups.set(id, { key, events: [event] });
    }
  }

  const buckets = Array.from(groups.values()).map(
    (g): IncidentAggregateBucket => ({
      groupKey: g.key,
      incidentCount: g.events.length,
      deviceCount: new Set(g.events.flatMap((e) => (e.serial === null ? [] : [e.serial]))).size,
      unmatchedCount: g.events.filter((e) => !e.matched).length,
      share: ratio(g.events.length, events.length),
    })
  );

  const chronological = dimensions.every((d) => TEMPORAL_DIMENSIONS.has(d));
  buckets.sort((a, b) =>
    chronological
      ? compareKeys(a.groupKey, b.groupKey)
      : b.incidentCount - a.incidentCount || compareKeys(a.groupKey, b.groupKey)
  );
  return top === null ? buckets : buckets.slice(0, top);
}

export function aggregateIncidentsAll(
  events: IncidentEvent[],
  options: IncidentAggregationOptions
): IncidentAggregateResult[] {
  return options.dimensions.map((dimensions) => ({
    dimensions,
    buckets: aggregateIncidents(events, dimensions, options.top),
  }));
}

// ============================================================================
// GLOBAL SUMMARY
// ============================================================================

export function summarizeRecords(records: MergedRecord[], options: AggregateOptions): LifecycleSummary {
  const ttf = present(records.map((r) => ttfValue(r, options.unit)));
  const ages = present(records.map((r) => ageValue(r, options)));
  const devicesWithIncidents = records.filter((r) => r.incidents.incidentCount > 0).length;
  const devicesReturned = records.filter((r) => r.returns.returnCount > 0).length;
  const validSerialCount = records.filter((r) => r.serialCode.validity.status === "valid").length;

  return {
    deviceCount: records.length,
    devicesWithIncidents,
    devicesReturned,
    incidentRate: ratio(devicesWithIncidents, records.length),
    returnRate: ratio(devicesReturned, records.length),
    incidentWithoutReturnCount: records.filter((r) => r.metrics.incidentWithoutReturn).length,
    ttfCount: ttf.length,
    meanTtf: mean(ttf),
    minTtf: min(ttf),
    maxTtf: max(ttf),
    anomalousTtfCount: records.filter((r) => r.metrics.ttfAnomaly).length,
    meanAge: mean(ages),
    validSerialCount,
    validSerialRate: ratio(validSerialCount, records.length),
    unit: options.unit,
  };
}
