/**
 * METRICS CALCULATOR
 *
 * Reliability metrics per device. Ages are measured to a reference date the
 * caller reads once per run from an injected clock, so every record of a run
 * shares the same "today".
 *
 * Time-to-failure runs from the installation date (else the fabrication date)
 * to the device's latest incident, or its earliest with
 * `ttfIncidentDate: "first"`. TTF exists only when an incident date exists; a
 * negative value is kept and flagged as an anomaly.
 */

import { differenceInCalendarDays, format, isValid, parseISO } from "date-fns";
import type { MetricsOptions } from "@shared/schema";
import {
  DAYS_PER_MONTH,
  type FabricationDateSource,
  type IsoDate,
  type JoinedRecord,
  type LifecycleMetrics,
  type MergedRecord,
  type ReferenceClock,
  type TtfReference,
} from "../lifecycleContract";

// ============================================================================
// CLOCKS
// ============================================================================

export function fixedClock(date: IsoDate): ReferenceClock {
  if (!isValid(parseISO(date))) {
    throw new RangeError(`Invalid reference date: ${date}`);
  }
  return { today: () => date };
}

export const systemClock: ReferenceClock = {
  today: () => format(new Date(), "yyyy-MM-dd"),
};

// ============================================================================
// DAY ARITHMETIC
// ============================================================================

/** Whole calendar days from `from` to `to` (negative when `to` is earlier). */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return differenceInCalendarDays(parseISO(to), parseISO(from));
}

export function toMonths(days: number | null): number | null {
  return days === null ? null : days / DAYS_PER_MONTH;
}

function span(from: IsoDate | null, to: IsoDate | null): number | null {
  return from !== null && to !== null ? daysBetween(from, to) : null;
}

// ============================================================================
// METRICS
// ============================================================================

function resolveFabricationDate(
  record: JoinedRecord,
  options: MetricsOptions
): { date: IsoDate | null; source: FabricationDateSource | null } {
  if (record.fabricationDate !== null) {
    return { date: record.fabricationDate, source: "column" };
  }
  if (options.fabricationDateFallback === "serial" && record.serialCode.derivedFabricationDate !== null) {
    return { date: record.serialCode.derivedFabricationDate, source: "serial" };
  }
  return { date: null, source: null };
}

function resolveTtfReference(
  installationDate: IsoDate | null,
  fabricationDate: IsoDate | null
): { date: IsoDate | null; reference: TtfReference | null } {
  if (installationDate !== null) return { date: installationDate, reference: "installation" };
  if (fabricationDate !== null) return { date: fabricationDate, reference: "fabrication" };
  return { date: null, reference: null };
}

export function computeMetrics(
  record: JoinedRecord,
  referenceDate: IsoDate,
  options: MetricsOptions
): MergedRecord {
  const fabrication = resolveFabricationDate(record, options);
  const incidentDate =
    options.ttfIncidentDate === "first"
      ? record.incidents.firstIncidentDate
      : record.incidents.lastIncidentDate;

  let ttfReference: TtfReference | null = null;
  let timeToFailureDays: number | null = null;
  if (incidentDate !== null) {
    const reference = resolveTtfReference(record.installationDate, fabrication.date);
    if (reference.date !== null) {
      ttfReference = reference.reference;
      timeToFailureDays = daysBetween(reference.date, incidentDate);
    }
  }

  const ageSinceInstallationDays = span(record.installationDate, referenceDate);
  const ageSinceFabricationDays = span(fabrication.date, referenceDate);
  const stockDurationDays = span(fabrication.date, record.installationDate);

  const metrics: LifecycleMetrics = {
    fabricationDateUsed: fabrication.date,
    fabricationDateSource: fabrication.source,
    ttfReference,
    timeToFailureDays,
    timeToFailureMonths: toMonths(timeToFailureDays),
    ttfAnomaly: timeToFailureDays !== null && timeToFailureDays < 0,
    ageSinceInstallationDays,
    ageSinceInstallationMonths: toMonths(ageSinceInstallationDays),
    ageSinceFabricationDays,
    ageSinceFabricationMonths: toMonths(ageSinceFabricationDays),
    stockDurationDays,
    stockDurationMonths: toMonths(stockDurationDays),
    inactivityDays: span(record.lastConnectionDate, referenceDate),
    incidentWithoutReturn: record.incidents.incidentCount > 0 && record.returns.returnCount === 0,
  };

  return { ...record, metrics };
}
