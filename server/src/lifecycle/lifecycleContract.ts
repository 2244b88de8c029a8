/**
 * DEVICE LIFECYCLE CONTRACT
 *
 * Canonical record shapes shared by every lifecycle engine. Dates are carried
 * as ISO calendar strings (yyyy-MM-dd) from the moment they leave the
 * DateNormalizer; nothing downstream sees a raw cell.
 */

import type {
  AggregateDimension,
  CellValue,
  IncidentDimension,
  MetricUnit,
  SourceName,
  SourceRow,
} from "@shared/schema";

// ============================================================================
// CORE TYPE DEFINITIONS
// ============================================================================

/** Calendar date in yyyy-MM-dd form. */
export type IsoDate = string;

export const DAYS_PER_MONTH = 30.44;

export interface ReferenceClock {
  today(): IsoDate;
}

// ============================================================================
// SERIAL CODE
// ============================================================================

export type SerialInvalidReason = "length" | "month" | "year-window";

export type SerialValidity =
  | { status: "valid" }
  | { status: "invalid"; reason: SerialInvalidReason };

export interface SerialCode {
  raw: string;
  /** Serial after glyph normalization, trimming and optional padding. */
  normalizedDigits: string;
  monthCode: number | null;
  yearCode: number | null;
  sequence: string | null;
  validity: SerialValidity;
  /** First day of the encoded manufacture month, only when valid. */
  derivedFabricationDate: IsoDate | null;
}

// ============================================================================
// RECORDS
// ============================================================================

export interface DeviceRecord {
  /** Position of the row in the installation table. */
  rowIndex: number;
  serial: string;
  model: string | null;
  subsidiary: string | null;
  countryRef: string | null;
  fabricationDate: IsoDate | null;
  installationDate: IsoDate | null;
  lastConnectionDate: IsoDate | null;
  /** Installation row after date normalization, carried to the output table. */
  attributes: SourceRow;
}

export interface IncidentSummary {
  incidentCount: number;
  firstIncidentDate: IsoDate | null;
  lastIncidentDate: IsoDate | null;
  lastIncidentDescription: string | null;
}

export interface ReturnSummary {
  returnCount: number;
  lastReturnDate: IsoDate | null;
  lastRmaId: string | null;
}

export interface JoinedRecord extends DeviceRecord {
  serialCode: SerialCode;
  incidents: IncidentSummary;
  returns: ReturnSummary;
}

export type FabricationDateSource = "column" | "serial";
export type TtfReference = "installation" | "fabrication";

export interface LifecycleMetrics {
  fabricationDateUsed: IsoDate | null;
  fabricationDateSource: FabricationDateSource | null;
  ttfReference: TtfReference | null;
  timeToFailureDays: number | null;
  timeToFailureMonths: number | null;
  /** Incident predates the reference date. */
  ttfAnomaly: boolean;
  ageSinceInstallationDays: number | null;
  ageSinceInstallationMonths: number | null;
  ageSinceFabricationDays: number | null;
  ageSinceFabricationMonths: number | null;
  stockDurationDays: number | null;
  stockDurationMonths: number | null;
  inactivityDays: number | null;
  incidentWithoutReturn: boolean;
}

export interface MergedRecord extends JoinedRecord {
  metrics: LifecycleMetrics;
}

/** One incident row after date normalization, with its device's attributes. */
export interface IncidentEvent {
  rowIndex: number;
  serial: string | null;
  incidentDate: IsoDate | null;
  description: string | null;
  model: string | null;
  subsidiary: string | null;
  /** The serial names a device of the installation table. */
  matched: boolean;
}

// ============================================================================
// AGGREGATES
// ============================================================================

export type GroupKey = Array<string | null>;

export interface AggregateBucket {
  groupKey: GroupKey;
  count: number;
  ttfCount: number;
  meanTtf: number | null;
  minTtf: number | null;
  maxTtf: number | null;
  meanAge: number | null;
  incidentCount: number;
  returnCount: number;
  incidentWithoutReturnCount: number;
  unit: MetricUnit;
  collapsed: boolean;
}

export interface AggregateResult {
  dimensions: AggregateDimension[];
  buckets: AggregateBucket[];
}

export interface IncidentAggregateBucket {
  groupKey: GroupKey;
  incidentCount: number;
  /** Distinct serials among the bucket's incidents. */
  deviceCount: number;
  /** Incidents whose serial matches no installed device. */
  unmatchedCount: number;
  /** Bucket's share of all incident rows. */
  share: number | null;
}

export interface IncidentAggregateResult {
  dimensions: IncidentDimension[];
  buckets: IncidentAggregateBucket[];
}

export interface LifecycleSummary {
  deviceCount: number;
  devicesWithIncidents: number;
  devicesReturned: number;
  incidentRate: number | null;
  returnRate: number | null;
  incidentWithoutReturnCount: number;
  ttfCount: number;
  meanTtf: number | null;
  minTtf: number | null;
  maxTtf: number | null;
  anomalousTtfCount: number;
  meanAge: number | null;
  validSerialCount: number;
  validSerialRate: number | null;
  unit: MetricUnit;
}

// ============================================================================
// RUN REPORT
// ============================================================================

export interface DateColumnReport {
  source: SourceName;
  field: string;
  column: string;
  total: number;
  parsed: number;
  missing: number;
  invalid: number;
  /** How many cells each pattern (or "date", "excel-serial", "fallback") resolved. */
  patternUsage: Record<string, number>;
  /** Pattern applied to the whole column in "column" resolution mode. */
  columnPattern: string | null;
  invalidSamples: string[];
}

export interface ColumnCollision {
  column: string;
  renamedTo: string;
}

export interface MergeReport {
  installationRows: number;
  incidentRows: number;
  returnRows: number;
  incidentRowsWithoutSerial: number;
  returnRowsWithoutSerial: number;
  devicesWithIncidents: number;
  devicesWithReturns: number;
  multiIncidentSerials: number;
  multiReturnSerials: number;
  unmatchedIncidentSerials: string[];
  unmatchedReturnSerials: string[];
}

export interface DedupeReport {
  inputRows: number;
  removedCount: number;
  duplicateKeyCount: number;
}

export interface SerialReport {
  valid: number;
  invalid: Record<SerialInvalidReason, number>;
}

export interface CalculationLogEntry {
  calculationId: string;
  formula: string;
  inputs: Record<string, number | string>;
  output: number | null;
  outputUnit: string;
}

export interface LifecycleRunReport {
  referenceDate: IsoDate;
  dateColumns: DateColumnReport[];
  serials: SerialReport;
  merge: MergeReport;
  dedupe: DedupeReport;
  columnCollisions: ColumnCollision[];
  calculationLog: CalculationLogEntry[];
}

export interface FlatTable {
  columns: string[];
  rows: Array<Record<string, CellValue>>;
}

export interface LifecycleRunResult {
  fingerprint: string;
  records: MergedRecord[];
  table: FlatTable;
  aggregates: AggregateResult[];
  incidentAggregates: IncidentAggregateResult[];
  summary: LifecycleSummary;
  report: LifecycleRunReport;
}

// ============================================================================
// OUTPUT COLUMNS
// ============================================================================

/** Source suffix applied to a derived column whose name an installation column already uses. */
export type DerivedColumnSource = "serial" | "incident" | "return" | "metrics";

/**
 * Derived columns appended after the installation columns, in output order.
 */
export const MERGED_RECORD_COLUMNS: ReadonlyArray<{
  name: string;
  source: DerivedColumnSource;
  value: (record: MergedRecord) => CellValue;
}> = [
  { name: "serialDigits", source: "serial", value: (r) => r.serialCode.normalizedDigits },
  { name: "serialMonthCode", source: "serial", value: (r) => r.serialCode.monthCode },
  { name: "serialYearCode", source: "serial", value: (r) => r.serialCode.yearCode },
  { name: "serialStatus", source: "serial", value: (r) => r.serialCode.validity.status },
  {
    name: "serialInvalidReason",
    source: "serial",
    value: (r) => (r.serialCode.validity.status === "invalid" ? r.serialCode.validity.reason : null),
  },
  { name: "serialFabricationDate", source: "serial", value: (r) => r.serialCode.derivedFabricationDate },
  { name: "incidentCount", source: "incident", value: (r) => r.incidents.incidentCount },
  { name: "firstIncidentDate", source: "incident", value: (r) => r.incidents.firstIncidentDate },
  { name: "lastIncidentDate", source: "incident", value: (r) => r.incidents.lastIncidentDate },
  { name: "lastIncidentDescription", source: "incident", value: (r) => r.incidents.lastIncidentDescription },
  { name: "returnCount", source: "return", value: (r) => r.returns.returnCount },
  { name: "lastReturnDate", source: "return", value: (r) => r.returns.lastReturnDate },
  { name: "lastRmaId", source: "return", value: (r) => r.returns.lastRmaId },
  { name: "fabricationDateUsed", source: "metrics", value: (r) => r.metrics.fabricationDateUsed },
  { name: "fabricationDateSource", source: "metrics", value: (r) => r.metrics.fabricationDateSource },
  { name: "ttfReference", source: "metrics", value: (r) => r.metrics.ttfReference },
  { name: "timeToFailureDays", source: "metrics", value: (r) => r.metrics.timeToFailureDays },
  { name: "timeToFailureMonths", source: "metrics", value: (r) => r.metrics.timeToFailureMonths },
  { name: "ttfAnomaly", source: "metrics", value: (r) => r.metrics.ttfAnomaly },
  { name: "ageSinceInstallationDays", source: "metrics", value: (r) => r.metrics.ageSinceInstallationDays },
  { name: "ageSinceInstallationMonths", source: "metrics", value: (r) => r.metrics.ageSinceInstallationMonths },
  { name: "ageSinceFabricationDays", source: "metrics", value: (r) => r.metrics.ageSinceFabricationDays },
  { name: "ageSinceFabricationMonths", source: "metrics", value: (r) => r.metrics.ageSinceFabricationMonths },
  { name: "stockDurationDays", source: "metrics", value: (r) => r.metrics.stockDurationDays },
  { name: "stockDurationMonths", source: "metrics", value: (r) => r.metrics.stockDurationMonths },
  { name: "inactivityDays", source: "metrics", value: (r) => r.metrics.inactivityDays },
  { name: "incidentWithoutReturn", source: "metrics", value: (r) => r.metrics.incidentWithoutReturn },
];

export const CALCULATION_FORMULAS = {
  TIME_TO_FAILURE: "incident_date - COALESCE(installation_date, fabrication_date) // days",
  AGE_SINCE_INSTALLATION: "reference_date - installation_date // days",
  AGE_SINCE_FABRICATION: "reference_date - fabrication_date // days",
  STOCK_DURATION: "installation_date - fabrication_date // days",
  INACTIVITY: "reference_date - last_connection_date // days",
  DAYS_TO_MONTHS: `days / ${DAYS_PER_MONTH}`,
  INCIDENT_RATE: "devices_with_incidents / device_count",
  RETURN_RATE: "devices_returned / device_count",
  MEAN_TTF: "AVG(time_to_failure) over devices with an incident date",
} as const;
