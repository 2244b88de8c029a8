import { z } from "zod";

// ============== SOURCE TABLES ==============

export const SOURCE_NAMES = ["installations", "incidents", "returns"] as const;
export const sourceNameSchema = z.enum(SOURCE_NAMES);
export type SourceName = z.infer<typeof sourceNameSchema>;

export const cellValueSchema = z.union([z.string(), z.number(), z.boolean(), z.date(), z.null()]);
export type CellValue = z.infer<typeof cellValueSchema>;

export const sourceRowSchema = z.record(z.string(), cellValueSchema);
export type SourceRow = z.infer<typeof sourceRowSchema>;

export const sourceTableSchema = z
  .object({
    columns: z.array(z.string().min(1)),
    rows: z.array(sourceRowSchema),
  })
  .superRefine((table, ctx) => {
    const seen = new Set<string>();
    for (const column of table.columns) {
      if (seen.has(column)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["columns"],
          message: `Duplicate column "${column}"`,
        });
      }
      seen.add(column);
    }
  });
export type SourceTable = z.infer<typeof sourceTableSchema>;

export const sourceTablesSchema = z.object({
  installations: sourceTableSchema,
  incidents: sourceTableSchema,
  returns: sourceTableSchema,
});
export type SourceTables = z.infer<typeof sourceTablesSchema>;

// ============== COLUMN MAPPING ==============

const columnName = z.string().trim().min(1);

export const installationColumnsSchema = z.object({
  serial: columnName,
  model: columnName,
  subsidiary: columnName,
  installationDate: columnName,
  countryRef: columnName.optional(),
  fabricationDate: columnName.optional(),
  lastConnectionDate: columnName.optional(),
});

export const incidentColumnsSchema = z.object({
  serial: columnName,
  incidentDate: columnName,
  description: columnName.optional(),
});

export const returnColumnsSchema = z.object({
  serial: columnName,
  returnDate: columnName,
  rmaId: columnName.optional(),
});

export const columnMappingSchema = z.object({
  installations: installationColumnsSchema,
  incidents: incidentColumnsSchema,
  returns: returnColumnsSchema,
});

export type InstallationColumns = z.infer<typeof installationColumnsSchema>;
export type IncidentColumns = z.infer<typeof incidentColumnsSchema>;
export type ReturnColumns = z.infer<typeof returnColumnsSchema>;
export type ColumnMapping = z.infer<typeof columnMappingSchema>;

// ============== DATE NORMALIZATION ==============

/**
 * Candidate patterns in date-fns token syntax. Order is the priority order:
 * ISO-8601 first, then day-first, then month-first, then dot-separated.
 */
export const DEFAULT_DATE_FORMATS = [
  "yyyy-MM-dd",
  "yyyy-MM-dd HH:mm:ss",
  "yyyy-MM-dd HH:mm:ss.SSS",
  "yyyy-MM-dd HH:mm:ss.SSSSSS",
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy/MM/dd",
  "dd/MM/yyyy",
  "dd-MM-yyyy",
  "dd/MM/yyyy HH:mm",
  "MM/dd/yyyy",
  "MM-dd-yyyy",
  "dd.MM.yyyy",
  "MM.dd.yyyy",
  "yyyy.MM.dd",
];

export const dateOptionsSchema = z
  .object({
    formats: z.array(z.string().min(1)).min(1).default(DEFAULT_DATE_FORMATS),
    excelSerialDates: z.boolean().default(true),
    permissiveFallback: z.boolean().default(true),
    resolution: z.enum(["cell", "column"]).default("cell"),
    plausibleYears: z
      .object({
        min: z.number().int().default(1900),
        max: z.number().int().default(2100),
      })
      .default({}),
  })
  .refine((o) => o.plausibleYears.min <= o.plausibleYears.max, {
    message: "plausibleYears.min must not exceed plausibleYears.max",
    path: ["plausibleYears"],
  });
export type DateOptions = z.infer<typeof dateOptionsSchema>;

// ============== SERIAL CODE RULES ==============

const digitRange = z.tuple([z.number().int().min(0), z.number().int().min(1)]);

export const serialCodeRulesSchema = z
  .object({
    length: z.number().int().min(4).default(7),
    monthDigits: digitRange.default([0, 2]),
    yearDigits: digitRange.default([2, 4]),
    yearWindow: z
      .object({
        min: z.number().int().min(0).max(99).default(17),
        max: z.number().int().min(0).max(99).default(26),
      })
      .default({}),
    century: z.number().int().default(2000),
    padNumeric: z.boolean().default(false),
  })
  .refine((r) => r.yearWindow.min <= r.yearWindow.max, {
    message: "yearWindow.min must not exceed yearWindow.max",
    path: ["yearWindow"],
  })
  .refine(
    (r) =>
      [r.monthDigits, r.yearDigits].every(([start, end]) => start < end && end <= r.length),
    { message: "monthDigits and yearDigits must be ranges inside the serial length" }
  );
export type SerialCodeRules = z.infer<typeof serialCodeRulesSchema>;

// ============== PIPELINE ==============

export const DEVICE_KEY_FIELDS = ["model", "serial", "subsidiary", "countryRef"] as const;
export const deviceKeyFieldSchema = z.enum(DEVICE_KEY_FIELDS);
export type DeviceKeyField = z.infer<typeof deviceKeyFieldSchema>;

export const AGGREGATE_DIMENSIONS = [
  "model",
  "subsidiary",
  "countryRef",
  "serialStatus",
  "installationMonth",
] as const;
export const aggregateDimensionSchema = z.enum(AGGREGATE_DIMENSIONS);
export type AggregateDimension = z.infer<typeof aggregateDimensionSchema>;

/** Grouping fields for the incident table, one row per reported incident. */
export const INCIDENT_DIMENSIONS = ["incidentMonth", "incidentYear", "description", "model", "subsidiary"] as const;
export const incidentDimensionSchema = z.enum(INCIDENT_DIMENSIONS);
export type IncidentDimension = z.infer<typeof incidentDimensionSchema>;

export const metricUnitSchema = z.enum(["days", "months"]);
export type MetricUnit = z.infer<typeof metricUnitSchema>;

export const metricsOptionsSchema = z
  .object({
    ttfIncidentDate: z.enum(["last", "first"]).default("last"),
    fabricationDateFallback: z.enum(["serial", "none"]).default("serial"),
  })
  .default({});
export type MetricsOptions = z.infer<typeof metricsOptionsSchema>;

export const longTailOptionsSchema = z
  .object({
    enabled: z.boolean().default(false),
    threshold: z.number().min(0).max(1).default(0.02),
    minBuckets: z.number().int().min(0).default(10),
    label: z.string().min(1).default("Other"),
  })
  .default({});
export type LongTailOptions = z.infer<typeof longTailOptionsSchema>;

export const incidentAggregationOptionsSchema = z
  .object({
    dimensions: z
      .array(z.array(incidentDimensionSchema).min(1))
      .default([["incidentMonth"], ["description"]]),
    /** Keep only the first N buckets of each grouping. */
    top: z.number().int().min(1).nullable().default(null),
  })
  .default({});
export type IncidentAggregationOptions = z.infer<typeof incidentAggregationOptionsSchema>;

export const aggregationOptionsSchema = z
  .object({
    dimensions: z
      .array(z.array(aggregateDimensionSchema).min(1))
      .default([["model"], ["subsidiary"]]),
    ageBasis: z.enum(["fabrication", "installation"]).default("fabrication"),
    unit: metricUnitSchema.default("days"),
    longTail: longTailOptionsSchema,
    incidents: incidentAggregationOptionsSchema,
  })
  .default({});
export type AggregationOptions = z.infer<typeof aggregationOptionsSchema>;

export const pipelineConfigSchema = z.object({
  columns: columnMappingSchema,
  dates: dateOptionsSchema.default({}),
  serialCode: serialCodeRulesSchema.default({}),
  dedupeKey: z.array(deviceKeyFieldSchema).min(1).default(["model", "serial"]),
  metrics: metricsOptionsSchema,
  aggregation: aggregationOptionsSchema,
});

export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;
export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

// ============== APPLICATION (ADAPTERS) ==============

export const sheetNamesSchema = z.object({
  installations: z.string().min(1),
  incidents: z.string().min(1),
  returns: z.string().min(1),
});
export type SheetNames = z.infer<typeof sheetNamesSchema>;

export const lifecycleAppConfigSchema = z.object({
  sheets: sheetNamesSchema,
  pipeline: pipelineConfigSchema,
});
export type LifecycleAppConfig = z.infer<typeof lifecycleAppConfigSchema>;
