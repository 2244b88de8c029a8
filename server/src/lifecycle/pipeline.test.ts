/**
 * Lifecycle pipeline tests
 *
 * End-to-end runs over small in-memory tables: date cleanup, serial decoding,
 * merge, dedupe, metrics and aggregation in one pass.
 */

import { describe, it, expect } from "vitest";
import type { PipelineConfigInput, SourceTables } from "@shared/schema";
import { ConfigurationError, SourceTableError } from "./errors";
import { fixedClock } from "./engines/metricsCalculator";
import { LifecyclePipeline, normalizeTableDates, runLifecyclePipeline } from "./pipeline";
import { PipelineCache } from "./pipelineCache";
import type { ReferenceClock } from "./lifecycleContract";

const config: PipelineConfigInput = {
  columns: {
    installations: {
      serial: "no de série",
      model: "modèle",
      subsidiary: "filiale",
      installationDate: "date d'installation",
      lastConnectionDate: "dernière connexion",
    },
    incidents: { serial: "no de série", incidentDate: "date d'incidents", description: "incident" },
    returns: { serial: "no de série", returnDate: "date de retour", rmaId: "RMA" },
  },
  aggregation: {
    dimensions: [["model"], ["model", "subsidiary"]],
    incidents: { dimensions: [["incidentMonth"], ["subsidiary", "model"]] },
  },
};

function sourceTables(): SourceTables {
  return {
    installations: {
      columns: ["no de série", "modèle", "filiale", "date d'installation", "dernière connexion"],
      rows: [
        { "no de série": "0118001", modèle: "M1", filiale: "FR", "date d'installation": "01/02/2018", "dernière connexion": "2020-12-01" },
        { "no de série": "0219002", modèle: "M2", filiale: "DE", "date d'installation": 43466, "dernière connexion": null },
        { "no de série": "0320003", modèle: "M1", filiale: "FR", "date d'installation": "2020-04-01", "dernière connexion": null },
        { "no de série": "0118001", modèle: "M1", filiale: "IT", "date d'installation": "2018-03-01", "dernière connexion": null },
        { "no de série": "1399004", modèle: "M3", filiale: "FR", "date d'installation": "garbage", "dernière connexion": null },
      ],
    },
    incidents: {
      columns: ["no de série", "date d'incidents", "incident"],
      rows: [
        { "no de série": "0118001", "date d'incidents": "2019-06-01", incident: "screen" },
        { "no de série": "0320003", "date d'incidents": "2020-05-01", incident: "a" },
        { "no de série": "0320003", "date d'incidents": "2020-06-01", incident: "b" },
        { "no de série": "0320003", "date d'incidents": "2020-07-01", incident: "c" },
        { "no de série": "5555555", "date d'incidents": "2020-01-01", incident: "stray" },
      ],
    },
    returns: {
      columns: ["no de série", "date de retour", "RMA"],
      rows: [{ "no de série": "0219002", "date de retour": "2019-09-01", RMA: "RMA-1" }],
    },
  };
}

const clock = fixedClock("2021-01-01");

describe("LifecyclePipeline", () => {
  const result = runLifecyclePipeline(sourceTables(), config, clock);

  it("keeps one row per distinct (model, serial)", () => {
    expect(result.records.map((r) => r.serial)).toEqual(["0118001", "0219002", "0320003", "1399004"]);
    expect(result.records[0].subsidiary).toBe("FR");
    expect(result.report.dedupe).toEqual({ inputRows: 5, removedCount: 1, duplicateKeyCount: 1 });
  });

  it("measures time to failure from the installation date", () => {
    const device = result.records[0];
    expect(device.serialCode.derivedFabricationDate).toBe("2018-01-01");
    expect(device.installationDate).toBe("2018-02-01");
    expect(device.metrics.ttfReference).toBe("installation");
    expect(device.metrics.timeToFailureDays).toBe(485);
    expect(device.metrics.inactivityDays).toBe(31);
  });

  it("leaves time to failure empty for a device without incidents", () => {
    const device = result.records[1];
    expect(device.installationDate).toBe("2019-01-01");
    expect(device.metrics.timeToFailureDays).toBeNull();
    expect(device.metrics.incidentWithoutReturn).toBe(false);
    expect(device.returns.lastRmaId).toBe("RMA-1");
  });

  it("collapses several incidents onto one device row", () => {
    const device = result.records[2];
    expect(device.incidents.incidentCount).toBe(3);
    expect(device.returns.returnCount).toBe(0);
    expect(device.metrics.incidentWithoutReturn).toBe(true);
    expect(device.incidents.lastIncidentDate).toBe("2020-07-01");
    expect(device.metrics.timeToFailureDays).toBe(91);
    expect(result.table.rows.filter((row) => row["no de série"] === "0320003")).toHaveLength(1);
  });

  it("measures time to failure to the latest of several incidents", () => {
    const tables = sourceTables();
    tables.incidents.rows.push({ "no de série": "0118001", "date d'incidents": "2018-03-01", incident: "early" });

    const device = runLifecyclePipeline(tables, config, clock).records[0];
    expect(device.incidents.firstIncidentDate).toBe("2018-03-01");
    expect(device.incidents.lastIncidentDate).toBe("2019-06-01");
    expect(device.metrics.timeToFailureDays).toBe(485);
  });

  it("can measure time to failure to the first incident", () => {
    const first = runLifecyclePipeline(sourceTables(), { ...config, metrics: { ttfIncidentDate: "first" } }, clock);
    expect(first.records[2].metrics.timeToFailureDays).toBe(30);
  });

  it("keeps devices with invalid serials and unreadable dates", () => {
    const device = result.records[3];
    expect(device.serialCode.validity).toEqual({ status: "invalid", reason: "month" });
    expect(device.installationDate).toBeNull();
    expect(result.report.serials).toEqual({ valid: 3, invalid: { length: 0, month: 1, "year-window": 0 } });
  });

  it("reports date parsing per mapped column", () => {
    const installed = result.report.dateColumns.find((r) => r.column === "date d'installation");
    expect(installed).toMatchObject({
      source: "installations",
      field: "installationDate",
      total: 5,
      parsed: 4,
      missing: 0,
      invalid: 1,
      invalidSamples: ["garbage"],
    });
    expect(installed?.patternUsage).toEqual({ "dd/MM/yyyy": 1, "excel-serial": 1, "yyyy-MM-dd": 2 });
    expect(result.report.dateColumns.map((r) => `${r.source}.${r.field}`)).toEqual([
      "installations.installationDate",
      "installations.lastConnectionDate",
      "incidents.incidentDate",
      "returns.returnDate",
    ]);
  });

  it("reports merge statistics", () => {
    expect(result.report.merge).toMatchObject({
      installationRows: 5,
      incidentRows: 5,
      returnRows: 1,
      devicesWithIncidents: 3,
      devicesWithReturns: 1,
      multiIncidentSerials: 1,
      unmatchedIncidentSerials: ["5555555"],
      unmatchedReturnSerials: [],
    });
  });

  it("summarizes the fleet", () => {
    expect(result.summary).toMatchObject({
      deviceCount: 4,
      devicesWithIncidents: 2,
      devicesReturned: 1,
      incidentRate: 0.5,
      returnRate: 0.25,
      ttfCount: 2,
      meanTtf: 288,
      validSerialCount: 3,
    });
  });

  it("logs every fleet-level calculation", () => {
    const log = result.report.calculationLog;
    expect(log.map((e) => e.calculationId)).toEqual([
      "CALC_TIME_TO_FAILURE",
      "CALC_AGE_SINCE_INSTALLATION",
      "CALC_AGE_SINCE_FABRICATION",
      "CALC_STOCK_DURATION",
      "CALC_INACTIVITY",
      "CALC_MEAN_TTF",
      "CALC_INCIDENT_RATE",
      "CALC_RETURN_RATE",
    ]);
    expect(log[0]).toEqual({
      calculationId: "CALC_TIME_TO_FAILURE",
      formula: "incident_date - COALESCE(installation_date, fabrication_date) // days",
      inputs: { anomalous_ttf: 0, devices_with_value: 2 },
      output: 288,
      outputUnit: "days",
    });
    expect(log[1].inputs).toEqual({ reference_date: "2021-01-01", devices_with_value: 3 });
    expect(log[1].output).toBeCloseTo(2071 / 3, 10);
    expect(log[4].output).toBe(31);
    expect(log.slice(5).map((e) => e.output)).toEqual([288, 0.5, 0.25]);
  });

  it("aggregates on every configured dimension list", () => {
    expect(result.aggregates.map((a) => a.dimensions)).toEqual([["model"], ["model", "subsidiary"]]);
    const m1 = result.aggregates[0].buckets[0];
    expect(m1.groupKey).toEqual(["M1"]);
    expect(m1.count).toBe(2);
    expect(m1.meanTtf).toBe(288);
  });

  it("groups incident rows by month and by subsidiary and model", () => {
    expect(result.incidentAggregates.map((a) => a.dimensions)).toEqual([["incidentMonth"], ["subsidiary", "model"]]);
    expect(result.incidentAggregates[0].buckets.map((b) => b.groupKey[0])).toEqual([
      "2019-06",
      "2020-01",
      "2020-05",
      "2020-06",
      "2020-07",
    ]);
    expect(result.incidentAggregates[1].buckets).toEqual([
      { groupKey: ["FR", "M1"], incidentCount: 4, deviceCount: 2, unmatchedCount: 0, share: 0.8 },
      { groupKey: [null, null], incidentCount: 1, deviceCount: 1, unmatchedCount: 1, share: 0.2 },
    ]);
  });

  it("flattens records into the installation columns plus derived ones", () => {
    expect(result.table.columns.slice(0, 6)).toEqual([
      "no de série",
      "modèle",
      "filiale",
      "date d'installation",
      "dernière connexion",
      "serialDigits",
    ]);
    expect(result.table.rows[0]).toMatchObject({
      "no de série": "0118001",
      "date d'installation": "2018-02-01",
      incidentCount: 1,
      timeToFailureDays: 485,
      serialStatus: "valid",
      serialInvalidReason: null,
    });
    expect(result.report.columnCollisions).toEqual([]);
  });

  it("reads the clock once and measures every record to that date", () => {
    let reads = 0;
    const midnight: ReferenceClock = { today: () => (reads++ === 0 ? "2021-01-01" : "2021-01-02") };

    const run = runLifecyclePipeline(sourceTables(), config, midnight);
    expect(reads).toBe(1);
    expect(run.report.referenceDate).toBe("2021-01-01");
    expect(run.records.map((r) => r.metrics.ageSinceInstallationDays)).toEqual([1065, 731, 275, null]);
  });

  it("does not modify the caller's tables", () => {
    const tables = sourceTables();
    runLifecyclePipeline(tables, config, clock);
    expect(tables).toEqual(sourceTables());
  });

  it("renames derived columns that clash with installation columns", () => {
    const tables = sourceTables();
    tables.installations.columns.push("incidentCount");
    tables.installations.rows = tables.installations.rows.map((row) => ({ ...row, incidentCount: "legacy" }));

    const run = runLifecyclePipeline(tables, config, clock);
    expect(run.report.columnCollisions).toEqual([{ column: "incidentCount", renamedTo: "incidentCount_incident" }]);
    expect(run.table.rows[0]).toMatchObject({ incidentCount: "legacy", incidentCount_incident: 1 });
  });
});

describe("LifecyclePipeline failures", () => {
  it("aborts on a mapped column the tables lack", () => {
    const tables = sourceTables();
    tables.returns.columns = ["no de série", "date de retour"];
    tables.returns.rows = [];

    expect(() => runLifecyclePipeline(tables, config, clock)).toThrow(ConfigurationError);
  });

  it("aborts on a malformed table", () => {
    expect(() => runLifecyclePipeline({ installations: [], incidents: [], returns: [] }, config, clock)).toThrow(
      SourceTableError
    );
  });

  it("rejects an invalid configuration at construction", () => {
    expect(() => new LifecyclePipeline({ columns: {} }, clock)).toThrow(ConfigurationError);
  });

  it("runs over empty tables", () => {
    const tables = sourceTables();
    tables.installations.rows = [];
    tables.incidents.rows = [];
    tables.returns.rows = [];

    const run = runLifecyclePipeline(tables, config, clock);
    expect(run.records).toEqual([]);
    expect(run.summary.incidentRate).toBeNull();
    expect(run.aggregates[0].buckets).toEqual([]);
  });
});

describe("LifecyclePipeline cache", () => {
  it("returns the cached result for identical input", () => {
    const cache = new PipelineCache();
    const pipeline = new LifecyclePipeline(config, clock, cache);

    const first = pipeline.run(sourceTables());
    const second = pipeline.run(sourceTables());
    expect(second).toBe(first);
    expect(cache.size).toBe(1);
  });

  it("runs again when the reference date changes", () => {
    const cache = new PipelineCache();
    const first = new LifecyclePipeline(config, clock, cache).run(sourceTables());
    const later = new LifecyclePipeline(config, fixedClock("2021-02-01"), cache).run(sourceTables());

    expect(later).not.toBe(first);
    expect(later.records[0].metrics.inactivityDays).toBe(62);
    expect(cache.size).toBe(2);
  });
});

describe("normalizeTableDates", () => {
  it("rewrites only the listed columns", () => {
    const tables = sourceTables();
    const { tables: next, reports } = normalizeTableDates(
      tables,
      [{ source: "installations", field: "installationDate", column: "date d'installation" }],
      { formats: ["dd/MM/yyyy"], excelSerialDates: false, permissiveFallback: false, resolution: "cell", plausibleYears: { min: 1900, max: 2100 } }
    );

    expect(next.installations.rows.map((r) => r["date d'installation"])).toEqual(["2018-02-01", null, null, null, null]);
    expect(next.installations.rows[0]["dernière connexion"]).toBe("2020-12-01");
    expect(reports[0].invalid).toBe(4);
    expect(tables.installations.rows[0]["date d'installation"]).toBe("01/02/2018");
  });
});
