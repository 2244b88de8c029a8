import { describe, it, expect } from "vitest";
import type { SourceTables } from "@shared/schema";
import { parsePipelineConfig, resolveColumnMapping, validateSourceTables } from "./config";
import { ConfigurationError, SourceTableError } from "./errors";

const columns = {
  installations: {
    serial: "serial",
    model: "model",
    subsidiary: "subsidiary",
    installationDate: "installed",
    lastConnectionDate: "seen",
  },
  incidents: { serial: "serial", incidentDate: "date" },
  returns: { serial: "serial", returnDate: "date", rmaId: "rma" },
};

const tables: SourceTables = {
  installations: { columns: ["serial", "model", "subsidiary", "installed", "seen"], rows: [] },
  incidents: { columns: ["serial", "date"], rows: [] },
  returns: { columns: ["serial", "date", "rma"], rows: [] },
};

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to throw");
}

describe("parsePipelineConfig", () => {
  it("fills defaults around the column mapping", () => {
    const config = parsePipelineConfig({ columns });

    expect(config.dedupeKey).toEqual(["model", "serial"]);
    expect(config.dates.resolution).toBe("cell");
    expect(config.serialCode.length).toBe(7);
    expect(config.serialCode.yearWindow).toEqual({ min: 17, max: 26 });
    expect(config.metrics).toEqual({ ttfIncidentDate: "last", fabricationDateFallback: "serial" });
    expect(config.aggregation.dimensions).toEqual([["model"], ["subsidiary"]]);
    expect(config.aggregation.longTail.enabled).toBe(false);
  });

  it("rejects a configuration without required mappings", () => {
    const error = thrown(() =>
      parsePipelineConfig({ columns: { ...columns, incidents: { serial: "serial" } } })
    );
    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof ConfigurationError)) return;
    expect(error.issues).toEqual(["columns.incidents.incidentDate: Required"]);
  });

  it("rejects an inverted year window", () => {
    expect(() => parsePipelineConfig({ columns, serialCode: { yearWindow: { min: 30, max: 20 } } })).toThrow(
      ConfigurationError
    );
  });

  it("rejects date patterns date-fns cannot use", () => {
    const error = thrown(() => parsePipelineConfig({ columns, dates: { formats: ["DD/MM/YYYY"] } }));
    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof ConfigurationError)) return;
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toContain('"DD/MM/YYYY"');
  });
});

describe("resolveColumnMapping", () => {
  it("lists the mapped date columns per source", () => {
    const resolved = resolveColumnMapping(parsePipelineConfig({ columns }).columns, tables);
    expect(resolved.dateColumns).toEqual([
      { source: "installations", field: "installationDate", column: "installed" },
      { source: "installations", field: "lastConnectionDate", column: "seen" },
      { source: "incidents", field: "incidentDate", column: "date" },
      { source: "returns", field: "returnDate", column: "date" },
    ]);
  });

  it("reports every missing column at once", () => {
    const partial: SourceTables = {
      ...tables,
      installations: { columns: ["serial", "subsidiary", "installed", "seen"], rows: [] },
      returns: { columns: ["serial", "date"], rows: [] },
    };
    const error = thrown(() => resolveColumnMapping(parsePipelineConfig({ columns }).columns, partial));

    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof ConfigurationError)) return;
    expect(error.missingFields).toEqual([
      { source: "installations", field: "model", column: "model" },
      { source: "returns", field: "rmaId", column: "rma" },
    ]);
    expect(error.message).toBe(
      'Mapped columns missing from source tables: installations.model -> "model", returns.rmaId -> "rma"'
    );
  });
});

describe("validateSourceTables", () => {
  it("accepts typed cells", () => {
    const raw = {
      ...tables,
      installations: {
        columns: ["serial", "installed"],
        rows: [{ serial: 118001, installed: new Date(2020, 0, 1) }, { serial: "x", installed: null }],
      },
    };
    expect(validateSourceTables(raw).installations.rows).toHaveLength(2);
  });

  it("names the offending source", () => {
    const error = thrown(() => validateSourceTables({ ...tables, incidents: { columns: ["a"], rows: "nope" } }));
    expect(error).toBeInstanceOf(SourceTableError);
    if (!(error instanceof SourceTableError)) return;
    expect(error.source).toBe("incidents");
  });

  it("rejects duplicate column names", () => {
    const error = thrown(() => validateSourceTables({ ...tables, returns: { columns: ["a", "a"], rows: [] } }));
    expect(error).toBeInstanceOf(SourceTableError);
    if (!(error instanceof SourceTableError)) return;
    expect(error.issues).toEqual(['returns.columns: Duplicate column "a"']);
  });

  it("rejects a missing table", () => {
    const error = thrown(() => validateSourceTables({ installations: tables.installations, incidents: tables.incidents }));
    expect(error).toBeInstanceOf(SourceTableError);
    if (!(error instanceof SourceTableError)) return;
    expect(error.source).toBe("returns");
  });
});
