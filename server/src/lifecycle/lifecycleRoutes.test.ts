/**
 * Lifecycle API tests
 *
 * Runs the real express router on an ephemeral local port and talks to it
 * with fetch + multipart uploads.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import express from "express";
import { createServer, type Server } from "http";
import * as XLSX from "xlsx";
import { registerRoutes } from "../../routes";
import { DEFAULT_CONFIG_PATH, loadLifecycleAppConfig } from "../../lifecycle-config";

const appConfig = loadLifecycleAppConfig(DEFAULT_CONFIG_PATH);

function workbookBlob(sheets: Record<string, unknown[][]>): Blob {
  const workbook = XLSX.utils.book_new();
  for (const [name, matrix] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.aoa_to_sheet(matrix), name);
  }
  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  return new Blob([new Uint8Array(buffer)]);
}

const installationsSheet = [
  ["no de série", "modèle", "filiale", "date d'installation", "dernière connexion"],
  ["0118001", "M1", "FR", "2018-02-01", "2019-12-01"],
  ["0219002", "M2", "DE", "01/03/2019", null],
];
const incidentsSheet = [
  ["no de série", "date d'incidents", "incident"],
  ["0118001", "2019-06-01", "screen"],
];
const returnsSheet = [["no de série", "date de retour", "RMA"]];

function fleetForm(extra: Record<string, string> = {}): FormData {
  const form = new FormData();
  form.append("file", workbookBlob({ Feuil1: installationsSheet, Feuil2: incidentsSheet, Feuil3: returnsSheet }), "parc.xlsx");
  for (const [key, value] of Object.entries(extra)) form.append(key, value);
  return form;
}

let server: Server;
let baseUrl = "";

beforeAll(async () => {
  const app = express();
  server = createServer(app);
  await registerRoutes(server, app, appConfig);
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no TCP address");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

describe("POST /api/lifecycle/analyze", () => {
  it("analyzes a three-sheet workbook", async () => {
    const res = await fetch(`${baseUrl}/api/lifecycle/analyze`, {
      method: "POST",
      body: fleetForm({ referenceDate: "2020-01-01" }),
    });

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({
      summary: { deviceCount: 2, devicesWithIncidents: 1, incidentRate: 0.5, unit: "months" },
      report: { referenceDate: "2020-01-01", dedupe: { removedCount: 0 } },
      rows: [
        { "no de série": "0118001", timeToFailureDays: 485, incidentWithoutReturn: true },
        { "no de série": "0219002", "date d'installation": "2019-03-01", timeToFailureDays: null },
      ],
    });
  });

  it("accepts one file per source", async () => {
    const form = new FormData();
    form.append("installations", new Blob(["no de série;modèle;filiale;date d'installation;dernière connexion\n0118001;M1;FR;01/02/2018;\n"]), "parc.csv");
    form.append("incidents", new Blob(["no de série;date d'incidents;incident\n0118001;01/06/2019;écran\n"]), "incidents.csv");
    form.append("returns", workbookBlob({ Retours: returnsSheet }), "retours.xlsx");
    form.append("referenceDate", "2020-01-01");

    const res = await fetch(`${baseUrl}/api/lifecycle/analyze`, { method: "POST", body: form });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      summary: { deviceCount: 1, devicesWithIncidents: 1 },
      rows: [{ "date d'installation": "2018-02-01", firstIncidentDate: "2019-06-01", timeToFailureDays: 485 }],
    });
  });

  it("applies a configuration override", async () => {
    const res = await fetch(`${baseUrl}/api/lifecycle/analyze`, {
      method: "POST",
      body: fleetForm({ referenceDate: "2020-01-01", config: JSON.stringify({ aggregation: { dimensions: [["subsidiary"]] } }) }),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      summary: { unit: "days" },
      aggregates: [{ dimensions: ["subsidiary"], buckets: [{ groupKey: ["DE"] }, { groupKey: ["FR"] }] }],
    });
  });

  it("answers 422 with the missing fields", async () => {
    const override = { columns: { ...appConfig.pipeline.columns, returns: { serial: "no de série", returnDate: "retour" } } };
    const res = await fetch(`${baseUrl}/api/lifecycle/analyze`, {
      method: "POST",
      body: fleetForm({ config: JSON.stringify(override) }),
    });

    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({
      code: "CONFIGURATION_ERROR",
      missingFields: [{ source: "returns", field: "returnDate", column: "retour" }],
    });
  });

  it("answers 400 without files", async () => {
    const form = new FormData();
    form.append("referenceDate", "2020-01-01");
    const res = await fetch(`${baseUrl}/api/lifecycle/analyze`, { method: "POST", body: form });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "MISSING_FILES" });
  });

  it("answers 400 for a malformed override or reference date", async () => {
    const badJson = await fetch(`${baseUrl}/api/lifecycle/analyze`, { method: "POST", body: fleetForm({ config: "{" }) });
    expect(badJson.status).toBe(400);
    expect(await badJson.json()).toMatchObject({ code: "INVALID_CONFIG_JSON" });

    const badDate = await fetch(`${baseUrl}/api/lifecycle/analyze`, {
      method: "POST",
      body: fleetForm({ referenceDate: "01/01/2020" }),
    });
    expect(badDate.status).toBe(400);
    expect(await badDate.json()).toMatchObject({ code: "INVALID_REFERENCE_DATE" });
  });

  it("answers 400 when a sheet is missing", async () => {
    const form = new FormData();
    form.append("file", workbookBlob({ Feuil1: installationsSheet }), "parc.xlsx");
    const res = await fetch(`${baseUrl}/api/lifecycle/analyze`, { method: "POST", body: form });

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: "SOURCE_TABLE_ERROR", source: "incidents" });
  });
});

describe("POST /api/lifecycle/export", () => {
  it("returns an xlsx workbook", async () => {
    const res = await fetch(`${baseUrl}/api/lifecycle/export`, {
      method: "POST",
      body: fleetForm({ referenceDate: "2020-01-01" }),
    });

    expect(res.status).toBe(200);
    expect(res.headers.get("content-disposition")).toBe('attachment; filename="device-lifecycle-2020-01-01.xlsx"');
    const workbook = XLSX.read(Buffer.from(await res.arrayBuffer()), { type: "buffer" });
    expect(workbook.SheetNames).toEqual([
      "Devices",
      "Summary",
      "By model",
      "By subsidiary",
      "By model x subsidiary",
      "Incidents by incidentMonth",
      "Incidents by description",
      "Incidents by subsidiary x model",
      "Date report",
    ]);
  });
});

describe("GET /api/health", () => {
  it("reports a healthy service", async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "healthy" });
  });
});
