import * as XLSX from "xlsx";
import type { CellValue, SheetNames, SourceName, SourceTable, SourceTables } from "@shared/schema";
import { SourceTableError } from "./src/lifecycle/errors";

export type TableFileType = "csv" | "xlsx";

export function detectFileType(filename: string): TableFileType | null {
  const ext = filename.toLowerCase().split(".").pop();
  if (ext === "xlsx" || ext === "xls") return "xlsx";
  if (ext === "csv") return "csv";
  return null;
}

function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (value instanceof Date) return isNaN(value.getTime()) ? null : value;
  return String(value);
}

function headerNames(header: unknown[]): string[] {
  const seen = new Map<string, number>();
  return header.map((cell, i) => {
    const base = cell === null || cell === undefined || String(cell).trim() === "" ? `column_${i + 1}` : String(cell).trim();
    const n = seen.get(base) ?? 0;
    seen.set(base, n + 1);
    return n === 0 ? base : `${base}_${n + 1}`;
  });
}

function tableFromMatrix(matrix: unknown[][]): SourceTable {
  const [header = [], ...body] = matrix;
  const columns = headerNames(header);
  const rows = body.map((values) => {
    const row: Record<string, CellValue> = {};
    columns.forEach((column, j) => {
      row[column] = toCell(values[j]);
    });
    return row;
  });
  return { columns, rows };
}

function readWorkbook(buffer: Buffer, source: SourceName | null): XLSX.WorkBook {
  try {
    return XLSX.read(buffer, { type: "buffer", cellDates: true });
  } catch (error) {
    throw new SourceTableError(
      `Failed to read workbook: ${error instanceof Error ? error.message : "Unknown error"}`,
      source
    );
  }
}

function sheetTable(workbook: XLSX.WorkBook, sheetName: string, source: SourceName): SourceTable {
  const worksheet = workbook.Sheets[sheetName];
  if (!worksheet) {
    throw new SourceTableError(
      `Sheet "${sheetName}" not found for ${source} (available: ${workbook.SheetNames.join(", ")})`,
      source
    );
  }
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(worksheet, {
    header: 1,
    raw: true,
    defval: null,
    blankrows: false,
  });
  return tableFromMatrix(matrix);
}

/**
 * Reads the installation, incident and return sheets of a single workbook.
 */
export function parseWorkbook(buffer: Buffer, sheets: SheetNames): SourceTables {
  const workbook = readWorkbook(buffer, null);
  return {
    installations: sheetTable(workbook, sheets.installations, "installations"),
    incidents: sheetTable(workbook, sheets.incidents, "incidents"),
    returns: sheetTable(workbook, sheets.returns, "returns"),
  };
}

/**
 * Reads one source table from a CSV file or from the first sheet of a workbook.
 */
export function parseTableFile(buffer: Buffer, filename: string, source: SourceName): SourceTable {
  const fileType = detectFileType(filename);
  if (fileType === "csv") return parseCsvTable(buffer, source);
  if (fileType === "xlsx") {
    const workbook = readWorkbook(buffer, source);
    const firstSheet = workbook.SheetNames[0];
    if (!firstSheet) throw new SourceTableError(`No sheets found in ${filename}`, source);
    return sheetTable(workbook, firstSheet, source);
  }
  throw new SourceTableError(`Unsupported file type for ${filename}. Use CSV or XLSX.`, source);
}

export function parseCsvTable(buffer: Buffer, source: SourceName): SourceTable {
  const content = buffer.toString("utf-8").replace(/^\uFEFF/, "");
  const lines = content.split(/\r?\n/).filter((line) => line.trim().length > 0);

  if (lines.length === 0) {
    return { columns: [], rows: [] };
  }

  const [headerLine, ...bodyLines] = lines;
  const delimiter = headerLine.includes(";") && !headerLine.includes(",") ? ";" : ",";
  const header = parseCSVLine(headerLine, delimiter);
  const errors: string[] = [];
  const matrix: unknown[][] = [header];

  bodyLines.forEach((line, i) => {
    const values = parseCSVLine(line, delimiter);
    if (values.length !== header.length) {
      errors.push(`Row ${i + 2}: Column count mismatch (expected ${header.length}, got ${values.length})`);
      return;
    }
    matrix.push(values.map((v) => (v === "" ? null : v)));
  });

  if (errors.length > 0) {
    throw new SourceTableError(`Malformed CSV for ${source}`, source, errors);
  }
  return tableFromMatrix(matrix);
}

function parseCSVLine(line: string, delimiter: string): string[] {
  const result: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    const nextChar = line[i + 1];

    if (char === '"' && !inQuotes) {
      inQuotes = true;
    } else if (char === '"' && inQuotes) {
      if (nextChar === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = false;
      }
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}
