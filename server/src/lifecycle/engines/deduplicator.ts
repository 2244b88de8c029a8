/**
 * DEDUPLICATOR
 *
 * Survivor rule: stable sort by serial (code-point order), then keep the
 * first row per key tuple. Rows sharing a serial keep their input order, so
 * the survivor is the earliest installation row for that key.
 */

import type { DeviceKeyField } from "@shared/schema";
import type { DedupeReport, DeviceRecord } from "../lifecycleContract";

export interface DedupeResult<T> {
  records: T[];
  removedCount: number;
  report: DedupeReport;
}

function compareSerial(a: DeviceRecord, b: DeviceRecord): number {
  if (a.serial < b.serial) return -1;
  if (a.serial > b.serial) return 1;
  return 0;
}

export function dedupeKeyOf(record: DeviceRecord, key: DeviceKeyField[]): string {
  return JSON.stringify(key.map((field) => record[field]));
}

export function dedupeRecords<T extends DeviceRecord>(
  records: T[],
  key: DeviceKeyField[] = ["model", "serial"]
): DedupeResult<T> {
  const sorted = [...records].sort(compareSerial);
  const seen = new Map<string, number>();
  const kept: T[] = [];

  for (const record of sorted) {
    const k = dedupeKeyOf(record, key);
    const occurrences = seen.get(k) ?? 0;
    if (occurrences === 0) kept.push(record);
    seen.set(k, occurrences + 1);
  }

  let duplicateKeyCount = 0;
  seen.forEach((n) => {
    if (n > 1) duplicateKeyCount++;
  });

  const removedCount = records.length - kept.length;
  return {
    records: kept,
    removedCount,
    report: { inputRows: records.length, removedCount, duplicateKeyCount },
  };
}
