import crypto from "crypto";
import type { PipelineConfig, SourceTables } from "@shared/schema";
import type { IsoDate, LifecycleRunResult } from "./lifecycleContract";

export function sha256Hex(input: string): string {
  return crypto.createHash("sha256").update(input).digest("hex");
}

/**
 * JSON with object keys sorted at every depth, so equal content always
 * hashes the same regardless of key insertion order.
 */
export function stableStringify(value: unknown): string {
  if (value instanceof Date) {
    return `{"$date":${value.getTime()}}`;
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(",")}}`;
  }
  return JSON.stringify(value ?? null);
}

export function fingerprintRun(tables: SourceTables, config: PipelineConfig, referenceDate: IsoDate): string {
  return sha256Hex(stableStringify({ tables, config, referenceDate }));
}

/**
 * Results of previous runs keyed by input fingerprint. Oldest entry goes
 * first once capacity is reached.
 */
export class PipelineCache {
  private readonly entries = new Map<string, LifecycleRunResult>();

  constructor(private readonly capacity = 16) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`PipelineCache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get(fingerprint: string): LifecycleRunResult | undefined {
    return this.entries.get(fingerprint);
  }

  set(fingerprint: string, result: LifecycleRunResult): void {
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, result);
    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}
