/**
 * Management provider for the container inventory class.
 *
 * Enumeration runs a full sweep and posts every record followed by OK. Reading
 * a single instance and every mutating operation are permanently unsupported.
 */

import { collectInventory } from "../inventory/collector.js";
import type { CollectOptions } from "../inventory/collector.js";
import type { InventoryRecord } from "../inventory/types.js";
import { logger } from "../logger.js";

export type ProviderResult = "OK" | "NOT_SUPPORTED" | "FAILED";

/** Per-request reply channel supplied by the host framework. */
export interface ProviderContext {
  post(record: InventoryRecord): void;
  result(code: ProviderResult): void;
}

export type Sweep = () => Promise<InventoryRecord[]>;

export class InventoryProvider {
  private readonly sweep: Sweep;

  constructor(sweepOrOptions: Sweep | CollectOptions = {}) {
    this.sweep =
      typeof sweepOrOptions === "function" ? sweepOrOptions : () => collectInventory(sweepOrOptions);
  }

  load(context: ProviderContext): void {
    context.result("OK");
  }

  unload(context: ProviderContext): void {
    context.result("OK");
  }

  async enumerateInstances(context: ProviderContext): Promise<void> {
    let records: InventoryRecord[];
    try {
      records = await this.sweep();
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      logger.error(`[provider] Enumeration failed: ${msg}`);
      context.result("FAILED");
      return;
    }
    for (const record of records) {
      context.post(record);
    }
    context.result("OK");
  }

  getInstance(context: ProviderContext): void {
    context.result("NOT_SUPPORTED");
  }

  createInstance(context: ProviderContext): void {
    context.result("NOT_SUPPORTED");
  }

  modifyInstance(context: ProviderContext): void {
    context.result("NOT_SUPPORTED");
  }

  deleteInstance(context: ProviderContext): void {
    context.result("NOT_SUPPORTED");
  }
}

/** Context that collects posted records, for callers that want them as an array. */
export class CollectingContext implements ProviderContext {
  readonly records: InventoryRecord[] = [];
  code: ProviderResult | null = null;

  post(record: InventoryRecord): void {
    this.records.push(record);
  }

  result(code: ProviderResult): void {
    this.code = code;
  }
}
