import { describe, expect, it } from "vitest";

import { createCatalogMatcher } from "@/catalog/matcher";
import { silentLogger } from "@/pipeline/logger";
import { processPriceRow, readQuantity, type PriceRowContext } from "@/pipeline/stages/importPriceSheet";
import type { ConflictMode, MappingSpec } from "@/pipeline/types";

import { MemoryCatalogStore } from "../support/memoryStores";

const mapping: MappingSpec = {
  nameColumn: "Name",
  dateColumn: "Date",
  quantityColumn: "Qty",
  valueGroups: [
    { column: "Acme", partner: "Acme", valueType: "bid" },
    { column: "Globex", partner: "Globex", valueType: "bid" },
  ],
};

function context(
  store: MemoryCatalogStore,
  overrides: { conflictMode?: ConflictMode; fallbackPeriod?: string | null } = {}
): PriceRowContext {
  return {
    catalog: store,
    matcher: createCatalogMatcher(store),
    mapping,
    conflictMode: overrides.conflictMode ?? "skip",
    fallbackPeriod: overrides.fallbackPeriod ?? null,
    matchThreshold: 90,
    taskId: "task-1",
    log: silentLogger,
    now: () => new Date(2025, 4, 20),
  };
}

function seedRecord(store: MemoryCatalogStore) {
  const entity = store.addEntity("Widget A", "widget a");
  store.addRecord({
    entityId: entity.id,
    partner: "Acme",
    period: "2024-03",
    value: 10,
    valueType: "bid",
    quantity: 1,
    note: null,
    source: null,
  });
  return entity;
}

describe("processPriceRow", () => {
  it("creates the entity and writes one record per value group", async () => {
    const store = new MemoryCatalogStore();

    const outcome = await processPriceRow(context(store), {
      Name: "Widget A (export)",
      Date: "2024-03-15",
      Qty: "2",
      Acme: "12.50",
      Globex: "¥13",
    });

    expect(outcome).toEqual({ kind: "success", inserted: 2, updated: 0, skipped: 0 });
    expect(store.entities).toHaveLength(1);
    expect(store.entities[0]).toMatchObject({ displayName: "Widget A (export)", normalizedKey: "widget a" });
    expect(store.records.map(({ partner, period, value, quantity, note, source }) => ({
      partner,
      period,
      value,
      quantity,
      note,
      source,
    }))).toEqual([
      { partner: "Acme", period: "2024-03", value: 12.5, quantity: 2, note: "imported 2025-05-20", source: "task-1" },
      { partner: "Globex", period: "2024-03", value: 13, quantity: 2, note: "imported 2025-05-20", source: "task-1" },
    ]);
  });

  it("excludes rows with a blank name", async () => {
    const store = new MemoryCatalogStore();

    const outcome = await processPriceRow(context(store), { Name: null, Acme: "5" });

    expect(outcome).toEqual({ kind: "excluded", reason: "blank_name" });
    expect(store.entities).toHaveLength(0);
  });

  it("fails rows whose name normalizes to nothing", async () => {
    const store = new MemoryCatalogStore();

    const outcome = await processPriceRow(context(store), { Name: "(sample)", Acme: "5" });

    expect(outcome).toEqual({
      kind: "rowError",
      reason: "name '(sample)' has no usable characters after normalization",
    });
  });

  it("rejects non-positive values before writing anything", async () => {
    const store = new MemoryCatalogStore();

    const outcome = await processPriceRow(context(store), { Name: "Widget A", Acme: "12", Globex: "-5" });

    expect(outcome).toEqual({ kind: "rowError", reason: "value for Globex must be greater than 0" });
    expect(store.entities).toHaveLength(0);
    expect(store.records).toHaveLength(0);
  });

  it("excludes rows without any usable value", async () => {
    const store = new MemoryCatalogStore();

    const outcome = await processPriceRow(context(store), { Name: "Widget A", Acme: "", Globex: "n/a" });

    expect(outcome).toEqual({ kind: "excluded", reason: "no_value" });
    expect(store.entities).toHaveLength(0);
  });

  it("leaves an existing value alone in skip mode", async () => {
    const store = new MemoryCatalogStore();
    seedRecord(store);

    const outcome = await processPriceRow(context(store), { Name: "widget a", Date: "2024-03-01", Acme: "12" });

    expect(outcome).toEqual({ kind: "excluded", reason: "no_write", skipped: 1 });
    expect(store.records).toHaveLength(1);
    expect(store.records[0]?.value).toBe(10);
  });

  it("replaces an existing value in overwrite mode", async () => {
    const store = new MemoryCatalogStore();
    seedRecord(store);

    const outcome = await processPriceRow(context(store, { conflictMode: "overwrite" }), {
      Name: "widget a",
      Date: "2024-03-01",
      Acme: "12",
    });

    expect(outcome).toEqual({ kind: "success", inserted: 0, updated: 1, skipped: 0 });
    expect(store.records).toHaveLength(1);
    expect(store.records[0]).toMatchObject({ value: 12, note: "updated 2025-05-20", source: "task-1" });
  });

  it("counts skipped values on a row that also inserts", async () => {
    const store = new MemoryCatalogStore();
    seedRecord(store);

    const outcome = await processPriceRow(context(store), {
      Name: "Widget A",
      Date: "2024-03-01",
      Acme: "12",
      Globex: "14",
    });

    expect(outcome).toEqual({ kind: "success", inserted: 1, updated: 0, skipped: 1 });
  });

  it("reuses a similar catalog entity", async () => {
    const store = new MemoryCatalogStore();
    store.addEntity("Widget AB", "widget ab");

    await processPriceRow(context(store), { Name: "Widget A", Date: "2024-03-01", Acme: "12" });

    expect(store.entities).toHaveLength(1);
    expect(store.records[0]?.entityId).toBe(1);
  });

  it("uses the entity another writer created after the catalog lookup", async () => {
    const store = new MemoryCatalogStore();
    store.beforeInsertEntity = (input) => {
      store.beforeInsertEntity = undefined;
      store.addEntity("WIDGET A", input.normalizedKey);
    };

    const outcome = await processPriceRow(context(store), { Name: "Widget A", Date: "2024-03-01", Acme: "12" });

    expect(outcome).toEqual({ kind: "success", inserted: 1, updated: 0, skipped: 0 });
    expect(store.entities.map((entity) => entity.displayName)).toEqual(["WIDGET A"]);
    expect(store.records[0]?.entityId).toBe(1);
  });

  it("re-reads after losing an insert race", async () => {
    const store = new MemoryCatalogStore();
    store.beforeInsertValue = (record) => {
      store.beforeInsertValue = undefined;
      store.addRecord({ ...record, value: 99, source: "other-task" });
    };

    const skipOutcome = await processPriceRow(context(store), { Name: "Widget A", Date: "2024-03-01", Acme: "12" });

    expect(skipOutcome).toEqual({ kind: "excluded", reason: "no_write", skipped: 1 });
    expect(store.records).toHaveLength(1);
    expect(store.records[0]?.value).toBe(99);
  });

  it("updates the winner of an insert race in overwrite mode", async () => {
    const store = new MemoryCatalogStore();
    store.beforeInsertValue = (record) => {
      store.beforeInsertValue = undefined;
      store.addRecord({ ...record, value: 99, source: "other-task" });
    };

    const outcome = await processPriceRow(context(store, { conflictMode: "overwrite" }), {
      Name: "Widget A",
      Date: "2024-03-01",
      Acme: "12",
    });

    expect(outcome).toEqual({ kind: "success", inserted: 0, updated: 1, skipped: 0 });
    expect(store.records).toHaveLength(1);
    expect(store.records[0]).toMatchObject({ value: 12, source: "task-1" });
  });

  it("uses the fallback period, then the current month", async () => {
    const store = new MemoryCatalogStore();

    await processPriceRow(context(store, { fallbackPeriod: "2023-12" }), { Name: "Widget A", Date: "", Acme: "1" });
    await processPriceRow(context(store), { Name: "Widget A", Date: "later", Acme: "1" });

    expect(store.records.map((record) => record.period)).toEqual(["2023-12", "2025-05"]);
  });
});

describe("readQuantity", () => {
  it("truncates to a positive integer and defaults to 1", () => {
    expect(readQuantity({ Qty: "3.9" }, mapping)).toBe(3);
    expect(readQuantity({ Qty: "0.5" }, mapping)).toBe(1);
    expect(readQuantity({ Qty: "-2" }, mapping)).toBe(1);
    expect(readQuantity({ Qty: null }, mapping)).toBe(1);
    expect(readQuantity({ Qty: "3" }, { ...mapping, quantityColumn: undefined })).toBe(1);
  });
});
