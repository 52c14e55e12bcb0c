import { and, asc, eq } from "drizzle-orm";

import type { DbClient } from "@/db";
import { catalogEntities, valueRecords, type ValueRecordRow } from "@/db/schema";

import type { CatalogStore, ValueRecord } from "./types";

function toValueRecord(row: ValueRecordRow): ValueRecord {
  return {
    id: row.id,
    entityId: row.entityId,
    partner: row.partner,
    period: row.period,
    value: Number(row.value),
    valueType: row.valueType,
    quantity: row.quantity,
    note: row.note,
    source: row.source,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function createCatalogDb(db: DbClient): CatalogStore {
  async function findEntityByKey(normalizedKey: string) {
    const rows = await db
      .select()
      .from(catalogEntities)
      .where(eq(catalogEntities.normalizedKey, normalizedKey))
      .limit(1);
    return rows[0] ?? null;
  }

  return {
    findEntityByKey,

    async listEntityCandidates() {
      return await db
        .select({
          id: catalogEntities.id,
          displayName: catalogEntities.displayName,
          normalizedKey: catalogEntities.normalizedKey,
        })
        .from(catalogEntities)
        .orderBy(asc(catalogEntities.id));
    },

    async insertOrFetchEntity(input) {
      const [created] = await db
        .insert(catalogEntities)
        .values({ displayName: input.displayName, normalizedKey: input.normalizedKey })
        .onConflictDoNothing({ target: catalogEntities.normalizedKey })
        .returning();

      if (created) {
        return { entity: created, created: true };
      }

      // Someone else created it between our lookup and the insert.
      const existing = await findEntityByKey(input.normalizedKey);
      if (!existing) {
        throw new Error(`Entity with key '${input.normalizedKey}' vanished after insert conflict`);
      }
      return { entity: existing, created: false };
    },

    async findValueRecord(entityId, partner, period) {
      const rows = await db
        .select()
        .from(valueRecords)
        .where(
          and(
            eq(valueRecords.entityId, entityId),
            eq(valueRecords.partner, partner),
            eq(valueRecords.period, period)
          )
        )
        .limit(1);
      return rows[0] ? toValueRecord(rows[0]) : null;
    },

    async insertValueRecord(record) {
      const inserted = await db
        .insert(valueRecords)
        .values({
          entityId: record.entityId,
          partner: record.partner,
          period: record.period,
          value: String(record.value),
          valueType: record.valueType,
          quantity: record.quantity,
          note: record.note,
          source: record.source,
        })
        .onConflictDoNothing({
          target: [valueRecords.entityId, valueRecords.partner, valueRecords.period],
        })
        .returning({ id: valueRecords.id });
      return inserted.length > 0;
    },

    async updateValueRecord(id, patch) {
      await db
        .update(valueRecords)
        .set({
          value: String(patch.value),
          valueType: patch.valueType,
          quantity: patch.quantity,
          note: patch.note,
          source: patch.source,
          updatedAt: new Date(),
        })
        .where(eq(valueRecords.id, id));
    },
  };
}
