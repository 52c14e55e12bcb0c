export type CanonicalEntity = {
  id: number;
  displayName: string;
  normalizedKey: string;
  createdAt: Date;
};

export type EntityCandidate = Pick<CanonicalEntity, "id" | "displayName" | "normalizedKey">;

export type ValueRecord = {
  id: number;
  entityId: number;
  partner: string;
  period: string;
  value: number;
  valueType: string;
  quantity: number;
  note: string | null;
  source: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type NewValueRecord = Omit<ValueRecord, "id" | "createdAt" | "updatedAt">;

export type ValueRecordPatch = Pick<ValueRecord, "value" | "valueType" | "quantity" | "note" | "source">;

/**
 * Minimal store contract used by the matcher and the import rows.
 */
export interface CatalogStore {
  findEntityByKey(normalizedKey: string): Promise<CanonicalEntity | null>;
  /** All entities in catalog order (ascending id). */
  listEntityCandidates(): Promise<EntityCandidate[]>;
  /**
   * Inserts the entity unless one with the same key exists, in which case the
   * existing row is returned with `created: false`.
   */
  insertOrFetchEntity(input: {
    displayName: string;
    normalizedKey: string;
  }): Promise<{ entity: CanonicalEntity; created: boolean }>;
  findValueRecord(entityId: number, partner: string, period: string): Promise<ValueRecord | null>;
  /** Returns false when the (entity, partner, period) triple is already taken. */
  insertValueRecord(record: NewValueRecord): Promise<boolean>;
  updateValueRecord(id: number, patch: ValueRecordPatch): Promise<void>;
}
