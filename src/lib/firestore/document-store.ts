import { FieldValue, type Firestore, type Query } from "firebase-admin/firestore";

export type DocumentData = Record<string, unknown>;

export type StoredDocument = {
  id: string;
  data: DocumentData;
};

export type DocumentQuery = {
  where?: Array<{ field: string; value: string | number | boolean }>;
  orderBy?: { field: string; direction: "asc" | "desc" };
  limit?: number;
};

/**
 * Document-oriented persistence keyed by collection path. Implementations
 * provide per-document atomicity only; there are no multi-document
 * transactions.
 */
export interface DocumentStore {
  add(collectionPath: string, data: DocumentData): Promise<string>;
  query(collectionPath: string, options?: DocumentQuery): Promise<StoredDocument[]>;
}

export function createFirestoreDocumentStore(db: Firestore): DocumentStore {
  return {
    async add(collectionPath, data) {
      const ref = await db.collection(collectionPath).add({
        ...data,
        createdAt: FieldValue.serverTimestamp(),
      });
      return ref.id;
    },

    async query(collectionPath, options = {}) {
      let query: Query = db.collection(collectionPath);
      for (const filter of options.where ?? []) {
        query = query.where(filter.field, "==", filter.value);
      }
      if (options.orderBy) {
        query = query.orderBy(options.orderBy.field, options.orderBy.direction);
      }
      if (options.limit !== undefined) {
        query = query.limit(options.limit);
      }

      const snapshot = await query.get();
      return snapshot.docs.map((item) => ({ id: item.id, data: item.data() }));
    },
  };
}
