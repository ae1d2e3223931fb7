import { getFirestore, Firestore, Query } from 'firebase-admin/firestore';
import { logger } from './logger';
import { DatabaseError } from './errors';
import {
  DocumentFields,
  QueryFilter,
  QueryOptions,
  RegistryStore,
  StoreTransaction,
} from '../database/repository';

/**
 * RegistryStore adossé à Cloud Firestore.
 * L'instance Firestore est résolue au premier accès, après initializeApp().
 */
export class FirestoreHelper implements RegistryStore {
  private firestore?: Firestore;

  private get db(): Firestore {
    if (!this.firestore) {
      this.firestore = getFirestore();
    }
    return this.firestore;
  }

  async getDocument(collection: string, docId: string): Promise<DocumentFields | null> {
    const doc = await this.db.collection(collection).doc(docId).get();
    return doc.exists ? doc.data() ?? null : null;
  }

  async queryDocuments(
    collection: string,
    filters: QueryFilter[] = [],
    options: QueryOptions = {}
  ): Promise<DocumentFields[]> {
    let query: Query = this.db.collection(collection);

    filters.forEach(filter => {
      query = query.where(filter.field, filter.operator, filter.value);
    });

    if (options.orderBy) {
      query = query.orderBy(options.orderBy, options.orderDirection || 'asc');
    }

    if (options.limit !== undefined) {
      query = query.limit(options.limit);
    }

    const snapshot = await query.get();

    logger.debug('Query completed', {
      collection,
      filtersCount: filters.length,
      resultCount: snapshot.size,
    });

    return snapshot.docs.map(doc => doc.data());
  }

  /**
   * Exécute une transaction Firestore. Les écritures restent en attente
   * jusqu'à la résolution de `work`; un rejet n'écrit rien.
   */
  async runTransaction<R>(work: (transaction: StoreTransaction) => Promise<R>): Promise<R> {
    try {
      return await this.db.runTransaction(async (transaction) => {
        const handle: StoreTransaction = {
          get: async (collection, id) => {
            const snapshot = await transaction.get(this.db.collection(collection).doc(id));
            return snapshot.exists ? snapshot.data() ?? null : null;
          },
          set: (collection, id, data) => {
            transaction.set(this.db.collection(collection).doc(id), data);
          },
          delete: (collection, id) => {
            transaction.delete(this.db.collection(collection).doc(id));
          },
        };

        return work(handle);
      });
    } catch (error) {
      if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
        // Erreurs gRPC de Firestore (contention, indisponibilité)
        logger.error('Firestore transaction failed', error);
        throw new DatabaseError('Transaction could not be committed', 'transaction', undefined, {
          grpcCode: error.code,
        });
      }
      throw error;
    }
  }
}

export const firestoreHelper = new FirestoreHelper();
