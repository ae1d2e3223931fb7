/**
 * Data Access Layer - Repository Pattern
 * Donation Registry
 *
 * Repositories read and stage writes through a RegistryStore transaction,
 * so a registry operation commits all of its documents or none of them.
 */

import { Address, ProjectId } from '../types/global';
import { DatabaseError } from '../utils/errors';
import { helpers } from '../utils/helpers';

// ============================================================================
// STORE PORT
// ============================================================================

export type DocumentFields = Record<string, unknown>;

/**
 * Transaction handle: every read must happen before the first write.
 */
export interface StoreTransaction {
  get(collection: string, id: string): Promise<DocumentFields | null>;
  set(collection: string, id: string, data: DocumentFields): void;
  delete(collection: string, id: string): void;
}

export interface QueryFilter {
  field: string;
  operator: '==' | '>' | '>=' | '<' | '<=';
  value: string | number | boolean;
}

export interface QueryOptions {
  orderBy?: string;
  orderDirection?: 'asc' | 'desc';
  limit?: number;
}

export interface RegistryStore {
  runTransaction<R>(work: (transaction: StoreTransaction) => Promise<R>): Promise<R>;
  getDocument(collection: string, id: string): Promise<DocumentFields | null>;
  queryDocuments(collection: string, filters: QueryFilter[], options?: QueryOptions): Promise<DocumentFields[]>;
}

// ============================================================================
// BASE REPOSITORY CLASS
// ============================================================================

export abstract class BaseRepository<T> {
  constructor(
    protected readonly store: RegistryStore,
    protected readonly collectionName: string
  ) {}

  /**
   * Convertit un document brut en entité typée
   */
  protected abstract decode(data: DocumentFields): T;

  protected malformed(field: string): DatabaseError {
    return new DatabaseError(
      `Malformed ${this.collectionName} document`,
      'read',
      this.collectionName,
      { field }
    );
  }

  protected readString(data: DocumentFields, field: string): string {
    const value = data[field];
    if (typeof value !== 'string') throw this.malformed(field);
    return value;
  }

  protected readNumber(data: DocumentFields, field: string): number {
    const value = data[field];
    if (typeof value !== 'number' || !Number.isFinite(value)) throw this.malformed(field);
    return value;
  }

  protected readBoolean(data: DocumentFields, field: string, fallback: boolean): boolean {
    const value = data[field];
    if (value === undefined) return fallback;
    if (typeof value !== 'boolean') throw this.malformed(field);
    return value;
  }

  protected readAmount(data: DocumentFields, field: string): bigint {
    const value = this.readString(data, field);
    if (!/^\d+$/.test(value)) throw this.malformed(field);
    return BigInt(value);
  }

  protected readAddress(data: DocumentFields, field: string): Address {
    const value = this.readString(data, field);
    if (!helpers.identity.isAddress(value)) throw this.malformed(field);
    return value;
  }

  protected readProjectId(data: DocumentFields, field: string): ProjectId {
    const value = this.readString(data, field);
    if (!helpers.identity.isProjectId(value)) throw this.malformed(field);
    return value;
  }

  protected async readInTransaction(transaction: StoreTransaction, id: string): Promise<T | null> {
    const data = await transaction.get(this.collectionName, id);
    return data ? this.decode(data) : null;
  }

  protected async readDirect(id: string): Promise<T | null> {
    const data = await this.store.getDocument(this.collectionName, id);
    return data ? this.decode(data) : null;
  }
}
