/**
 * Event Repository Implementation
 * Donation Registry
 *
 * Journal d'événements en ajout seul. Chaque mutation du registre lit puis
 * réécrit le document d'état /registry/state : Firestore sérialise donc
 * toutes les transactions qui émettent un événement, et `seq` reste contigu.
 */

import { BaseRepository, DocumentFields, QueryFilter, RegistryStore, StoreTransaction } from '../repository';
import {
  CeaseEvent,
  CreateEvent,
  DonateEvent,
  ModifyDescriptionEvent,
  PaginationOptions,
  ProjectId,
  RegistryEvent,
  RegistryEventDraft,
} from '../../types/global';
import { EventDocument, RegistryStateDocument } from '../../types/firestore';
import { COLLECTIONS, REGISTRY_CONFIG } from '../../utils/constants';

export interface RegistryState {
  eventCount: number;
}

export class EventRepository extends BaseRepository<RegistryEvent> {
  constructor(store: RegistryStore) {
    super(store, COLLECTIONS.EVENTS);
  }

  static documentId(seq: number): string {
    return String(seq).padStart(12, '0');
  }

  protected decode(data: DocumentFields): RegistryEvent {
    const seq = this.readNumber(data, 'seq');
    const projectId = this.readProjectId(data, 'projectId');
    const time = this.readNumber(data, 'time');
    const type = this.readString(data, 'type');

    switch (type) {
      case 'Create':
        return {
          type,
          seq,
          projectId,
          time,
          creator: this.readAddress(data, 'creator'),
          name: this.readString(data, 'name'),
          description: this.readString(data, 'description'),
        };
      case 'ModifyDescription':
        return { type, seq, projectId, time, description: this.readString(data, 'description') };
      case 'Cease':
        return { type, seq, projectId, time };
      case 'Donate':
        return {
          type,
          seq,
          projectId,
          time,
          donor: this.readAddress(data, 'donor'),
          receiver: this.readAddress(data, 'receiver'),
          name: this.readString(data, 'name'),
          amount: this.readAmount(data, 'amount'),
          message: this.readString(data, 'message'),
        };
      default:
        throw this.malformed('type');
    }
  }

  private encode(event: RegistryEvent): EventDocument {
    if (event.type === 'Donate') {
      return { ...event, amount: event.amount.toString() };
    }
    return { ...event };
  }

  async readState(transaction: StoreTransaction): Promise<RegistryState> {
    const data = await transaction.get(COLLECTIONS.REGISTRY, REGISTRY_CONFIG.STATE_DOCUMENT_ID);
    if (!data) {
      return { eventCount: 0 };
    }
    return { eventCount: this.readNumber(data, 'eventCount') };
  }

  /**
   * Nombre d'événements émis, lu hors transaction
   */
  async countEvents(): Promise<number> {
    const data = await this.store.getDocument(COLLECTIONS.REGISTRY, REGISTRY_CONFIG.STATE_DOCUMENT_ID);
    return data ? this.readNumber(data, 'eventCount') : 0;
  }

  /**
   * Attribue le prochain numéro de séquence et enregistre l'événement
   */
  append(transaction: StoreTransaction, state: RegistryState, draft: Omit<CreateEvent, 'seq'>): CreateEvent;
  append(transaction: StoreTransaction, state: RegistryState, draft: Omit<ModifyDescriptionEvent, 'seq'>): ModifyDescriptionEvent;
  append(transaction: StoreTransaction, state: RegistryState, draft: Omit<CeaseEvent, 'seq'>): CeaseEvent;
  append(transaction: StoreTransaction, state: RegistryState, draft: Omit<DonateEvent, 'seq'>): DonateEvent;
  append(transaction: StoreTransaction, state: RegistryState, draft: RegistryEventDraft): RegistryEvent {
    const seq = state.eventCount + 1;
    const event: RegistryEvent = { ...draft, seq };

    transaction.set(this.collectionName, EventRepository.documentId(seq), this.encode(event));

    const stateDocument: RegistryStateDocument = { eventCount: seq };
    transaction.set(COLLECTIONS.REGISTRY, REGISTRY_CONFIG.STATE_DOCUMENT_ID, stateDocument);
    state.eventCount = seq;

    return event;
  }

  /**
   * Événements d'un projet, par séquence croissante, strictement après `fromSeq`
   */
  async listByProject(projectId: ProjectId, options: PaginationOptions = {}): Promise<RegistryEvent[]> {
    const filters: QueryFilter[] = [{ field: 'projectId', operator: '==', value: projectId }];
    if (options.fromSeq !== undefined) {
      filters.push({ field: 'seq', operator: '>', value: options.fromSeq });
    }

    const documents = await this.store.queryDocuments(this.collectionName, filters, {
      orderBy: 'seq',
      orderDirection: 'asc',
      limit: options.limit,
    });

    return documents.map(document => this.decode(document));
  }
}
