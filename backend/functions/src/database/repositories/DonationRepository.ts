/**
 * Donation Repository Implementation
 * Donation Registry
 *
 * Grand livre des dons : montant cumulé par couple (donateur, projet).
 * Les entrées ne sont jamais décrémentées ni supprimées, même après la
 * cessation du projet.
 */

import { BaseRepository, DocumentFields, RegistryStore, StoreTransaction } from '../repository';
import { Address, LedgerEntry, ProjectId, UnixTime } from '../../types/global';
import { DonationDocument } from '../../types/firestore';
import { COLLECTIONS } from '../../utils/constants';

export class DonationRepository extends BaseRepository<LedgerEntry> {
  constructor(store: RegistryStore) {
    super(store, COLLECTIONS.DONATIONS);
  }

  static entryId(donor: Address, projectId: ProjectId): string {
    return `${donor}_${projectId}`;
  }

  protected decode(data: DocumentFields): LedgerEntry {
    return {
      donor: this.readAddress(data, 'donor'),
      projectId: this.readProjectId(data, 'projectId'),
      amount: this.readAmount(data, 'amount'),
    };
  }

  async load(transaction: StoreTransaction, donor: Address, projectId: ProjectId): Promise<LedgerEntry> {
    const entry = await this.readInTransaction(transaction, DonationRepository.entryId(donor, projectId));
    return entry ?? { donor, projectId, amount: 0n };
  }

  /**
   * Ajoute `amount` à l'entrée lue plus tôt dans la même transaction
   */
  credit(transaction: StoreTransaction, entry: LedgerEntry, amount: bigint, time: UnixTime): LedgerEntry {
    const updated: LedgerEntry = { ...entry, amount: entry.amount + amount };
    const document: DonationDocument = {
      donor: updated.donor,
      projectId: updated.projectId,
      amount: updated.amount.toString(),
      updatedAt: time,
    };
    transaction.set(this.collectionName, DonationRepository.entryId(entry.donor, entry.projectId), document);
    return updated;
  }

  async getDonated(donor: Address, projectId: ProjectId): Promise<bigint> {
    const entry = await this.readDirect(DonationRepository.entryId(donor, projectId));
    return entry ? entry.amount : 0n;
  }
}
