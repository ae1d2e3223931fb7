/**
 * Account Repository Implementation
 * Donation Registry
 *
 * Soldes en valeur native et politique de réception de chaque adresse.
 * Une adresse sans document a un solde nul et accepte la valeur.
 */

import { BaseRepository, DocumentFields, RegistryStore, StoreTransaction } from '../repository';
import { Account, Address } from '../../types/global';
import { AccountDocument } from '../../types/firestore';
import { COLLECTIONS } from '../../utils/constants';

export class AccountRepository extends BaseRepository<Account> {
  constructor(store: RegistryStore) {
    super(store, COLLECTIONS.ACCOUNTS);
  }

  static emptyAccount(address: Address): Account {
    return { address, balance: 0n, acceptsValue: true };
  }

  protected decode(data: DocumentFields): Account {
    return {
      address: this.readAddress(data, 'address'),
      balance: this.readAmount(data, 'balance'),
      acceptsValue: this.readBoolean(data, 'acceptsValue', true),
    };
  }

  async load(transaction: StoreTransaction, address: Address): Promise<Account> {
    return (await this.readInTransaction(transaction, address)) ?? AccountRepository.emptyAccount(address);
  }

  save(transaction: StoreTransaction, account: Account): void {
    const document: AccountDocument = {
      address: account.address,
      balance: account.balance.toString(),
      acceptsValue: account.acceptsValue,
    };
    transaction.set(this.collectionName, account.address, document);
  }

  async findByAddress(address: Address): Promise<Account> {
    return (await this.readDirect(address)) ?? AccountRepository.emptyAccount(address);
  }
}
