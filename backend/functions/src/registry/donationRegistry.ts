/**
 * Donation Registry
 *
 * Machine à états du cycle de vie des projets et du grand livre des dons.
 * Chaque opération mutante s'exécute dans une seule transaction du store :
 * gardes, transfert de valeur, mise à jour du grand livre et émission de
 * l'événement sont validés ensemble ou pas du tout.
 */

import { RegistryStore, StoreTransaction } from '../database/repository';
import { ProjectRepository } from '../database/repositories/ProjectRepository';
import { DonationRepository } from '../database/repositories/DonationRepository';
import { AccountRepository } from '../database/repositories/AccountRepository';
import { EventRepository } from '../database/repositories/EventRepository';
import { firestoreHelper } from '../utils/firestore';
import { logger } from '../utils/logger';
import { helpers } from '../utils/helpers';
import { REGISTRY_CONFIG } from '../utils/constants';
import {
  IllegalCallerError,
  InsufficientFundsError,
  TransactionFailedError,
} from '../utils/errors';
import {
  Account,
  Address,
  CeaseEvent,
  CreateEvent,
  DonateEvent,
  ModifyDescriptionEvent,
  PaginationOptions,
  Project,
  ProjectId,
  RegistryEvent,
  UnixTime,
} from '../types/global';
import {
  checkAmountPositive,
  checkCallerIsCreator,
  checkCallerIsNotCreator,
  checkDescription,
  checkMessage,
  checkName,
  checkProjectExists,
} from './guards';
import { ProjectReplay, replayProjectEvents } from './eventReplay';

export interface DonationRegistryOptions {
  transactionTimeoutMs?: number;
  historyMaxEvents?: number;
}

export interface CreateResult {
  projectId: ProjectId;
  createTime: UnixTime;
  overwritten: boolean;
  event: CreateEvent;
}

export interface ModifyDescriptionResult {
  projectId: ProjectId;
  time: UnixTime;
  event: ModifyDescriptionEvent;
}

export interface CeaseResult {
  projectId: ProjectId;
  time: UnixTime;
  event: CeaseEvent;
}

export interface DonateResult {
  projectId: ProjectId;
  receiver: Address;
  amount: bigint;
  totalDonated: bigint;
  time: UnixTime;
  event: DonateEvent;
}

export interface ProjectHistory extends ProjectReplay {
  events: RegistryEvent[];
  // Vrai quand la relecture s'arrête au plafond d'événements
  truncated: boolean;
}

export class DonationRegistry {
  private readonly projects: ProjectRepository;
  private readonly donations: DonationRepository;
  private readonly accounts: AccountRepository;
  private readonly events: EventRepository;
  private readonly transactionTimeoutMs: number;
  private readonly historyMaxEvents: number;

  constructor(
    private readonly store: RegistryStore,
    options: DonationRegistryOptions = {}
  ) {
    this.projects = new ProjectRepository(store);
    this.donations = new DonationRepository(store);
    this.accounts = new AccountRepository(store);
    this.events = new EventRepository(store);
    this.transactionTimeoutMs = options.transactionTimeoutMs ?? REGISTRY_CONFIG.TRANSACTION_TIMEOUT_MS;
    this.historyMaxEvents = options.historyMaxEvents ?? REGISTRY_CONFIG.HISTORY_MAX_EVENTS;
  }

  /**
   * Exécute `work` dans une transaction bornée dans le temps.
   * Le dépassement rejette le corps de la transaction : rien n'est écrit.
   */
  private execute<R>(operation: string, work: (transaction: StoreTransaction) => Promise<R>): Promise<R> {
    return this.store.runTransaction(transaction =>
      helpers.async.withTimeout(
        work(transaction),
        this.transactionTimeoutMs,
        () => new TransactionFailedError(`${operation} timed out after ${this.transactionTimeoutMs}ms`)
      )
    );
  }

  /**
   * L'adresse nulle représente l'absence de créateur et ne peut pas appeler
   */
  private assertCaller(caller: Address): void {
    if (helpers.identity.isZeroAddress(caller)) {
      throw new IllegalCallerError(caller);
    }
  }

  // ============================================================================
  // PROJECT REGISTRY
  // ============================================================================

  async create(caller: Address, name: string, description: string): Promise<CreateResult> {
    this.assertCaller(caller);
    checkName(name);
    checkDescription(description);

    const result = await this.execute('create', async (transaction) => {
      const createTime = helpers.date.nowSeconds();
      const projectId = helpers.identity.deriveProjectId(caller, name, createTime);

      const state = await this.events.readState(transaction);
      const previous = await this.projects.load(transaction, projectId);

      this.projects.save(transaction, { id: projectId, creator: caller, name, createTime });
      const event = this.events.append(transaction, state, {
        type: 'Create',
        projectId,
        creator: caller,
        name,
        description,
        time: createTime,
      });

      return {
        projectId,
        createTime,
        overwritten: !helpers.identity.isZeroAddress(previous.creator),
        event,
      };
    });

    if (result.overwritten) {
      // Même créateur, même nom, même seconde : le dernier enregistrement l'emporte
      logger.warn('Project id collision, previous record overwritten', {
        projectId: result.projectId,
        creator: caller,
        createTime: result.createTime,
      });
    }

    logger.business('Project created', 'projects', {
      projectId: result.projectId,
      creator: caller,
      name,
      seq: result.event.seq,
    });

    return result;
  }

  async modifyDescription(caller: Address, projectId: ProjectId, description: string): Promise<ModifyDescriptionResult> {
    this.assertCaller(caller);

    const result = await this.execute('modifyDescription', async (transaction) => {
      const time = helpers.date.nowSeconds();
      const state = await this.events.readState(transaction);
      const project = await this.projects.load(transaction, projectId);

      checkCallerIsCreator(project, caller);
      checkDescription(description);

      const event = this.events.append(transaction, state, {
        type: 'ModifyDescription',
        projectId,
        description,
        time,
      });

      return { projectId, time, event };
    });

    logger.business('Project description modified', 'projects', {
      projectId,
      creator: caller,
      seq: result.event.seq,
    });

    return result;
  }

  async cease(caller: Address, projectId: ProjectId): Promise<CeaseResult> {
    this.assertCaller(caller);

    const result = await this.execute('cease', async (transaction) => {
      const time = helpers.date.nowSeconds();
      const state = await this.events.readState(transaction);
      const project = await this.projects.load(transaction, projectId);

      checkCallerIsCreator(project, caller);

      this.projects.remove(transaction, projectId);
      const event = this.events.append(transaction, state, { type: 'Cease', projectId, time });

      return { projectId, time, event };
    });

    logger.business('Project ceased', 'projects', {
      projectId,
      creator: caller,
      seq: result.event.seq,
    });

    return result;
  }

  // ============================================================================
  // DONATION LEDGER & TRANSFER
  // ============================================================================

  async donate(caller: Address, projectId: ProjectId, message: string, amount: bigint): Promise<DonateResult> {
    this.assertCaller(caller);
    checkAmountPositive(amount);
    checkMessage(message);

    const result = await this.execute('donate', async (transaction) => {
      const time = helpers.date.nowSeconds();
      const state = await this.events.readState(transaction);
      const project = await this.projects.load(transaction, projectId);

      checkProjectExists(project, projectId);
      checkCallerIsNotCreator(project, caller);

      // Le destinataire est le créateur enregistré au moment du don
      const receiver = project.creator;
      const entry = await this.donations.load(transaction, caller, projectId);
      const donorAccount = await this.accounts.load(transaction, caller);
      const receiverAccount = await this.accounts.load(transaction, receiver);

      this.transfer(transaction, donorAccount, receiverAccount, amount);
      const updated = this.donations.credit(transaction, entry, amount, time);

      const event = this.events.append(transaction, state, {
        type: 'Donate',
        projectId,
        donor: caller,
        receiver,
        name: project.name,
        amount,
        message,
        time,
      });

      return { projectId, receiver, amount, totalDonated: updated.amount, time, event };
    });

    logger.financial('Donation transferred', {
      projectId,
      donor: caller,
      receiver: result.receiver,
      amount: result.amount,
      totalDonated: result.totalDonated,
      seq: result.event.seq,
    });

    return result;
  }

  /**
   * Transfert de valeur native entre deux comptes lus dans la transaction.
   * Le refus du destinataire fait échouer toute l'opération.
   */
  private transfer(transaction: StoreTransaction, from: Account, to: Account, amount: bigint): void {
    if (!to.acceptsValue) {
      throw new TransactionFailedError(`Receiver ${to.address} rejected the transfer`);
    }

    if (from.balance < amount) {
      throw new InsufficientFundsError(amount, { balance: from.balance.toString() });
    }

    this.accounts.save(transaction, { ...from, balance: from.balance - amount });
    this.accounts.save(transaction, { ...to, balance: to.balance + amount });
  }

  // ============================================================================
  // ACCOUNTS
  // ============================================================================

  async fundAccount(address: Address, amount: bigint): Promise<Account> {
    checkAmountPositive(amount);

    const account = await this.execute('fundAccount', async (transaction) => {
      const current = await this.accounts.load(transaction, address);
      const updated: Account = { ...current, balance: current.balance + amount };
      this.accounts.save(transaction, updated);
      return updated;
    });

    logger.financial('Account funded', { address, amount, balance: account.balance });

    return account;
  }

  async setReceivePolicy(address: Address, acceptsValue: boolean): Promise<Account> {
    this.assertCaller(address);

    const account = await this.execute('setReceivePolicy', async (transaction) => {
      const current = await this.accounts.load(transaction, address);
      const updated: Account = { ...current, acceptsValue };
      this.accounts.save(transaction, updated);
      return updated;
    });

    logger.audit('setReceivePolicy', `accounts/${address}`, 'success', { acceptsValue });

    return account;
  }

  // ============================================================================
  // QUERIES
  // ============================================================================

  getProject(projectId: ProjectId): Promise<Project> {
    return this.projects.findById(projectId);
  }

  getDonated(donor: Address, projectId: ProjectId): Promise<bigint> {
    return this.donations.getDonated(donor, projectId);
  }

  getAccount(address: Address): Promise<Account> {
    return this.accounts.findByAddress(address);
  }

  getProjectEvents(projectId: ProjectId, options: PaginationOptions = {}): Promise<RegistryEvent[]> {
    const limit = Math.min(options.limit ?? REGISTRY_CONFIG.EVENTS_DEFAULT_LIMIT, REGISTRY_CONFIG.EVENTS_MAX_LIMIT);
    return this.events.listByProject(projectId, { fromSeq: options.fromSeq, limit });
  }

  getEventCount(): Promise<number> {
    return this.events.countEvents();
  }

  /**
   * Reconstruit l'historique d'un projet en rejouant tous ses événements
   */
  /**
   * Une seule lecture du journal : le projet, la description et les totaux
   * sont tous dérivés des mêmes événements.
   */
  async getProjectHistory(projectId: ProjectId): Promise<ProjectHistory> {
    const events = await this.events.listByProject(projectId, { limit: this.historyMaxEvents });
    const truncated = events.length === this.historyMaxEvents;

    if (truncated) {
      logger.warn('Project history truncated', { projectId, maxEvents: this.historyMaxEvents });
    }

    return { events, truncated, ...replayProjectEvents(events) };
  }
}

export const donationRegistry = new DonationRegistry(firestoreHelper);
