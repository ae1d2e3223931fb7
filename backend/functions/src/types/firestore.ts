/**
 * Types Firestore Documents - Donation Registry
 * Forme des documents telle qu'écrite en base (montants en chaînes décimales)
 */

import { Address, ProjectId, RegistryEventType, UnixTime } from './global';

/**
 * Document Project - Collection /projects/{projectId}
 */
export type ProjectDocument = {
  id: ProjectId;
  creator: Address;
  name: string;
  createTime: UnixTime;
};

/**
 * Document Donation - Collection /donations/{donor}_{projectId}
 * Montant cumulé, jamais décrémenté ni supprimé
 */
export type DonationDocument = {
  donor: Address;
  projectId: ProjectId;
  amount: string;
  updatedAt: UnixTime;
};

/**
 * Document Account - Collection /accounts/{address}
 */
export type AccountDocument = {
  address: Address;
  balance: string;
  acceptsValue: boolean;
};

/**
 * Document d'état global - /registry/state
 * Lu et réécrit par chaque mutation, ce qui sérialise les transactions
 */
export type RegistryStateDocument = {
  eventCount: number;
};

/**
 * Document Event - Collection /events/{seq}
 */
export type EventDocument = {
  seq: number;
  type: RegistryEventType;
  projectId: ProjectId;
  time: UnixTime;
  creator?: Address;
  name?: string;
  description?: string;
  donor?: Address;
  receiver?: Address;
  amount?: string;
  message?: string;
};
