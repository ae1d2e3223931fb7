/**
 * Types globaux du registre de dons
 */

/**
 * Adresse de compte (20 octets, hexadécimal minuscule)
 */
export type Address = `0x${string}`;

/**
 * Identifiant de projet (32 octets, hexadécimal minuscule)
 */
export type ProjectId = `0x${string}`;

/**
 * Horodatage Unix en secondes
 */
export type UnixTime = number;

export interface Project {
  id: ProjectId;
  creator: Address;
  name: string;
  createTime: UnixTime;
}

export interface Account {
  address: Address;
  balance: bigint;
  acceptsValue: boolean;
}

export interface LedgerEntry {
  donor: Address;
  projectId: ProjectId;
  amount: bigint;
}

export type RegistryEventType = 'Create' | 'ModifyDescription' | 'Cease' | 'Donate';

interface RegistryEventBase {
  seq: number;
  projectId: ProjectId;
  time: UnixTime;
}

export interface CreateEvent extends RegistryEventBase {
  type: 'Create';
  creator: Address;
  name: string;
  description: string;
}

export interface ModifyDescriptionEvent extends RegistryEventBase {
  type: 'ModifyDescription';
  description: string;
}

export interface CeaseEvent extends RegistryEventBase {
  type: 'Cease';
}

export interface DonateEvent extends RegistryEventBase {
  type: 'Donate';
  donor: Address;
  receiver: Address;
  name: string;
  amount: bigint;
  message: string;
}

export type RegistryEvent = CreateEvent | ModifyDescriptionEvent | CeaseEvent | DonateEvent;

export type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * Événement avant attribution de son numéro de séquence
 */
export type RegistryEventDraft = DistributiveOmit<RegistryEvent, 'seq'>;

export interface PaginationOptions {
  fromSeq?: number;
  limit?: number;
}
