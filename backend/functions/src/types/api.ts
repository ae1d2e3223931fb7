/**
 * Types API Request/Response - Donation Registry
 * Les montants transitent en chaînes décimales (entiers de taille arbitraire)
 */

import { Address, CreateEvent, CeaseEvent, DonateEvent, ModifyDescriptionEvent, ProjectId, UnixTime } from './global';

export type AmountInput = string | number;

export type DonateEventView = Omit<DonateEvent, 'amount'> & { amount: string };

export type RegistryEventView = CreateEvent | ModifyDescriptionEvent | CeaseEvent | DonateEventView;

export interface ProjectView {
  id: ProjectId;
  creator: Address;
  name: string;
  createTime: UnixTime;
}

/**
 * Projects API Types
 */
export namespace ProjectsAPI {
  export interface CreateProjectRequest {
    name: string;
    description: string;
  }

  export interface CreateProjectResponse {
    projectId: ProjectId;
    createTime: UnixTime;
    overwritten: boolean;
    event: RegistryEventView;
  }

  export interface ModifyDescriptionRequest {
    projectId: ProjectId;
    description: string;
  }

  export interface CeaseProjectRequest {
    projectId: ProjectId;
  }

  export interface ProjectMutationResponse {
    projectId: ProjectId;
    time: UnixTime;
    event: RegistryEventView;
  }

  export interface GetProjectRequest {
    projectId: ProjectId;
  }

  export interface GetProjectEventsRequest {
    projectId: ProjectId;
    fromSeq?: number;
    limit?: number;
  }

  export interface GetProjectEventsResponse {
    projectId: ProjectId;
    events: RegistryEventView[];
    nextSeq: number | null;
  }

  export interface ProjectHistoryResponse {
    project: ProjectView;
    description: string | null;
    ceased: boolean;
    totalDonated: string;
    donationCount: number;
    events: RegistryEventView[];
    truncated: boolean;
  }
}

/**
 * Donations API Types
 */
export namespace DonationsAPI {
  export interface DonateRequest {
    projectId: ProjectId;
    message: string;
    amount: AmountInput;
  }

  export interface DonateResponse {
    projectId: ProjectId;
    receiver: Address;
    amount: string;
    totalDonated: string;
    time: UnixTime;
    event: RegistryEventView;
  }

  export interface GetDonatedRequest {
    donor: Address;
    projectId: ProjectId;
  }

  export interface GetDonatedResponse {
    donor: Address;
    projectId: ProjectId;
    amount: string;
  }
}

/**
 * Accounts API Types
 */
export namespace AccountsAPI {
  export interface GetBalanceRequest {
    address: Address;
  }

  export interface FundAccountRequest {
    address: Address;
    amount: AmountInput;
  }

  export interface SetReceivePolicyRequest {
    acceptsValue: boolean;
  }

  export interface AccountResponse {
    address: Address;
    balance: string;
    acceptsValue: boolean;
  }
}
