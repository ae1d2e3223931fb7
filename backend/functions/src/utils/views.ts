/**
 * Représentations JSON des entités du registre.
 * Les montants bigint sont sérialisés en chaînes décimales.
 */

import { Account, Project, ProjectId, RegistryEvent } from '../types/global';
import { AccountsAPI, ProjectView, ProjectsAPI, RegistryEventView } from '../types/api';
import { ProjectHistory } from '../registry/donationRegistry';
import { helpers } from './helpers';

export function toEventView(event: RegistryEvent): RegistryEventView {
  if (event.type === 'Donate') {
    return { ...event, amount: helpers.amount.format(event.amount) };
  }
  return event;
}

export function toProjectView(project: Project): ProjectView {
  return {
    id: project.id,
    creator: project.creator,
    name: project.name,
    createTime: project.createTime,
  };
}

export function toAccountResponse(account: Account): AccountsAPI.AccountResponse {
  return {
    address: account.address,
    balance: helpers.amount.format(account.balance),
    acceptsValue: account.acceptsValue,
  };
}

/**
 * Page d'événements : `nextSeq` vaut null lorsque la page est incomplète
 */
export function toEventsPage(
  projectId: ProjectId,
  events: RegistryEvent[],
  limit: number
): ProjectsAPI.GetProjectEventsResponse {
  const last = events[events.length - 1];
  return {
    projectId,
    events: events.map(toEventView),
    nextSeq: last && events.length === limit ? last.seq : null,
  };
}

export function toHistoryResponse(history: ProjectHistory): ProjectsAPI.ProjectHistoryResponse {
  return {
    project: toProjectView(history.project),
    description: history.description,
    ceased: history.ceased,
    totalDonated: helpers.amount.format(history.totalDonated),
    donationCount: history.donationCount,
    events: history.events.map(toEventView),
    truncated: history.truncated,
  };
}
