/**
 * Reconstruction hors-chaîne de l'état descriptif d'un projet.
 * La description n'est jamais stockée sur le projet : seule la relecture
 * ordonnée des événements la restitue.
 */

import { Project, RegistryEvent } from '../types/global';
import { EMPTY_PROJECT } from '../database/repositories/ProjectRepository';

export interface ProjectReplay {
  project: Project;
  description: string | null;
  ceased: boolean;
  totalDonated: bigint;
  donationCount: number;
}

export function replayProjectEvents(events: RegistryEvent[]): ProjectReplay {
  const ordered = [...events].sort((a, b) => a.seq - b.seq);

  const replay: ProjectReplay = {
    project: { ...EMPTY_PROJECT },
    description: null,
    ceased: false,
    totalDonated: 0n,
    donationCount: 0,
  };

  for (const event of ordered) {
    switch (event.type) {
      case 'Create':
        replay.project = {
          id: event.projectId,
          creator: event.creator,
          name: event.name,
          createTime: event.time,
        };
        replay.description = event.description;
        replay.ceased = false;
        break;
      case 'ModifyDescription':
        replay.description = event.description;
        break;
      case 'Cease':
        replay.project = { ...EMPTY_PROJECT };
        replay.description = null;
        replay.ceased = true;
        break;
      case 'Donate':
        // Le grand livre n'est jamais remis à zéro : les dons s'additionnent sur tout l'historique
        replay.totalDonated += event.amount;
        replay.donationCount += 1;
        break;
    }
  }

  return replay;
}
