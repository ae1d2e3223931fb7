/**
 * Project Repository Implementation
 * Donation Registry
 *
 * Registre des projets : un document par identifiant, supprimé à la cessation.
 */

import { BaseRepository, DocumentFields, RegistryStore, StoreTransaction } from '../repository';
import { Project, ProjectId } from '../../types/global';
import { ProjectDocument } from '../../types/firestore';
import { COLLECTIONS, ZERO_ADDRESS, ZERO_HASH } from '../../utils/constants';

/**
 * Enregistrement nul : ce que renvoie la lecture d'un projet absent ou cessé
 */
export const EMPTY_PROJECT: Readonly<Project> = Object.freeze({
  id: ZERO_HASH,
  creator: ZERO_ADDRESS,
  name: '',
  createTime: 0,
});

export class ProjectRepository extends BaseRepository<Project> {
  constructor(store: RegistryStore) {
    super(store, COLLECTIONS.PROJECTS);
  }

  protected decode(data: DocumentFields): Project {
    return {
      id: this.readProjectId(data, 'id'),
      creator: this.readAddress(data, 'creator'),
      name: this.readString(data, 'name'),
      createTime: this.readNumber(data, 'createTime'),
    };
  }

  /**
   * Lit le projet dans la transaction; un projet absent vaut l'enregistrement nul
   */
  async load(transaction: StoreTransaction, id: ProjectId): Promise<Project> {
    return (await this.readInTransaction(transaction, id)) ?? { ...EMPTY_PROJECT };
  }

  save(transaction: StoreTransaction, project: Project): void {
    const document: ProjectDocument = {
      id: project.id,
      creator: project.creator,
      name: project.name,
      createTime: project.createTime,
    };
    transaction.set(this.collectionName, project.id, document);
  }

  remove(transaction: StoreTransaction, id: ProjectId): void {
    transaction.delete(this.collectionName, id);
  }

  async findById(id: ProjectId): Promise<Project> {
    return (await this.readDirect(id)) ?? { ...EMPTY_PROJECT };
  }
}
