/**
 * Préconditions du registre.
 * Chaque garde lève une erreur typée portant la valeur fautive; elles sont
 * appelées avant toute écriture, donc un échec n'a aucun effet observable.
 */

import { Address, Project, ProjectId } from '../types/global';
import {
  IllegalCallerError,
  IncorrectStringFormatError,
  InsufficientFundsError,
  ProjectExistedError,
} from '../utils/errors';
import { helpers } from '../utils/helpers';
import { REGISTRY_LIMITS } from '../utils/constants';

export function checkStringBounds(value: string, minBytes: number, maxBytes: number): void {
  const length = helpers.string.byteLength(value);
  if (length < minBytes || length > maxBytes) {
    throw new IncorrectStringFormatError(value, minBytes, maxBytes);
  }
}

export function checkName(name: string): void {
  checkStringBounds(name, REGISTRY_LIMITS.NAME.MIN_BYTES, REGISTRY_LIMITS.NAME.MAX_BYTES);
}

export function checkDescription(description: string): void {
  checkStringBounds(description, REGISTRY_LIMITS.DESCRIPTION.MIN_BYTES, REGISTRY_LIMITS.DESCRIPTION.MAX_BYTES);
}

export function checkMessage(message: string): void {
  checkStringBounds(message, REGISTRY_LIMITS.MESSAGE.MIN_BYTES, REGISTRY_LIMITS.MESSAGE.MAX_BYTES);
}

export function checkAmountPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new InsufficientFundsError(amount);
  }
}

export function checkCallerIsCreator(project: Project, caller: Address): void {
  if (project.creator !== caller) {
    throw new IllegalCallerError(caller);
  }
}

export function checkCallerIsNotCreator(project: Project, caller: Address): void {
  if (project.creator === caller) {
    throw new IllegalCallerError(caller);
  }
}

/**
 * Un projet dont le créateur est l'adresse nulle n'existe pas
 */
export function checkProjectExists(project: Project, id: ProjectId): void {
  if (helpers.identity.isZeroAddress(project.creator)) {
    throw new ProjectExistedError(id);
  }
}
