/**
 * General Helper Functions
 * Donation Registry
 */

import { createHash } from 'crypto';
import { Address, ProjectId, UnixTime } from '../types/global';
import { PATTERNS, ZERO_ADDRESS } from './constants';
import { ValidationError } from './errors';

/**
 * Utilitaires pour les identités (adresses et identifiants de projet)
 */
export const identityHelpers = {
  isAddress(value: string): value is Address {
    return PATTERNS.ADDRESS.test(value);
  },

  isProjectId(value: string): value is ProjectId {
    return PATTERNS.PROJECT_ID.test(value);
  },

  isZeroAddress(address: Address): boolean {
    return address === ZERO_ADDRESS;
  },

  /**
   * Dérive l'identifiant d'un projet de (créateur, nom, instant de création).
   * sha256(adresse sur 20 octets || nom UTF-8 || instant sur 32 octets big-endian)
   */
  deriveProjectId(creator: Address, name: string, createTime: UnixTime): ProjectId {
    const time = Buffer.alloc(32);
    time.writeBigUInt64BE(BigInt(createTime), 24);

    const digest = createHash('sha256')
      .update(Buffer.from(creator.slice(2), 'hex'))
      .update(Buffer.from(name, 'utf8'))
      .update(time)
      .digest('hex');

    return `0x${digest}`;
  },
};

/**
 * Utilitaires pour les montants (entiers de taille arbitraire)
 */
export const amountHelpers = {
  /**
   * Convertit une entrée décimale (chaîne ou entier JS) en bigint
   */
  parse(value: string | number, field: string = 'amount'): bigint {
    if (typeof value === 'number') {
      if (!Number.isSafeInteger(value)) {
        throw new ValidationError('Amount must be a safe integer', field, value);
      }
      return BigInt(value);
    }

    if (!PATTERNS.INTEGER.test(value)) {
      throw new ValidationError('Amount must be an integer string', field, value);
    }
    return BigInt(value);
  },

  format(value: bigint): string {
    return value.toString();
  },
};

/**
 * Utilitaires pour les chaînes de caractères
 */
export const stringHelpers = {
  byteLength(value: string): number {
    return Buffer.byteLength(value, 'utf8');
  },
};

/**
 * Utilitaires pour les dates
 */
export const dateHelpers = {
  /**
   * Instant courant en secondes Unix
   */
  nowSeconds(): UnixTime {
    return Math.floor(Date.now() / 1000);
  },
};

/**
 * Utilitaires pour les opérations asynchrones
 */
export const asyncHelpers = {
  /**
   * Borne la durée d'une promesse; le minuteur est toujours libéré
   */
  async withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    onTimeout: () => Error
  ): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    });

    try {
      return await Promise.race([promise, timeoutPromise]);
    } finally {
      clearTimeout(timer);
    }
  },
};

/**
 * Export de tous les helpers dans un objet global
 */
export const helpers = {
  identity: identityHelpers,
  amount: amountHelpers,
  string: stringHelpers,
  date: dateHelpers,
  async: asyncHelpers,
};
