/**
 * Authentication and Authorization Utilities
 * Donation Registry
 *
 * L'identité de l'appelant est l'adresse portée par la revendication
 * personnalisée `address` du jeton Firebase Auth.
 */

import { logger } from './logger';
import { AuthenticationError, AuthorizationError } from './errors';
import { helpers } from './helpers';
import { Address } from '../types/global';

/**
 * Sous-ensemble de CallableRequest utilisé par les fonctions du registre
 */
export interface CallerRequest {
  data: unknown;
  auth?: {
    uid: string;
    token: Record<string, unknown>;
  };
}

export class AuthHelper {
  /**
   * Résout l'adresse de l'appelant à partir de son jeton
   */
  requireCallerAddress(request: CallerRequest): Address {
    if (!request.auth) {
      throw new AuthenticationError('Authentication required');
    }

    const claim = request.auth.token.address;
    if (typeof claim !== 'string') {
      throw new AuthenticationError('Caller has no address claim', { uid: request.auth.uid });
    }

    const address = claim.toLowerCase();
    if (!helpers.identity.isAddress(address) || helpers.identity.isZeroAddress(address)) {
      logger.security('Invalid address claim', 'medium', { uid: request.auth.uid });
      throw new AuthenticationError('Caller address claim is invalid', { uid: request.auth.uid });
    }

    return address;
  }

  /**
   * Exige la revendication `admin` (approvisionnement des comptes)
   */
  requireAdmin(request: CallerRequest): string {
    if (!request.auth) {
      throw new AuthenticationError('Authentication required');
    }

    if (request.auth.token.admin !== true) {
      logger.security('Admin operation refused', 'high', { uid: request.auth.uid });
      throw new AuthorizationError('Admin privileges required');
    }

    return request.auth.uid;
  }
}

export const authHelper = new AuthHelper();
