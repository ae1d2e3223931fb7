/**
 * Constantes globales - Donation Registry
 * Configuration et constantes utilisées dans toute l'application
 */

import type { CallableOptions, HttpsOptions } from 'firebase-functions/v2/https';

/**
 * Configuration de l'application
 */
export const APP_CONFIG = {
  name: 'Donation Registry',
  version: '1.0.0',
  environment: process.env.NODE_ENV || 'development',
  region: process.env.FUNCTIONS_REGION || 'europe-west1',
} as const;

/**
 * Bornes des chaînes, en octets UTF-8
 */
export const REGISTRY_LIMITS = {
  NAME: { MIN_BYTES: 1, MAX_BYTES: 64 },
  DESCRIPTION: { MIN_BYTES: 0, MAX_BYTES: 1024 },
  MESSAGE: { MIN_BYTES: 0, MAX_BYTES: 256 },
} as const;

function readPositiveInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Paramètres d'exécution du registre
 */
export const REGISTRY_CONFIG = {
  // Au-delà, la transaction est abandonnée et le don échoue
  TRANSACTION_TIMEOUT_MS: readPositiveInt('REGISTRY_TRANSACTION_TIMEOUT_MS', 10000),
  EVENTS_DEFAULT_LIMIT: 50,
  EVENTS_MAX_LIMIT: 200,
  HISTORY_MAX_EVENTS: readPositiveInt('REGISTRY_HISTORY_MAX_EVENTS', 5000),
  STATE_DOCUMENT_ID: 'state',
} as const;

/**
 * Noms des collections Firestore
 */
export const COLLECTIONS = {
  PROJECTS: 'projects',
  DONATIONS: 'donations',
  ACCOUNTS: 'accounts',
  EVENTS: 'events',
  REGISTRY: 'registry',
} as const;

/**
 * Expressions régulières de validation
 */
export const PATTERNS = {
  ADDRESS: /^0x[0-9a-fA-F]{40}$/,
  PROJECT_ID: /^0x[0-9a-fA-F]{64}$/,
  INTEGER: /^-?\d+$/,
} as const;

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000' as const;

export const ZERO_HASH = '0x0000000000000000000000000000000000000000000000000000000000000000' as const;

/**
 * Options de déploiement des fonctions
 */
export const CALLABLE_OPTIONS: CallableOptions = {
  region: APP_CONFIG.region,
  memory: '256MiB',
  timeoutSeconds: 60,
  maxInstances: 20,
  enforceAppCheck: process.env.ENFORCE_APP_CHECK === 'true',
};

export const HTTP_OPTIONS: HttpsOptions = {
  region: APP_CONFIG.region,
  memory: '256MiB',
  timeoutSeconds: 30,
  maxInstances: 20,
  cors: false,
};

/**
 * Origines autorisées pour l'API de lecture
 */
export const API_ALLOWED_ORIGINS: string[] = (process.env.API_ALLOWED_ORIGINS || '')
  .split(',')
  .map(origin => origin.trim())
  .filter(origin => origin.length > 0);
