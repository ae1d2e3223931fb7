import Joi from 'joi';
import { ValidationError } from './errors';
import { PATTERNS, REGISTRY_CONFIG } from './constants';

/**
 * Schémas communs des requêtes du registre.
 * Les longueurs de chaînes et la positivité des montants ne sont pas
 * vérifiées ici : les gardes du registre s'en chargent avec leurs erreurs typées.
 */
export const registrySchemas = {
  projectId: Joi.string().pattern(PATTERNS.PROJECT_ID).lowercase().required(),
  address: Joi.string().pattern(PATTERNS.ADDRESS).lowercase().required(),
  text: Joi.string().allow('').required(),
  amount: Joi.alternatives()
    // Les nombres JSON seuls : une chaîne doit suivre le motif entier
    .try(Joi.string().pattern(PATTERNS.INTEGER), Joi.number().integer().strict())
    .required(),
  fromSeq: Joi.number().integer().min(0).optional(),
  limit: Joi.number().integer().min(1).max(REGISTRY_CONFIG.EVENTS_MAX_LIMIT).optional(),
};

export function validateWithJoi<T>(schema: Joi.ObjectSchema<T>, data: unknown): T {
  const result = schema.validate(data, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: true
  });

  if (result.error) {
    const firstError = result.error.details[0];
    throw new ValidationError(
      firstError.message,
      firstError.path.join('.')
    );
  }

  const value = result.value;
  if (value === undefined) {
    throw new ValidationError('Request payload is required');
  }

  return value;
}
