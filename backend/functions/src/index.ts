/**
 * Firebase Functions Entry Point
 * Donation Registry
 *
 * This file exports all Firebase Functions for deployment
 */

import { initializeApp } from 'firebase-admin/app';
import { onRequest } from 'firebase-functions/v2/https';
import { setGlobalOptions } from 'firebase-functions/v2';
import express from 'express';
import { logger } from './utils/logger';
import { APP_CONFIG, HTTP_OPTIONS } from './utils/constants';
import { createApiRouter } from './api';

initializeApp();

// ============================================================================
// GLOBAL CONFIGURATION
// ============================================================================

setGlobalOptions({
  region: APP_CONFIG.region,
  maxInstances: 20,
});

// ============================================================================
// API FUNCTION - READ-ONLY REST API
// ============================================================================

const app = express();

app.use((req, res, next) => {
  res.on('error', (error) => {
    logger.error('Response error', error);
  });
  next();
});

app.use('/api', createApiRouter());

app.get('/', (req, res) => {
  res.json({
    name: APP_CONFIG.name,
    version: APP_CONFIG.version,
    status: 'operational',
    timestamp: new Date().toISOString(),
    endpoints: {
      health: '/api/health',
      projects: '/api/projects/:projectId',
      donations: '/api/donations/:donor/:projectId',
      accounts: '/api/accounts/:address',
    },
  });
});

export const api = onRequest(HTTP_OPTIONS, app);

// ============================================================================
// PROJECT REGISTRY FUNCTIONS
// ============================================================================

export { createProject } from './projects/createProject';
export { modifyProjectDescription } from './projects/modifyProjectDescription';
export { ceaseProject } from './projects/ceaseProject';
export { getProject } from './projects/getProject';
export { getProjectEvents } from './projects/getProjectEvents';
export { getProjectHistory } from './projects/getProjectHistory';

// ============================================================================
// DONATION FUNCTIONS
// ============================================================================

export { donate } from './donations/donate';
export { getDonated } from './donations/getDonated';

// ============================================================================
// ACCOUNT FUNCTIONS
// ============================================================================

export { getBalance } from './accounts/getBalance';
export { fundAccount } from './accounts/fundAccount';
export { setReceivePolicy } from './accounts/setReceivePolicy';
