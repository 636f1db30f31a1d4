import * as functions from 'firebase-functions';
import { createApp } from './app';
import { createContainer } from './config/container';
import { loadSettings } from './config/settings';

const container = createContainer(loadSettings());

/**
 * Firebase Function: health economics query API
 *
 * POST /queries          submit a question (body: { text, billRefs? })
 * GET  /queries          paginated history (pageSize, pageToken, status,
 *                        billRef, createdAfter, createdBefore)
 * GET  /queries/:id      replay a stored query
 * GET  /stats            stored query and bill counts
 */
export const api = functions
  .runWith({ timeoutSeconds: 540, memory: '512MB', secrets: ['OPENAI_API_KEY'] })
  .https.onRequest(createApp(container));
