/**
 * SELECTION MODULE
 *
 * Watchlists, chart overlays and per-session state.
 */

import type { FastifyInstance } from 'fastify';
import type { ApiContext } from '../../api/context.js';
import { registerSessionRoutes } from './api/session.routes.js';

export async function registerSelectionModule(fastify: FastifyInstance, ctx: ApiContext): Promise<void> {
  await registerSessionRoutes(fastify, ctx);
  console.log('[Selection] ✅ Registered at /api/sessions/*');
}

export * from './selection.types.js';
export { addToSelection, removeFromSelection, flattenSelection, groupFlattened, selectionSize, clearSelection } from './selection.store.js';
export { SessionStore, DEFAULT_SETTINGS, type SessionState, type DisplaySettings } from './session.store.js';
