import express, { type Router } from 'express';
import { requestLogger } from './shared.js';
import {
    handleTriggerUpdate,
    handleUpdateErrors,
    handleUpdateHistory,
    handleUpdateStatus,
    type UpdateAdminDeps,
} from './handlers/update-admin.js';

export type { UpdateAdminDeps } from './handlers/update-admin.js';

/**
 * Update administration routes for a Node server running under the supervisor.
 *
 * Endpoints:
 *   POST /admin/trigger-update  Request an upgrade on the next supervisor start
 *   GET  /admin/update-errors   Error records from the update history
 *   GET  /admin/update-history  Update history, oldest first (`?limit=N`)
 *   GET  /admin/update-status   Whether an update request is pending
 */
export function createUpdateAdminRouter(deps: UpdateAdminDeps): Router {
    const router = express.Router();
    router.use(express.json());
    router.use(requestLogger);

    router.post('/admin/trigger-update', handleTriggerUpdate(deps));
    router.get('/admin/update-errors', handleUpdateErrors(deps));
    router.get('/admin/update-history', handleUpdateHistory(deps));
    router.get('/admin/update-status', handleUpdateStatus(deps));

    return router;
}
