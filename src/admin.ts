/**
 * Library entry for a Node production server that wants the update admin
 * routes. Importing it has no side effects; the supervisor CLI lives in
 * `index.ts`.
 *
 * @example
 * const config = resolveSupervisorConfig();
 * app.use(createUpdateAdminRouter({
 *     stateStore: createStateStore(config),
 *     history: createHistoryLog(config),
 *     onUpdateRequested: () => server.close(),
 * }));
 */
export { createUpdateAdminRouter, type UpdateAdminDeps } from './api/router.js';
export { resolveSupervisorConfig, type SupervisorConfig } from './config/supervisor-config.js';
export { createHistoryLog, createStateStore } from './core/supervisor-factory.js';
export { FileCycleStateStore } from './services/cycle-state-store.js';
export { HistoryLog } from './services/history-log.js';
export type { HistoryRecord, HistoryStatus } from './types/update-cycle.js';
export type { TriggerUpdateData, UpdateStatusData } from './types/api.js';
