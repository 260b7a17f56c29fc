import type { Request, Response } from 'express';
import type { HistoryLog } from '../../services/history-log.js';
import type { TriggerUpdateData, UpdateStatusData } from '../../types/api.js';
import type { CycleStateStore, HistoryRecord } from '../../types/update-cycle.js';
import { logThought } from '../../utils/logger.js';
import { mapError, sendError, sendOk } from '../shared.js';

const DEFAULT_REQUEST_SOURCE = 'admin-api';
const MAX_SOURCE_LENGTH = 120;

export interface UpdateAdminDeps {
    stateStore: CycleStateStore;
    history: Pick<HistoryLog, 'read' | 'append'>;
    /**
     * Runs once the trigger response has been flushed, typically to stop the
     * running server so the supervisor can take over.
     */
    onUpdateRequested?: () => void | Promise<void>;
}

function parseSource(body: unknown): string {
    if (!body || typeof body !== 'object' || !('source' in body)) {
        return DEFAULT_REQUEST_SOURCE;
    }
    const { source } = body;
    if (source === undefined) {
        return DEFAULT_REQUEST_SOURCE;
    }
    if (typeof source !== 'string' || source.trim().length === 0) {
        throw new Error("Field 'source' must be a non-empty string when provided.");
    }
    return source.trim().slice(0, MAX_SOURCE_LENGTH);
}

export function parseLimitQuery(value: unknown): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) {
        throw new Error("Query parameter 'limit' must be a non-negative integer.");
    }
    return Number.parseInt(value.trim(), 10);
}

function scheduleAfterResponse(res: Response, callback: () => void | Promise<void>): void {
    res.once('finish', () => {
        Promise.resolve()
            .then(callback)
            .catch((error: unknown) => {
                const detail = error instanceof Error ? error.message : String(error);
                void logThought(`[API] Update request callback failed: ${detail}`);
            });
    });
}

/** POST /admin/trigger-update */
export function handleTriggerUpdate(deps: UpdateAdminDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        let source: string;
        try {
            source = parseSource(req.body);
        } catch (error: unknown) {
            sendError(res, error instanceof Error ? error.message : String(error), 400);
            return;
        }

        try {
            const before = await deps.stateStore.read();
            const after = await deps.stateStore.request(source);
            const requestedAt = after.status === 'pending' ? after.request.requestedAt : null;
            const data: TriggerUpdateData = {
                status: before.status === 'pending' ? 'already_pending' : 'update_initiated',
                requestedAt,
            };

            if (data.status === 'update_initiated') {
                await deps.history.append('info', `Update requested by ${source}`);
            }
            void logThought(`[API] Update ${data.status === 'update_initiated' ? 'requested' : 'already pending'} (${source}).`);

            if (deps.onUpdateRequested) {
                scheduleAfterResponse(res, deps.onUpdateRequested);
            }
            sendOk(res, data);
        } catch (error: unknown) {
            const mapped = mapError(error);
            sendError(res, `Could not request update: ${mapped.message}`, mapped.status);
        }
    };
}

/** GET /admin/update-errors */
export function handleUpdateErrors(deps: UpdateAdminDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        try {
            const records = await deps.history.read();
            sendOk<HistoryRecord[]>(res, records.filter((record) => record.status === 'error'));
        } catch (error: unknown) {
            const mapped = mapError(error);
            sendError(res, mapped.message, mapped.status);
        }
    };
}

/** GET /admin/update-history?limit=N */
export function handleUpdateHistory(deps: UpdateAdminDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        let limit: number | undefined;
        try {
            limit = parseLimitQuery(req.query.limit);
        } catch (error: unknown) {
            sendError(res, error instanceof Error ? error.message : String(error), 400);
            return;
        }

        try {
            sendOk<HistoryRecord[]>(res, await deps.history.read(limit));
        } catch (error: unknown) {
            const mapped = mapError(error);
            sendError(res, mapped.message, mapped.status);
        }
    };
}

/** GET /admin/update-status */
export function handleUpdateStatus(deps: UpdateAdminDeps) {
    return async (_req: Request, res: Response): Promise<void> => {
        try {
            const [state, records] = await Promise.all([deps.stateStore.read(), deps.history.read(1)]);
            const data: UpdateStatusData = {
                pending: state.status === 'pending',
                requestedAt: state.status === 'pending' ? state.request.requestedAt : null,
                source: state.status === 'pending' ? state.request.source : null,
                lastRecord: records.at(-1) ?? null,
            };
            sendOk(res, data);
        } catch (error: unknown) {
            const mapped = mapError(error);
            sendError(res, mapped.message, mapped.status);
        }
    };
}
