import type { HistoryRecord } from './update-cycle.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

export interface TriggerUpdateData {
    status: 'update_initiated' | 'already_pending';
    requestedAt: string | null;
}

export interface UpdateStatusData {
    pending: boolean;
    requestedAt: string | null;
    source: string | null;
    lastRecord: HistoryRecord | null;
}
