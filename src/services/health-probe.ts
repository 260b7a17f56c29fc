import type { HealthProbe, HealthProbeResult } from '../types/process.js';

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readPayloadStatus(raw: string): string | undefined {
  if (!raw.trim()) {
    return undefined;
  }
  try {
    const parsed = JSON.parse(raw) as unknown;
    return isObjectRecord(parsed) && typeof parsed.status === 'string' ? parsed.status : undefined;
  } catch {
    return undefined;
  }
}

/**
 * GET the liveness endpoint once. Any 2xx counts as healthy; everything else,
 * including connection refusal and timeouts, is "not yet healthy".
 */
export const httpHealthProbe: HealthProbe = async (url: string, timeoutMs: number): Promise<HealthProbeResult> => {
  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: { accept: 'application/json' },
      signal: AbortSignal.timeout(timeoutMs),
    });
    const payloadStatus = readPayloadStatus(await response.text());
    const suffix = payloadStatus ? ` (status '${payloadStatus}')` : '';

    if (!response.ok) {
      return {
        ok: false,
        detail: `Health endpoint returned HTTP ${response.status}${suffix}.`,
        statusCode: response.status,
      };
    }
    return {
      ok: true,
      detail: `Health endpoint returned HTTP ${response.status}${suffix}.`,
      statusCode: response.status,
    };
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      detail: `Health endpoint probe failed: ${detail}`,
    };
  }
};
