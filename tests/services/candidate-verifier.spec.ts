import { describe, expect, it, vi } from 'vitest';

vi.mock('../../src/utils/logger.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/utils/logger.js')>()),
  logThought: vi.fn(async () => undefined),
}));

import { CandidateVerifier, type CandidateVerifierOptions } from '../../src/services/candidate-verifier.js';
import type { ProcessSpec } from '../../src/types/process.js';
import { FakeProcessSupervisor, type FakeProcessScript } from '../harness/fake-process-supervisor.js';
import { scriptedProbe } from '../harness/scripted-collaborators.js';
import { VirtualClock } from '../harness/virtual-clock.js';

const LAUNCH: ProcessSpec = {
  command: 'venv/bin/uvicorn',
  args: ['main:app', '--host', '0.0.0.0', '--port', '8000'],
  cwd: '/srv/app',
  stdio: 'capture',
  logPath: '/srv/app/startup.log',
};

const REFUSED = 'Health endpoint probe failed: connect ECONNREFUSED 127.0.0.1:8000';

function createVerifier(
  script: FakeProcessScript,
  overrides: Partial<CandidateVerifierOptions> = {},
): { verifier: CandidateVerifier; processes: FakeProcessSupervisor; clock: VirtualClock } {
  const processes = new FakeProcessSupervisor([script]);
  const clock = new VirtualClock();
  const verifier = new CandidateVerifier({
    processSupervisor: processes,
    launch: LAUNCH,
    healthUrl: 'http://127.0.0.1:8000/health',
    pollIntervalMs: 1000,
    maxAttempts: 30,
    probeTimeoutMs: 2000,
    stopTimeoutMs: 10_000,
    diagnosticLines: 10,
    healthProbe: scriptedProbe(),
    clock,
    ...overrides,
  });
  return { verifier, processes, clock };
}

describe('CandidateVerifier', () => {
  it('reports healthy as soon as the endpoint answers and stops the candidate', async () => {
    const probe = scriptedProbe(5);
    const { verifier, processes, clock } = createVerifier({}, { healthProbe: probe });

    const result = await verifier.verify();

    expect(result.outcome).toBe('healthy');
    expect(result.attempts).toBe(5);
    expect(result.detail).toBe("Candidate healthy on attempt 5: Health endpoint returned HTTP 200 (status 'ok').");
    expect(result.transitions).toEqual(['idle', 'launching', 'polling', 'healthy']);
    expect(probe.calls()).toBe(5);
    expect(clock.sleeps).toEqual([1000, 1000, 1000, 1000]);

    const candidate = processes.last();
    expect(candidate.spec).toEqual(LAUNCH);
    expect(candidate.signals).toEqual(['SIGTERM']);
    expect(candidate.running).toBe(false);
    expect(result.exit).toEqual({ code: null, signal: 'SIGTERM' });
  });

  it('short-circuits to crashed when the candidate dies and quotes its output', async () => {
    const probe = scriptedProbe();
    const { verifier, processes } = createVerifier(
      {
        exitAfterLivenessChecks: 1,
        exitCode: 3,
        output: ['INFO: Started server process', 'Traceback (most recent call last):', 'ModuleNotFoundError: No module named joblib'],
      },
      { healthProbe: probe, diagnosticLines: 2 },
    );

    const result = await verifier.verify();

    expect(result.outcome).toBe('crashed');
    expect(result.attempts).toBe(2);
    expect(result.detail).toBe('Candidate exited with exit code 3 on attempt 2.');
    expect(result.diagnostics).toEqual([
      'Traceback (most recent call last):',
      'ModuleNotFoundError: No module named joblib',
    ]);
    expect(result.transitions).toEqual(['idle', 'launching', 'polling', 'crashed']);
    expect(probe.calls()).toBe(1);
    expect(processes.last().signals).toEqual([]);
  });

  it('gives up as unhealthy once the attempt budget is spent', async () => {
    const { verifier, processes, clock } = createVerifier({}, { maxAttempts: 3 });

    const result = await verifier.verify();

    expect(result.outcome).toBe('unhealthy');
    expect(result.attempts).toBe(3);
    expect(result.detail).toBe(`No healthy response after 3 attempt(s); last probe: ${REFUSED}`);
    expect(clock.sleeps).toEqual([1000, 1000]);
    expect(processes.last().signals).toEqual(['SIGTERM']);
    expect(processes.last().running).toBe(false);
  });

  it('never reports healthy for a live process whose port stays closed', async () => {
    const { verifier } = createVerifier({ output: ['Loading model...'] }, { maxAttempts: 30 });

    const result = await verifier.verify();

    expect(result.outcome).toBe('unhealthy');
    expect(result.attempts).toBe(30);
    expect(result.diagnostics).toEqual(['Loading model...']);
  });

  it('escalates to SIGKILL when the candidate ignores SIGTERM', async () => {
    const { verifier, processes } = createVerifier({ ignoreSigterm: true }, { healthProbe: scriptedProbe(1) });

    const result = await verifier.verify();

    const candidate = processes.last();
    expect(result.outcome).toBe('healthy');
    expect(candidate.signals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(candidate.waitTimeouts).toEqual([10_000, undefined]);
    expect(result.exit).toEqual({ code: null, signal: 'SIGKILL' });
  });

  it('stops polling when cancelled and still terminates the candidate', async () => {
    const controller = new AbortController();
    const { verifier, processes, clock } = createVerifier({});
    clock.onSleep(() => controller.abort());

    const result = await verifier.verify(controller.signal);

    expect(result.outcome).toBe('unhealthy');
    expect(result.attempts).toBe(1);
    expect(result.detail).toBe('verification cancelled');
    expect(processes.last().signals).toEqual(['SIGTERM']);
  });

  it('treats a candidate that cannot be spawned as crashed', async () => {
    const { verifier, processes } = createVerifier({ spawnError: new Error('spawn venv/bin/uvicorn ENOENT') });

    const result = await verifier.verify();

    expect(result.outcome).toBe('crashed');
    expect(result.attempts).toBe(0);
    expect(result.detail).toBe('Candidate could not be started: spawn venv/bin/uvicorn ENOENT');
    expect(result.transitions).toEqual(['idle', 'launching', 'crashed']);
    expect(processes.spawned).toHaveLength(0);
  });

  it('counts a probe that throws as unhealthy', async () => {
    const { verifier } = createVerifier(
      {},
      {
        maxAttempts: 2,
        healthProbe: async () => {
          throw new Error('socket hang up');
        },
      },
    );

    const result = await verifier.verify();

    expect(result.outcome).toBe('unhealthy');
    expect(result.detail).toBe('No healthy response after 2 attempt(s); last probe: Health probe threw: socket hang up');
  });
});
