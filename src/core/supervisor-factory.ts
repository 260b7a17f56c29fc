import type { SupervisorConfig } from '../config/supervisor-config.js';
import { ArtifactReconciler } from '../services/artifact-reconciler.js';
import { RcloneBlobStore, type BlobStore } from '../services/blob-store.js';
import { CandidateVerifier } from '../services/candidate-verifier.js';
import { CycleDecider } from '../services/cycle-decider.js';
import { FileCycleStateStore } from '../services/cycle-state-store.js';
import { CommandDependencyInstaller, type DependencyInstaller } from '../services/dependency-installer.js';
import { HistoryLog } from '../services/history-log.js';
import { NodeProcessSupervisor } from '../services/process-supervisor.js';
import { ProductionHandoff, type SignalSource } from '../services/production-handoff.js';
import { UpdateCycleService } from '../services/update-cycle.js';
import { GitVersionControl, type VersionControl } from '../services/version-control.js';
import type { CycleStateStore } from '../types/update-cycle.js';
import type { Clock, CommandRunner, HealthProbe, ProcessSupervisor } from '../types/process.js';
import { setLogDirectory } from '../utils/logger.js';
import { Supervisor } from './supervisor.js';

/** Swap any collaborator; everything else is built from the config. */
export interface SupervisorOverrides {
  commandRunner?: CommandRunner;
  versionControl?: VersionControl;
  installer?: DependencyInstaller;
  blobStore?: BlobStore;
  processSupervisor?: ProcessSupervisor;
  healthProbe?: HealthProbe;
  clock?: Clock;
  stateStore?: CycleStateStore;
  history?: HistoryLog;
  signalSource?: SignalSource;
}

export interface SupervisorComponents {
  supervisor: Supervisor;
  stateStore: CycleStateStore;
  history: HistoryLog;
}

function splitCommand(command: readonly string[], key: string): { executable: string; args: string[] } {
  const [executable, ...args] = command;
  if (!executable) {
    throw new Error(`${key} must name an executable.`);
  }
  return { executable, args };
}

export function createHistoryLog(config: SupervisorConfig): HistoryLog {
  return new HistoryLog({ filePath: config.historyPath, limit: config.historyLimit });
}

export function createStateStore(config: SupervisorConfig): FileCycleStateStore {
  return new FileCycleStateStore({ markerPath: config.markerPath });
}

export function createSupervisor(
  config: SupervisorConfig,
  overrides: SupervisorOverrides = {},
): SupervisorComponents {
  setLogDirectory(config.logDir);

  const history = overrides.history ?? createHistoryLog(config);
  const stateStore = overrides.stateStore ?? createStateStore(config);
  const processSupervisor = overrides.processSupervisor ?? new NodeProcessSupervisor();
  const versionControl =
    overrides.versionControl ??
    new GitVersionControl({
      workspaceRoot: config.workspaceRoot,
      gitBinary: config.git.binary,
      timeoutMs: config.git.timeoutMs,
      commandRunner: overrides.commandRunner,
    });
  const installer =
    overrides.installer ??
    new CommandDependencyInstaller({
      workspaceRoot: config.workspaceRoot,
      command: config.install.command,
      timeoutMs: config.install.timeoutMs,
      commandRunner: overrides.commandRunner,
    });
  const blobStore =
    overrides.blobStore ??
    new RcloneBlobStore({
      remoteName: config.artifacts.remoteName,
      rcloneBinary: config.artifacts.rcloneBinary,
      timeoutMs: config.artifacts.timeoutMs,
      commandRunner: overrides.commandRunner,
    });

  const server = splitCommand(config.service.command, 'SERVICE_COMMAND');

  const verifier = new CandidateVerifier({
    processSupervisor,
    launch: {
      command: server.executable,
      args: server.args,
      cwd: config.workspaceRoot,
      stdio: 'capture',
      logPath: config.candidate.logPath,
    },
    healthUrl: config.health.url,
    pollIntervalMs: config.health.pollIntervalMs,
    maxAttempts: config.health.maxAttempts,
    probeTimeoutMs: config.health.probeTimeoutMs,
    stopTimeoutMs: config.candidate.stopTimeoutMs,
    diagnosticLines: config.health.diagnosticLines,
    healthProbe: overrides.healthProbe,
    clock: overrides.clock,
  });

  const decider = new CycleDecider({
    versionControl,
    stateStore,
    history,
    rollbackInstaller: config.install.reinstallOnRollback ? installer : undefined,
  });

  const supervisor = new Supervisor({
    updateCycle: new UpdateCycleService({ stateStore, versionControl, installer, verifier, decider, history }),
    reconciler: new ArtifactReconciler({
      blobStore,
      history,
      storageDir: config.artifacts.storageDir,
      remoteStoragePath: config.artifacts.remoteStoragePath,
      modelDir: config.artifacts.modelDir,
      remoteModelPath: config.artifacts.remoteModelPath,
    }),
    handoff: new ProductionHandoff({
      processSupervisor,
      command: server.executable,
      baseArgs: server.args,
      cwd: config.workspaceRoot,
      signalSource: overrides.signalSource,
    }),
  });

  return { supervisor, stateStore, history };
}
