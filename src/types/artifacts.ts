export type BlobSyncMode = 'copy' | 'mirror';

export type ArtifactStep = 'storage-bootstrap' | 'storage-backup' | 'model-pull';

export type ArtifactStepStatus = 'ok' | 'skipped' | 'warning';

export interface ArtifactStepResult {
  step: ArtifactStep;
  status: ArtifactStepStatus;
  detail: string;
}

export interface ReconcileReport {
  steps: ArtifactStepResult[];
  warnings: string[];
}
