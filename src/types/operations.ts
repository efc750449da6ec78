export type OperationOutcome =
  | { status: 'succeeded'; target: string; backupFile: string | null; warnings: string[] }
  | { status: 'failed'; target: string; backupFile: string | null; reason: string }
  | { status: 'cancelled'; target: string }
  | { status: 'rejected'; target: string; reason: string };

export type OperationStatus = OperationOutcome['status'];

export type RemovePhase = 'remove' | 'orphan-sweep' | 'cache-clean';

export interface PhaseReport {
  phase: RemovePhase;
  status: 'succeeded' | 'failed' | 'skipped';
}

export type RemoveOutcome = OperationOutcome & { phases: PhaseReport[] };

export interface ManagerStatus {
  id: string;
  displayName: string;
  installed: boolean;
}

export interface SystemInfo {
  installedCount: number;
  managers: ManagerStatus[];
  recentLog: string[];
}
