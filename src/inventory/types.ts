import type { WorkloadRecord } from "../proxy/types.js";

/** Runtime state of one container, as far as routing diagnostics care. */
export interface WorkloadState {
  running: boolean;
  status: string;
  /** Docker health status, or "none" when the image defines no healthcheck. */
  health: string;
}

/** Source of running workloads and their metadata. */
export interface WorkloadInventory {
  /** Running workloads that carry the routing label. */
  listWorkloads(): Promise<WorkloadRecord[]>;
  /** Labels of one workload, or an empty map when it no longer exists. */
  getLabels(id: string): Promise<Record<string, string>>;
  /** State of a workload by name or id, or null when it does not exist. */
  getState(nameOrId: string): Promise<WorkloadState | null>;
}

export interface LogWindow {
  /** Maximum number of trailing lines. */
  tail: number;
  /** Only lines newer than this many seconds. */
  sinceSeconds: number;
}

/** Recent output of the reverse proxy as one text blob. */
export interface LogSource {
  fetchRecent(window: LogWindow): Promise<string>;
}
