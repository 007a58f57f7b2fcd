// Types for the pipeline state machine
export type PipelineState =
  | "idle"
  | "starting"
  | "running"
  | "stopping"
  | "stopped"
  | "error";

export interface StateTransition {
  from: PipelineState;
  to: PipelineState;
}

export interface StopReport {
  alreadyStopped: boolean;
  timedOut: string[];
}

export interface QueueStats {
  size: number;
  capacity: number;
  dropped: number;
}

export interface WorkerStats {
  running: boolean;
  processed: number;
  failed: number;
  abandoned: boolean;
}

export interface PipelineStats {
  state: PipelineState;
  queues: Record<string, QueueStats>;
  workers: Record<string, WorkerStats>;
  droppedPartials: number;
  droppedFinalized: number;
  discardedAtShutdown: number;
}
