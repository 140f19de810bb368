import { DeliveryOutcome } from '../../application/ports/input/deliver-callback.port';

export interface PoolStats {
  poolSize: number;
  activeWorkers: number;
  idleWorkers: number;
  /** Submissions blocked until a worker frees up (at most one with a single dispatcher). */
  waitingSubmissions: number;
  completedTasks: number;
  failedTasks: number;
  outcomes: Record<DeliveryOutcome, number>;
  averageProcessingTimeMs: number;
  isAccepting: boolean;
}

export interface WorkerStats {
  workerId: number;
  isActive: boolean;
  currentJobId?: string;
  tasksCompleted: number;
  tasksFailed: number;
  lastActivityAt: Date;
}

export interface TaskCompletedEvent {
  workerId: number;
  jobId: string;
  outcome: DeliveryOutcome;
  processingTimeMs: number;
}

export interface TaskFailedEvent {
  workerId: number;
  jobId: string;
  error: string;
  processingTimeMs: number;
}
