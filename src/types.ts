export type JobStatus =
  | "waiting"
  | "processing"
  | "completed"
  | "failed"
  | "retrying";

export type TerminalJobStatus = Extract<JobStatus, "completed" | "failed">;

export interface JobRecord<TPayload, TResult = unknown> {
  id: string;
  queue: string;
  payload: TPayload;
  status: JobStatus;
  attempts: number;
  maxRetries: number;
  timeoutMs: number;
  backoffMs: number;
  createdAt: string;
  updatedAt: string;
  error: string | null;
  result: TResult | null;
}

export interface JobContext {
  attempt: number;
  /** Aborted when the job exceeds its timeout or the worker stops. */
  signal: AbortSignal;
}

export type JobHandler<TPayload, TResult = unknown> = (
  job: JobRecord<TPayload, TResult>,
  context: JobContext,
) => Promise<TResult>;

export interface QueueTimeouts {
  healthCheckMs: number;
  connectMs: number;
  enqueueMs: number;
  /** Deadline for any other single store call. */
  operationMs: number;
  /** How long one blocking move waits for a job. */
  blockMs: number;
  /** Worker pause after a failed health check. */
  unhealthyPauseMs: number;
  /** Worker pause after a store error. */
  errorPauseMs: number;
  resultPollMs: number;
}

export interface JobResult<TResult> {
  jobId: string;
  status: TerminalJobStatus;
  result: TResult | null;
  error: string | null;
}

export interface QueueStats {
  waiting: number;
  processing: number;
  succeeded: number;
  failed: number;
}

export interface QueueEvents<TPayload, TResult = unknown> {
  jobEnqueued: { job: JobRecord<TPayload, TResult> };
  jobReserved: { job: JobRecord<TPayload, TResult> };
  jobStarted: { job: JobRecord<TPayload, TResult> };
  jobCompleted: { job: JobRecord<TPayload, TResult>; durationMs: number };
  jobFailed: {
    job: JobRecord<TPayload, TResult>;
    error: unknown;
    willRetry: boolean;
  };
  idle: { durationMs: number };
  storeUnavailable: { pauseMs: number };
  error: { error: unknown };
}

export type QueueEventName<TPayload, TResult = unknown> = keyof QueueEvents<
  TPayload,
  TResult
>;

export type QueueEventListener<
  TPayload,
  K extends QueueEventName<TPayload, TResult>,
  TResult = unknown,
> = (payload: QueueEvents<TPayload, TResult>[K]) => void;
