import { randomUUID } from "node:crypto";

import { DEFAULT_BACKOFF_MS } from "./backoff.js";
import { SerializationError } from "./errors.js";
import type { JobRecord, JobStatus, TerminalJobStatus } from "./types.js";

export const DEFAULT_JOB_TIMEOUT_MS = 60_000;

export interface CreateJobOptions {
  id?: string;
  maxRetries: number;
  timeoutMs?: number;
  backoffMs?: number;
}

const JOB_STATUSES: readonly JobStatus[] = [
  "waiting",
  "processing",
  "completed",
  "failed",
  "retrying",
];

export function createJobRecord<TPayload, TResult = unknown>(
  queue: string,
  payload: TPayload,
  options: CreateJobOptions,
): JobRecord<TPayload, TResult> {
  const now = new Date().toISOString();
  return {
    id: options.id ?? randomUUID(),
    queue,
    payload,
    status: "waiting",
    attempts: 0,
    maxRetries: Math.max(0, options.maxRetries),
    timeoutMs: Math.max(1, options.timeoutMs ?? DEFAULT_JOB_TIMEOUT_MS),
    backoffMs: Math.max(0, options.backoffMs ?? DEFAULT_BACKOFF_MS),
    createdAt: now,
    updatedAt: now,
    error: null,
    result: null,
  };
}

export function canRetry(job: JobRecord<unknown, unknown>): boolean {
  return job.attempts < job.maxRetries;
}

export function isTerminal(status: JobStatus): status is TerminalJobStatus {
  return status === "completed" || status === "failed";
}

export function incrementRetry<TPayload, TResult>(
  job: JobRecord<TPayload, TResult>,
): JobRecord<TPayload, TResult> {
  return {
    ...job,
    attempts: job.attempts + 1,
    status: "retrying",
    updatedAt: advance(job.updatedAt),
  };
}

export function markProcessing<TPayload, TResult>(
  job: JobRecord<TPayload, TResult>,
): JobRecord<TPayload, TResult> {
  return { ...job, status: "processing", updatedAt: advance(job.updatedAt) };
}

export function markRetrying<TPayload, TResult>(
  job: JobRecord<TPayload, TResult>,
  error: string,
): JobRecord<TPayload, TResult> {
  return {
    ...job,
    status: "retrying",
    error,
    updatedAt: advance(job.updatedAt),
  };
}

export function markCompleted<TPayload, TResult>(
  job: JobRecord<TPayload, TResult>,
  result: TResult | null = null,
): JobRecord<TPayload, TResult> {
  return {
    ...job,
    status: "completed",
    result,
    error: null,
    updatedAt: advance(job.updatedAt),
  };
}

export function markFailed<TPayload, TResult>(
  job: JobRecord<TPayload, TResult>,
  error: string,
): JobRecord<TPayload, TResult> {
  return {
    ...job,
    status: "failed",
    error,
    updatedAt: advance(job.updatedAt),
  };
}

export function serializeJobRecord(job: JobRecord<unknown, unknown>): string {
  let encoded: string | undefined;
  try {
    // JSON.stringify drops fields whose value encodes to nothing.
    if (JSON.stringify(job.payload) === undefined) {
      throw new SerializationError(`Job ${job.id} payload has no JSON form`);
    }
    if (JSON.stringify(job.result) === undefined) {
      throw new SerializationError(`Job ${job.id} result has no JSON form`);
    }
    encoded = JSON.stringify(job);
  } catch (error) {
    if (error instanceof SerializationError) {
      throw error;
    }
    throw new SerializationError(`Failed to serialize job ${job.id}`, error);
  }
  if (encoded === undefined) {
    throw new SerializationError(`Failed to serialize job ${job.id}`);
  }
  return encoded;
}

export function deserializeJobRecord<TPayload, TResult = unknown>(
  raw: string,
): JobRecord<TPayload, TResult> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new SerializationError("Failed to deserialize job record", error);
  }
  if (!isJobRecord<TPayload, TResult>(decoded)) {
    throw new SerializationError("Stored value is not a job record");
  }
  return decoded;
}

function isJobRecord<TPayload, TResult>(
  value: unknown,
): value is JobRecord<TPayload, TResult> {
  if (typeof value !== "object" || value === null || !("payload" in value)) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.id === "string" &&
    typeof record.queue === "string" &&
    JOB_STATUSES.some((status) => status === record.status) &&
    typeof record.attempts === "number" &&
    typeof record.maxRetries === "number" &&
    typeof record.timeoutMs === "number" &&
    typeof record.backoffMs === "number" &&
    typeof record.createdAt === "string" &&
    typeof record.updatedAt === "string" &&
    (record.error === null || typeof record.error === "string") &&
    "result" in record
  );
}

// Transitions never move updatedAt backwards, even across clock skew.
function advance(previous: string): string {
  const last = Date.parse(previous);
  const now = Date.now();
  return new Date(Number.isNaN(last) ? now : Math.max(now, last + 1)).toISOString();
}
