export interface QueueKeys {
  waiting: string;
  processing: string;
  succeeded: string;
  failed: string;
  job: (id: string) => string;
}

export function queueKeys(queueKey: string): QueueKeys {
  return {
    waiting: `${queueKey}:waiting`,
    processing: `${queueKey}:processing`,
    succeeded: `${queueKey}:succeeded`,
    failed: `${queueKey}:failed`,
    job: (id) => `${queueKey}:job:${id}`,
  };
}
