export interface RecoverCallbacksResult {
  scanned: number;
  recovered: number;
}

/**
 * Recover Callbacks Port (Driving Port / Use Case Interface)
 * Re-queues callbacks left InProgress by a process that died mid-delivery
 */
export interface RecoverCallbacksPort {
  execute(): Promise<RecoverCallbacksResult>;
}
