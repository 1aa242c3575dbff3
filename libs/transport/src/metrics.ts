export type TransportState = "STOPPED" | "STARTING" | "RUNNING" | "STOPPING";

export interface ReadWorkerMetrics {
  linesFramed: number;
  linesAnnotated: number;
  readTimeouts: number;
  readErrors: number;
  lastError?: string;
  lastLineAt?: string;
}

export interface WriteWorkerMetrics {
  commandsWritten: number;
  writeErrors: number;
  lastError?: string;
  lastWriteAt?: string;
}
