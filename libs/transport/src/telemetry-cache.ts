export interface TelemetrySnapshot {
  value: string;
  sequence: number;
  updatedAt?: string;
}

/** Single slot holding the most recent telemetry record. */
export class TelemetryCache {
  private value = "";
  private sequence = 0;
  private updatedAt?: string;

  publish(record: string): void {
    this.value = record;
    this.sequence += 1;
    this.updatedAt = new Date().toISOString();
  }

  read(): string {
    return this.value;
  }

  snapshot(): TelemetrySnapshot {
    return { value: this.value, sequence: this.sequence, updatedAt: this.updatedAt };
  }
}
