import mqtt, { type IClientPublishOptions } from "mqtt";
import type { TelemetrySnapshot } from "@serial-relay/transport";

/** JSON body published for each telemetry record. */
export interface TelemetryMessage {
  ts: string;
  sequence: number;
  telemetry: string;
}

export interface TelemetryPublisher {
  readonly topic: string;
  publishSnapshot(snapshot: TelemetrySnapshot): Promise<void>;
  disconnect(): Promise<void>;
}

/** The part of an mqtt.js client the publisher drives. */
export interface MqttTelemetryClient {
  publishAsync(topic: string, message: string, opts: IClientPublishOptions): Promise<unknown>;
  endAsync(): Promise<void>;
}

export function toTelemetryMessage(snapshot: TelemetrySnapshot, now: () => Date = () => new Date()): TelemetryMessage {
  return {
    ts: snapshot.updatedAt ?? now().toISOString(),
    sequence: snapshot.sequence,
    telemetry: snapshot.value
  };
}

/**
 * Publishes telemetry snapshots to one topic. Messages are retained so a
 * subscriber that connects late still sees the latest record.
 */
export class MqttTelemetryPublisher implements TelemetryPublisher {
  constructor(
    private readonly client: MqttTelemetryClient,
    readonly topic: string
  ) {}

  static connect(brokerUrl: string, topic: string): MqttTelemetryPublisher {
    return new MqttTelemetryPublisher(mqtt.connect(brokerUrl), topic);
  }

  async publishSnapshot(snapshot: TelemetrySnapshot): Promise<void> {
    const payload = JSON.stringify(toTelemetryMessage(snapshot));
    await this.client.publishAsync(this.topic, payload, { qos: 0, retain: true });
  }

  async disconnect(): Promise<void> {
    await this.client.endAsync();
  }
}
