import { z } from "zod";

export const RelayConfigSchema = z.object({
  serialPath: z.string().min(1).default("/dev/ttyACM0"),
  baudRate: z.coerce.number().int().positive().default(115200),
  readTimeoutMs: z.coerce.number().int().positive().default(500),
  idleDelayMs: z.coerce.number().int().nonnegative().default(10),
  port: z.coerce.number().int().nonnegative().default(5000),
  host: z.string().default("0.0.0.0"),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  mqttUrl: z.string().url().optional(),
  mqttTopic: z.string().min(1).default("serial-relay/telemetry"),
  mirrorIntervalMs: z.coerce.number().int().positive().default(250)
});

export type RelayConfig = z.infer<typeof RelayConfigSchema>;

/** The first CLI argument, when present, names the serial device. */
export function loadRelayConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2)
): RelayConfig {
  return RelayConfigSchema.parse({
    serialPath: argv[0] ?? env.SERIAL_PATH,
    baudRate: env.SERIAL_BAUD_RATE,
    readTimeoutMs: env.SERIAL_READ_TIMEOUT_MS,
    idleDelayMs: env.SERIAL_IDLE_DELAY_MS,
    port: env.RELAY_PORT ?? env.PORT,
    host: env.RELAY_HOST,
    logLevel: env.LOG_LEVEL,
    mqttUrl: env.MQTT_URL || undefined,
    mqttTopic: env.MQTT_TOPIC,
    mirrorIntervalMs: env.MIRROR_INTERVAL_MS
  });
}
