import { z } from "zod";

export const TransportConfigSchema = z.object({
  path: z.string().min(1),
  baudRate: z.number().int().positive().default(115200),
  readTimeoutMs: z.number().int().positive().default(500),
  idleDelayMs: z.number().int().nonnegative().default(10),
  timestampMarker: z.string().min(1).default("TS"),
  ageMarker: z.string().min(1).default("AGE")
});

export type TransportConfig = z.infer<typeof TransportConfigSchema>;
export type TransportConfigInput = z.input<typeof TransportConfigSchema>;
