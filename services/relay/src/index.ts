import { fileURLToPath } from "node:url";
import { loadRelayConfig } from "./config";
import { buildServer } from "./server";

async function main(): Promise<void> {
  try {
    const config = loadRelayConfig();
    const server = await buildServer({ config });
    await server.listen({ port: config.port, host: config.host });
    server.log.info(`serial-relay listening on ${config.host}:${String(config.port)}, device ${config.serialPath}`);

    const shutdown = (signal: NodeJS.Signals): void => {
      server.log.info(`serial-relay: received ${signal}, shutting down`);
      server.close().then(
        () => process.exit(0),
        (error: unknown) => {
          server.log.error(error, "serial-relay: shutdown failed");
          process.exit(1);
        }
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  } catch (error) {
    const message = error instanceof Error ? `${error.message}\n${error.stack ?? ""}` : String(error);
    process.stderr.write(`serial-relay failed to start: ${message}\n`);
    process.exit(1);
  }
}

const entryFile = process.argv[1];
const isCliEntry = entryFile && fileURLToPath(import.meta.url) === entryFile;

if (isCliEntry) {
  void main();
}
