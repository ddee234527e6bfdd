import { buildApp } from "./app.js";
import { loadConfig, type ExporterConfig } from "./config.js";

function readConfig(): ExporterConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  }
}

const config = readConfig();
const app = await buildApp({ config });

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info(`Received ${signal}, shutting down`);
    void app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error(err);
        process.exit(1);
      },
    );
  });
}

// Start
const { port, host } = config.http;

try {
  await app.listen({ port, host });
  app.log.info(`Usage exporter listening on ${host}:${port}`);
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
