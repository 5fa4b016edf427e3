import type { ExporterConfig } from "@nas-exporter/shared";
import { buildApp } from "./app.js";
import { ConfigError, loadConfig, redactConfig } from "./config.js";
import { EXPORTER_NAME } from "./collector/index.js";
import { VERSION } from "./version.js";

function readConfig(): ExporterConfig {
  try {
    return loadConfig(process.argv.slice(2));
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();

const app = await buildApp({ config });
app.log.info({ version: VERSION, config: redactConfig(config) }, `Starting ${EXPORTER_NAME}`);

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info(`Received ${signal}, shutting down`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error(err);
        process.exit(1);
      },
    );
  });
}

// Start
const { host, port } = config.listen;

try {
  await app.listen({ port, host });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
