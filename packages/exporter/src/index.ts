import { loadConfig } from "./config.js";
import { buildApp } from "./app.js";
import { StatusFetcher } from "./status/index.js";
import { resolveBoundAddress } from "./watchdog/index.js";

async function main() {
  const config = loadConfig();
  const statusSource = new StatusFetcher(config.status);

  // The server listens on this host's tailnet address, so it has to be known first
  const boundAddress = await resolveBoundAddress(statusSource);

  const app = await buildApp({
    statusSource,
    boundAddress,
    config,
    onFatal: () => {
      app.close().then(
        () => process.exit(1),
        () => process.exit(1),
      );
    },
  });

  try {
    await app.listen({ host: boundAddress, port: config.port });
    app.log.info(`Exporter listening on ${boundAddress}:${config.port}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Startup failed:", err);
  process.exit(1);
});
