import { buildServer } from "./app";
import { loadConfig } from "./config";
import { createContext } from "./context";

const start = async () => {
  const config = loadConfig();
  const ctx = createContext(config);
  await ctx.locator.ensureDirectories();
  const server = await buildServer(ctx);

  try {
    await server.listen({ port: config.port, host: config.host });
    server.log.info({ dataDir: config.dirs.data }, "Video Trimmer running");
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      server.log.info({ signal }, "Shutting down");
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          server.log.error(err);
          process.exit(1);
        },
      );
    });
  }
};

start().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
