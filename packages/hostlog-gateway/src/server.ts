import { createDb, createMemoryStore, createPgStore, type Store } from "@hostlog/db";
import { loadEnv, type Env } from "./env.js";
import { configFromEnv, configHash } from "./config.js";
import { buildApp } from "./app.js";

function createStore(env: Env): Store {
  if (env.HOSTLOG_STORE === "memory") return createMemoryStore();
  // loadEnv already requires it for postgres
  if (env.DATABASE_URL === undefined) throw new Error("DATABASE_URL is required for the postgres store");
  return createPgStore(createDb(env.DATABASE_URL));
}

async function main() {
  const env = loadEnv();
  const cfg = configFromEnv(env);

  const app = await buildApp({ store: createStore(env), cfg });

  app.log.info({ config: { hash: configHash(cfg), store: env.HOSTLOG_STORE, ...cfg } }, "gateway_config");

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "gateway_shutdown");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "gateway_shutdown_failed");
          process.exit(1);
        }
      );
    });
  }

  await app.listen({ port: cfg.http.port, host: "0.0.0.0" });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
