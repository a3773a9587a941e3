import Fastify, { type FastifyServerOptions } from "fastify";
import type { Store } from "@hostlog/db";
import type { GatewayConfig } from "./config.js";
import { ApiError, ConflictError } from "./errors.js";
import { Links } from "./render/fields.js";
import { registerHealth } from "./routes/health.js";
import { registerHosts } from "./routes/hosts.js";
import { registerEventTypes } from "./routes/eventtypes.js";

export interface AppOptions {
  store: Store;
  cfg: GatewayConfig;
  logger?: FastifyServerOptions["logger"];
}

export async function buildApp(opts: AppOptions) {
  const app = Fastify({ logger: opts.logger ?? true, ignoreTrailingSlash: true });
  const links = new Links(opts.cfg.api.prefix);

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ConflictError) {
      req.log.warn({ sqlState: err.constraintCode, message: err.message }, "store_conflict");
      return reply.code(err.statusCode).send({ error: err.code, message: err.message, sqlState: err.constraintCode });
    }
    if (err instanceof ApiError) {
      return reply.code(err.statusCode).send({ error: err.code, message: err.message });
    }
    // Fastify's own client errors, e.g. an unparseable JSON body
    if (err.statusCode !== undefined && err.statusCode >= 400 && err.statusCode < 500) {
      return reply.code(err.statusCode).send({ error: "bad_request", message: err.message });
    }

    req.log.error({ err }, "unhandled_error");
    return reply.code(500).send({ error: "internal_error" });
  });

  await registerHealth(app, opts.store);
  await registerHosts(app, { store: opts.store, cfg: opts.cfg, links });
  await registerEventTypes(app, { store: opts.store, cfg: opts.cfg, links });

  app.addHook("onClose", async () => {
    await opts.store.close();
  });

  return app;
}
