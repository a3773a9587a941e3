import type { FastifyInstance } from "fastify";
import type { Store } from "@hostlog/db";

export async function registerHealth(app: FastifyInstance, store: Store) {
  app.get("/health", async (req, reply) => {
    try {
      await store.ping();
    } catch (err) {
      req.log.warn({ err }, "store_unreachable");
      reply.code(503);
      return { ok: false };
    }
    return { ok: true };
  });
}
