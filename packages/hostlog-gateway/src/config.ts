import crypto from "node:crypto";
import { z } from "zod";
import type { Env } from "./env.js";

export const GatewayConfigSchema = z.object({
  http: z.object({
    port: z.number().int().positive()
  }),
  api: z.object({
    prefix: z.string().startsWith("/")
  }),
  pagination: z
    .object({
      defaultLimit: z.number().int().positive(),
      maxLimit: z.number().int().positive()
    })
    .refine((p) => p.defaultLimit <= p.maxLimit, {
      message: "defaultLimit must not exceed maxLimit",
      path: ["defaultLimit"]
    })
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;

export function configFromEnv(env: Env): GatewayConfig {
  return GatewayConfigSchema.parse({
    http: { port: env.HOSTLOG_PORT },
    api: { prefix: env.HOSTLOG_API_PREFIX },
    pagination: { defaultLimit: env.HOSTLOG_DEFAULT_LIMIT, maxLimit: env.HOSTLOG_MAX_LIMIT }
  });
}

export function configHash(cfg: GatewayConfig) {
  return crypto.createHash("sha256").update(JSON.stringify(cfg)).digest("hex").slice(0, 12);
}
