import "dotenv/config";
import { z } from "zod";
import { DatabaseUrlSchema } from "@hostlog/db";

const EnvSchema = z.object({
  HOSTLOG_STORE: z.enum(["postgres", "memory"]).default("postgres"),
  DATABASE_URL: DatabaseUrlSchema.optional(),

  HOSTLOG_PORT: z.coerce.number().int().positive().default(8787),
  HOSTLOG_API_PREFIX: z.string().startsWith("/").default("/api/v1"),

  HOSTLOG_DEFAULT_LIMIT: z.coerce.number().int().positive().default(10),
  HOSTLOG_MAX_LIMIT: z.coerce.number().int().positive().default(100)
}).refine(env => env.HOSTLOG_STORE === "memory" || env.DATABASE_URL !== undefined, {
  message: "Required when HOSTLOG_STORE is postgres",
  path: ["DATABASE_URL"]
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("\n");
    throw new Error(`Invalid environment:\n${msg}`);
  }
  return parsed.data;
}
