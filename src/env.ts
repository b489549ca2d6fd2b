// src/env.ts
import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  STORE_DRIVER: z.enum(["memory", "file", "postgres"]).default("file"),
  DATA_DIR: z.string().min(1).default("./data"),
  DATABASE_URL: z.string().url().optional(),
  STORE_RETRIES: z.coerce.number().int().nonnegative().default(2),
  STORE_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(50),
}).refine((env) => env.STORE_DRIVER !== "postgres" || !!env.DATABASE_URL, {
  message: "DATABASE_URL is required when STORE_DRIVER=postgres",
  path: ["DATABASE_URL"],
});

export type StoreDriver = z.infer<typeof EnvSchema>["STORE_DRIVER"];

export function loadEnv(source: NodeJS.ProcessEnv = process.env) {
  const raw = EnvSchema.parse(source);
  return {
    PORT: raw.PORT,
    STORE: {
      DRIVER: raw.STORE_DRIVER,
      DATA_DIR: raw.DATA_DIR,
      DATABASE_URL: raw.DATABASE_URL,
      RETRIES: raw.STORE_RETRIES,
      RETRY_DELAY_MS: raw.STORE_RETRY_DELAY_MS,
    },
  };
}

export type Env = ReturnType<typeof loadEnv>;
