// src/config/env.ts
// Purpose: Parse process environment once into a typed, validated configuration.

import { z } from "zod";

////////////////////////////////////////////////////////////////
// Schema
////////////////////////////////////////////////////////////////

const EnvSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),
    PORT: z.coerce.number().int().positive().default(3001),
    CORS_ORIGIN: z.string().default("http://localhost:3000"),

    STORE: z.enum(["postgres", "memory"]).default("postgres"),
    DATABASE_URL: z.string().url().optional(),
    REDIS_URL: z.string().url().optional(),

    JWT_SECRET: z.string().min(1),

    // 3 days
    MELDING_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(259200),
    MAIL_FROM: z.string().email().default("noreply@meldingen.example"),
  })
  .superRefine((env, ctx) => {
    if (env.STORE === "postgres" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when STORE=postgres",
      });
    }
  });

export type AppConfig = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  public readonly details: Record<string, string[] | undefined>;
  constructor(details: Record<string, string[] | undefined>) {
    const fields = Object.keys(details).join(", ");
    super(`Invalid environment configuration: ${fields}`);
    this.name = "ConfigError";
    this.details = details;
  }
}

export function loadConfig(
  source: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = EnvSchema.safeParse(source);

  if (!parsed.success) {
    throw new ConfigError(parsed.error.flatten().fieldErrors);
  }

  return parsed.data;
}
