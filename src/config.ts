/**
 * Environment Configuration
 *
 * Validates and provides type-safe access to environment variables.
 * Read once at process start; a missing upstream credential is not a boot
 * failure, it is reported to each client session instead.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { DEFAULT_UPSTREAM_URL } from "./upstream-client.js";
import { DEFAULT_SUMMARIZER_MODEL } from "./summarizer.js";

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => ["true", "false", "1", "0", "yes", "no", ""].includes(value), {
    message: "Expected one of true/false/1/0/yes/no",
  })
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
  // ===== Upstream transcription =====
  DEEPGRAM_API_KEY: z.string().trim().default(""),
  DEEPGRAM_URL: z.string().url().default(DEFAULT_UPSTREAM_URL),
  DEEPGRAM_MODEL: z.string().min(1).default("nova-2"),
  DEEPGRAM_DIARIZE: booleanFlag.default("false"),
  AUDIO_SAMPLE_RATE: z.coerce.number().int().positive().default(16000),

  // ===== Summarizer (optional) =====
  OPENAI_API_KEY: z.string().trim().default(""),
  SUMMARIZER_MODEL: z.string().min(1).default(DEFAULT_SUMMARIZER_MODEL),

  // ===== Server =====
  PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGIN: z.string().min(1).default("*"),
});

export interface AppConfig {
  port: number;
  corsOrigin: string;
  upstream: {
    apiKey: string;
    url: string;
    model: string;
    diarize: boolean;
    sampleRate: number;
  };
  summarizer: {
    /** Null selects the local summarizer. */
    apiKey: string | null;
    model: string;
  };
}

/**
 * Parses the environment into an AppConfig.
 * @throws ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const vars = parsed.data;

  return {
    port: vars.PORT,
    corsOrigin: vars.CORS_ORIGIN,
    upstream: {
      apiKey: vars.DEEPGRAM_API_KEY,
      url: vars.DEEPGRAM_URL,
      model: vars.DEEPGRAM_MODEL,
      diarize: vars.DEEPGRAM_DIARIZE,
      sampleRate: vars.AUDIO_SAMPLE_RATE,
    },
    summarizer: {
      apiKey: vars.OPENAI_API_KEY || null,
      model: vars.SUMMARIZER_MODEL,
    },
  };
}
