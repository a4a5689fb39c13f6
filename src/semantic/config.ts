import { z } from "zod";
import { DEFAULT_EMBEDDING_MODEL } from "./types";
import type { EmbeddingConfig } from "./types";

const embeddingEnvSchema = z.object({
  EMBEDDING_MODEL: z.string().trim().optional(),
  OPENAI_API_KEY: z.string().trim().optional(),
});

/** Read embedding settings from the environment. Blank values count as unset. */
export function resolveEmbeddingConfig(env: Record<string, string | undefined> = process.env): EmbeddingConfig {
  const parsed = embeddingEnvSchema.parse(env);
  const config: EmbeddingConfig = { model: parsed.EMBEDDING_MODEL || DEFAULT_EMBEDDING_MODEL };
  if (parsed.OPENAI_API_KEY) config.apiKey = parsed.OPENAI_API_KEY;
  return config;
}
