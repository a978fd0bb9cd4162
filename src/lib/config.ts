import { z } from "zod";
import { DEFAULT_DOCUMENT_FILE, DEFAULT_START_TIMEOUT_MS } from "./constants";
import { formatIssues } from "./document";
import { CliError } from "./errors";
import { normalizeInputPath } from "./utils";

const envSchema = z.object({
  DECKHAND_DOCKER_BIN: z.string().min(1).optional(),
  DECKHAND_FILE: z.string().min(1).default(DEFAULT_DOCUMENT_FILE),
  DECKHAND_PROJECT: z
    .string()
    .regex(/^[a-z0-9][a-z0-9_-]*$/, "must be lowercase letters, digits, '_' or '-'")
    .optional(),
  DECKHAND_START_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(DEFAULT_START_TIMEOUT_MS)
});

export interface DeckhandConfig {
  dockerBin?: string;
  files: string[];
  project?: string;
  startTimeoutMs: number;
}

/** Flags a command may pass; each one overrides the matching environment variable. */
export interface ConfigOverrides {
  file?: string[];
  project?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): DeckhandConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new CliError({
      kind: "validation",
      message: `Invalid environment: ${formatIssues(parsed.error)}`,
      hint: "Unset or correct the DECKHAND_* variables above."
    });
  }

  const files = (overrides.file && overrides.file.length > 0 ? overrides.file : [parsed.data.DECKHAND_FILE]).map(normalizeInputPath);
  return {
    dockerBin: parsed.data.DECKHAND_DOCKER_BIN,
    files,
    project: overrides.project ?? parsed.data.DECKHAND_PROJECT,
    startTimeoutMs: parsed.data.DECKHAND_START_TIMEOUT_MS
  };
}
