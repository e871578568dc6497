import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

const DOTENV_LINE = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_.-]*)\s*=\s*(.*?)\s*$/;

const unquote = (raw: string): string => {
  const quote = raw[0];
  if ((quote === '"' || quote === "'") && raw.length >= 2 && raw.endsWith(quote)) {
    return raw.slice(1, -1);
  }
  // Unquoted values may carry a trailing comment.
  return raw.replace(/\s+#.*$/, "");
};

export function parseDotEnvLine(line: string): [string, string] | null {
  if (line.trimStart().startsWith("#")) {
    return null;
  }
  const match = DOTENV_LINE.exec(line);
  if (!match) {
    return null;
  }
  const [, key, rawValue] = match;
  return [key, unquote(rawValue)];
}

type RuntimeModeName = "local" | "prod";

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: (candidate: string) => boolean;
  readFileSync?: (candidate: string, encoding: "utf8") => string;
}

const modeCandidates = (rawMode: string | undefined): RuntimeModeName[] => {
  const mode = rawMode?.trim().toLowerCase();
  if (mode === "local" || mode === "prod") {
    return [mode];
  }
  return ["local", "prod"];
};

/**
 * Fills `processEnv` from `.env.<mode>` in the working directory and returns the file
 * used, if any. Variables already set win over the file. Without an explicit
 * `APP_MODE`, `.env.local` is tried before `.env.prod`.
 */
export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): string | null {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync = options.existsSync ?? fs.existsSync;
  const readFileSync = options.readFileSync ?? ((candidate: string, encoding: "utf8") => fs.readFileSync(candidate, encoding));

  const envFilePath = modeCandidates(processEnv.APP_MODE)
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return null;
  }

  const entries = readFileSync(envFilePath, "utf8")
    .split(/\r?\n/)
    .map(parseDotEnvLine)
    .filter((entry): entry is [string, string] => entry !== null);
  for (const [key, value] of entries) {
    processEnv[key] ??= value;
  }

  return envFilePath;
}

const runtimeModeSchema = z.enum(["prod", "local"]);
const distanceMetricSchema = z.enum(["cosine", "dot", "euclid", "manhattan"]);
const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });
const optionalTrimmedString = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed && trimmed.length > 0 ? trimmed : undefined;
  });

export const envSchema = z
  .object({
    APP_MODE: runtimeModeSchema.default("prod"),
    PORT: z.coerce.number().int().positive().default(3000),
    FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:8501"),
    ENABLE_INFRA_BOOTSTRAP: booleanFlagSchema.default(false),
    OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
    OPENAI_MODEL: z.string().min(1).default("gpt-3.5-turbo"),
    OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-ada-002"),
    OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    QDRANT_URL: optionalTrimmedString,
    QDRANT_API_KEY: optionalTrimmedString,
    QDRANT_COLLECTION: z.string().min(1).default("events-knowledge"),
    QDRANT_DISTANCE: distanceMetricSchema.default("cosine"),
    QDRANT_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    LOCAL_VECTOR_STORE_FILE: optionalTrimmedString,
    DOCUMENT_MAPPING_FILE: z.string().min(1).default("data/document_mapping.json"),
    RETRIEVAL_TOP_K: z.coerce.number().int().positive().max(50).default(5),
    USE_QUERY_REFORMULATION: booleanFlagSchema.default(true)
  })
  .superRefine((value, ctx) => {
    if (value.APP_MODE === "prod" && !value.QDRANT_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QDRANT_URL"],
        message: "QDRANT_URL is required in prod mode"
      });
    }
  });

export type Env = z.infer<typeof envSchema>;
export type DistanceMetric = z.infer<typeof distanceMetricSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return parsed.data;
}
