import { z } from "zod";
import { DEFAULT_EMBEDDING_DIMENSION } from "./embedding/dimension.ts";
import { ConfigurationError } from "./lib/errors.ts";
import { err, ok, type Result } from "./lib/result.ts";

const optionalString = z
  .string()
  .optional()
  .transform((s) => (s && s.trim() ? s.trim() : undefined));

/** Width of the `vector` column created by the migrations. */
export const SCHEMA_VECTOR_DIMENSION = DEFAULT_EMBEDDING_DIMENSION;

const configSchema = z
  .object({
    databaseUrl: optionalString,
    logLevel: z.string().default("info"),
    embeddingBackend: z.enum(["api", "local"]).default("api"),
    voyageApiKey: optionalString,
    embeddingModel: z.string().default("voyage-3-large"),
    embeddingDimension: z.coerce.number().int().positive().default(DEFAULT_EMBEDDING_DIMENSION),
    embeddingTimeoutSeconds: z.coerce.number().positive().default(60),
    githubToken: optionalString,
    githubOrg: optionalString,
    jiraUrl: optionalString,
    jiraEmail: optionalString,
    jiraApiToken: optionalString,
    jiraProjectKeys: z
      .string()
      .default("")
      .transform((s) =>
        s
          .split(",")
          .map((k) => k.trim())
          .filter(Boolean),
      ),
    scorePrWindow: z.coerce.number().int().positive().default(50),
    scoreEvidenceCount: z.coerce.number().int().positive().default(3),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.embeddingBackend === "api" && !cfg.voyageApiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["voyageApiKey"],
        message: "VOYAGE_API_KEY is required when EMBEDDING_BACKEND=api",
      });
    }
    if (cfg.databaseUrl && cfg.embeddingDimension !== SCHEMA_VECTOR_DIMENSION) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["embeddingDimension"],
        message: `EMBEDDING_DIMENSION must be ${SCHEMA_VECTOR_DIMENSION} when DATABASE_URL is set (the embeddings table stores vector(${SCHEMA_VECTOR_DIMENSION}))`,
      });
    }
  });

type ParsedConfig = z.infer<typeof configSchema>;

export type GithubCredentials = {
  token: string;
  org: string;
};

export type JiraCredentials = {
  url: string;
  email: string;
  apiToken: string;
  projectKeys: string[];
};

export type AppConfig = {
  databaseUrl: string | undefined;
  logLevel: string;
  embedding: {
    backend: "api" | "local";
    apiKey: string | undefined;
    model: string;
    dimensions: number;
    timeoutSeconds: number;
  };
  github: GithubCredentials | undefined;
  jira: JiraCredentials | undefined;
  scoring: {
    prWindow: number;
    evidenceCount: number;
  };
};

function toAppConfig(parsed: ParsedConfig): AppConfig {
  const github =
    parsed.githubToken && parsed.githubOrg
      ? { token: parsed.githubToken, org: parsed.githubOrg }
      : undefined;

  const jira =
    parsed.jiraUrl && parsed.jiraEmail && parsed.jiraApiToken
      ? {
          url: parsed.jiraUrl.replace(/\/+$/, ""),
          email: parsed.jiraEmail,
          apiToken: parsed.jiraApiToken,
          projectKeys: parsed.jiraProjectKeys,
        }
      : undefined;

  return {
    databaseUrl: parsed.databaseUrl,
    logLevel: parsed.logLevel,
    embedding: {
      backend: parsed.embeddingBackend,
      apiKey: parsed.voyageApiKey,
      model: parsed.embeddingModel,
      dimensions: parsed.embeddingDimension,
      timeoutSeconds: parsed.embeddingTimeoutSeconds,
    },
    github,
    jira,
    scoring: {
      prWindow: parsed.scorePrWindow,
      evidenceCount: parsed.scoreEvidenceCount,
    },
  };
}

/**
 * Parse configuration from an environment-like record.
 * Returns a ConfigurationError listing every invalid setting instead of exiting.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Result<AppConfig, ConfigurationError> {
  const result = configSchema.safeParse({
    databaseUrl: env.DATABASE_URL,
    logLevel: env.LOG_LEVEL,
    embeddingBackend: env.EMBEDDING_BACKEND,
    voyageApiKey: env.VOYAGE_API_KEY,
    embeddingModel: env.EMBEDDING_MODEL,
    embeddingDimension: env.EMBEDDING_DIMENSION,
    embeddingTimeoutSeconds: env.EMBEDDING_TIMEOUT_SECONDS,
    githubToken: env.GITHUB_TOKEN,
    githubOrg: env.GITHUB_ORG,
    jiraUrl: env.JIRA_URL,
    jiraEmail: env.JIRA_EMAIL,
    jiraApiToken: env.JIRA_API_TOKEN,
    jiraProjectKeys: env.JIRA_PROJECT_KEYS,
    scorePrWindow: env.SCORE_PR_WINDOW,
    scoreEvidenceCount: env.SCORE_EVIDENCE_COUNT,
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    const setting = result.error.issues[0]?.path.join(".");
    return err(new ConfigurationError(`Invalid configuration: ${details}`, setting));
  }

  return ok(toAppConfig(result.data));
}

export function requireGithub(
  config: AppConfig,
): Result<GithubCredentials, ConfigurationError> {
  if (!config.github) {
    return err(
      new ConfigurationError(
        "GitHub integration is not configured. Set GITHUB_TOKEN and GITHUB_ORG.",
        "github",
      ),
    );
  }
  return ok(config.github);
}

export function requireJira(
  config: AppConfig,
): Result<JiraCredentials, ConfigurationError> {
  if (!config.jira) {
    return err(
      new ConfigurationError(
        "Jira integration is not configured. Set JIRA_URL, JIRA_EMAIL and JIRA_API_TOKEN.",
        "jira",
      ),
    );
  }
  return ok(config.jira);
}

export function requireDatabaseUrl(
  config: AppConfig,
): Result<string, ConfigurationError> {
  if (!config.databaseUrl) {
    return err(new ConfigurationError("DATABASE_URL is not set", "databaseUrl"));
  }
  return ok(config.databaseUrl);
}
