import { config as loadEnv } from "dotenv";
import { join, resolve } from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";
import { parseByteSize } from "./util/byte-size.js";

function flag(defaultValue: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === "") return defaultValue;
      const normalized = value.trim().toLowerCase();
      if (["true", "1", "yes"].includes(normalized)) return true;
      if (["false", "0", "no"].includes(normalized)) return false;
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected true or false, got "${value}"`,
      });
      return z.NEVER;
    });
}

function positiveInt(defaultValue: number, max?: number) {
  const base = z.coerce.number().int().positive();
  return (max ? base.max(max) : base).default(defaultValue);
}

function pathList() {
  return z
    .string()
    .optional()
    .transform((value) =>
      (value ?? "")
        .split(",")
        .map((entry) => entry.trim())
        .filter(Boolean)
    );
}

const required = () => z.string({ required_error: "required" }).trim().min(1, "required");

export const EnvSchema = z.object({
  GITLAB_BASE_URL: required().pipe(z.string().url()),
  GITLAB_TOKEN: required(),
  GITHUB_TOKEN: required(),
  GITHUB_ORG: required(),
  GITHUB_API_URL: z.string().url().default("https://api.github.com"),
  GITHUB_GIT_URL: z.string().url().default("https://github.com"),
  INCLUDE_ARCHIVED: flag(true),
  LFS_ABOVE: z
    .string()
    .default("100MB")
    .transform((value, ctx) => {
      const parsed = parseByteSize(value);
      if (!parsed.ok) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: parsed.error });
        return z.NEVER;
      }
      return { label: value.trim(), bytes: parsed.bytes };
    }),
  MIGRATE_CONCURRENCY: positiveInt(3),
  LFS_CONCURRENCY: positiveInt(4),
  SKIP_EXISTING_DESTINATION: flag(true),
  REWRITE_SUBMODULES: flag(false),
  DRY_RUN: flag(false),
  MIRROR_ROOT: z.string().trim().min(1).optional(),
  PAGE_SIZE: positiveInt(100, 100),
  RETRY_ATTEMPTS: positiveInt(5),
  INCLUDE_REPOS: pathList(),
  EXCLUDE_REPOS: pathList(),
});

export interface AppConfig {
  gitlab: {
    baseUrl: string;
    token: string;
    pageSize: number;
  };
  github: {
    token: string;
    org: string;
    apiUrl: string;
    gitUrl: string;
  };
  includeArchived: boolean;
  lfsThreshold: { label: string; bytes: number };
  migrateConcurrency: number;
  lfsConcurrency: number;
  skipExistingNonEmpty: boolean;
  rewriteSubmodules: boolean;
  dryRun: boolean;
  retryAttempts: number;
  includeRepos: string[];
  excludeRepos: string[];
  paths: {
    root: string;
    sourceDir: string;
    stateDir: string;
    logsDir: string;
  };
}

/** Validates the environment. Reports every problem at once. */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const parsed = EnvSchema.safeParse({
    ...env,
    // Name used by earlier `.env` files
    SKIP_EXISTING_DESTINATION: env.SKIP_EXISTING_DESTINATION ?? env.SKIP_EXISTING_GH,
  });
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const root = resolve(cwd, values.MIRROR_ROOT ?? "migration-work");

  return {
    gitlab: {
      baseUrl: values.GITLAB_BASE_URL,
      token: values.GITLAB_TOKEN,
      pageSize: values.PAGE_SIZE,
    },
    github: {
      token: values.GITHUB_TOKEN,
      org: values.GITHUB_ORG,
      apiUrl: values.GITHUB_API_URL,
      gitUrl: values.GITHUB_GIT_URL,
    },
    includeArchived: values.INCLUDE_ARCHIVED,
    lfsThreshold: values.LFS_ABOVE,
    migrateConcurrency: values.MIGRATE_CONCURRENCY,
    lfsConcurrency: values.LFS_CONCURRENCY,
    skipExistingNonEmpty: values.SKIP_EXISTING_DESTINATION,
    rewriteSubmodules: values.REWRITE_SUBMODULES,
    dryRun: values.DRY_RUN,
    retryAttempts: values.RETRY_ATTEMPTS,
    includeRepos: values.INCLUDE_REPOS,
    excludeRepos: values.EXCLUDE_REPOS,
    paths: {
      root,
      sourceDir: join(root, "source"),
      stateDir: join(root, "state"),
      logsDir: join(root, "logs"),
    },
  };
}

/** Reads `.env` (if present) into `process.env`, then validates it. */
export function loadConfigFromEnvironment(): AppConfig {
  loadEnv();
  return loadConfig(process.env);
}
