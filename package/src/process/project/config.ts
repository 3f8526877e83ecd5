/**
 * 配置读取工具模块。
 *
 * 职责说明：
 * 1. 从项目根目录加载 `.env`，仅加载当前项目，不向上级目录递归查找。
 * 2. 读取 `botwire.json` 并将 `${ENV_KEY}` 占位符解析为环境变量值。
 * 3. 用 zod 校验并补齐默认值，校验失败抛出 ConfigError（列出所有出错字段）。
 */
import dotenv from "dotenv";
import fs from "fs-extra";
import { z } from "zod";
import { ConfigError, describeError } from "../../errors.js";
import { getConfigPath, getDotenvPath } from "./paths.js";

const logLevelSchema = z.enum(["debug", "info", "action", "warn", "error"]);

const maxAttemptsSchema = z
  .union([z.number().int().positive(), z.literal("unlimited")])
  .transform((value) => (value === "unlimited" ? Number.POSITIVE_INFINITY : value));

export const botwireConfigSchema = z.object({
  token: z.string().min(1),
  api: z.object({
    url: z.string().url(),
    basePath: z.string().default("/bot/v1/"),
  }),
  polling: z
    .object({
      pollTimeSeconds: z.number().int().min(0).default(15),
      requestTimeoutMs: z.number().int().positive().default(30_000),
      initialCursor: z.union([z.number().int().min(0), z.string()]).default(0),
    })
    .default({}),
  dispatch: z
    .object({
      concurrency: z.number().int().min(1).max(64).default(1),
    })
    .default({}),
  retry: z
    .object({
      maxAttempts: maxAttemptsSchema.default(5),
      baseDelayMs: z.number().min(0).default(1000),
      maxDelayMs: z.number().min(0).default(30_000),
      factor: z.number().min(1).default(2),
    })
    .default({}),
  logging: z
    .object({
      level: logLevelSchema.default("info"),
      /** Relative to the project root. Console-only when omitted. */
      dir: z.string().min(1).optional(),
    })
    .default({}),
  /** Bot module loaded by `botwire run`, relative to the project root. */
  entry: z.string().min(1).optional(),
});

export type BotwireConfig = z.infer<typeof botwireConfigSchema>;
export type BotwireConfigInput = z.input<typeof botwireConfigSchema>;

export function loadProjectDotenv(projectRoot: string): void {
  // 仅加载项目根目录 .env（不向上搜索）
  dotenv.config({ path: getDotenvPath(projectRoot) });
}

/**
 * Replaces whole-string `${ENV_KEY}` values with `process.env[ENV_KEY]`.
 * Unset variables become `undefined` so validation reports them as missing.
 */
export function resolveEnvPlaceholdersDeep(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env,
): unknown {
  if (typeof value === "string") {
    const match = value.match(/^\$\{([A-Z0-9_]+)\}$/);
    if (!match) return value;
    const envVar = match[1];
    return envVar ? env[envVar] : value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvPlaceholdersDeep(item, env));
  }

  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = resolveEnvPlaceholdersDeep(v, env);
    }
    return out;
  }

  return value;
}

export function parseBotwireConfig(raw: unknown, source: string): BotwireConfig {
  const parsed = botwireConfigSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  const issues = parsed.error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
  throw new ConfigError(source, issues);
}

export async function loadBotwireConfig(projectRoot: string): Promise<BotwireConfig> {
  loadProjectDotenv(projectRoot);

  const configPath = getConfigPath(projectRoot);
  if (!(await fs.pathExists(configPath))) {
    throw new ConfigError(configPath, ["file not found"]);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (error) {
    throw new ConfigError(configPath, [`invalid JSON: ${describeError(error)}`]);
  }
  return parseBotwireConfig(resolveEnvPlaceholdersDeep(raw), configPath);
}
