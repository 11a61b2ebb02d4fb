import { readFile } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { ConfigError, ValidationError } from "../../domain/common/errors";
import { AppConfigSchema, type AppConfig } from "./schema";

export type LoadConfigArgs = {
  configPath?: string;
  overrides?: Partial<AppConfig>;
};

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function deepMerge(base: UnknownRecord, next: UnknownRecord): UnknownRecord {
  const out: UnknownRecord = { ...base };
  for (const [key, value] of Object.entries(next)) {
    const prior = out[key];
    if (isRecord(prior) && isRecord(value)) {
      out[key] = deepMerge(prior, value);
    } else if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

function envString(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim().length > 0 ? v : undefined;
}

function envBool(name: string): boolean | undefined {
  const raw = envString(name);
  if (!raw) return undefined;
  if (raw === "true" || raw === "1") return true;
  if (raw === "false" || raw === "0") return false;
  return undefined;
}

function configFromEnv(): UnknownRecord {
  return {
    logLevel: envString("LOG_LEVEL"),
    allow: envString("STRIP_TAGS_ALLOW"),
    squeeze: envBool("STRIP_TAGS_SQUEEZE"),
    stripComments: envBool("STRIP_TAGS_STRIP_COMMENTS"),
  };
}

async function readConfigFile(configPath: string): Promise<UnknownRecord> {
  const abs = path.isAbsolute(configPath)
    ? configPath
    : path.join(process.cwd(), configPath);
  let raw: string;
  try {
    raw = await readFile(abs, "utf8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${abs}`, error);
  }

  const ext = path.extname(abs).toLowerCase();
  try {
    if (ext === ".yaml" || ext === ".yml") {
      const parsed = YAML.parse(raw) as unknown;
      return isRecord(parsed) ? parsed : {};
    }
    const parsed = JSON.parse(raw) as unknown;
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${abs}`, error);
  }
}

/**
 * Resolves configuration from, lowest precedence first: the optional config
 * file, environment variables, then explicit overrides (CLI flags).
 */
export async function loadConfig(
  args: LoadConfigArgs = {},
): Promise<AppConfig> {
  const fileConfig = args.configPath
    ? await readConfigFile(args.configPath)
    : {};
  const envConfig = configFromEnv();
  const merged = deepMerge(
    deepMerge(fileConfig, envConfig),
    args.overrides ?? {},
  );

  const parsed = AppConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new ValidationError(
      `Invalid configuration:\n${issues}`,
      parsed.error,
    );
  }
  return parsed.data;
}
