import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const BooleanFromEnv = z.preprocess((value) => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") return true;
    if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off") return false;
  }
  return value;
}, z.boolean());

function resolveDefaultVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }
  try {
    const thisFile = fileURLToPath(import.meta.url);
    const packageJsonPath = path.resolve(path.dirname(thisFile), "../package.json");
    const raw = fs.readFileSync(packageJsonPath, "utf8");
    const parsed: unknown = JSON.parse(raw);
    if (parsed && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") {
      return parsed.version;
    }
    return "dev";
  } catch {
    return "dev";
  }
}

const EnvSchema = z.object({
  HALO_CONFIG_FILE: z.string().default("./config/halo.default.yaml"),
  HALO_TMP_DIR: z.string().default(os.tmpdir()),
  HALO_MAX_ARCHIVE_SIZE: z.coerce.number().int().positive().optional(),
  HALO_MIN_SCORE: z.coerce.number().int().nonnegative().optional(),
  HALO_FAIL_ON_FINDINGS: BooleanFromEnv.default(false),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  VERSION: z.string().default(resolveDefaultVersion())
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }

  if (!fs.existsSync(parsed.data.HALO_TMP_DIR)) {
    throw new Error(`Invalid environment: HALO_TMP_DIR does not exist: ${parsed.data.HALO_TMP_DIR}`);
  }

  return parsed.data;
}
