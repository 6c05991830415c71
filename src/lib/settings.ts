import fs from "node:fs";
import YAML from "yaml";
import { z } from "zod";
import type { AppConfig } from "../config.js";

const SettingsSchema = z.object({
  max_archive_size: z.number().int().positive().nullable().default(null),
  max_depth: z.number().int().nonnegative().default(3),
  max_passes: z.number().int().positive().default(10),
  max_tree_depth: z.number().int().positive().nullable().default(null),
  min_score: z.number().int().nonnegative().default(0),
  scores: z.record(z.string(), z.number().int()).default({}),
  min_key_sizes: z.record(z.string(), z.number().int().positive()).default({ rsa: 2048, dsa: 2048 })
});

export type Settings = z.infer<typeof SettingsSchema>;

export const DEFAULT_SETTINGS: Settings = SettingsSchema.parse({});

export function parseSettings(raw: unknown): Settings {
  const parsed = SettingsSchema.safeParse(raw ?? {});
  if (!parsed.success) throw new Error(`Invalid settings file: ${parsed.error.message}`);
  return parsed.data;
}

export function loadSettingsFromFile(settingsFile: string): Settings {
  const raw = fs.readFileSync(settingsFile, "utf8");
  return parseSettings(YAML.parse(raw));
}

// Environment overrides win over the settings file.
export function applyConfigOverrides(settings: Settings, config: AppConfig): Settings {
  return {
    ...settings,
    max_archive_size: config.HALO_MAX_ARCHIVE_SIZE ?? settings.max_archive_size,
    min_score: config.HALO_MIN_SCORE ?? settings.min_score
  };
}

export function getMaximumArchiveSize(settings: Settings): number | null {
  return settings.max_archive_size;
}

export function getScoreOrDefault(settings: Settings, rule: string, fallback: number): number {
  return settings.scores[rule] ?? fallback;
}

export function getMinimumKeySize(settings: Settings, keyType: string): number {
  return settings.min_key_sizes[keyType] ?? 0;
}
