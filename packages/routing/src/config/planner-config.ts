/**
 * Layered JSON config for the planner.
 *
 * `configs/planner/default.json` holds the full config; named profiles in
 * `configs/planner/profiles/` override parts of it. Data file paths are
 * relative to the repository root (the directory containing `configs/`).
 */

import { readFileSync, readdirSync, existsSync } from "node:fs";
import { resolve, dirname, join, isAbsolute } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const plannerConfigSchema = z.object({
  /** Ceiling on waypoints for exact planning; k! orderings are enumerated */
  maxExactWaypoints: z.number().int().min(0).max(12),
  /** Label printed after distances */
  distanceUnit: z.string().min(1),
  data: z.object({
    roads: z.string().min(1),
    attractions: z.string().min(1),
  }),
});

export type PlannerConfig = z.infer<typeof plannerConfigSchema>;

const profileConfigSchema = z.object({
  name: z.string(),
  description: z.string(),
  overrides: z.object({
    maxExactWaypoints: plannerConfigSchema.shape.maxExactWaypoints.optional(),
    distanceUnit: plannerConfigSchema.shape.distanceUnit.optional(),
    data: plannerConfigSchema.shape.data.partial().optional(),
  }),
});

export type ProfileConfig = z.infer<typeof profileConfigSchema>;

export interface ProfileInfo {
  name: string;
  description: string;
}

/** Used when `default.json` is missing */
export const HARDCODED_DEFAULTS: PlannerConfig = {
  maxExactWaypoints: 9,
  distanceUnit: "miles",
  data: {
    roads: "data/roads.csv",
    attractions: "data/attractions.csv",
  },
};

// ---------------------------------------------------------------------------
// Config directory resolution
// ---------------------------------------------------------------------------

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/** Walk up from this module to the nearest `configs/planner/` */
export function findConfigsRoot(): string {
  let dir = __dirname;
  for (let i = 0; i < 10; i++) {
    const candidate = join(dir, "configs", "planner");
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  const repoRoot = resolve(__dirname, "..", "..", "..", "..");
  return join(repoRoot, "configs", "planner");
}

// ---------------------------------------------------------------------------
// Load
// ---------------------------------------------------------------------------

function readJson(filePath: string): unknown {
  return JSON.parse(readFileSync(filePath, "utf-8"));
}

/** Apply a profile's overrides on top of a full config */
export function applyOverrides(base: PlannerConfig, overrides: ProfileConfig["overrides"]): PlannerConfig {
  return plannerConfigSchema.parse({
    ...base,
    ...overrides,
    data: { ...base.data, ...overrides.data },
  });
}

/** Load the default config. Falls back to hardcoded defaults when the file is missing. */
export function loadDefaultConfig(configsRoot = findConfigsRoot()): PlannerConfig {
  const filePath = join(configsRoot, "default.json");
  if (!existsSync(filePath)) return HARDCODED_DEFAULTS;
  return plannerConfigSchema.parse(readJson(filePath));
}

/**
 * Load the planner config, optionally merged with a named profile.
 * Throws if the profile does not exist or either file is invalid.
 */
export function loadPlannerConfig(profileName?: string, configsRoot = findConfigsRoot()): PlannerConfig {
  const base = loadDefaultConfig(configsRoot);
  if (!profileName) return base;

  const profile = profileConfigSchema.parse(
    readJson(join(configsRoot, "profiles", `${profileName}.json`)),
  );
  return applyOverrides(base, profile.overrides);
}

/** List the available profiles; malformed files are reported and left out */
export function listProfiles(configsRoot = findConfigsRoot()): ProfileInfo[] {
  const profilesDir = join(configsRoot, "profiles");
  if (!existsSync(profilesDir)) return [];

  const profiles: ProfileInfo[] = [];
  for (const file of readdirSync(profilesDir).filter((f) => f.endsWith(".json")).sort()) {
    let raw: unknown;
    try {
      raw = readJson(join(profilesDir, file));
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
      console.warn(`[config] Skipping malformed profile ${file}: ${err.message}`);
      continue;
    }
    const parsed = profileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`[config] Skipping malformed profile ${file}`);
      continue;
    }
    profiles.push({ name: parsed.data.name, description: parsed.data.description });
  }
  return profiles;
}

/** Resolve a data path from the config against the repository root */
export function resolveDataPath(relativeOrAbsolute: string, configsRoot = findConfigsRoot()): string {
  if (isAbsolute(relativeOrAbsolute)) return relativeOrAbsolute;
  return resolve(configsRoot, "..", "..", relativeOrAbsolute);
}
