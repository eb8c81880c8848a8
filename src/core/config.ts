import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";

import { ConfigError } from "./errors.js";
import { findRepoRoot } from "./utils.js";

export const CONFIG_FILE_NAME = ".needs-gate.yaml";

export const GateConfigSchema = z
  .object({
    allowed_failures: z.array(z.string()).default([]),
    allowed_skips: z.array(z.string()).default([]),

    // Treat `cancelled` like `failure` for jobs allowed to fail.
    allow_cancelled: z.boolean().default(false),

    output_file: z.string().min(1).optional(),
    summary_file: z.string().min(1).optional(),
    log_file: z.string().min(1).optional(),
  })
  .strict();

export type GateConfig = z.infer<typeof GateConfigSchema>;

export type ConfigSource = "explicit" | "repo" | "defaults";

export type LoadedGateConfig = {
  config: GateConfig;
  configPath: string | null;
  source: ConfigSource;
};

// =============================================================================
// LOADING
// =============================================================================

export function defaultGateConfig(): GateConfig {
  return GateConfigSchema.parse({});
}

export function resolveGateConfig(args: {
  explicitPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}): LoadedGateConfig {
  const env = args.env ?? process.env;
  if (args.explicitPath) {
    const configPath = path.resolve(args.cwd ?? process.cwd(), args.explicitPath);
    return { config: loadGateConfig(configPath, env), configPath, source: "explicit" };
  }

  const repoRoot = findRepoRoot(args.cwd ?? process.cwd());
  if (repoRoot) {
    const configPath = path.join(repoRoot, CONFIG_FILE_NAME);
    if (fs.existsSync(configPath)) {
      return { config: loadGateConfig(configPath, env), configPath, source: "repo" };
    }
  }

  return { config: defaultGateConfig(), configPath: null, source: "defaults" };
}

export function loadGateConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): GateConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config not found at: ${configPath}`);
  }
  const raw = fs.readFileSync(configPath, "utf8");
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse YAML config: ${configPath}`, err);
  }

  // An empty file loads as undefined.
  const expanded = expandEnv(doc ?? {}, env);

  const parsed = GateConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config: ${configPath}\n${parsed.error.toString()}`);
  }

  return parsed.data;
}

// =============================================================================
// INTERNALS
// =============================================================================

function expandEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_, varName: string) => {
      const v = env[varName];
      if (v === undefined) {
        throw new ConfigError(`Environment variable ${varName} is not set but is referenced in config.`);
      }
      return v;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandEnv(item, env));
  }
  if (value && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnv(v, env);
    }
    return out;
  }
  return value;
}
