import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";

import { EngineConfigSchema, type EngineConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { formatSchemaIssues } from "./zod-issues.js";

const CONFIG_HINT = "Check the YAML file passed with --config, or omit --config to use defaults.";

export function loadEngineConfig(configPath: string): EngineConfig {
  const resolved = path.resolve(configPath);
  if (!fs.existsSync(resolved)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Engine config missing.",
      message: `Config file not found at ${resolved}.`,
      hint: CONFIG_HINT,
      cause: new ConfigError(`Missing config file: ${resolved}`),
    });
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(resolved, "utf8"));
  } catch (err) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Engine config unreadable.",
      message: `Config file ${resolved} is not valid YAML.`,
      hint: CONFIG_HINT,
      cause: new ConfigError(`Failed to parse ${resolved}`, err),
    });
  }

  const parsed = EngineConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = formatSchemaIssues(parsed.error.issues);
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Engine config invalid.",
      message: `Config file ${resolved} has invalid values:\n${issues.map((issue) => `- ${issue}`).join("\n")}`,
      hint: CONFIG_HINT,
      cause: new ConfigError("Config schema validation failed", parsed.error),
    });
  }

  return resolveConfigPaths(parsed.data, path.dirname(resolved));
}

// Relative log paths are anchored at the config file, not the working directory.
function resolveConfigPaths(config: EngineConfig, configDir: string): EngineConfig {
  const file = config.logging.file;
  if (file === undefined || path.isAbsolute(file)) {
    return config;
  }

  return { ...config, logging: { ...config.logging, file: path.resolve(configDir, file) } };
}
