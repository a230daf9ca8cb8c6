// Config loader: reads the bootstrap.yaml shipped beside the package and validates it.
// The file is part of the release, so installer URLs are fixed when the tool is built;
// nothing here reads user-supplied locations except the explicit path tests pass in.
// Config shape lives in schema.ts; add new keys there and in config/bootstrap.yaml.
import { readFileSync } from "node:fs";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { ZodIssue } from "zod";
import { describeError, environmentError } from "../shared/errors.js";
import { logger } from "../shared/logger.js";
import type { BootstrapConfig } from "../types/config.js";
import { bootstrapConfigSchema } from "./schema.js";

/** src/config and dist/config both sit two levels below the package root. */
export const BUNDLED_CONFIG_PATH = path.resolve(__dirname, "../../config/bootstrap.yaml");

export function loadConfig(explicitPath?: string): BootstrapConfig {
  const configPath = explicitPath ?? BUNDLED_CONFIG_PATH;

  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    throw environmentError(`Cannot read bootstrap config: ${configPath}`, {
      context: { cause: describeError(err) },
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(raw);
  } catch (err) {
    throw environmentError(`Bootstrap config is not valid YAML: ${configPath}`, {
      context: { cause: describeError(err) },
    });
  }

  const result = bootstrapConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw environmentError(`Invalid bootstrap config: ${formatIssues(result.error.issues)}`, {
      context: { configPath },
    });
  }

  logger.debug({ configPath, toolchains: result.data.toolchains.map((t) => t.name) }, "Configuration loaded");
  return result.data;
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
