import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig, DeliveryFormat, ProviderName } from "./schema";

/**
 * Parses and validates briefing configuration from YAML text.
 *
 * @param raw - YAML document
 * @param source - Label used in error messages, usually the file path
 * @throws Error listing every schema issue as `  - path: message`
 */
export function parseConfig(raw: string, source: string): AppConfig {
  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${source}: ${message}`);
  }

  const result = appConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${source}:\n${issues}`);
  }

  return result.data;
}

export function loadConfig(configPath: string): AppConfig {
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  return parseConfig(raw, configPath);
}

export { loadSecrets, validateSecrets, missingMailFields } from "./secrets";
export type { MailCredentials, Secrets, SecretIssue } from "./secrets";
export type { AppConfig, DeliveryFormat, ProviderName };
