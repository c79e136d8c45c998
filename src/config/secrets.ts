// pattern: Functional Core
import { z } from "zod";
import type { ProviderName } from "./schema";

/**
 * Environment variable holding the API key for each hosted provider.
 * Local providers (ollama, lmstudio) take no key.
 */
export const apiKeyEnvVars: Readonly<Record<ProviderName, string | null>> = {
  deepseek: "DEEPSEEK_API_KEY",
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  gemini: "GOOGLE_GENERATIVE_AI_API_KEY",
  ollama: null,
  lmstudio: null,
};

// Blank strings count as unset.
const optionalSecret = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  EMAIL_SENDER: optionalSecret,
  EMAIL_APP_PASSWORD: optionalSecret,
  EMAIL_RECEIVER: optionalSecret,
});

export type MailCredentials = Readonly<{
  sender?: string;
  password?: string;
  recipient?: string;
}>;

export type Secrets = Readonly<{
  provider: ProviderName;
  apiKey?: string;
  mail: MailCredentials;
}>;

export type SecretIssue =
  | { readonly kind: "MissingCredential"; readonly variable: string }
  | {
      readonly kind: "MissingConfig";
      readonly fields: ReadonlyArray<keyof MailCredentials>;
    };

/**
 * Resolves the secrets the briefing needs from an environment map.
 * Never throws; absence is reported by {@link validateSecrets}.
 */
export function loadSecrets(
  env: Readonly<Record<string, string | undefined>>,
  provider: ProviderName,
): Secrets {
  const mailEnv = envSchema.parse(env);
  const keyVar = apiKeyEnvVars[provider];
  const apiKey = keyVar ? optionalSecret.parse(env[keyVar]) : undefined;

  return {
    provider,
    apiKey,
    mail: {
      sender: mailEnv.EMAIL_SENDER,
      password: mailEnv.EMAIL_APP_PASSWORD,
      recipient: mailEnv.EMAIL_RECEIVER,
    },
  };
}

export function missingMailFields(
  mail: MailCredentials,
): Array<keyof MailCredentials> {
  const missing: Array<keyof MailCredentials> = [];
  if (!mail.sender?.trim()) missing.push("sender");
  if (!mail.password?.trim()) missing.push("password");
  if (!mail.recipient?.trim()) missing.push("recipient");
  return missing;
}

/**
 * Single validation pass over resolved secrets, run before any stage.
 * Returns every issue found, in a stable order: credential first, then mail.
 */
export function validateSecrets(secrets: Secrets): Array<SecretIssue> {
  const issues: Array<SecretIssue> = [];

  const keyVar = apiKeyEnvVars[secrets.provider];
  if (keyVar && !secrets.apiKey) {
    issues.push({ kind: "MissingCredential", variable: keyVar });
  }

  const fields = missingMailFields(secrets.mail);
  if (fields.length > 0) {
    issues.push({ kind: "MissingConfig", fields });
  }

  return issues;
}
