import { vi } from "vitest";
import type { Logger } from "pino";
import { appConfigSchema } from "../config/schema";
import type { AppConfig, Secrets } from "../config";

/**
 * Builds a fully defaulted config with empty source lists.
 * @param overrides - Raw (pre-validation) sections to merge in
 */
export function createTestConfig(
  overrides: Record<string, unknown> = {},
): AppConfig {
  return appConfigSchema.parse({
    sources: { tech: [], finance: [], papers: [] },
    ...overrides,
  });
}

export function createTestSecrets(overrides: Partial<Secrets> = {}): Secrets {
  return {
    provider: "deepseek",
    apiKey: "test-api-key",
    mail: {
      sender: "briefing@gmail.com",
      password: "test-password",
      recipient: "reader@example.org",
    },
    ...overrides,
  };
}

/**
 * Logger whose methods are spies, for asserting on log calls.
 */
export function createMockLogger(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    level: "info" as const,
    child: vi.fn(),
    isLevelEnabled: vi.fn(),
  } as unknown as Logger;
}
