/**
 * Vitest Global Setup
 *
 * Keeps the developer's own tern settings and provider keys out of the tests.
 */
import { beforeEach } from "vitest";

const LEAKY_ENV_PREFIXES = ["TERN_", "ANTHROPIC_", "OPENAI_", "OLLAMA_"];

beforeEach(() => {
  for (const key of Object.keys(process.env)) {
    if (LEAKY_ENV_PREFIXES.some((prefix) => key.startsWith(prefix))) {
      delete process.env[key];
    }
  }
});
