import { describe, expect, it } from "vitest";

import { inspectCredential, isValidCredential } from "../validation.js";

describe("credentials/validation", () => {
  describe("isValidCredential", () => {
    it("should accept Anthropic keys only for anthropic", () => {
      expect(isValidCredential("sk-ant-x", "anthropic")).toBe(true);
      expect(isValidCredential("sk-ant-x", "openai")).toBe(false);
    });

    it("should accept plain sk- keys for openai", () => {
      expect(isValidCredential("sk-x", "openai")).toBe(true);
      expect(isValidCredential("sk-proj-abc123", "openai")).toBe(true);
      expect(isValidCredential("sk-x", "anthropic")).toBe(false);
    });

    it("should treat blank input as invalid for every kind", () => {
      for (const kind of ["anthropic", "openai", "ollama", "none"] as const) {
        expect(isValidCredential("   ", kind)).toBe(false);
        expect(isValidCredential(undefined, kind)).toBe(false);
      }
    });

    it("should accept any non-blank value for kinds without a format", () => {
      expect(isValidCredential("anything", "ollama")).toBe(true);
    });
  });

  describe("inspectCredential", () => {
    it("should trim surrounding whitespace from valid values", () => {
      expect(inspectCredential("  sk-ant-test-secret \n", "anthropic")).toEqual({
        status: "valid",
        value: "sk-ant-test-secret",
      });
    });

    it("should distinguish absent from invalid", () => {
      expect(inspectCredential("", "openai")).toEqual({ status: "absent" });
      expect(inspectCredential("pk-test", "openai")).toEqual({
        status: "invalid",
        reason: "OpenAI keys start with sk-",
      });
      expect(inspectCredential("sk-ant-test", "openai")).toEqual({
        status: "invalid",
        reason: "OpenAI keys must not start with sk-ant-",
      });
    });
  });
});
