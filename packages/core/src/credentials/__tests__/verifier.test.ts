import { MockAgent } from "undici";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { HttpCredentialVerifier } from "../verifier.js";

describe("HttpCredentialVerifier", () => {
  let agent: MockAgent;
  let verifier: HttpCredentialVerifier;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    verifier = new HttpCredentialVerifier({ dispatcher: agent, timeoutMs: 1000 });
  });

  afterEach(async () => {
    await agent.close();
  });

  it("should send the Anthropic key header and accept 200", async () => {
    agent
      .get("https://api.anthropic.com")
      .intercept({
        path: "/v1/models",
        method: "GET",
        headers: { "x-api-key": "sk-ant-test-secret", "anthropic-version": "2023-06-01" },
      })
      .reply(200, { data: [] });

    expect(await verifier.verify("anthropic", "sk-ant-test-secret")).toBe(true);
  });

  it("should send a bearer token to OpenAI", async () => {
    agent
      .get("https://api.openai.com")
      .intercept({ path: "/v1/models", method: "GET", headers: { authorization: "Bearer sk-test-secret" } })
      .reply(200, { data: [] });

    expect(await verifier.verify("openai", "sk-test-secret")).toBe(true);
  });

  it("should treat a 401 as invalid", async () => {
    agent
      .get("https://api.openai.com")
      .intercept({ path: "/v1/models", method: "GET" })
      .reply(401, { error: { message: "Incorrect API key provided" } });

    expect(await verifier.verify("openai", "sk-test-secret")).toBe(false);
  });

  it("should treat a network error as invalid", async () => {
    agent
      .get("https://api.anthropic.com")
      .intercept({ path: "/v1/models", method: "GET" })
      .replyWithError(new Error("connection reset"));

    expect(await verifier.verify("anthropic", "sk-ant-test-secret")).toBe(false);
  });

  it("should give up once the timeout expires", async () => {
    const impatient = new HttpCredentialVerifier({ dispatcher: agent, timeoutMs: 50 });
    agent
      .get("https://api.anthropic.com")
      .intercept({ path: "/v1/models", method: "GET" })
      .reply(200, { data: [] })
      .delay(500);

    await expect(impatient.verify("anthropic", "sk-ant-test-secret")).resolves.toBe(false);
  });

  it("should accept providers that need no credential without a request", async () => {
    expect(await verifier.verify("ollama", "")).toBe(true);
  });
});
