/**
 * Unit tests for the Anthropic-backed oracle
 *
 * The Messages API is replaced by a fake completion function.
 */

import { describe, it, expect, vi } from "vitest";
import { AnthropicPolicyOracle, extractJsonPayload } from "@/clients/anthropic";

describe("extractJsonPayload", () => {
  it("should parse bare JSON", () => {
    expect(extractJsonPayload(' {"confidence": 0.7} ')).toEqual({ confidence: 0.7 });
  });

  it("should parse JSON fenced in a markdown block", () => {
    const answer = 'Here you go:\n```json\n{"program_name": "Acme VDP"}\n```\nThanks';
    expect(extractJsonPayload(answer)).toEqual({ program_name: "Acme VDP" });
  });

  it("should throw on non-JSON answers", () => {
    expect(() => extractJsonPayload("I am not sure")).toThrow(SyntaxError);
  });
});

describe("AnthropicPolicyOracle", () => {
  it("should require an API key without a completion function", () => {
    expect(() => new AnthropicPolicyOracle({})).toThrow(/ANTHROPIC_API_KEY/);
  });

  it("should rate relevance from the confidence field", async () => {
    const complete = vi.fn(
      async (_system: string, _prompt: string) => '```json\n{"confidence": "0.85"}\n```',
    );
    const oracle = new AnthropicPolicyOracle({ complete });

    const confidence = await oracle.rateRelevance({
      companyName: "Acme Robotics AG",
      url: "https://www.acme.example/vdp",
      excerpt: "Report vulnerabilities to psirt@acme.example",
    });

    expect(confidence).toBe(0.85);
    const [system, prompt] = complete.mock.calls[0];
    expect(system).toBe("You are a cybersecurity policy analyzer.");
    expect(prompt).toContain("Acme Robotics AG");
    expect(prompt).toContain("Report vulnerabilities to psirt@acme.example");
  });

  it("should score 0 when the answer has no confidence", async () => {
    const oracle = new AnthropicPolicyOracle({ complete: async () => "{}" });
    expect(
      await oracle.rateRelevance({ companyName: "Acme", url: "https://a.example", excerpt: "x" }),
    ).toBe(0);
  });

  it("should reject malformed extraction answers", async () => {
    const oracle = new AnthropicPolicyOracle({ complete: async () => "[1, 2]" });
    await expect(
      oracle.extractPolicy({ companyName: "Acme", url: "https://a.example", text: "x" }),
    ).rejects.toThrow();
  });

  it("should return the raw extracted fields", async () => {
    const oracle = new AnthropicPolicyOracle({
      complete: async () =>
        JSON.stringify({
          program_name: "Acme VDP",
          bounty: false,
          scope: ["*.acme.example", null],
          contact: { email: "psirt@acme.example", pgp: "" },
        }),
    });

    expect(
      await oracle.extractPolicy({ companyName: "Acme", url: "https://a.example", text: "policy" }),
    ).toEqual({
      program_name: "Acme VDP",
      bounty: false,
      scope: ["*.acme.example", null],
      contact: { email: "psirt@acme.example", pgp: "" },
    });
  });
});
