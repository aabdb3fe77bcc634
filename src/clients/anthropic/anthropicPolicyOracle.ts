/**
 * AnthropicPolicyOracle: relevance rating and policy extraction via Claude
 *
 * Implements both oracle interfaces on top of the Messages API. Answers are
 * JSON (optionally fenced in a markdown code block) validated with zod.
 */

import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import type {
  ExtractionOracle,
  ExtractionRequest,
  RelevanceOracle,
  RelevanceRequest,
} from "@/interfaces";
import type { RawPolicyFieldValue, RawPolicyFields } from "@/types";
import {
  ANTHROPIC_DEFAULT_MODEL,
  ANTHROPIC_MAX_RETRIES,
  ANTHROPIC_MAX_TOKENS,
  ANTHROPIC_TIMEOUT_MS,
  EXTRACTION_MAX_CHARS,
  ORACLE_SYSTEM_PROMPT,
} from "@/constants/clients/anthropic";
import { buildExtractionPrompt, buildRelevancePrompt } from "./prompts";
import * as logger from "@/logger";

/**
 * Completion function: system prompt + user prompt in, text out
 */
export type CompleteFn = (system: string, prompt: string) => Promise<string>;

export interface AnthropicPolicyOracleConfig {
  apiKey?: string;
  model?: string;
  /**
   * Optional completion function (for testing/mocking)
   * Defaults to the Anthropic Messages API
   */
  complete?: CompleteFn;
}

const relevanceResponseSchema = z.object({
  confidence: z.coerce.number().optional(),
});

const fieldValueSchema: z.ZodType<RawPolicyFieldValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(fieldValueSchema),
    z.record(fieldValueSchema),
  ]),
);

const extractionResponseSchema = z.record(fieldValueSchema);

/**
 * Extract the JSON payload from a model answer (handles markdown code blocks)
 */
export function extractJsonPayload(answer: string): unknown {
  let jsonStr = answer;
  const jsonMatch = jsonStr.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonMatch) {
    jsonStr = jsonMatch[1];
  }
  return JSON.parse(jsonStr.trim());
}

function createMessagesComplete(apiKey: string, model: string): CompleteFn {
  const client = new Anthropic({
    apiKey,
    maxRetries: ANTHROPIC_MAX_RETRIES,
    timeout: ANTHROPIC_TIMEOUT_MS,
  });

  return async (system, prompt) => {
    const response = await client.messages.create({
      model,
      max_tokens: ANTHROPIC_MAX_TOKENS,
      system,
      messages: [{ role: "user", content: prompt }],
    });

    for (const block of response.content) {
      if (block.type === "text") {
        return block.text;
      }
    }
    throw new Error("No text response from Claude");
  };
}

export class AnthropicPolicyOracle implements RelevanceOracle, ExtractionOracle {
  private readonly complete: CompleteFn;

  constructor(config: AnthropicPolicyOracleConfig) {
    if (config.complete) {
      this.complete = config.complete;
    } else {
      if (!config.apiKey) {
        throw new Error(
          "Anthropic configuration missing: ANTHROPIC_API_KEY. Please set this environment variable.",
        );
      }
      this.complete = createMessagesComplete(
        config.apiKey,
        config.model || ANTHROPIC_DEFAULT_MODEL,
      );
    }
    logger.debug("AnthropicPolicyOracle initialized", { model: config.model });
  }

  async rateRelevance(request: RelevanceRequest): Promise<number> {
    const answer = await this.complete(
      ORACLE_SYSTEM_PROMPT,
      buildRelevancePrompt(request.companyName, request.excerpt),
    );
    const parsed = relevanceResponseSchema.parse(extractJsonPayload(answer));
    return parsed.confidence ?? 0;
  }

  async extractPolicy(request: ExtractionRequest): Promise<RawPolicyFields> {
    const answer = await this.complete(
      ORACLE_SYSTEM_PROMPT,
      buildExtractionPrompt(request.companyName, request.text.slice(0, EXTRACTION_MAX_CHARS)),
    );
    return extractionResponseSchema.parse(extractJsonPayload(answer));
  }
}
