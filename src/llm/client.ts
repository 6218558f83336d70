import OpenAI from "openai";
import { cfg } from "../config/env.js";

let openaiClient: OpenAI | null = null;

export function getOpenAIClient(): OpenAI {
  if (!openaiClient) {
    const apiKey = cfg.openai.apiKey;
    if (!apiKey) {
      throw new Error("OPENAI_API_KEY not configured in .env");
    }
    openaiClient = new OpenAI({
      apiKey,
      baseURL: cfg.openai.baseUrl,
      timeout: cfg.llm.timeoutMs,
      // Turn-level retries live in TurnService.
      maxRetries: 0,
    });
  }
  return openaiClient;
}
