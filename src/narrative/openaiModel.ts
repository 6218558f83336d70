import type OpenAI from "openai";
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import { getOpenAIClient } from "../llm/client.js";
import type { RateLimiter } from "../llm/rateLimiter.js";
import { log } from "../utils/logger.js";
import { withTimeout } from "../utils/withTimeout.js";
import type { ChatMessage, CompletionRequest, CompletionResponse, NarrativeModel } from "./model.js";

const llmLog = log.withScope("llm");

export interface OpenAINarrativeModelOptions {
  model: string;
  maxTokens: number;
  timeoutMs: number;
  limiter?: RateLimiter;
  client?: () => OpenAI;
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return {
        role: "assistant",
        content: message.content,
        ...(message.toolCalls?.length
          ? {
              tool_calls: message.toolCalls.map((c) => ({
                id: c.id,
                type: "function" as const,
                function: { name: c.name, arguments: c.arguments },
              })),
            }
          : {}),
      };
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
  }
}

export class OpenAINarrativeModel implements NarrativeModel {
  constructor(private readonly opts: OpenAINarrativeModelOptions) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const client = (this.opts.client ?? getOpenAIClient)();
    const controller = new AbortController();
    const started = Date.now();

    // The limiter wait counts against the timeout.
    const response = await withTimeout(
      this.send(client, request, controller.signal),
      this.opts.timeoutMs,
      "llm",
      "chat completion",
      controller,
    );

    const message = response.choices[0]?.message;
    const toolCalls = (message?.tool_calls ?? []).map((c) => ({
      id: c.id,
      name: c.function.name,
      arguments: c.function.arguments,
    }));

    llmLog.debug(`Completion in ${Date.now() - started}ms`, {
      model: this.opts.model,
      toolCalls: toolCalls.length,
      tokens: response.usage?.total_tokens,
    });

    return { text: message?.content?.trim() ?? "", toolCalls };
  }

  private async send(client: OpenAI, request: CompletionRequest, signal: AbortSignal) {
    await this.opts.limiter?.acquire();
    signal.throwIfAborted();

    const tools: ChatCompletionTool[] | undefined = request.tools?.map((t) => ({
      type: "function",
      function: { name: t.name, description: t.description, parameters: t.parameters },
    }));

    return client.chat.completions.create(
      {
        model: this.opts.model,
        temperature: request.temperature,
        max_tokens: this.opts.maxTokens,
        messages: [{ role: "system", content: request.system }, ...request.messages.map(toOpenAIMessage)],
        ...(tools?.length ? { tools } : {}),
      },
      { signal, timeout: this.opts.timeoutMs },
    );
  }
}
