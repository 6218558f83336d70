import type { Whitelist } from "../books/whitelist.js";
import type { ExtractedSignals } from "../extract/contentExtractor.js";
import type { DiceRoll, Rng } from "../mechanics/dice.js";
import type { RetrievalResult } from "../retrieval/types.js";
import { applyMutations } from "../state/stateUpdater.js";
import type { GameState, Mutation } from "../state/types.js";
import { StateInvariantError, UpstreamUnavailableError } from "../turn/errors.js";
import { log } from "../utils/logger.js";
import { validateToolCall, type ToolCallOutcome } from "../validation/toolCalls.js";
import { reject } from "../validation/validator.js";
import type { ChatMessage, CompletionRequest, CompletionResponse, NarrativeModel, ModelToolCall } from "./model.js";
import { buildTurnContext, NARRATOR_SYSTEM_PROMPT, PLAIN_MODE_ADDENDUM, TOOL_MODE_ADDENDUM } from "./prompts.js";
import { parseToolArguments } from "./toolArguments.js";
import { NARRATOR_TOOLS } from "./toolSpecs.js";

const narrativeLog = log.withScope("narrative");

export type GenerationMode = "plain" | "tools";

export interface ToolInvocation {
  toolName: string;
  arguments: unknown;
  result: {
    accepted: boolean;
    reason: string;
    message: string;
    mutations: Mutation[];
  };
}

export interface GenerationInput {
  state: GameState;
  actionText: string;
  retrieval: RetrievalResult;
  signals: ExtractedSignals;
  facts: readonly string[];
  allowedItems: ReadonlySet<string>;
  knownExits: readonly number[];
  regenerationNotice?: string;
}

export interface GenerationResult {
  text: string;
  mode: GenerationMode;
  /** Accepted tool mutations, in emission order. */
  mutations: Mutation[];
  invocations: ToolInvocation[];
  rolls: DiceRoll[];
  modelCalls: number;
}

export interface NarrativeGeneratorOptions {
  mode: GenerationMode;
  temperature: number;
  maxToolIterations: number;
  backtrackLimit: number;
  rng: Rng;
}

export class NarrativeGenerator {
  constructor(
    private readonly model: NarrativeModel,
    private readonly whitelist: Whitelist,
    private readonly opts: NarrativeGeneratorOptions,
  ) {}

  get mode(): GenerationMode {
    return this.opts.mode;
  }

  async generate(input: GenerationInput): Promise<GenerationResult> {
    return this.opts.mode === "tools" ? this.generateWithTools(input) : this.generatePlain(input);
  }

  private async call(request: CompletionRequest): Promise<CompletionResponse> {
    try {
      return await this.model.complete(request);
    } catch (err) {
      if (err instanceof UpstreamUnavailableError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new UpstreamUnavailableError("llm", `Narrative generation failed: ${reason}`, err);
    }
  }

  private async generatePlain(input: GenerationInput): Promise<GenerationResult> {
    const response = await this.call({
      system: NARRATOR_SYSTEM_PROMPT + PLAIN_MODE_ADDENDUM,
      messages: [{ role: "user", content: buildTurnContext(input) }],
      temperature: this.opts.temperature,
    });
    return {
      text: requireText(response.text),
      mode: "plain",
      mutations: [],
      invocations: [],
      rolls: [],
      modelCalls: 1,
    };
  }

  /**
   * Request/validate/apply loop. Each proposal is checked against the state
   * as it would be after the proposals accepted so far; rejected proposals
   * go back to the model as tool results and change nothing.
   */
  private async generateWithTools(input: GenerationInput): Promise<GenerationResult> {
    const system = NARRATOR_SYSTEM_PROMPT + TOOL_MODE_ADDENDUM;
    const messages: ChatMessage[] = [{ role: "user", content: buildTurnContext(input) }];
    const mutations: Mutation[] = [];
    const invocations: ToolInvocation[] = [];
    const rolls: DiceRoll[] = [];
    const prose: string[] = [];
    let projected = input.state;
    let modelCalls = 0;

    for (let iteration = 0; iteration < this.opts.maxToolIterations; iteration++) {
      const response = await this.call({
        system,
        messages,
        tools: [...NARRATOR_TOOLS],
        temperature: this.opts.temperature,
      });
      modelCalls++;

      if (response.toolCalls.length === 0) {
        prose.push(response.text);
        return { text: requireText(prose.join("\n\n")), mode: "tools", mutations, invocations, rolls, modelCalls };
      }

      if (response.text) prose.push(response.text);
      messages.push({ role: "assistant", content: response.text || null, toolCalls: response.toolCalls });

      for (const call of response.toolCalls) {
        const { outcome, args } = this.evaluate(projected, call, input.knownExits);

        if (outcome.verdict.valid && outcome.mutations.length > 0) {
          try {
            projected = applyMutations(projected, outcome.mutations);
            mutations.push(...outcome.mutations);
          } catch (err) {
            if (!(err instanceof StateInvariantError)) throw err;
            outcome.verdict = reject("invalid_tool_arguments", err.message);
            outcome.message = `REJECTED (invalid_tool_arguments): ${err.message}`;
            outcome.mutations = [];
          }
        }
        if (outcome.roll) rolls.push(outcome.roll);

        invocations.push({
          toolName: call.name,
          arguments: args,
          result: {
            accepted: outcome.verdict.valid,
            reason: outcome.verdict.reason,
            message: outcome.message,
            mutations: outcome.mutations,
          },
        });
        if (!outcome.verdict.valid) {
          narrativeLog.warn(`Rejected tool call ${call.name}: ${outcome.verdict.reason}`, { arguments: args });
        }
        messages.push({ role: "tool", toolCallId: call.id, content: outcome.message });
      }
    }

    narrativeLog.warn(`Tool loop hit ${this.opts.maxToolIterations} iterations; asking for final narration`);
    const closing = await this.call({ system, messages, temperature: this.opts.temperature });
    modelCalls++;
    prose.push(closing.text);
    return { text: requireText(prose.join("\n\n")), mode: "tools", mutations, invocations, rolls, modelCalls };
  }

  private evaluate(
    state: GameState,
    call: ModelToolCall,
    knownExits: readonly number[],
  ): { outcome: ToolCallOutcome; args: unknown } {
    let args: unknown;
    try {
      args = parseToolArguments(call.arguments);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      const verdict = reject("invalid_tool_arguments", `Arguments for ${call.name} were not valid JSON: ${reason}`);
      return {
        outcome: { verdict, mutations: [], message: `REJECTED (invalid_tool_arguments): ${verdict.message}` },
        args: call.arguments,
      };
    }
    const outcome = validateToolCall(
      state,
      { name: call.name, arguments: args },
      { whitelist: this.whitelist, backtrackLimit: this.opts.backtrackLimit, knownExits, rng: this.opts.rng },
    );
    return { outcome, args };
  }
}

function requireText(text: string): string {
  const trimmed = text.trim();
  if (!trimmed) {
    throw new UpstreamUnavailableError("llm", "The model returned no narrative text");
  }
  return trimmed;
}
