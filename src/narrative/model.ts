export interface ModelToolCall {
  id: string;
  name: string;
  /** Raw JSON text as produced by the model. */
  arguments: string;
}

export type ChatMessage =
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; toolCalls?: ModelToolCall[] }
  | { role: "tool"; toolCallId: string; content: string };

export interface ToolSpec {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface CompletionRequest {
  system: string;
  messages: ChatMessage[];
  tools?: ToolSpec[];
  temperature: number;
}

export interface CompletionResponse {
  text: string;
  toolCalls: ModelToolCall[];
}

/** The language model as the narrator sees it. Implementations must time out. */
export interface NarrativeModel {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
