export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "pretty" | "json";

export interface Config {
  openai: {
    apiKey?: string;
    baseUrl?: string;
  };

  llm: {
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    toolMode: boolean; // false => plain prompt->text generation
    maxToolIterations: number;
    rateLimitRpm: number; // 0 disables
  };

  embeddings: {
    model: string;
  };

  retrieval: {
    k: number;
    minScore: number;
    previewChars: number;
    maxSecondary: number;
    timeoutMs: number;
    cacheTtlSeconds: number; // 0 disables
  };

  game: {
    inventoryCapacity: number;
    backtrackLimit: number;
    maxTurnAttempts: number;
  };

  data: {
    root: string;
    booksDir: string;
    dbFilename: string;
  };

  server: {
    port: number;
    printConfig: boolean;
  };

  logging: {
    level: LogLevel;
    scopes?: string[]; // empty/undefined => all
    format: LogFormat;
  };
}
