import OpenAI from "openai";
import { getConfig } from "../config/index.js";

type HealthStatus = "ok" | "error";

export interface ChatCompletionRequest {
  model: string;
  temperature?: number;
  max_tokens?: number;
  response_format?: { type: "json_object" };
  messages: Array<{ role: "system" | "user"; content: string }>;
}

export interface ChatCompletionResponse {
  choices: Array<{ message?: { content?: string | null } }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

export interface EmbeddingRequest {
  model: string;
  input: string | string[];
}

export interface EmbeddingResponse {
  data: Array<{ index: number; embedding: number[] }>;
}

/**
 * The slice of the OpenAI SDK the pipeline talks to. Any OpenAI-compatible endpoint
 * configured through `OPENAI_BASE_URL` satisfies it.
 */
export interface ModelClient {
  models: {
    retrieve(model: string, options?: { signal?: AbortSignal }): Promise<unknown>;
  };
  embeddings: {
    create(request: EmbeddingRequest): Promise<EmbeddingResponse>;
  };
  chat: {
    completions: {
      create(request: ChatCompletionRequest): Promise<ChatCompletionResponse>;
    };
  };
}

export interface OpenAISingleton {
  client: ModelClient;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const REQUEST_TIMEOUT_MS = 20_000;
const REQUEST_RETRIES = 2;
const MOCK_EMBEDDING_DIMENSIONS = 8;

let singleton: OpenAISingleton | null = null;

async function withTimeout<T>(operation: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await operation(controller.signal);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

// Character-frequency vectors: deterministic and good enough to exercise ranking offline.
const mockEmbedding = (text: string): number[] => {
  const vector = new Array<number>(MOCK_EMBEDDING_DIMENSIONS).fill(0);
  for (const char of text.toLowerCase()) {
    const code = char.codePointAt(0) ?? 0;
    vector[code % MOCK_EMBEDDING_DIMENSIONS] += 1;
  }
  return vector;
};

export function createMockModelClient(model: string): ModelClient {
  return {
    models: {
      async retrieve() {
        return { id: model };
      }
    },
    embeddings: {
      async create(request) {
        const values = Array.isArray(request.input) ? request.input : [request.input];
        return {
          data: values.map((value, index) => ({
            index,
            embedding: mockEmbedding(value)
          }))
        };
      }
    },
    chat: {
      completions: {
        async create() {
          return {
            choices: [
              {
                message: {
                  content: JSON.stringify({
                    coverage_result: "It depends",
                    explanation: "Mock model response."
                  })
                }
              }
            ]
          };
        }
      }
    }
  };
}

function initialize(): OpenAISingleton {
  const config = getConfig();

  if (process.env.MOCK_INFRA_CLIENTS === "1") {
    console.info("[clients/openai] initialized singleton (mock)");
    return {
      client: createMockModelClient(config.OPENAI_SYNTHESIS_MODEL),
      async healthCheck() {
        return { status: "ok" };
      }
    };
  }

  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    baseURL: config.OPENAI_BASE_URL,
    maxRetries: REQUEST_RETRIES,
    timeout: REQUEST_TIMEOUT_MS
  });

  console.info("[clients/openai] initialized singleton");

  return {
    client,
    async healthCheck() {
      try {
        await withTimeout(async (signal) => {
          await client.models.retrieve(config.OPENAI_SYNTHESIS_MODEL, { signal });
        }, REQUEST_TIMEOUT_MS);
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  console.info("[clients/openai] shutdown complete");
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
