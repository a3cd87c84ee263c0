import { ChatOpenAI } from "@langchain/openai";
import { HumanMessage, SystemMessage, type MessageContent } from "@langchain/core/messages";
import { RateLimitError, TransportError, errorMessage } from "../errors.js";

export type CompletionRequest = {
  model: string;
  system: string;
  user: string;
  maxTokens: number;
  temperature: number;
};

/** Chat completion endpoint: one system + one user message in, text out. */
export interface CompletionClient {
  complete(req: CompletionRequest): Promise<string>;
}

function statusOf(err: unknown): number | null {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return null;
}

/**
 * Map whatever the OpenAI SDK threw onto the shared taxonomy.
 * Errors without an HTTP status are connection failures or timeouts.
 */
export function classifyLlmError(err: unknown): Error {
  if (err instanceof RateLimitError || err instanceof TransportError) return err;

  const status = statusOf(err);
  const msg = errorMessage(err);
  if (status === 429) return new RateLimitError(`llm rate limited: ${msg}`);
  if (status !== null) {
    return new TransportError(`llm HTTP ${status}: ${msg}`, { status, retryable: status >= 500, cause: err });
  }
  return new TransportError(`llm request failed: ${msg}`, { cause: err });
}

export function messageText(content: MessageContent): string {
  if (typeof content === "string") return content;
  return content
    .map((part) => ("text" in part && typeof part.text === "string" ? part.text : ""))
    .join("");
}

/**
 * Groq exposes an OpenAI-compatible API, so the LangChain OpenAI chat model is
 * pointed at its base URL. Retries are left to the pipeline's retry policy.
 */
export function createChatCompletionClient(args: { apiKey: string; baseUrl: string; timeoutMs: number }): CompletionClient {
  return {
    async complete(req: CompletionRequest): Promise<string> {
      const llm = new ChatOpenAI({
        model: req.model,
        temperature: req.temperature,
        maxTokens: req.maxTokens,
        apiKey: args.apiKey,
        timeout: args.timeoutMs,
        maxRetries: 0,
        configuration: { baseURL: args.baseUrl }
      });

      try {
        const response = await llm.invoke([new SystemMessage(req.system), new HumanMessage(req.user)]);
        return messageText(response.content);
      } catch (err) {
        throw classifyLlmError(err);
      }
    }
  };
}
