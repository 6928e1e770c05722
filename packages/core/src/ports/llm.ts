import { type ChatMessage } from '../entities/message';
import { type RuntimeResource } from '../lifecycle';

export interface LLMCompleteOptions {
  systemPrompt : string;
  /** Prior turns followed by the new user request, oldest first. */
  messages     : readonly ChatMessage[];
  /** Aborted when the caller stops waiting; providers cancel the request. */
  signal?      : AbortSignal;
}

export interface LLMResponse {
  content: string;
  tokensUsed: {
    promptTokens: number;
    completionTokens: number;
  };
  model: string;
  latencyMs: number;
}

export interface LLMProvider extends RuntimeResource {
  complete(options: LLMCompleteOptions): Promise<LLMResponse>;
}
