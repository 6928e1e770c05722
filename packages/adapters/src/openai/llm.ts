import OpenAI from 'openai';
import {
    UpstreamServiceError,
    type ChatMessage,
    type LLMCompleteOptions,
    type LLMProvider,
    type LLMResponse
} from '@worksheetbot/core';

type OpenAIMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;
type CompletionParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming;

/** The slice of a chat completion this provider reads. */
export interface ChatCompletionPayload {
    model: string;
    usage?: { prompt_tokens: number; completion_tokens: number } | null;
    choices: Array<{ message: { content: string | null } }>;
}

/** Structural subset of the OpenAI client, so tests can hand in a stub. */
export interface ChatCompletionClient {
    chat: {
        completions: {
            create(params: CompletionParams, options?: { signal?: AbortSignal }): Promise<ChatCompletionPayload>;
        };
    };
}

export interface OpenAILLMProviderOptions {
    apiKey: string;
    model: string;
    baseUrl?: string;
    /** Client-side retries inside the SDK. */
    maxRetries?: number;
    temperature?: number;
    client?: ChatCompletionClient;
}

function toOpenAIMessages(systemPrompt: string, messages: readonly ChatMessage[]): OpenAIMessage[] {
    const mapped: OpenAIMessage[] = [{ role: 'system', content: systemPrompt }];

    for (const message of messages) {
        mapped.push(message.role === 'user'
            ? { role: 'user', content: message.content }
            : { role: 'assistant', content: message.content });
    }

    return mapped;
}

export class OpenAILLMProvider implements LLMProvider {
    private readonly client: ChatCompletionClient;

    public constructor(private readonly opts: OpenAILLMProviderOptions) {
        this.client = opts.client ?? new OpenAI({
            baseURL: opts.baseUrl,
            apiKey: opts.apiKey,
            maxRetries: opts.maxRetries
        });
    }

    public async complete(options: LLMCompleteOptions): Promise<LLMResponse> {
        const start = Date.now();

        const response = await this.client.chat.completions.create({
            model: this.opts.model,
            temperature: this.opts.temperature ?? 0,
            messages: toOpenAIMessages(options.systemPrompt, options.messages)
        }, { signal: options.signal });

        const content = response.choices[0]?.message.content;
        if (!content || !content.trim()) {
            throw new UpstreamServiceError('llm', `${response.model} returned an empty completion`);
        }

        return {
            content,
            tokensUsed: {
                promptTokens: response.usage?.prompt_tokens ?? 0,
                completionTokens: response.usage?.completion_tokens ?? 0
            },
            model: response.model,
            latencyMs: Date.now() - start
        };
    }
}
