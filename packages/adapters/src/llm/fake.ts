import {
    type LLMCompleteOptions,
    type LLMProvider,
    type LLMResponse
} from '@worksheetbot/core';

export function fakeLLMResponse(content: string): LLMResponse {
    return {
        content,
        tokensUsed: { promptTokens: 0, completionTokens: 0 },
        model: 'fake-model',
        latencyMs: 1
    };
}

/**
 * Replays queued responses in order, cycling once the queue is exhausted.
 * A queued `Error` is thrown instead of returned.
 */
export class FakeLLMProvider implements LLMProvider {
    private responses: Array<LLMResponse | Error>;
    private callCount = 0;
    public readonly calls: LLMCompleteOptions[] = [];

    public constructor(responses?: Array<LLMResponse | Error | string>) {
        this.responses = FakeLLMProvider.normalize(responses ?? ['Fake response']);
    }

    public setResponses(responses: Array<LLMResponse | Error | string>): void {
        this.responses = FakeLLMProvider.normalize(responses);
        this.callCount = 0;
    }

    public async complete(options: LLMCompleteOptions): Promise<LLMResponse> {
        this.calls.push({ ...options, messages: [...options.messages] });
        if (options.signal?.aborted) {
            throw options.signal.reason;
        }

        const response = this.responses[this.callCount % this.responses.length];
        if (!response) {
            throw new Error('FakeLLMProvider: No response available');
        }
        this.callCount++;

        if (response instanceof Error) {
            throw response;
        }
        return response;
    }

    private static normalize(responses: Array<LLMResponse | Error | string>): Array<LLMResponse | Error> {
        return responses.map((response) => (typeof response === 'string' ? fakeLLMResponse(response) : response));
    }
}
