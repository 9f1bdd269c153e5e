// src/providers/openai-provider.ts

import { type ApiCallParams, ApiProviderBase, pick } from './api-provider-base.js';
import type { CompletionRequest } from './llm-provider.interface.js';

export class OpenAIProvider extends ApiProviderBase {
    readonly name: string = 'OpenAI';

    constructor(baseUrl: string = 'https://api.openai.com/v1', apiKey?: string) {
        super(baseUrl.replace(/\/+$/, ''), apiKey);
    }

    protected buildHeaders(): Record<string, string> {
        return this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {};
    }

    protected buildApiCallParams(request: CompletionRequest): ApiCallParams {
        return {
            url: `${this.host}/chat/completions`,
            headers: this.buildHeaders(),
            body: {
                model: request.model,
                messages: request.messages,
                temperature: request.temperature,
                max_tokens: request.maxOutputTokens,
            },
        };
    }

    protected parseResponse(data: unknown): string | null {
        const choices = pick(data, 'choices');
        if (!Array.isArray(choices)) {
            throw new Error(`${this.name} returned an unexpected response body: ${JSON.stringify(data).substring(0, 500)}`);
        }

        const content = pick(choices, 0, 'message', 'content');
        return typeof content === 'string' && content.length > 0 ? content : null;
    }
}
