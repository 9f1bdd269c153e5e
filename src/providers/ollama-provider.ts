// src/providers/ollama-provider.ts

import { type ApiCallParams, ApiProviderBase, pick } from './api-provider-base.js';
import type { CompletionRequest } from './llm-provider.interface.js';

export class OllamaProvider extends ApiProviderBase {
    readonly name: string = 'Ollama';

    constructor(host: string = 'http://localhost:11434') {
        super(host.replace(/\/+$/, ''));
    }

    protected buildApiCallParams(request: CompletionRequest): ApiCallParams {
        return {
            url: `${this.host}/api/chat`,
            headers: {},
            body: {
                model: request.model,
                messages: request.messages,
                stream: false,
                options: {
                    temperature: request.temperature,
                    num_predict: request.maxOutputTokens,
                },
            },
        };
    }

    protected parseResponse(data: unknown): string | null {
        const message = pick(data, 'message');
        if (typeof message !== 'object' || message === null) {
            throw new Error(`Ollama returned an unexpected response body: ${JSON.stringify(data).substring(0, 500)}`);
        }

        const content = pick(message, 'content');
        return typeof content === 'string' && content.trim().length > 0 ? content.trim() : null;
    }
}
