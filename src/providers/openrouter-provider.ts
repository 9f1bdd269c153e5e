// src/providers/openrouter-provider.ts

import { OpenAIProvider } from './openai-provider.js';

/** OpenRouter speaks the OpenAI chat-completions dialect plus an attribution header. */
export class OpenRouterProvider extends OpenAIProvider {
    readonly name: string = 'OpenRouter';

    constructor(baseUrl: string = 'https://openrouter.ai/api/v1', apiKey?: string) {
        super(baseUrl, apiKey);
    }

    protected buildHeaders(): Record<string, string> {
        return {
            ...super.buildHeaders(),
            'X-Title': 'pr-lens',
        };
    }
}
