import type { CompletionRequest, LLMProvider } from './llm-provider.interface.js';

export interface ApiCallParams {
    url: string;
    headers: Record<string, string>;
    body: Record<string, unknown>;
}

/** Walks `path` through nested objects and arrays, returning undefined at the first miss. */
export function pick(data: unknown, ...path: (string | number)[]): unknown {
    let current: unknown = data;
    for (const key of path) {
        if (typeof current !== 'object' || current === null) {
            return undefined;
        }
        current = Reflect.get(current, key);
    }
    return current;
}

export abstract class ApiProviderBase implements LLMProvider {
    abstract readonly name: string;

    constructor(
        protected host: string,
        protected apiKey?: string
    ) {}

    protected abstract buildApiCallParams(request: CompletionRequest): ApiCallParams;
    protected abstract parseResponse(data: unknown): string | null;

    async complete(request: CompletionRequest): Promise<string | null> {
        const { url, headers, body } = this.buildApiCallParams(request);

        const response = await fetch(url, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                ...headers,
            },
            body: JSON.stringify(body),
        });

        if (!response.ok) {
            const errorText = await response.text();
            throw new Error(
                `LLM API Error (${this.name}): ${response.status} - ${response.statusText}. Response: ${errorText}`
            );
        }

        const data: unknown = await response.json();

        // Ollama returns {message: {content}}, OpenAI-compatible APIs return {choices: [{message: {content}}]}
        return this.parseResponse(data);
    }
}
