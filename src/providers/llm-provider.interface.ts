// src/providers/llm-provider.interface.ts

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  maxOutputTokens: number;
  temperature: number;
}

export interface LLMProvider {
  readonly name: string;
  /** Resolves to null when the API answers without any completion text. */
  complete(request: CompletionRequest): Promise<string | null>;
}
