export type { ChatMessage, ChatRole, CompletionRequest, LLMProvider } from './llm-provider.interface.js';
export { ApiProviderBase } from './api-provider-base.js';
export type { ApiCallParams } from './api-provider-base.js';
export { OpenAIProvider } from './openai-provider.js';
export { OpenRouterProvider } from './openrouter-provider.js';
export { OllamaProvider } from './ollama-provider.js';
