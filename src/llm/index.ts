/**
 * LLM Integration Module
 *
 * Model-access adapter for the conversation loop. The loop depends only on
 * the `ModelClient` interface; `AnthropicModelClient` implements it on top
 * of the Anthropic Messages API.
 */

export type { ModelClient, ModelRequest, ModelResponse } from './types.js';
export { AnthropicModelClient, type AnthropicModelClientOptions } from './client.js';
export { buildMessages, toAnthropicTools } from './messages.js';
export { SYSTEM_PROMPT } from './prompts.js';
