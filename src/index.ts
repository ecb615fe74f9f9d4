export {closeAgentRuntime, createAgentRuntime, runAgentTurn, MAX_STEPS_NOTICE, TOOL_NOT_RUN_NOTICE} from './core/agent.js'
export type {AgentRunOptions, AgentRuntime, AgentRuntimeOptions} from './core/agent.js'
export {ConversationSession} from './core/conversation.js'
export type {ConversationSessionOptions} from './core/conversation.js'
export * from './core/errors.js'
export {InMemoryEventBus} from './core/event-bus.js'
export type {EventBus, EventHandler} from './core/event-bus.js'
export type {AgentEvent} from './core/events.js'
export * from './core/messages.js'
export {bpeTokenizer, countTokens} from './core/tokenizer.js'
export type {Tokenizer} from './core/tokenizer.js'
export {SessionLogSubscriber} from './core/subscribers/session-log-subscriber.js'
export {loadConfig, maskSecret} from './config/load-config.js'
export type {AppConfig} from './config/schema.js'
export {AnthropicProvider} from './providers/anthropic-provider.js'
export {DeepSeekProvider} from './providers/deepseek-provider.js'
export {MockProvider} from './providers/mock-provider.js'
export {OpenAIProvider} from './providers/openai-provider.js'
export {DEFAULT_MODELS, providerFromConfig, resolveModel, resolveProviderName} from './providers/select-provider.js'
export type {HttpTransport, LLMProvider, ProviderName, ProviderOptions} from './providers/types.js'
export {TOOL_CATALOG, isToolName} from './tools/catalog.js'
export type {ToolName} from './tools/catalog.js'
export {ToolDispatcher} from './tools/dispatcher.js'
export type {ToolDispatcherOptions} from './tools/dispatcher.js'
export {GitTree, getGitRoot, resolveProjectRoot} from './tools/git-tree.js'
export type {TreeSource} from './tools/git-tree.js'
