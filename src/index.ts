export type * from './llm/types.js';
export { classifyResponse, parseVerdict, HIGH_QUALITY_PHRASE, LOW_QUALITY_PHRASE } from './llm/ResponseParser.js';
export { QUALITY_PROMPT, buildTitlePrompt } from './llm/prompts.js';
export { createVerdict, unparseableVerdict, isParseable } from './llm/verdict.js';
export { BaseLLMProvider, ProviderError, PROVIDER_DEFAULTS } from './llm/providers/BaseLLMProvider.js';
export { OllamaProvider } from './llm/providers/OllamaProvider.js';
export { OpenAIProvider } from './llm/providers/OpenAIProvider.js';
export { AnthropicProvider } from './llm/providers/AnthropicProvider.js';
export { ProviderFactory } from './llm/ProviderFactory.js';

export * from './consensus/index.js';

export type * from './checkpoint/types.js';
export { CheckpointStore, CheckpointRecordError } from './checkpoint/CheckpointStore.js';
export { validateCheckpointState, recoverCheckpointState } from './checkpoint/stateValidation.js';

export { DocumentStoreError } from './documents/types.js';
export type { StoredDocument, FetchCriteria, DocumentStore } from './documents/types.js';
export { PaperlessClient } from './documents/PaperlessClient.js';
export type { PaperlessClientConfig } from './documents/PaperlessClient.js';

export type * from './pipeline/types.js';
export { ProcessingPipeline } from './pipeline/ProcessingPipeline.js';
export type { PipelineDependencies } from './pipeline/ProcessingPipeline.js';
export { finalizeTitle, fallbackTitle } from './pipeline/titles.js';

export { loadAppConfig, ConfigError } from './config/index.js';
export type { AppConfig, Env } from './config/index.js';
export { logger, setLogLevel } from './utils/logger.js';
