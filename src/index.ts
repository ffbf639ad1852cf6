// src/index.ts

export { PersonaPipeline } from './pipeline';
export type { PipelineOverrides, PipelineResult, RunOptions } from './pipeline';
export { loadConfig, validateConfigSafe, DEFAULT_GEMINI_MODEL } from './config/ConfigValidator';
export type { PersonaConfig } from './config/ConfigValidator';
export { RedditConnector, DEFAULT_COLLECT_OPTIONS } from './connectors/reddit/RedditConnector';
export type { CollectOptions } from './connectors/reddit/types';
export type { ContentCollector } from './connectors/types';
export type { SourceItem, SourceItemKind } from './core/normalizer/types';
export { PersonaSynthesizer } from './synthesizer/PersonaSynthesizer';
export { GeminiClient } from './synthesizer/GeminiClient';
export { buildPrompt } from './synthesizer/PromptBuilder';
export type { TextGenerator } from './synthesizer/types';
export { writePersona, personaFileName } from './output/PersonaWriter';
export { extractUsername } from './utils/profileUrl';
export { Logger } from './observability/Logger';
export type { LoggerConfig } from './observability/Logger';

// Export error classes for error handling
export {
  PersonaError,
  ConfigError,
  InputError,
  AuthError,
  NotFoundError,
  ApiError,
  ApiClientError,
  ApiServerError,
  NetworkError,
  NetworkTimeoutError,
  NormalizationError,
  EmptyInputError,
  UpstreamError,
  OutputError,
  exitCodeFor,
} from './utils/errors';
