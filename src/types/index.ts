/**
 * ola shared types: barrel export
 */

export type {
  ProviderName,
  IProviderIdentity,
  IInvocationRequest,
  ChunkListener,
  IAccumulatedResponse,
} from "./model.js";

export {
  PROVIDER_NAMES,
  DEFAULT_BASE_URLS,
  STATIC_MODELS,
  MAX_OUTPUT_TOKENS,
  REQUEST_TIMEOUT_MS,
} from "./model.js";

export type {
  IProviderEntry,
  IProviderConfig,
  IPromptTemplate,
  IDefaultFlags,
  IThinkingAnimation,
  IBehaviorSettings,
  ISettings,
} from "./config.js";

export { EMPTY_PROVIDER_CONFIG, DEFAULT_SETTINGS } from "./config.js";

export type {
  IProjectFile,
  IProjectItem,
  IProject,
  IProjectFileContent,
  IProjectContent,
} from "./project.js";

export { DEFAULT_PROJECT_ID, DEFAULT_PROJECT_NAME } from "./project.js";

export type {
  IPromptSessionRecord,
  IRawSessionRecord,
  SessionRecord,
  IResponseEntry,
  IFeedbackEntry,
  ConversationEntry,
  IRecursionContext,
} from "./session.js";

export type {
  IErrorContext,
  ConfigError,
  ProviderError,
  SinkError,
  ProjectError,
  AnyOlaError,
} from "./errors.js";

export {
  OlaError,
  ConfigurationError,
  InvalidConfigError,
  UnsupportedProviderError,
  NetworkError,
  ProviderHttpError,
  MalformedResponseError,
  MalformedChunkError,
  ClipboardError,
  LoggingError,
  ProjectNotFoundError,
  DuplicateProjectError,
} from "./errors.js";
