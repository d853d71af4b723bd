/**
 * Product Explorer - Main Entry Point
 *
 * Best-first, AI-guided crawler that finds product detail pages on a single
 * website.
 *
 * Architecture:
 * - tree/scheduler hold crawl state and the best-first frontier
 * - gateway asks an LLM to score links and spot dynamic-loading controls
 * - transport fetches and parses pages; dynamic drives a headless browser
 * - engine runs the crawl loop; runner wires a task config end to end
 */

// Core Types
export type * from './types/index.js';

// Errors and observability
export {
  ExplorerError,
  FetchError,
  AIProviderError,
  ParseError,
  DomainViolationError,
  AutomationTimeoutError,
  ConfigError,
  toError,
  type ErrorCode,
} from './errors/index.js';
export {
  createLogger,
  parseLogLevel,
  silentLogger,
  defaultMetrics,
  type Logger,
  type LogLevel,
  type Metrics,
} from './logger/index.js';

// Config Module - Task file and environment resolution
export {
  loadTaskConfig,
  resolveTaskConfig,
  defaultOutputFileName,
  DEFAULT_MODELS,
  API_KEY_ENV,
  TaskConfigFileSchema,
  type TaskConfig,
  type TaskConfigFile,
  type Env,
} from './config/index.js';

// Tree and Scheduler Modules - Crawl state
export {
  WebsiteTree,
  averageAncestralScore,
  renderTree,
  hostnameOf,
  normalizeDomain,
  isSameDomain,
  ROOT_SCORE,
  SKIP_THRESHOLD,
  PRODUCT_THRESHOLD,
  type NodeId,
  type NewChild,
  type WebsiteNode,
} from './tree/index.js';
export { OpenSet } from './scheduler/index.js';

// Gateway Module - LLM scoring and detection
export {
  createScoringGateway,
  PromptGateway,
  AnthropicGateway,
  OpenAIGateway,
  GoogleGateway,
  isRateLimitError,
  parseScoreResponse,
  parseDetectionResponse,
  type GatewayConfig,
  type GatewayOptions,
  type ScoringGateway,
} from './gateway/index.js';

// Transport Module - HTTP fetch and HTML parsing
export {
  HttpPageFetcher,
  withRetry,
  cheerioPageParser,
  parsePage,
  extractLinks,
  resolveLink,
  canonicalUrl,
  type FetchedPage,
  type FetcherConfig,
  type PageFetcher,
  type PageParser,
  type ParsedPage,
} from './transport/index.js';

// Dynamic Module - Browser-driven content exhaustion
export {
  DynamicContentExplorer,
  PlaywrightDriver,
  LinkCollector,
  TRIGGER_HANDLERS,
  type AutomationDriver,
  type ControlHandle,
  type ControlTarget,
  type DynamicExplorerOptions,
  type PlaywrightDriverOptions,
} from './dynamic/index.js';

// Engine Module - Crawl loop
export {
  ExplorationEngine,
  CrawlSession,
  createSessionId,
  type CrawlCounters,
  type EngineDependencies,
  type EngineOptions,
  type StopReason,
} from './engine/index.js';

// Results and Storage Modules - Output documents
export {
  buildResultDocuments,
  deduplicateProducts,
  normalizeProductUrl,
  cleanProductUrl,
  normalizeProductName,
  cleanedOutputPath,
  type DedupResult,
  type ResultDocuments,
  type ResultInput,
} from './results/index.js';
export {
  FileStorageAdapter,
  S3StorageAdapter,
  MemoryStorageAdapter,
  createStorageAdapter,
  isS3Location,
  parseS3Location,
  type ArtifactMetadata,
  type S3Config,
  type StorageAdapter,
} from './storage/index.js';

// Runner Module - Task entry point
export { runCrawlTask, type CrawlTaskOutput, type CrawlTaskOverrides } from './runner/index.js';
