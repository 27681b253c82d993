/**
 * Central type exports
 */

// Configuration
export type {
  AppConfig,
  PartialAppConfig,
  DeliveryConfig,
  OcrConfig,
  PdfConfig,
  MarkdownConfig,
  DatesConfig,
  CategorizationConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export { AppConfigSchema, PartialAppConfigSchema } from "./config";

// Documents
export type {
  SourceFile,
  ProcessedFile,
  DocumentInfo,
  Categorization,
  FileKind,
  FileGroup,
  PageName,
} from "./documents";

// Context
export type {
  PipelineContext,
  RunConfig,
  OrganizationCriteria,
  OrganizationResolver,
  DeliveryEntry,
  Issue,
  IssueType,
  IssueReason,
  ProcessingStats,
} from "./context";

// Pipeline
export type { Stage, StageFunction, Next, Pipeline } from "./pipeline";

// Services
export type {
  OcrEngine,
  TextExtractor,
  DocumentGenerator,
  Categorizer,
  DeliveryService,
} from "./services";
