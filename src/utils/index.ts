/**
 * Utility exports
 */

// Grouping utilities
export { parsePageName } from "./parse-page-name";
export { classifyFile, IMAGE_EXTENSIONS, DOCUMENT_EXTENSIONS } from "./classify-file";
export { groupFiles, partitionFiles, comparePageDigits } from "./group-files";
export type { PartitionedFiles } from "./group-files";
export { combineImages, computeCanvasLayout } from "./combine-images";
export type { CombinedImage, CanvasLayout, ImageSize } from "./combine-images";

// Organization utilities
export {
  resolveOrganization,
  isOrganizationCriteria,
  UNCATEGORIZED,
} from "./resolve-organization";
export { extractDateTag } from "./extract-date-tag";
export { parseCategorization, emptyCategorization } from "./parse-categorization";

// Filesystem utilities
export { fileExists } from "./file-exists";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// Template utilities
export { loadDocumentTemplate } from "./load-template";
export { getDefaultDocumentTemplate } from "./get-default-document-template";

// Context
export { createContext } from "./create-context";

// Errors
export {
  DocdropError,
  ConfigurationError,
  UnsupportedFormatError,
  ExtractionError,
  InvalidResponseError,
  PipelineError,
} from "./errors";

// Classes
export { IdGenerator } from "./id-generator";
export { Tracker } from "./tracker";
export { Logger } from "./logger";
