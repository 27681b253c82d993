/**
 * Pipeline modules export
 */

export { traversal, scanDocuments } from "./traversal";
export { processor, processDocuments, PAGE_BREAK } from "./processor";
export type { ProcessorOptions } from "./processor";
export { dateTagging, tagDates } from "./dates";
export { categorization, categorizeDocuments } from "./categorization";
export { delivery, planDeliveries } from "./delivery";
export { logging } from "./logging";
export { stats } from "./stats";
