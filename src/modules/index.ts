/**
 * Pipeline modules export
 */

export { walk, createRunState } from "./walker";
export { filterItem, compileTitlePattern } from "./filter";
export { stats, formatSummary } from "./stats";
