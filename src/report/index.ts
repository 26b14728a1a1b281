export {
  TOOL_NAME,
  buildRunReport,
  describeError,
  renderJsonReport,
} from "./json-reporter.js";
export type { RunReportInput } from "./json-reporter.js";
export { renderMarkdownReport, renderRecipeInfo } from "./markdown-reporter.js";
export type { MarkdownRenderOptions } from "./markdown-reporter.js";
export { formatDuration } from "./report-utils.js";
export type { ErrorReport, RunReport, StageReport } from "./types.js";
