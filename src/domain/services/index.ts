/**
 * Domain Services
 *
 * Algorithms and business logic of documentation synchronization.
 * These services operate on domain entities and ports only.
 */

// Change detection
export {
  fingerprint,
  fingerprintNodes,
  nodeOwnText,
  directoryFingerprint,
  docstringKey,
  classify,
} from "./fingerprint";

// Summarization
export {
  NodeSummarizer,
  splitText,
  type SummarizeRequest,
  type NodeSummarizerOptions,
} from "./nodeSummarizer";

// Aggregation
export {
  TreeAggregator,
  SUMMARY_UNAVAILABLE,
  outlineText,
  type TreeAggregatorDeps,
  type NodeRecord,
} from "./treeAggregator";

// Docstring rewriting
export {
  planDocstringEdits,
  applyEdits,
  rewriteDocstrings,
  verifyRewrite,
  detectEol,
  type TextEdit,
  type DocstringFormatter,
} from "./docstringRewriter";

// Rendering
export { renderDirectoryTree } from "./directoryTree";
export { renderSummaryDocument } from "./summaryDocument";

// Concurrency
export { Semaphore, parallelMap } from "./concurrency";

// Configuration validation
export {
  validateConfig,
  formatValidationIssues,
  type ValidationIssue,
  type ValidationResult,
} from "./configValidator";
