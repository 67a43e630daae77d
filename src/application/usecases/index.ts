/**
 * Use Cases
 */

export {
  syncDocumentation,
  type SyncDocumentationOptions,
  type SyncDocumentationDependencies,
} from "./syncDocumentation";
export {
  walkTree,
  type WalkTreeDependencies,
  type WalkTreeOptions,
  type WalkTreeResult,
} from "./walkTree";
export {
  readDocstrings,
  type ReadDocstringsDependencies,
  type DocstringListing,
} from "./readDocstrings";
export {
  getSyncStatus,
  type SyncStatusDependencies,
  type ProjectStatus,
} from "./getSyncStatus";
