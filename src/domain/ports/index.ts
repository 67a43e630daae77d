/**
 * Domain Ports
 *
 * Interfaces defining what the domain needs from external systems.
 * These are implemented by infrastructure adapters.
 */

export type { FileSystem, DirectoryEntry, EntryType } from "./filesystem";
export type { Logger, LoggerFactory } from "./logger";
export type { IParser, ParserLanguage } from "./parser";
export type {
  SummarizationProvider,
  SummaryContext,
  SummaryScope,
  ChildSummary,
  DocstringRequest,
} from "./summarization";
export type { SummaryCache, SummaryStore } from "./summaryCache";
export type { ChatClient, ChatMessage } from "./chat";
