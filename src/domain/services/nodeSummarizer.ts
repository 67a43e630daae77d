/**
 * Node Summarizer
 *
 * Calls the summarization capability for units whose fingerprint is not
 * cached. Guarantees at most one successful call chain per distinct
 * fingerprint per run: cached fingerprints are answered from the cache,
 * requests for a fingerprint already in flight share its promise, and a
 * fingerprint that failed is not tried again in the same run.
 *
 * Every call goes through one semaphore, so the configured concurrency
 * bounds the total number of outstanding requests to the provider.
 */

import type {
  DocstringRequest,
  SummarizationProvider,
  SummaryCache,
  SummaryContext,
} from "../ports";
import {
  SummarizationError,
  SyncCancelledError,
  describeError,
  throwIfCancelled,
} from "../entities";
import { Semaphore } from "./concurrency";

export interface SummarizeRequest {
  fingerprint: string;

  /** The unit's own text */
  text: string;

  context: SummaryContext;

  /** Store the result in the cache (false when a child summary degraded) */
  cacheResult: boolean;
}

export interface NodeSummarizerOptions {
  /** Retries after a failed call */
  maxRetries: number;

  /** Texts longer than this are summarized in chunks */
  maxChunkChars: number;

  /** Maximum concurrent calls */
  concurrency: number;

  /** Cooperative cancellation */
  signal?: AbortSignal;
}

export class NodeSummarizer {
  /** Calls made to `summarize`, retries and chunks included */
  summarizeCalls = 0;

  /** Calls made to `generateDocstring`, retries included */
  docstringCalls = 0;

  private readonly semaphore: Semaphore;
  private readonly inFlight = new Map<string, Promise<string>>();
  private readonly failed = new Map<string, SummarizationError>();
  private readonly docstrings = new Map<string, Promise<string>>();

  constructor(
    private readonly provider: SummarizationProvider,
    private readonly cache: SummaryCache,
    private readonly options: NodeSummarizerOptions
  ) {
    this.semaphore = new Semaphore(options.concurrency);
  }

  /**
   * Summary for a fingerprint, from the cache or the provider.
   *
   * @throws SummarizationError when every attempt failed
   * @throws SyncCancelledError once cancellation is observed
   */
  async summarize(request: SummarizeRequest): Promise<string> {
    const cached = this.cache.get(request.fingerprint);
    if (cached !== undefined) {
      return cached;
    }

    if (!request.cacheResult) {
      return this.summarizeText(request.text, request.context);
    }

    const previousFailure = this.failed.get(request.fingerprint);
    if (previousFailure) {
      throw previousFailure;
    }

    const pending = this.inFlight.get(request.fingerprint);
    if (pending) {
      return pending;
    }

    const promise = this.summarizeText(request.text, request.context).then(
      (summary) => {
        this.cache.put(request.fingerprint, summary);
        return summary;
      },
      (error: unknown) => {
        if (error instanceof SummarizationError) {
          this.failed.set(request.fingerprint, error);
        }
        throw error;
      }
    );
    this.inFlight.set(request.fingerprint, promise);

    try {
      return await promise;
    } finally {
      this.inFlight.delete(request.fingerprint);
    }
  }

  /**
   * Generated docstring text for a docstring key. Identical keys within a run
   * share one generation.
   */
  async generateDocstring(key: string, request: DocstringRequest): Promise<string> {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    let pending = this.docstrings.get(key);
    if (!pending) {
      pending = this.withRetries("docstring", () =>
        this.provider.generateDocstring(request, this.options.signal)
      ).then((text) => {
        this.cache.put(key, text);
        return text;
      });
      this.docstrings.set(key, pending);
    }
    return pending;
  }

  private async summarizeText(text: string, context: SummaryContext): Promise<string> {
    const chunks = splitText(text, this.options.maxChunkChars);
    if (chunks.length === 1) {
      return this.withRetries("summarize", () =>
        this.provider.summarize(text, context, this.options.signal)
      );
    }

    const partials = await Promise.all(
      chunks.map((chunk, index) =>
        this.withRetries("summarize", () =>
          this.provider.summarize(
            chunk,
            { ...context, part: { stage: "chunk", index, total: chunks.length } },
            this.options.signal
          )
        )
      )
    );

    const combined = partials
      .map((partial, index) => `Part ${index + 1}:\n${partial}`)
      .join("\n\n");
    return this.withRetries("summarize", () =>
      this.provider.summarize(
        combined,
        { ...context, part: { stage: "combine", index: 0, total: chunks.length } },
        this.options.signal
      )
    );
  }

  private async withRetries(
    capability: "summarize" | "docstring",
    call: () => Promise<string>
  ): Promise<string> {
    const attempts = this.options.maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      throwIfCancelled(this.options.signal);

      try {
        const result = await this.semaphore.run(async () => {
          // Cancellation may have been requested while waiting for a slot
          throwIfCancelled(this.options.signal);
          if (capability === "summarize") {
            this.summarizeCalls++;
          } else {
            this.docstringCalls++;
          }
          return call();
        });

        const trimmed = result.trim();
        if (trimmed.length === 0) {
          throw new Error("empty response");
        }
        return trimmed;
      } catch (error) {
        if (error instanceof SyncCancelledError || this.options.signal?.aborted) {
          throw new SyncCancelledError();
        }
        lastError = error;
      }
    }

    throw new SummarizationError(
      `${capability === "summarize" ? "Summarization" : "Docstring generation"} failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${describeError(lastError)}`,
      attempts,
      lastError
    );
  }
}

/**
 * Split text into chunks of at most `maxChars`, preferring line breaks.
 */
export function splitText(text: string, maxChars: number): string[] {
  if (text.length <= maxChars) {
    return [text];
  }

  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(start + maxChars, text.length);
    if (end < text.length) {
      const lineBreak = text.lastIndexOf("\n", end - 1);
      if (lineBreak > start) {
        end = lineBreak + 1;
      }
    }
    chunks.push(text.slice(start, end));
    start = end;
  }
  return chunks;
}
