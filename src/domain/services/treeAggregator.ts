/**
 * Tree Aggregator
 *
 * Bottom-up summarization of the project tree. Source nodes are summarized
 * after their nested nodes, files after their top-level definitions and
 * directories after every child. Siblings run concurrently; a parent never
 * starts before all of its children have settled.
 */

import type {
  AggregatedUnit,
  ChangeStatus,
  DirectoryUnit,
  FileUnit,
  NodeLineage,
  SourceNode,
  SyncWarning,
  Unit,
} from "../entities";
import {
  SummarizationError,
  directoryLineageKey,
  nodeLineageKey,
  unitName,
} from "../entities";
import type { ChildSummary, Logger, SummaryCache, SummaryContext } from "../ports";
import { classify, directoryFingerprint, fingerprintNodes } from "./fingerprint";
import type { NodeSummarizer } from "./nodeSummarizer";

/** Placeholder used when no summary, fresh or stale, is available */
export const SUMMARY_UNAVAILABLE = "(summary unavailable)";

export interface TreeAggregatorDeps {
  summarizer: NodeSummarizer;
  cache: SummaryCache;

  /** Lineage persisted by the previous run */
  previousLineage: NodeLineage;

  logger?: Logger;
}

interface Produced {
  summary: string;
  fingerprint: string;
  degraded: boolean;
}

interface NodeResult extends Produced {
  node: SourceNode;
}

/**
 * Summary of one source node, as recorded while aggregating.
 */
export interface NodeRecord {
  path: string;
  node: SourceNode;
  fingerprint: string;
  summary: string;
  degraded: boolean;
}

export class TreeAggregator {
  /** Node- and unit-level failures */
  readonly warnings: SyncWarning[] = [];

  /** Every fingerprint whose cache entry backs a summary used in this run */
  readonly liveFingerprints = new Set<string>();

  /** Lineage to persist for the next run */
  readonly lineage: NodeLineage = {};

  /** How many summarized units were new, changed or unchanged */
  readonly changes: Record<ChangeStatus, number> = { new: 0, changed: 0, unchanged: 0 };

  private readonly files = new Map<string, Promise<AggregatedUnit>>();
  private readonly nodes = new Map<string, NodeRecord[]>();

  constructor(private readonly deps: TreeAggregatorDeps) {}

  /**
   * Aggregate a unit. Dispatches on the unit's type; the root directory
   * (path `.`) is summarized with project scope.
   */
  aggregate(unit: Unit): Promise<AggregatedUnit> {
    return unit.type === "file"
      ? this.summarizeFile(unit)
      : this.aggregateDirectory(unit);
  }

  /**
   * Summarize a file's nodes bottom-up. Memoized per path.
   */
  summarizeFile(file: FileUnit): Promise<AggregatedUnit> {
    let result = this.files.get(file.path);
    if (!result) {
      result = this.computeFile(file);
      this.files.set(file.path, result);
    }
    return result;
  }

  /**
   * Node records of a summarized file, in post-order.
   */
  nodeRecords(path: string): NodeRecord[] {
    return this.nodes.get(path) ?? [];
  }

  private async computeFile(file: FileUnit): Promise<AggregatedUnit> {
    const fingerprints = fingerprintNodes(file.rootNode, file.rawText);
    const records: NodeRecord[] = [];
    this.nodes.set(file.path, records);

    const visit = async (node: SourceNode): Promise<NodeResult> => {
      const children = await Promise.all(node.children.map(visit));
      const fingerprint = fingerprints.get(node.qualifiedName) ?? "";

      const produced = await this.produce({
        fingerprint,
        lineageKey: nodeLineageKey(file.path, node.qualifiedName),
        text: outlineText(node, file.rawText),
        context: {
          scope: node.kind,
          name: node.qualifiedName,
          path: file.path,
          signature: node.kind === "module" ? undefined : node.signature,
          children: children.map(
            (child): ChildSummary => ({
              name: child.node.name,
              scope: child.node.kind,
              summary: child.summary,
            })
          ),
        },
        degradedBelow: children.some((child) => child.degraded),
        warningPath: file.path,
        warningNode: node.qualifiedName,
      });

      records.push({ path: file.path, node, ...produced });
      return { node, ...produced };
    };

    const root = await visit(file.rootNode);
    return {
      unit: file,
      summary: root.summary,
      fingerprint: root.fingerprint,
      degraded: root.degraded,
      children: [],
    };
  }

  private async aggregateDirectory(dir: DirectoryUnit): Promise<AggregatedUnit> {
    // Post-order barrier: every child settles before the directory starts
    const children = await Promise.all(dir.children.map((child) => this.aggregate(child)));

    const scope = dir.path === "." ? "project" : "directory";
    const fingerprint = directoryFingerprint(
      scope,
      children.map((child) => ({
        name: unitName(child.unit),
        fingerprint: child.fingerprint,
      }))
    );

    if (children.length === 0) {
      return { unit: dir, summary: "", fingerprint, degraded: false, children };
    }

    const text = children
      .map((child) => `${displayName(child.unit)}:\n${child.summary}`)
      .join("\n\n");

    const produced = await this.produce({
      fingerprint,
      lineageKey: directoryLineageKey(dir.path),
      text,
      context: {
        scope,
        name: dir.path === "." ? dir.name : dir.path,
        path: dir.path,
        children: children.map(
          (child): ChildSummary => ({
            name: displayName(child.unit),
            scope: child.unit.type === "file" ? "module" : "directory",
            summary: child.summary,
          })
        ),
      },
      degradedBelow: children.some((child) => child.degraded),
      warningPath: dir.path,
    });

    return { unit: dir, ...produced, children };
  }

  /**
   * Summarize one unit, falling back to its previous summary (or the
   * placeholder) when the provider fails.
   */
  private async produce(input: {
    fingerprint: string;
    lineageKey: string;
    text: string;
    context: SummaryContext;
    degradedBelow: boolean;
    warningPath: string;
    warningNode?: string;
  }): Promise<Produced> {
    const { summarizer, cache, previousLineage, logger } = this.deps;
    const previous = previousLineage[input.lineageKey];
    const status = classify(input.fingerprint, input.lineageKey, cache, previousLineage);
    const cached = status === "unchanged";
    this.changes[status]++;
    if (status !== "unchanged") {
      logger?.debug(`  ${status === "new" ? "New" : "Changed"}: ${input.lineageKey}`);
    }

    try {
      const summary = await summarizer.summarize({
        fingerprint: input.fingerprint,
        text: input.text,
        context: input.context,
        cacheResult: !input.degradedBelow,
      });

      if (input.degradedBelow && !cached) {
        this.keepPrevious(input.lineageKey, previous);
      } else {
        this.liveFingerprints.add(input.fingerprint);
        this.lineage[input.lineageKey] = input.fingerprint;
      }
      return { summary, fingerprint: input.fingerprint, degraded: input.degradedBelow };
    } catch (error) {
      if (!(error instanceof SummarizationError)) {
        throw error;
      }

      const stale = previous !== undefined ? cache.get(previous) : undefined;
      const target = input.warningNode ?? input.warningPath;
      this.warnings.push({
        kind: "SummarizationError",
        path: input.warningPath,
        node: input.warningNode,
        message:
          stale !== undefined
            ? `${error.message}; kept previous summary`
            : `${error.message}; summary unavailable`,
      });
      logger?.warn(`  Summary failed for ${target}: ${error.message}`);

      this.keepPrevious(input.lineageKey, stale !== undefined ? previous : undefined);
      return {
        summary: stale ?? SUMMARY_UNAVAILABLE,
        fingerprint: input.fingerprint,
        degraded: true,
      };
    }
  }

  private keepPrevious(lineageKey: string, previous: string | undefined): void {
    if (previous !== undefined && this.deps.cache.get(previous) !== undefined) {
      this.liveFingerprints.add(previous);
      this.lineage[lineageKey] = previous;
    }
  }
}

/**
 * Text sent for a node: its source with each child reduced to its header.
 */
export function outlineText(node: SourceNode, text: string): string {
  let result = "";
  let cursor = node.span.start;
  for (const child of node.children) {
    result += text.slice(cursor, child.span.start) + `${child.header} ...`;
    cursor = child.span.end;
  }
  return result + text.slice(cursor, node.span.end);
}

function displayName(unit: Unit): string {
  return unit.type === "directory" ? `${unit.name}/` : unitName(unit);
}
