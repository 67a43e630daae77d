/**
 * Summary Document
 *
 * Renders the aggregated tree as the Markdown summary document. The output
 * depends only on the tree and its summaries (no timestamps), so an
 * unchanged project renders byte-identical documents.
 */

import type { AggregatedUnit, DirectoryUnit } from "../entities";
import { renderDirectoryTree } from "./directoryTree";

export function renderSummaryDocument(tree: DirectoryUnit, root: AggregatedUnit): string {
  const lines: string[] = [`# ${tree.name}`, ""];

  if (root.children.length === 0) {
    lines.push("_No source files found._", "");
    return lines.join("\n");
  }

  lines.push(root.summary, "", "## Structure", "", "```", renderDirectoryTree(tree), "```", "");

  const visit = (entry: AggregatedUnit): void => {
    const heading = entry.unit.type === "directory" ? `${entry.unit.path}/` : entry.unit.path;
    lines.push(`## \`${heading}\``, "", entry.summary, "");
    entry.children.forEach(visit);
  };
  root.children.forEach(visit);

  return lines.join("\n");
}
