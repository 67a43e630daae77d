/**
 * Directory Tree Rendering
 *
 * Draws a unit tree with box-drawing characters:
 *
 *   project/
 *   ├── a.py
 *   └── sub/
 *       └── b.py
 */

import type { DirectoryUnit, Unit } from "../entities";
import { unitName } from "../entities";

export function renderDirectoryTree(root: DirectoryUnit): string {
  const lines = [`${root.name}/`];
  appendChildren(root, "", lines);
  return lines.join("\n");
}

function appendChildren(dir: DirectoryUnit, prefix: string, lines: string[]): void {
  dir.children.forEach((child: Unit, index) => {
    const last = index === dir.children.length - 1;
    const label = child.type === "directory" ? `${unitName(child)}/` : unitName(child);
    lines.push(`${prefix}${last ? "└── " : "├── "}${label}`);
    if (child.type === "directory") {
      appendChildren(child, prefix + (last ? "    " : "│   "), lines);
    }
  });
}
