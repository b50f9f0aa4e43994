interface TreeNode {
  readonly children: Map<string, TreeNode>;
}

function createNode(): TreeNode {
  return { children: new Map() };
}

/**
 * Render file paths as an indented directory tree:
 *
 * ```text
 * ├─ docs
 * │  └─ index.md
 * └─ src
 *    └─ main.py
 * ```
 *
 * Paths are de-duplicated and sorted; backslashes are treated as separators.
 */
export function buildFileTree(paths: Iterable<string>): string {
  const root = createNode();
  const unique = [...new Set(paths)].sort();
  for (const filePath of unique) {
    let node = root;
    for (const part of filePath.replace(/\\/g, '/').split('/')) {
      let child = node.children.get(part);
      if (!child) {
        child = createNode();
        node.children.set(part, child);
      }
      node = child;
    }
  }
  return renderNode(root, '').join('\n');
}

function renderNode(node: TreeNode, prefix: string): string[] {
  const lines: string[] = [];
  const entries = [...node.children.entries()].sort(([left], [right]) =>
    left < right ? -1 : left > right ? 1 : 0,
  );
  entries.forEach(([name, child], index) => {
    const isLast = index === entries.length - 1;
    lines.push(`${prefix}${isLast ? '└─ ' : '├─ '}${name}`);
    if (child.children.size > 0) {
      lines.push(...renderNode(child, prefix + (isLast ? '   ' : '│  ')));
    }
  });
  return lines;
}
