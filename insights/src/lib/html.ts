import type { Cheerio } from "cheerio";
import { AnyNode, hasChildren, isTag, isText } from "domhandler";

const HIDDEN_TAGS = new Set(["script", "style", "noscript", "template"]);

/**
 * Text nodes under `nodes` in document order, each trimmed, empties dropped.
 * Script, style, noscript and template contents are skipped.
 */
export function visibleStrings(nodes: AnyNode[]): string[] {
  const output: string[] = [];

  const visit = (node: AnyNode): void => {
    if (isText(node)) {
      const text = node.data.trim();
      if (text.length > 0) {
        output.push(text);
      }
      return;
    }
    if (isTag(node) && HIDDEN_TAGS.has(node.name.toLowerCase())) {
      return;
    }
    if (hasChildren(node)) {
      for (const child of node.children) {
        visit(child);
      }
    }
  };

  for (const node of nodes) {
    visit(node);
  }
  return output;
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

// Single-line visible text of a selection: strings joined by one space.
export function textOf<T extends AnyNode>(selection: Cheerio<T>): string {
  return collapseWhitespace(visibleStrings(selection.toArray()).join(" "));
}
