// Plain-text extraction: no markup survives, every node boundary becomes a space

import { logger, errorMessage } from "../logger/index.js";
import { parseFragment } from "./tree.js";
import type { HtmlNode } from "./tree.js";


function collectText(nodes: HtmlNode[], out: string[]): void {
  for (const node of nodes) {
    if (node.kind === "text") {
      out.push(node.text);
    } else {
      collectText(node.children, out);
    }
  }
}


export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, " ").trim();
}


/** Last-resort tag stripping for input the parser rejected */
export function stripTagsLoosely(html: string): string {
  return collapseWhitespace(html.replace(/<[^>]*>/g, " ").replace(/[<>]/g, " "));
}


/** Flatten HTML to a single line of text with entities decoded */
export function extractText(html: string | null | undefined): string {
  if (!html) return "";
  let nodes: HtmlNode[];
  try {
    nodes = parseFragment(html);
  } catch (err) {
    logger.warn("sanitizer", "text extraction fell back to tag stripping", { err: errorMessage(err) });
    return stripTagsLoosely(html);
  }
  const parts: string[] = [];
  collectText(nodes, parts);
  return collapseWhitespace(parts.join(" "));
}
