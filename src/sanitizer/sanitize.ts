// HTML cleaning for content:encoded: allow-listed tags only, wrappers unwrapped, noise collapsed

import { logger, errorMessage } from "../logger/index.js";
import { isAllowedAttribute, isAllowedTag, TAG_RENAMES, VOID_TAGS } from "./allowList.js";
import { escapeText, parseFragment, serializeFragment, textOf } from "./tree.js";
import type { HtmlElementNode, HtmlNode } from "./tree.js";
import { stripTagsLoosely } from "./text.js";


const NBSP = /\u00a0/g;
/** Re-parsing can split blocks the unwrap nested (a p inside a p); a few passes always settle */
const MAX_PASSES = 4;


function renameTags(nodes: HtmlNode[]): HtmlNode[] {
  return nodes.map((node) => {
    if (node.kind === "text") return node;
    return {
      ...node,
      tag: TAG_RENAMES.get(node.tag) ?? node.tag,
      children: renameTags(node.children),
    };
  });
}


/**
 * Replace every element outside the allow-list with its children.
 * Children are cleaned before their parent is inspected, so one walk removes
 * wrappers nested to any depth.
 */
export function unwrapDisallowed(nodes: HtmlNode[]): HtmlNode[] {
  const out: HtmlNode[] = [];
  for (const node of nodes) {
    if (node.kind === "text") {
      out.push(node);
      continue;
    }
    const children = unwrapDisallowed(node.children);
    if (isAllowedTag(node.tag)) {
      out.push({ ...node, children });
    } else {
      out.push(...children);
    }
  }
  return out;
}


function stripAttributes(nodes: HtmlNode[]): HtmlNode[] {
  return nodes.map((node) => {
    if (node.kind === "text") return node;
    const attributes: Record<string, string> = {};
    for (const [name, value] of Object.entries(node.attributes)) {
      if (isAllowedAttribute(node.tag, name)) attributes[name] = value;
    }
    return { ...node, attributes, children: stripAttributes(node.children) };
  });
}


function hasElementChild(node: HtmlElementNode): boolean {
  return node.children.some((child) => child.kind === "element");
}


/**
 * Drop empty leaf elements and turn whitespace-only ones into a single space.
 * Bottom-up: an element whose children all collapsed is a leaf by the time it is checked.
 */
export function collapseEmptyLeaves(nodes: HtmlNode[]): HtmlNode[] {
  const out: HtmlNode[] = [];
  for (const node of nodes) {
    if (node.kind === "text") {
      out.push(node);
      continue;
    }
    const element: HtmlElementNode = { ...node, children: collapseEmptyLeaves(node.children) };
    if (VOID_TAGS.has(element.tag) || hasElementChild(element)) {
      out.push(element);
      continue;
    }
    const text = textOf(element);
    if (text === "") continue;
    if (text.trim() === "") {
      out.push({ kind: "text", text: " " });
      continue;
    }
    out.push(element);
  }
  return out;
}


export function normalizeWhitespace(html: string): string {
  return html
    .replace(NBSP, " ")
    .replace(/ {2,}/g, " ")
    .replace(/\n\s*\n/g, "\n")
    .trim();
}


/** Apply every tree pass; exported for callers that already hold a parsed fragment */
export function cleanTree(nodes: HtmlNode[]): HtmlNode[] {
  return collapseEmptyLeaves(stripAttributes(unwrapDisallowed(renameTags(nodes))));
}


function cleanOnce(html: string): string {
  return normalizeWhitespace(serializeFragment(cleanTree(parseFragment(html))));
}


/** Clean rich-text HTML into the allow-listed subset; malformed input degrades, never throws */
export function sanitizeHtml(html: string | null | undefined): string {
  if (!html) return "";
  let out: string;
  try {
    out = cleanOnce(html);
    for (let pass = 1; pass < MAX_PASSES; pass++) {
      const next = cleanOnce(out);
      if (next === out) break;
      out = next;
    }
  } catch (err) {
    logger.warn("sanitizer", "HTML parse failed, emitting escaped text", { err: errorMessage(err) });
    return normalizeWhitespace(escapeText(stripTagsLoosely(html)));
  }
  return out;
}
