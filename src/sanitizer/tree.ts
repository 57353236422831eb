// Lenient HTML parsing into a small owned node tree, and serialization back to HTML

import { parse, HTMLElement, TextNode } from "node-html-parser";
import type { Node } from "node-html-parser";
import { VOID_TAGS } from "./allowList.js";


export interface HtmlElementNode {
  kind: "element";
  tag: string;
  attributes: Record<string, string>;
  children: HtmlNode[];
}


/** Text with entities already decoded */
export interface HtmlTextNode {
  kind: "text";
  text: string;
}


export type HtmlNode = HtmlElementNode | HtmlTextNode;


const PARSE_OPTIONS = {
  lowerCaseTagName: true,
  comment: false,
  parseNoneClosedTags: true,
  // pre is parsed as markup so its inline formatting survives; these stay raw text
  blockTextElements: { script: true, noscript: true, style: true },
};


function convert(node: Node): HtmlNode | null {
  if (node instanceof HTMLElement) {
    const attributes: Record<string, string> = {};
    for (const [name, value] of Object.entries(node.attributes)) {
      attributes[name.toLowerCase()] = value;
    }
    return {
      kind: "element",
      tag: node.rawTagName.toLowerCase(),
      attributes,
      children: convertAll(node.childNodes),
    };
  }
  if (node instanceof TextNode) {
    return { kind: "text", text: node.text };
  }
  return null;
}


function convertAll(nodes: Node[]): HtmlNode[] {
  const out: HtmlNode[] = [];
  for (const child of nodes) {
    const converted = convert(child);
    if (converted) out.push(converted);
  }
  return out;
}


/** Parse a fragment with node-html-parser; unclosed tags and stray markup are tolerated */
export function parseFragment(html: string): HtmlNode[] {
  const root = parse(html, PARSE_OPTIONS);
  return convertAll(root.childNodes);
}


/** Concatenated text of a subtree, no separators */
export function textOf(node: HtmlNode): string {
  if (node.kind === "text") return node.text;
  return node.children.map(textOf).join("");
}


export function escapeText(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}


export function escapeAttribute(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;");
}


function serializeNode(node: HtmlNode): string {
  if (node.kind === "text") return escapeText(node.text);
  const attrs = Object.entries(node.attributes)
    .map(([name, value]) => ` ${name}="${escapeAttribute(value)}"`)
    .join("");
  if (VOID_TAGS.has(node.tag)) return `<${node.tag}${attrs}/>`;
  return `<${node.tag}${attrs}>${serializeFragment(node.children)}</${node.tag}>`;
}


export function serializeFragment(nodes: HtmlNode[]): string {
  return nodes.map(serializeNode).join("");
}
