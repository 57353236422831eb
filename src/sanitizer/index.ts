export { sanitizeHtml, cleanTree, unwrapDisallowed, collapseEmptyLeaves, normalizeWhitespace } from "./sanitize.js";
export { extractText, collapseWhitespace } from "./text.js";
export { ALLOWED_TAGS, ALLOWED_ATTRS, VOID_TAGS, TAG_RENAMES, isAllowedTag, isAllowedAttribute } from "./allowList.js";
export { parseFragment, serializeFragment } from "./tree.js";
export type { HtmlNode, HtmlElementNode, HtmlTextNode } from "./tree.js";
