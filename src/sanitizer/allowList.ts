// Tags and attributes that survive sanitization; read-only process-wide constants


/** Tags kept in cleaned HTML. b and i are listed but renamed before the allow-list is applied */
export const ALLOWED_TAGS: ReadonlySet<string> = new Set([
  "p", "br", "strong", "b", "em", "i", "u",
  "a", "h1", "h2", "h3", "h4", "h5", "h6",
  "ul", "ol", "li", "blockquote", "hr", "sub", "sup",
]);


/** Attributes kept per tag; a tag missing here keeps none */
export const ALLOWED_ATTRS: ReadonlyMap<string, readonly string[]> = new Map([
  ["a", Object.freeze(["href"])],
]);


/** Tags with no content model: never collapsed, serialized without a closing tag */
export const VOID_TAGS: ReadonlySet<string> = new Set(["br", "hr"]);


/** Presentational tags replaced by their semantic equivalents */
export const TAG_RENAMES: ReadonlyMap<string, string> = new Map([
  ["b", "strong"],
  ["i", "em"],
]);


export function isAllowedTag(tag: string): boolean {
  return ALLOWED_TAGS.has(tag);
}


export function isAllowedAttribute(tag: string, name: string): boolean {
  return ALLOWED_ATTRS.get(tag)?.includes(name) ?? false;
}
