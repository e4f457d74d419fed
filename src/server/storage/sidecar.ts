/**
 * Sidecar (XMP) keyword store.
 *
 * A photo's sidecar sits beside the original with the extension replaced:
 * `IMG_0042.CR3` -> `IMG_0042.xmp`, never `IMG_0042.CR3.xmp`.
 *
 * Keywords live in `rdf:Description/dc:subject/rdf:Bag/rdf:li`. Writes are
 * read-merge-write: the whole document is parsed in order, keywords are
 * appended to the bag, and the document is written back atomically with every
 * other element, attribute, namespace, comment and whitespace kept. A leading
 * byte order mark and the xpacket `begin` marker survive the rewrite.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";

import { missingNames } from "~/lib/tags/keywords";
import { writeFileAtomic } from "~/server/storage/atomic-file";

export const SIDECAR_EXTENSION = ".xmp";

const NS = {
  x: "adobe:ns:meta/",
  rdf: "http://www.w3.org/1999/02/22-rdf-syntax-ns#",
  dc: "http://purl.org/dc/elements/1.1/",
} as const;

const ATTRS = ":@";
const TEXT = "#text";
const COMMENT = "#comment";
const BOM = "\uFEFF";

// Ordered node as produced by fast-xml-parser with `preserveOrder`:
// `{ "rdf:li": [{ "#text": "Lake" }], ":@": { "@_xml:lang": "en" } }`.
type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  commentPropName: COMMENT,
  parseTagValue: false,
  parseAttributeValue: false,
  // Whitespace between elements is kept as text, so a rewrite keeps the layout.
  trimValues: false,
});

// Rewrites: the parsed whitespace already lays the document out.
const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  commentPropName: COMMENT,
  format: false,
  suppressEmptyNode: true,
});

// New packets have no layout of their own.
const packetBuilder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  commentPropName: COMMENT,
  format: true,
  indentBy: "  ",
  suppressEmptyNode: true,
});

export class SidecarParseError extends Error {
  constructor(
    public readonly sidecarPath: string,
    detail: string,
  ) {
    super(`invalid XMP ${sidecarPath}: ${detail}`);
    this.name = "SidecarParseError";
  }
}

export function sidecarPathFor(originalPath: string): string {
  const { dir, name } = path.parse(originalPath);
  return path.join(dir, `${name}${SIDECAR_EXTENSION}`);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function tagName(node: XmlNode): string | null {
  return Object.keys(node).find((k) => k !== ATTRS) ?? null;
}

// Live child array of an element (mutations land in the document).
function childrenOf(node: XmlNode): unknown[] {
  const tag = tagName(node);
  if (tag === null) return [];
  const children = node[tag];
  return Array.isArray(children) ? children : [];
}

function findAll(nodes: readonly unknown[], name: string, out: XmlNode[] = []): XmlNode[] {
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const tag = tagName(node);
    if (tag === TEXT || tag === COMMENT) continue;
    if (tag === name) out.push(node);
    findAll(childrenOf(node), name, out);
  }
  return out;
}

function attrsOf(node: XmlNode): Record<string, unknown> {
  const attrs = node[ATTRS];
  return isRecord(attrs) ? attrs : {};
}

function declaresDc(node: XmlNode): boolean {
  return typeof attrsOf(node)["@_xmlns:dc"] === "string";
}

// Whitespace-only text node (layout between elements), or null.
function whitespaceOf(node: unknown): string | null {
  if (!isRecord(node)) return null;
  const text = node[TEXT];
  return typeof text === "string" && text.trim() === "" ? text : null;
}

/**
 * Every rdf:Description in document order, with whether the `dc` prefix is
 * bound there (declared on the element or one of its ancestors).
 */
function descriptions(
  nodes: readonly unknown[],
  dcInScope = false,
  out: { node: XmlNode; dcInScope: boolean }[] = [],
): { node: XmlNode; dcInScope: boolean }[] {
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const tag = tagName(node);
    if (tag === null || tag === TEXT || tag === COMMENT) continue;

    const inScope = dcInScope || declaresDc(node);
    if (tag === "rdf:Description") out.push({ node, dcInScope: inScope });
    descriptions(childrenOf(node), inScope, out);
  }
  return out;
}

function findChild(node: XmlNode, name: string): XmlNode | null {
  for (const child of childrenOf(node)) {
    if (isRecord(child) && tagName(child) === name) return child;
  }
  return null;
}

function textOf(node: XmlNode): string {
  return childrenOf(node)
    .map((child) => {
      const text = isRecord(child) ? child[TEXT] : undefined;
      return typeof text === "string" ? text : "";
    })
    .join("")
    .trim();
}

function element(name: string, children: unknown[], attrs?: Record<string, string>): XmlNode {
  const node: XmlNode = { [name]: children };
  if (attrs) {
    node[ATTRS] = Object.fromEntries(
      Object.entries(attrs).map(([k, v]) => [`@_${k}`, v]),
    );
  }
  return node;
}

function listItem(keyword: string): XmlNode {
  return element("rdf:li", [{ [TEXT]: keyword }]);
}

// `begin` of the leading xpacket instruction, which holds a byte order mark.
function xpacketBegin(xml: string): string | null {
  const match = /<\?xpacket\s+begin=(["'])(.*?)\1/.exec(xml);
  return match?.[2] ?? null;
}

function restoreXpacketBegin(doc: readonly unknown[], begin: string): void {
  for (const node of doc) {
    if (isRecord(node) && tagName(node) === "?xpacket" && attrsOf(node)["@_begin"] !== undefined) {
      node[ATTRS] = { ...attrsOf(node), "@_begin": begin };
      return;
    }
  }
}

function parseDocument(xml: string, sidecarPath: string): unknown[] {
  const valid = XMLValidator.validate(xml);
  if (valid !== true) {
    throw new SidecarParseError(sidecarPath, `${valid.err.msg} (line ${valid.err.line})`);
  }

  const parsed: unknown = parser.parse(xml);
  if (!Array.isArray(parsed)) {
    throw new SidecarParseError(sidecarPath, "unexpected document shape");
  }
  return parsed;
}

function keywordsIn(doc: readonly unknown[]): string[] {
  const out: string[] = [];

  // Every dc:subject counts, not only the first.
  for (const subject of findAll(doc, "dc:subject")) {
    const bag = findChild(subject, "rdf:Bag");
    if (!bag) continue;

    for (const li of findAll(childrenOf(bag), "rdf:li")) {
      const text = textOf(li);
      if (text.length > 0) out.push(text);
    }
  }

  return out;
}

async function readIfExists(p: string): Promise<string | null> {
  try {
    return await fs.readFile(p, "utf8");
  } catch (err) {
    if (isRecord(err) && err.code === "ENOENT") return null;
    throw err;
  }
}

/**
 * Keywords stored in the sidecar of `originalPath`; empty when there is no
 * sidecar. A sidecar that is not well-formed XML throws `SidecarParseError`.
 */
export async function readSidecarKeywords(originalPath: string): Promise<string[]> {
  const sidecarPath = sidecarPathFor(originalPath);
  const xml = await readIfExists(sidecarPath);
  if (xml === null) return [];

  return keywordsIn(parseDocument(xml.startsWith(BOM) ? xml.slice(BOM.length) : xml, sidecarPath));
}

function minimalPacket(keywords: readonly string[]): unknown[] {
  return [
    element("?xml", [{ [TEXT]: "" }], { version: "1.0", encoding: "UTF-8" }),
    element(
      "x:xmpmeta",
      [
        element(
          "rdf:RDF",
          [
            element(
              "rdf:Description",
              [element("dc:subject", [element("rdf:Bag", keywords.map(listItem))])],
              { "rdf:about": "", "xmlns:dc": NS.dc },
            ),
          ],
          { "xmlns:rdf": NS.rdf },
        ),
      ],
      { "xmlns:x": NS.x, "x:xmptk": "photo-keyword-tagger" },
    ),
  ];
}

// Appends `additions` to the first keyword bag, creating dc:subject/rdf:Bag as needed.
function appendToBag(doc: unknown[], additions: readonly string[], sidecarPath: string): void {
  let subject = findAll(doc, "dc:subject")[0];

  if (!subject) {
    const all = descriptions(doc);
    // A Description where `dc` is already bound keeps the namespaces as they are.
    const target = all.find((d) => d.dcInScope) ?? all[0];
    if (!target) {
      throw new SidecarParseError(sidecarPath, "no rdf:Description element");
    }

    if (!target.dcInScope) {
      target.node[ATTRS] = { ...attrsOf(target.node), "@_xmlns:dc": NS.dc };
    }

    subject = element("dc:subject", []);
    insertChild(target.node, subject);
  }

  let bag = findChild(subject, "rdf:Bag");
  if (!bag) {
    bag = element("rdf:Bag", []);
    childrenOf(subject).push(bag);
  }

  for (const keyword of additions) insertChild(bag, listItem(keyword));
}

/**
 * Append `child` after the last element of `parent`, indented like the
 * existing children and before the whitespace that closes the parent.
 */
function insertChild(parent: XmlNode, child: XmlNode): void {
  const children = childrenOf(parent);
  if (children.length === 0) {
    const tag = tagName(parent);
    if (tag !== null) parent[tag] = [child];
    return;
  }

  const indent = whitespaceOf(children[0]);
  const closing = whitespaceOf(children[children.length - 1]) !== null ? children.pop() : undefined;

  if (indent !== null && closing !== undefined) children.push({ [TEXT]: indent });
  children.push(child);
  if (closing !== undefined) children.push(closing);
}

/**
 * Merge `keywords` into the sidecar of `originalPath` (case-insensitive
 * union) and return the names actually added. Nothing is written when every
 * keyword is already present.
 *
 * `accept` sees each candidate with the keywords the sidecar already holds
 * and can turn it down.
 */
export async function mergeSidecarKeywords(
  originalPath: string,
  keywords: readonly string[],
  accept?: (name: string, present: readonly string[]) => boolean,
): Promise<{ sidecarPath: string; added: string[] }> {
  const sidecarPath = sidecarPathFor(originalPath);
  const xml = await readIfExists(sidecarPath);

  const accepted = (present: readonly string[]) =>
    accept ? keywords.filter((name) => accept(name, present)) : keywords;

  if (xml === null) {
    const added = missingNames([], accepted([]));
    if (added.length > 0) {
      await writeFileAtomic(sidecarPath, String(packetBuilder.build(minimalPacket(added))));
    }
    return { sidecarPath, added };
  }

  // fs hands the byte order mark through as text; it is not part of the XML.
  const bom = xml.startsWith(BOM) ? BOM : "";
  const body = xml.slice(bom.length);

  const doc = parseDocument(body, sidecarPath);
  const present = keywordsIn(doc);
  const added = missingNames(present, accepted(present));
  if (added.length === 0) return { sidecarPath, added };

  appendToBag(doc, added, sidecarPath);

  const begin = xpacketBegin(body);
  if (begin !== null) restoreXpacketBegin(doc, begin);

  await writeFileAtomic(sidecarPath, `${bom}${String(builder.build(doc))}`);

  return { sidecarPath, added };
}
