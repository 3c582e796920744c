import fs from "node:fs";
import path from "node:path";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { TrackOutcome, TrackRecord } from "../summary/types.js";
import { log } from "../utils/logger.js";
import { errorMessage } from "../utils/errors.js";
import { readTrackRecord, type AttributeBag } from "./attributes.js";

const TRACK_ELEMENT = "Track";
// preserveOrder output keeps each element's attributes under this key
const ATTRS_KEY = ":@";
const TEXT_KEY = "#text";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseAttributeValue: false,
  parseTagValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  // decodes &#NN; and &#xNN; references; named HTML ones are refused below
  htmlEntities: true,
});

const PREDEFINED_ENTITIES = new Set(["lt", "gt", "amp", "apos", "quot"]);
const ENTITY_REF = /&(?:([A-Za-z_][\w.-]*)|#[0-9]+|#x[0-9A-Fa-f]+);|&/g;
const ENTITY_DECL = /<!ENTITY\s+([A-Za-z_][\w.-]*)/g;
const UNPARSED = /<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>/g;

/** First entity reference that XML does not define for this document. */
export function undefinedEntity(xml: string): string | null {
  const declared = new Set(PREDEFINED_ENTITIES);
  for (const m of xml.matchAll(ENTITY_DECL)) {
    if (m[1] !== undefined) declared.add(m[1]);
  }
  const text = xml.replace(UNPARSED, "");
  for (const m of text.matchAll(ENTITY_REF)) {
    if (m[0] === "&") return "&";
    const name = m[1];
    if (name !== undefined && !declared.has(name)) return m[0];
  }
  return null;
}

const extractLog = log.child({ component: "extract" });

export type ExtractResult =
  | { ok: true; source: string; tracks: TrackOutcome[] }
  | { ok: false; source: string; reason: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function attributesOf(node: Record<string, unknown>): AttributeBag {
  const raw = node[ATTRS_KEY];
  const attrs: Record<string, string> = {};
  if (!isRecord(raw)) return attrs;
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === "string") attrs[name] = value;
    else if (typeof value === "number" || typeof value === "boolean") {
      attrs[name] = String(value);
    }
  }
  return attrs;
}

// Pre-order walk, so tracks come out in document order whatever their depth.
function collectTracks(nodes: unknown, out: AttributeBag[]): void {
  if (!Array.isArray(nodes)) return;
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    for (const [key, children] of Object.entries(node)) {
      if (key === ATTRS_KEY || key === TEXT_KEY) continue;
      if (key === TRACK_ELEMENT) out.push(attributesOf(node));
      collectTracks(children, out);
    }
  }
}

/**
 * Parses one XML document and returns one outcome per `Track` element.
 * A document that is not well-formed gives `ok: false`; a track whose
 * attributes do not coerce gives a failed outcome and the rest still load.
 */
export function extractTracks(xml: string, source: string): ExtractResult {
  const text = xml.replace(/^\uFEFF/, "");
  if (text.trim() === "") {
    return { ok: false, source, reason: "document is empty" };
  }

  const valid = XMLValidator.validate(text);
  if (valid !== true) {
    const { msg, line, col } = valid.err;
    return { ok: false, source, reason: `${msg} (line ${line}, col ${col})` };
  }

  const entity = undefinedEntity(text);
  if (entity !== null) {
    return {
      ok: false,
      source,
      reason:
        entity === "&"
          ? "bare '&' is not a valid entity reference"
          : `undefined entity ${entity}`,
    };
  }

  let tree: unknown;
  try {
    tree = parser.parse(text);
  } catch (err) {
    return { ok: false, source, reason: errorMessage(err) };
  }

  const elements: AttributeBag[] = [];
  collectTracks(tree, elements);

  const tracks = elements.map((attrs, index): TrackOutcome => {
    const read = readTrackRecord(attrs);
    if (read.ok) return { ok: true, record: read.value };
    extractLog.warn(
      { file: source, index, trackId: attrs.TRACK_ID, reason: read.reason },
      "track skipped"
    );
    return { ok: false, index, trackId: attrs.TRACK_ID, reason: read.reason };
  });

  return { ok: true, source, tracks };
}

export async function readTrackFile(filePath: string): Promise<ExtractResult> {
  const source = path.basename(filePath);
  let xml: string;
  try {
    xml = await fs.promises.readFile(filePath, "utf8");
  } catch (err) {
    return { ok: false, source, reason: errorMessage(err) };
  }
  return extractTracks(xml, source);
}

export function trackRecords(tracks: readonly TrackOutcome[]): TrackRecord[] {
  const records: TrackRecord[] = [];
  for (const t of tracks) if (t.ok) records.push(t.record);
  return records;
}

export function failedTracks(tracks: readonly TrackOutcome[]): number {
  return tracks.filter((t) => !t.ok).length;
}
