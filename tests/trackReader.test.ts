import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import {
  extractTracks,
  failedTracks,
  readTrackFile,
  trackRecords,
  undefinedEntity,
} from "../src/extract/trackReader.js";

const NESTED = `<?xml version="1.0" encoding="UTF-8"?>
<Tracks nTracks="2" spaceUnits="micron">
  <Track TRACK_ID="0" NUMBER_SPOTS="5" NUMBER_MERGES="0" TRACK_MEAN_SPEED="1.0" TRACK_MAX_SPEED="2.0">
    <Spot ID="1" />
  </Track>
  <Group name="late">
    <Track TRACK_ID="1" NUMBER_SPOTS="8" NUMBER_MERGES="2" TRACK_MEAN_SPEED="3.0" TRACK_MAX_SPEED="4.5" />
  </Group>
</Tracks>
`;

describe("extractTracks", () => {
  it("finds Track elements at any depth in document order", () => {
    const result = extractTracks(NESTED, "nested.xml");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(trackRecords(result.tracks)).toEqual([
      {
        track_id: 0,
        n_spots: 5,
        n_merges: 0,
        has_merging: false,
        mean_speed: 1,
        max_speed: 2,
      },
      {
        track_id: 1,
        n_spots: 8,
        n_merges: 2,
        has_merging: true,
        mean_speed: 3,
        max_speed: 4.5,
      },
    ]);
  });

  it("defaults missing attributes", () => {
    const result = extractTracks(
      `<Model><AllTracks><Track TRACK_ID="9" /></AllTracks></Model>`,
      "sparse.xml"
    );
    expect(result.ok && trackRecords(result.tracks)).toEqual([
      {
        track_id: 9,
        n_spots: 0,
        n_merges: 0,
        has_merging: false,
        mean_speed: 0,
        max_speed: 0,
      },
    ]);
  });

  it("skips a track that fails coercion and keeps the others", () => {
    const xml = `<Tracks>
      <Track TRACK_ID="0" NUMBER_MERGES="1" />
      <Track TRACK_ID="1" TRACK_MEAN_SPEED="fast" />
      <Track TRACK_ID="2" />
    </Tracks>`;
    const result = extractTracks(xml, "mixed.xml");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.tracks[1]).toEqual({
      ok: false,
      index: 1,
      trackId: "1",
      reason: 'TRACK_MEAN_SPEED: expected float, got "fast"',
    });
    expect(failedTracks(result.tracks)).toBe(1);
    expect(trackRecords(result.tracks).map((r) => r.track_id)).toEqual([0, 2]);
  });

  it("returns no tracks for a document without Track elements", () => {
    const result = extractTracks(`<Tracks nTracks="0"></Tracks>`, "empty.xml");
    expect(result).toEqual({ ok: true, source: "empty.xml", tracks: [] });
  });

  it("reports malformed XML instead of throwing", () => {
    const result = extractTracks(`<Tracks><Track TRACK_ID="1"></Tracks>`, "bad.xml");
    expect(result.ok).toBe(false);
    expect(result.source).toBe("bad.xml");
  });

  it("decodes character references in attribute values", () => {
    const result = extractTracks(
      `<Tracks><Track TRACK_ID="&#49;" NUMBER_MERGES="&#x32;" TRACK_MEAN_SPEED="2&#46;5"/></Tracks>`,
      "refs.xml"
    );
    expect(result.ok && trackRecords(result.tracks)).toEqual([
      {
        track_id: 1,
        n_spots: 0,
        n_merges: 2,
        has_merging: true,
        mean_speed: 2.5,
        max_speed: 0,
      },
    ]);
  });

  it("fails the whole document on an undefined entity", () => {
    expect(
      extractTracks(`<Tracks><Track TRACK_ID="&foo;"/></Tracks>`, "undef.xml")
    ).toEqual({ ok: false, source: "undef.xml", reason: "undefined entity &foo;" });
  });

  it("fails the whole document on a bare ampersand", () => {
    expect(
      extractTracks(`<Tracks><Track TRACK_ID="1 & 2"/></Tracks>`, "amp.xml")
    ).toEqual({
      ok: false,
      source: "amp.xml",
      reason: "bare '&' is not a valid entity reference",
    });
  });

  it("reports an empty document", () => {
    expect(extractTracks("  \n", "blank.xml")).toEqual({
      ok: false,
      source: "blank.xml",
      reason: "document is empty",
    });
  });

  it("gives identical output for identical input", () => {
    expect(extractTracks(NESTED, "a.xml")).toEqual(extractTracks(NESTED, "a.xml"));
  });
});

describe("readTrackFile", () => {
  it("reports an unreadable file as a failed result", async () => {
    const missing = path.join(os.tmpdir(), "no-such-dir-for-tracks", "gone.xml");
    const result = await readTrackFile(missing);
    expect(result.ok).toBe(false);
    expect(result.source).toBe("gone.xml");
  });
});

describe("undefinedEntity", () => {
  it("accepts predefined, numeric and declared entities", () => {
    const xml = `<!DOCTYPE t [<!ENTITY unit "um">]><t a="&lt;&#49;&#x41;&unit;"/>`;
    expect(undefinedEntity(xml)).toBeNull();
  });

  it("ignores references inside comments and CDATA", () => {
    expect(
      undefinedEntity(`<t><!-- &nbsp; --><![CDATA[&copy;]]></t>`)
    ).toBeNull();
  });

  it("names the first undefined entity", () => {
    expect(undefinedEntity(`<t a="&amp;&nbsp;&copy;"/>`)).toBe("&nbsp;");
  });
});
