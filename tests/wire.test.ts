import { describe, expect, test } from "vitest";
import {
  childTexts,
  decodeEntities,
  firstElement,
  scanElements,
  textOf,
} from "../packages/core/src/wire/fragments.js";
import {
  encodeParams,
  encodeParamValue,
  formatTimestamp,
  parseTimestamp,
} from "../packages/core/src/wire/params.js";

describe("fragment scanner", () => {
  test("reads attributes with entities decoded", () => {
    const [rev] = scanElements('<api><rev revid="5" comment="a &amp; b &lt;c&gt; &#233;" minor=""/></api>', "rev");
    expect(rev.attrs).toEqual({ revid: "5", comment: "a & b <c> é", minor: "" });
    expect(rev.inner).toBe("");
  });

  test("does not confuse elements sharing a name prefix", () => {
    const xml = "<blocks><block id=\"1\"/><block id=\"2\"/></blocks>";
    expect(scanElements(xml, "block").map(b => b.attrs.id)).toEqual(["1", "2"]);
    expect(scanElements(xml, "blocks")).toHaveLength(1);
  });

  test("matches nested elements of the same name to the right closing tag", () => {
    const xml = "<page title=\"A\"><page title=\"B\">inner</page>tail</page><page title=\"C\"/>";
    const pages = scanElements(xml, "page");
    expect(pages.map(p => p.attrs.title)).toEqual(["A", "B", "C"]);
    expect(pages[0].inner).toBe("<page title=\"B\">inner</page>tail");
    expect(pages[1].inner).toBe("inner");
  });

  test("skips comments and tolerates stray markup", () => {
    const xml = "<!-- <rev revid=\"1\"/> --><rev revid=\"2\" bogus>text</rev>";
    const revs = scanElements(xml, "rev");
    expect(revs).toHaveLength(1);
    expect(revs[0].attrs).toEqual({ revid: "2", bogus: "" });
    expect(textOf(revs[0])).toBe("text");
  });

  test("reads every element when no name is given", () => {
    const names = scanElements("<a x=\"1\"><b/></a><c></c>").map(f => f.name);
    expect(names).toEqual(["a", "b", "c"]);
  });

  test("collects child texts", () => {
    const groups = firstElement("<groups><g>*</g><g>user</g><g>bot</g></groups>", "groups");
    expect(groups).not.toBeNull();
    expect(childTexts(groups?.inner ?? "", "g")).toEqual(["*", "user", "bot"]);
  });

  test("leaves unknown entities alone", () => {
    expect(decodeEntities("&nbsp; &amp;amp; &#x41;")).toBe("&nbsp; &amp; A");
  });
});

describe("parameter encoding", () => {
  test("formats and parses compact timestamps in UTC", () => {
    const date = new Date(Date.UTC(2024, 0, 2, 3, 4, 5));
    expect(formatTimestamp(date)).toBe("20240102030405");
    expect(parseTimestamp("20240102030405")?.getTime()).toBe(date.getTime());
    expect(parseTimestamp("2024-01-02T03:04:05Z")?.getTime()).toBe(date.getTime());
    expect(parseTimestamp("yesterday")).toBeNull();
    expect(parseTimestamp(undefined)).toBeNull();
  });

  test("encodes values by type", () => {
    expect(encodeParamValue(true)).toBe("1");
    expect(encodeParamValue(false)).toBeUndefined();
    expect(encodeParamValue(null)).toBeUndefined();
    expect(encodeParamValue(12)).toBe("12");
    expect(encodeParamValue(["ids", "user"])).toBe("ids|user");
    expect(encodeParamValue(new Date(Date.UTC(2023, 11, 31, 23, 59, 59)))).toBe("20231231235959");
  });

  test("always requests XML and drops unset parameters", () => {
    const search = encodeParams({ action: "query", minor: false, bot: true, title: undefined });
    expect(search.toString()).toBe("format=xml&action=query&bot=1");
  });
});
