import { describe, expect, test } from "vitest";
import { ValidationError } from "../packages/core/src/api/errors.js";
import { dbNameToDomain, standardCapabilities } from "../packages/core/src/site/capabilities.js";
import { FakeWiki, api, createTestClient } from "./helpers/fake-wiki.js";

describe("database names", () => {
  test.each([
    ["enwiki", "en.wikipedia.org"],
    ["dewikivoyage", "de.wikivoyage.org"],
    ["zh_min_nanwiktionary", "zh-min-nan.wiktionary.org"],
    ["frwikisource", "fr.wikisource.org"],
    ["commonswiki", "commons.wikimedia.org"],
    ["wikidatawiki", "www.wikidata.org"],
  ])("%s is %s", (dbName, domain) => {
    expect(dbNameToDomain(dbName)).toBe(domain);
  });

  test("unknown names are rejected", () => {
    expect(() => dbNameToDomain("wiki")).toThrow(ValidationError);
    expect(() => dbNameToDomain("enwikifoo")).toThrow(ValidationError);
  });
});

describe("site capabilities", () => {
  test("standard sites build their endpoints from domain and script path", () => {
    const site = standardCapabilities("wiki.test", "/mw", "http");

    expect(site.apiUrl).toBe("http://wiki.test/mw/api.php");
    expect(site.indexUrl).toBe("http://wiki.test/mw/index.php");
    expect(site.family).toBe("mediawiki");
  });

  test("domains with paths or spaces are rejected", () => {
    expect(() => standardCapabilities("wiki.test/w")).toThrow(ValidationError);
    expect(() => standardCapabilities("")).toThrow(ValidationError);
  });

  test("a standard site lists only itself", async () => {
    const wiki = new FakeWiki();
    const { client } = createTestClient(wiki);

    expect(await client.listSites()).toEqual([{ dbName: "wiki.test", url: "https://wiki.test", code: "wiki.test" }]);
    expect(wiki.requests).toHaveLength(0);
  });

  test("the Wikimedia farm lists open wikis from the site matrix", async () => {
    const wiki = new FakeWiki().on(
      { action: "sitematrix" },
      api(
        '<sitematrix count="4">' +
          '<language code="en" name="English"><site>' +
          '<site url="https://en.wikipedia.org" dbname="enwiki" code="wiki"/>' +
          '<site url="https://en.wikinews.org" dbname="enwikinews" code="wikinews" closed=""/>' +
          "</site></language>" +
          '<specials><special url="https://commons.wikimedia.org" dbname="commonswiki" code="commons"/>' +
          '<special url="https://office.wikimedia.org" dbname="officewiki" code="office" private=""/></specials>' +
          "</sitematrix>"
      )
    );
    const { client } = createTestClient(wiki, { family: "wikimedia", domain: "en.wikipedia.org" });

    expect(await client.listSites()).toEqual([
      { dbName: "enwiki", url: "https://en.wikipedia.org", code: "wiki" },
      { dbName: "commonswiki", url: "https://commons.wikimedia.org", code: "commons" },
    ]);
    expect(wiki.sent({ action: "sitematrix" })[0].params.smtype).toBe("language|special");
  });
});
