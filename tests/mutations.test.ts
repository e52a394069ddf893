import { describe, expect, test } from "vitest";
import {
  HttpError,
  PermissionError,
  ProtocolError,
  SessionError,
  TransientError,
  ValidationError,
} from "../packages/core/src/api/errors.js";
import type { Revision } from "../packages/core/src/api/types.js";
import { WikiClient } from "../packages/core/src/api/client.js";
import { silentLogger } from "../packages/core/src/utils/logger.js";
import { FakeWiki, api, loggedInClient } from "./helpers/fake-wiki.js";
import { ManualClock } from "./helpers/manual-clock.js";

const EDITOR = {
  groups: ["*", "user", "bot"],
  rights: ["read", "edit", "bot", "delete", "rollback", "move", "upload", "sendemail"],
};

const EDIT_OK = api('<edit result="Success" pageid="1" title="Sandbox" newrevid="101"/>');

function revision(id: number, fields: Partial<Revision> = {}): Revision {
  return {
    id,
    parentId: id - 1,
    timestamp: new Date(Date.UTC(2024, 0, 1, 0, 0, id)),
    title: "Sandbox",
    summary: "",
    user: "Vandal",
    minor: false,
    bot: false,
    isNew: false,
    size: 10,
    ...fields,
  };
}

function topRevision(id: number): string {
  return api(
    `<query><pages><page title="Sandbox"><revisions><rev revid="${id}" parentid="${id - 1}" user="Vandal" timestamp="2024-01-01T00:00:${id}Z" size="3"/></revisions></page></pages>` +
      '<tokens rollbacktoken="rb-token+\\"/></query>'
  );
}

describe("edit", () => {
  test("sends text, token and bot flag with the write cookies", async () => {
    const wiki = new FakeWiki().pageInfo("Sandbox").on({ action: "edit" }, EDIT_OK);
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    const outcome = await client.edit("Sandbox", "Hello", "greeting");

    expect(outcome).toEqual({ action: "edit", title: "Sandbox", status: "done" });
    const [request] = wiki.sent({ action: "edit" });
    expect(request.method).toBe("POST");
    expect(request.params.text).toBe("Hello");
    expect(request.params.summary).toBe("greeting");
    expect(request.params.token).toBe("csrf-token+\\");
    expect(request.params.bot).toBe("1");
    expect(request.params.minor).toBeUndefined();
    expect(request.cookie).toBe("wikiSession=s2; wikiUserName=Bot");
  });

  test("accounts without the bot right never set the bot flag", async () => {
    const wiki = new FakeWiki().pageInfo("Sandbox").on({ action: "edit" }, EDIT_OK);
    const { client } = await loggedInClient(wiki, "Helper");

    await client.edit("Sandbox", "Hello", "greeting", { bot: true, minor: true });

    const [request] = wiki.sent({ action: "edit" });
    expect(request.params.bot).toBeUndefined();
    expect(request.params.minor).toBe("1");
  });

  test("new sections carry their heading", async () => {
    const wiki = new FakeWiki().pageInfo("Talk:Sandbox").on({ action: "edit" }, EDIT_OK);
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    await client.newSection("Talk:Sandbox", "Question", "Why?");

    const [request] = wiki.sent({ action: "edit" });
    expect(request.params.section).toBe("new");
    expect(request.params.sectiontitle).toBe("Question");
    expect(request.params.summary).toBe("Question");
  });

  test("retries once after an unrecognized response, with fresh tokens", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Sandbox")
      .on({ action: "edit" }, api('<edit result="Failure"/>'), EDIT_OK);
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    const outcome = await client.edit("Sandbox", "Hello", "greeting");

    expect(outcome.status).toBe("done");
    expect(wiki.sent({ action: "edit" })).toHaveLength(2);
    expect(wiki.sent({ prop: "info", inprop: "protection" })).toHaveLength(2);
  });

  test("a second failure is reported", async () => {
    const wiki = new FakeWiki().pageInfo("Sandbox").on({ action: "edit" }, api('<edit result="Failure"/>'));
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    await expect(client.edit("Sandbox", "Hello", "greeting")).rejects.toBeInstanceOf(ProtocolError);
    expect(wiki.sent({ action: "edit" })).toHaveLength(2);
  });

  test("server errors are retried, fatal errors are not", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Sandbox")
      .pageInfo("Other")
      .respond({ action: "edit", title: "Sandbox" }, () => ({ body: "", status: 503 }))
      .on({ action: "edit", title: "Other" }, api('<error code="unknownerror" info="Unknown error"/>'));
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    await expect(client.edit("Sandbox", "Hello", "greeting")).rejects.toBeInstanceOf(HttpError);
    expect(wiki.sent({ action: "edit", title: "Sandbox" })).toHaveLength(2);

    await expect(client.edit("Other", "Hello", "greeting")).rejects.toBeInstanceOf(ProtocolError);
    expect(wiki.sent({ action: "edit", title: "Other" })).toHaveLength(1);
  });

  test("rate limiting is retried once, then reported", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Sandbox")
      .on({ action: "edit" }, api('<error code="ratelimited" info="You have exceeded your rate limit"/>'));
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    const error: unknown = await client.edit("Sandbox", "Hello", "greeting").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientError);
    expect(error).toMatchObject({ reason: "ratelimited" });
    expect(wiki.sent({ action: "edit" })).toHaveLength(2);
  });

  test("a read-only database is retried", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Sandbox")
      .on({ action: "edit" }, api('<error code="readonly" info="The wiki is in read-only mode"/>'), EDIT_OK);
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    const outcome = await client.edit("Sandbox", "Hello", "greeting");

    expect(outcome.status).toBe("done");
    expect(wiki.sent({ action: "edit" })).toHaveLength(2);
  });

  test("protected pages are refused before sending", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Locked", { protection: '<pr type="edit" level="sysop" expiry="infinity"/>' })
      .on({ action: "edit" }, EDIT_OK);
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    const failure = client.edit("Locked", "Hello", "greeting");

    await expect(failure).rejects.toBeInstanceOf(PermissionError);
    await expect(failure).rejects.toMatchObject({ reason: "protected", title: "Locked" });
    expect(wiki.sent({ action: "edit" })).toHaveLength(0);
  });

  test("administrators may edit protected pages", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Locked", { protection: '<pr type="edit" level="sysop" expiry="infinity"/>' })
      .on({ action: "edit" }, EDIT_OK);
    const { client } = await loggedInClient(wiki, "Admin", { groups: ["*", "user", "sysop"], rights: ["edit"] });

    expect((await client.edit("Locked", "Hello", "greeting")).status).toBe("done");
  });

  test("a block stops all further writes", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Sandbox")
      .on({ action: "edit" }, api('<error code="blocked" info="You have been blocked from editing."/>'));
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    await expect(client.edit("Sandbox", "Hello", "greeting")).rejects.toMatchObject({ kind: "SESSION", reason: "blocked" });
    expect(client.session.writesBlocked).toBe(true);
    expect(client.session.cookies.isEmpty("write")).toBe(true);

    await expect(client.edit("Sandbox", "Again", "greeting")).rejects.toBeInstanceOf(SessionError);
    expect(wiki.sent({ action: "edit" })).toHaveLength(1);
  });

  test("expired cookies end the session", async () => {
    const wiki = new FakeWiki()
      .userInfo("Bot", EDITOR)
      .pageInfo("Sandbox", { setCookies: [] })
      .on({ action: "edit" }, EDIT_OK);
    const client = WikiClient.restore(
      {
        version: 1,
        site: { family: "mediawiki", domain: "wiki.test", scriptPath: "/w", protocol: "https" },
        username: "Bot",
        cookies: {},
        throttleMs: 0,
        maxLag: 0,
        statusCheckInterval: 100,
        assertions: [],
        namespaces: null,
        userAgent: "test-agent",
      },
      { fetch: wiki.fetch, clock: new ManualClock(), logger: silentLogger }
    );

    await expect(client.edit("Sandbox", "Hello", "greeting")).rejects.toMatchObject({ kind: "SESSION", reason: "expired" });
    expect(client.isLoggedIn).toBe(false);
    expect(wiki.sent({ action: "edit" })).toHaveLength(0);
  });

  test("the throttle runs after every mutation, failed or not", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Sandbox")
      .pageInfo("Locked", { protection: '<pr type="edit" level="sysop" expiry="infinity"/>' })
      .on({ action: "edit" }, EDIT_OK);
    const { client, clock } = await loggedInClient(wiki, "Bot", EDITOR, { throttleMs: 10000 });

    await client.edit("Sandbox", "Hello", "greeting");
    await expect(client.edit("Locked", "Hello", "greeting")).rejects.toBeInstanceOf(PermissionError);

    expect(clock.sleeps).toEqual([10000, 10000]);
  });

  test("concurrent mutations run one at a time", async () => {
    const order: string[] = [];
    const wiki = new FakeWiki()
      .pageInfo("A")
      .pageInfo("B")
      .respond({ action: "edit" }, request => {
        order.push(request.params.title);
        return EDIT_OK;
      });
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    await Promise.all([client.edit("A", "1", "s"), client.edit("B", "2", "s")]);

    expect(order).toEqual(["A", "B"]);
    const titles = wiki.requests
      .filter(r => r.params.action === "edit" || r.params.inprop === "protection")
      .map(r => `${r.params.action}:${r.params.titles ?? r.params.title}`);
    expect(titles).toEqual(["query:A", "edit:A", "query:B", "edit:B"]);
  });
});

describe("delete and move", () => {
  test("delete needs the delete right", async () => {
    const wiki = new FakeWiki().pageInfo("Sandbox");
    const { client } = await loggedInClient(wiki, "Helper");

    await expect(client.delete("Sandbox", "cleanup")).rejects.toMatchObject({ kind: "PERMISSION", reason: "missing-right" });
    expect(wiki.sent({ prop: "info", inprop: "protection" })).toHaveLength(0);
  });

  test("deleting a missing page is skipped", async () => {
    const wiki = new FakeWiki().pageInfo("Gone", { missing: true });
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    expect(await client.delete("Gone", "cleanup")).toEqual({
      action: "delete",
      title: "Gone",
      status: "skipped",
      note: "page does not exist",
    });
    expect(wiki.sent({ action: "delete" })).toHaveLength(0);
  });

  test("files, categories and self-moves are rejected locally", async () => {
    const wiki = new FakeWiki();
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);
    const before = wiki.requests.length;

    await expect(client.move("File:Logo.png", "File:New.png", "rename")).rejects.toBeInstanceOf(ValidationError);
    await expect(client.move("Category:Old", "Category:New", "rename")).rejects.toBeInstanceOf(ValidationError);
    await expect(client.move("Sandbox", "Sandbox_", "rename")).rejects.toBeInstanceOf(ValidationError);
    expect(wiki.requests).toHaveLength(before);
  });

  test("moving a missing page fails without retry", async () => {
    const wiki = new FakeWiki().pageInfo("Gone", { missing: true });
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    await expect(client.move("Gone", "Elsewhere", "rename")).rejects.toBeInstanceOf(ValidationError);
    expect(wiki.sent({ prop: "info", inprop: "protection" })).toHaveLength(1);
  });

  test("move-protected pages cannot be moved but can be edited", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Sandbox", { protection: '<pr type="move" level="sysop" expiry="infinity"/>' })
      .on({ action: "edit" }, EDIT_OK);
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    await expect(client.move("Sandbox", "Playground", "rename")).rejects.toBeInstanceOf(PermissionError);
    expect((await client.edit("Sandbox", "Hello", "greeting")).status).toBe("done");
  });
});

describe("rollback and undo", () => {
  test("rolls back the current revision with the rollback token", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Sandbox")
      .on({ prop: "revisions", type: "rollback" }, topRevision(50))
      .on({ action: "rollback" }, api('<rollback title="Sandbox" revid="52" old_revid="50" last_revid="49"/>'));
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    const outcome = await client.rollback(revision(50), { reason: "revert vandalism" });

    expect(outcome.status).toBe("done");
    const [request] = wiki.sent({ action: "rollback" });
    expect(request.params.token).toBe("rb-token+\\");
    expect(request.params.user).toBe("Vandal");
    expect(request.params.summary).toBe("revert vandalism");
  });

  test("a stale revision is not rolled back", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Sandbox")
      .on({ prop: "revisions", type: "rollback" }, topRevision(51))
      .on({ action: "rollback" }, api('<rollback title="Sandbox"/>'));
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    const outcome = await client.rollback(revision(50));

    expect(outcome).toEqual({
      action: "rollback",
      title: "Sandbox",
      status: "skipped",
      note: "revision 50 is not the current revision",
    });
    expect(wiki.sent({ action: "rollback" })).toHaveLength(0);
  });

  test("already rolled back is not an error", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Sandbox")
      .on({ prop: "revisions", type: "rollback" }, topRevision(50))
      .on({ action: "rollback" }, api('<error code="alreadyrolled" info="Someone else got there first"/>'));
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    expect(await client.rollback(revision(50))).toMatchObject({ status: "skipped", note: "alreadyrolled" });
  });

  test("hidden authors cannot be rolled back", async () => {
    const { client } = await loggedInClient(new FakeWiki(), "Bot", EDITOR);
    await expect(client.rollback(revision(50, { user: null }))).rejects.toBeInstanceOf(ValidationError);
  });

  test("undoes a range back to the parent of the oldest revision", async () => {
    const wiki = new FakeWiki().pageInfo("Sandbox").on({ action: "edit" }, EDIT_OK);
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    await client.undo(revision(60), revision(57), { reason: "undo spree" });

    const [request] = wiki.sent({ action: "edit" });
    expect(request.params.undo).toBe("60");
    expect(request.params.undoafter).toBe("56");
    expect(request.params.summary).toBe("undo spree");
  });

  test("undo ranges must be ordered and on one page", async () => {
    const { client } = await loggedInClient(new FakeWiki(), "Bot", EDITOR);

    await expect(client.undo(revision(57), revision(60))).rejects.toBeInstanceOf(ValidationError);
    await expect(client.undo(revision(60), revision(57, { title: "Elsewhere" }))).rejects.toBeInstanceOf(ValidationError);
    await expect(client.undo(revision(60), revision(1, { parentId: 0 }))).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("upload and e-mail", () => {
  test("uploads as multi-part form and never retries", async () => {
    const wiki = new FakeWiki().pageInfo("File:Logo.png", { missing: true }).on({ action: "upload" }, api('<upload result="Warning"/>'));
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    await expect(client.upload(new Uint8Array([1, 2, 3]), "Logo.png", "A logo")).rejects.toBeInstanceOf(ProtocolError);

    const uploads = wiki.sent({ action: "upload" });
    expect(uploads).toHaveLength(1);
    expect(uploads[0].params.filename).toBe("Logo.png");
    expect(uploads[0].params.file).toBe("file:Logo.png");
    expect(uploads[0].params.token).toBe("csrf-token+\\");
  });

  test("a rate-limited upload is not sent again", async () => {
    const wiki = new FakeWiki()
      .pageInfo("File:Logo.png", { missing: true })
      .on({ action: "upload" }, api('<error code="ratelimited" info="You have exceeded your rate limit"/>'));
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    await expect(client.upload(new Uint8Array([1, 2, 3]), "Logo.png", "A logo")).rejects.toBeInstanceOf(TransientError);
    expect(wiki.sent({ action: "upload" })).toHaveLength(1);
  });

  test("users who do not accept e-mail are skipped", async () => {
    const wiki = new FakeWiki()
      .pageInfo("User:Alice")
      .on({ list: "users", ususers: "Alice" }, api('<query><users><user name="Alice" userid="3"/></users></query>'));
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    expect(await client.emailUser("Alice", "Hi", "Hello there")).toMatchObject({
      status: "skipped",
      note: "Alice does not accept e-mail",
    });
    expect(wiki.sent({ action: "emailuser" })).toHaveLength(0);
  });
});

describe("watchlist changes", () => {
  test("watching updates the cached watchlist", async () => {
    const wiki = new FakeWiki()
      .on({ list: "watchlistraw" }, api('<watchlistraw><wr ns="0" title="Apple"/></watchlistraw>'))
      .on({ meta: "tokens", type: "watch" }, api('<query><tokens watchtoken="w-token"/></query>'))
      .on({ action: "watch" }, api('<watch title="Banana" watched=""/>'));
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    await client.lists.getRawWatchlist();
    await client.watch("Banana", "Talk:Cherry");

    expect(await client.lists.getRawWatchlist()).toEqual(["Apple", "Banana"]);
    expect(wiki.sent({ action: "watch" })[0].params.titles).toBe("Banana|Talk:Cherry");
  });

  test("purge needs a login", async () => {
    const { client } = await loggedInClient(new FakeWiki(), "Bot", EDITOR);
    await client.logout();
    await expect(client.purge("Sandbox")).rejects.toBeInstanceOf(ValidationError);
  });
});

describe("write cookies", () => {
  test("public token and revision reads leave them alone", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Sandbox", { setCookies: ["stray=x; path=/"] })
      .on({ prop: "revisions", type: "rollback" }, { body: topRevision(50), setCookies: ["stray=y; path=/"] });
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);
    const before = client.session.cookies.header("write");

    await client.pages.getPageInfo("Sandbox");
    await client.revisions.getTopRevision("Sandbox");

    expect(before).toBe("wikiSession=s2; wikiUserName=Bot");
    expect(client.session.cookies.header("write")).toBe(before);
    expect(client.session.cookies.header("read")).toBe("wikiSession=s2; wikiUserName=Bot");
  });

  test("mutations rebuild them from their own token fetch", async () => {
    const wiki = new FakeWiki()
      .pageInfo("Sandbox", { setCookies: ["extra=1; path=/"] })
      .on({ action: "edit" }, EDIT_OK);
    const { client } = await loggedInClient(wiki, "Bot", EDITOR);

    await client.edit("Sandbox", "Hello", "greeting");

    const [request] = wiki.sent({ action: "edit" });
    expect(request.cookie).toBe("extra=1; wikiSession=s2; wikiUserName=Bot");
  });
});
