/**
 * In-process stand-in for a wiki's api.php. Routes match on request
 * parameters; the most recently registered matching route answers.
 */

import { WikiClient, silentLogger, NamespaceTable, type ClientConfig, type FetchLike } from "../../packages/core/src/index.js";
import { ManualClock } from "./manual-clock.js";

export interface RecordedRequest {
  method: string;
  /** Query string and body parameters together */
  params: Record<string, string>;
  /** Cookie header sent, '' when none */
  cookie: string;
  userAgent: string;
}

export interface ReplySpec {
  body: string;
  status?: number;
  setCookies?: string[];
}

export type Reply = string | ReplySpec;
export type Responder = (request: RecordedRequest) => Reply;

interface Route {
  match: Record<string, string>;
  responder: Responder;
}

/** Wrap a response body in the API envelope */
export function api(body: string): string {
  return `<?xml version="1.0"?><api>${body}</api>`;
}

export class FakeWiki {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Route[] = [];

  /**
   * Answer requests whose parameters include `match`. Several replies are
   * given out in turn; the last one repeats.
   */
  on(match: Record<string, string>, ...replies: Reply[]): this {
    let next = 0;
    return this.respond(match, () => {
      const reply = replies[Math.min(next, replies.length - 1)];
      next++;
      return reply;
    });
  }

  respond(match: Record<string, string>, responder: Responder): this {
    this.routes.push({ match, responder });
    return this;
  }

  /** Requests whose parameters include `match` */
  sent(match: Record<string, string>): RecordedRequest[] {
    return this.requests.filter(request => matches(request.params, match));
  }

  readonly fetch: FetchLike = async (input, init) => {
    const url = new URL(input);
    const params: Record<string, string> = Object.fromEntries(url.searchParams);

    const { body } = init;
    if (typeof body === "string") {
      Object.assign(params, Object.fromEntries(new URLSearchParams(body)));
    } else if (body instanceof FormData) {
      for (const [key, value] of body.entries()) {
        params[key] = typeof value === "string" ? value : `file:${value.name}`;
      }
    }

    const headers = new Headers(init.headers);
    const request: RecordedRequest = {
      method: init.method ?? "GET",
      params,
      cookie: headers.get("Cookie") ?? "",
      userAgent: headers.get("User-Agent") ?? "",
    };
    this.requests.push(request);

    for (let i = this.routes.length - 1; i >= 0; i--) {
      const route = this.routes[i];
      if (!matches(params, route.match)) continue;
      const reply = route.responder(request);
      const response = typeof reply === "string" ? { body: reply } : reply;
      const responseHeaders = new Headers({ "Content-Type": "text/xml" });
      for (const cookie of response.setCookies ?? []) responseHeaders.append("Set-Cookie", cookie);
      return new Response(response.body, { status: response.status ?? 200, headers: responseHeaders });
    }

    return new Response(api(`<error code="unhandled" info="No fake route for ${url.search}"/>`), {
      status: 200,
    });
  };

  // ===========================================================================
  // Canned routes
  // ===========================================================================

  /** Accept a login for `name` with the given groups and rights */
  acceptLogin(name: string, account: { groups?: string[]; rights?: string[] } = {}): this {
    this.on(
      { meta: "tokens", type: "login" },
      { body: api(`<query><tokens logintoken="login-token+\\"/></query>`), setCookies: ["wikiSession=s1; path=/; HttpOnly"] }
    );
    this.on(
      { action: "login" },
      {
        body: api(`<login result="Success" lguserid="7" lgusername="${name}"/>`),
        setCookies: ["wikiSession=s2; path=/; HttpOnly", `wikiUserName=${name}; path=/`],
      }
    );
    return this.userInfo(name, account);
  }

  userInfo(name: string, account: { groups?: string[]; rights?: string[]; messages?: boolean } = {}): this {
    const groups = (account.groups ?? ["*", "user"]).map(g => `<g>${g}</g>`).join("");
    const rights = (account.rights ?? ["read", "edit"]).map(r => `<r>${r}</r>`).join("");
    const messages = account.messages ? ' messages=""' : "";
    return this.on(
      { meta: "userinfo" },
      api(`<query><userinfo id="7" name="${name}" editcount="42"${messages}><groups>${groups}</groups><rights>${rights}</rights></userinfo></query>`)
    );
  }

  /** Token and protection bundle for one page */
  pageInfo(
    title: string,
    page: { missing?: boolean; protection?: string; lastrevid?: number; setCookies?: string[] } = {}
  ): this {
    const state = page.missing ? ' missing=""' : ` pageid="1" lastrevid="${page.lastrevid ?? 100}" length="20"`;
    return this.on(
      { prop: "info", inprop: "protection", titles: title },
      {
        body: api(
          `<query><pages><page ns="0" title="${title}"${state}><protection>${page.protection ?? ""}</protection></page></pages>` +
            `<tokens csrftoken="csrf-token+\\"/></query>`
        ),
        setCookies: page.setCookies ?? ["wikiSession=s2; path=/"],
      }
    );
  }
}

function matches(params: Record<string, string>, match: Record<string, string>): boolean {
  return Object.entries(match).every(([key, value]) => params[key] === value);
}

/**
 * Client wired to a FakeWiki with a manual clock, no lag checks and no throttle
 */
export function createTestClient(wiki: FakeWiki, overrides: Partial<ClientConfig> = {}): { client: WikiClient; clock: ManualClock } {
  const clock = new ManualClock();
  const client = new WikiClient({
    domain: "wiki.test",
    fetch: wiki.fetch,
    clock,
    logger: silentLogger,
    maxLag: 0,
    throttleMs: 0,
    ...overrides,
  });
  client.session.namespaces = NamespaceTable.defaults();
  return { client, clock };
}

/** Client logged in as `name` */
export async function loggedInClient(
  wiki: FakeWiki,
  name: string,
  account: { groups?: string[]; rights?: string[] } = {},
  overrides: Partial<ClientConfig> = {}
): Promise<{ client: WikiClient; clock: ManualClock }> {
  wiki.acceptLogin(name, account);
  const setup = createTestClient(wiki, overrides);
  await setup.client.login(name, "test-secret");
  return setup;
}
