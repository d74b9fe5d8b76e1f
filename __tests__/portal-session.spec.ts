import { describe, it, expect, vi } from "vitest";
import { PortalSession, MAG_USER_AGENT } from "../src/portalSession.js";
import { PortalEndpointRegistry } from "../src/lib/portalEndpoints.js";
import type { ChallengeSolver } from "../src/lib/challengeSolver.js";
import { fakePortal, jsonResponse, textResponse, type PortalCall } from "./helpers/fakePortal.js";

const MAC = "00:1A:79:00:00:01";
const LOADER = "http://portal.example.com/stalker_portal/server/load.php";

const newSession = (
  fetchImpl: ReturnType<typeof fakePortal>["fetchImpl"],
  overrides: { portalUrl?: string; now?: () => number; tokenRefreshMs?: number; challengeSolver?: ChallengeSolver } = {},
) =>
  new PortalSession(
    {
      portalId: "main",
      portalUrl: overrides.portalUrl ?? LOADER,
      mac: MAC,
      activateWithProfile: false,
      tokenRefreshMs: overrides.tokenRefreshMs,
    },
    { fetchImpl, now: overrides.now, challengeSolver: overrides.challengeSolver },
  );

const genresBody = { js: [{ id: "*", title: "All" }, { id: "5", title: "News" }] };

const basicPortal = (call: PortalCall) => {
  switch (call.params.get("action")) {
    case "handshake":
      return jsonResponse({ js: { token: "tok-1" } });
    case "get_genres":
      return jsonResponse(genresBody);
    default:
      return jsonResponse({ js: {} });
  }
};

describe("PortalSession handshake", () => {
  it("walks the endpoint candidates until one answers", async () => {
    const portal = fakePortal((call) =>
      call.url.pathname === "/server/load.php" ? basicPortal(call) : textResponse("not found", 404),
    );
    const endpoints = new PortalEndpointRegistry();
    const session = new PortalSession(
      { portalId: "main", portalUrl: "http://portal.example.com/c/", mac: MAC, activateWithProfile: false },
      { fetchImpl: portal.fetchImpl, endpoints },
    );

    await expect(session.getToken()).resolves.toBe("tok-1");

    expect(portal.calls.map((call) => `${call.method} ${call.url.pathname}`)).toEqual([
      "GET /c/portal.php",
      "POST /c/portal.php",
      "GET /c/server/load.php",
      "POST /c/server/load.php",
      "GET /server/load.php",
    ]);
    expect(portal.calls[4].url.toString()).toBe(
      "http://portal.example.com/server/load.php?type=stb&action=handshake&token=&JsHttpRequest=1-xml",
    );
    expect(session.describe().endpoint).toBe("http://portal.example.com/server/load.php");
    expect(endpoints.hint("main")).toBe("http://portal.example.com/server/load.php");
  });

  it("sends the set-top-box identity without a bearer on the handshake", async () => {
    const portal = fakePortal(basicPortal);
    const session = newSession(portal.fetchImpl);

    await session.listGenres();

    const [handshake, genres] = portal.calls;
    expect(handshake.headers.get("cookie")).toBe(`mac=${MAC}; stb_lang=en; timezone=Europe/London`);
    expect(handshake.headers.get("user-agent")).toBe(MAG_USER_AGENT);
    expect(handshake.headers.get("authorization")).toBeNull();
    expect(genres.headers.get("authorization")).toBe("Bearer tok-1");
  });

  it("shares one in-flight handshake between concurrent callers", async () => {
    const portal = fakePortal(basicPortal);
    const session = newSession(portal.fetchImpl);

    const tokens = await Promise.all([session.getToken(), session.getToken(), session.getToken()]);

    expect(tokens).toEqual(["tok-1", "tok-1", "tok-1"]);
    expect(portal.actions()).toEqual(["handshake"]);
  });

  it("re-handshakes once the token ages past the refresh window", async () => {
    let clock = 1_000;
    const portal = fakePortal(basicPortal);
    const session = newSession(portal.fetchImpl, { now: () => clock, tokenRefreshMs: 500 });

    await session.listGenres();
    clock += 200;
    await session.listGenres();
    clock += 600;
    await session.listGenres();

    expect(portal.actions()).toEqual([
      "handshake",
      "get_genres",
      "get_genres",
      "handshake",
      "get_genres",
    ]);
  });

  it("keeps cookies the portal sets", async () => {
    const portal = fakePortal((call) =>
      call.params.get("action") === "handshake"
        ? jsonResponse({ js: { token: "tok-1" } }, { headers: { "set-cookie": "PHPSESSID=abc123; Path=/" } })
        : basicPortal(call),
    );
    const session = newSession(portal.fetchImpl);

    await session.listGenres();

    expect(portal.calls[1].headers.get("cookie")).toBe(
      `mac=${MAC}; stb_lang=en; timezone=Europe/London; PHPSESSID=abc123`,
    );
  });

  it("reports an unreachable portal when every endpoint fails at the network level", async () => {
    const portal = fakePortal(() => {
      throw new Error("connect ECONNREFUSED");
    });
    const session = newSession(portal.fetchImpl, { portalUrl: "http://portal.example.com/c/" });

    await expect(session.getToken()).rejects.toMatchObject({ code: "PortalUnreachable" });
    expect(session.describe().hasToken).toBe(false);
    // five handshake candidates, GET only, then seven xpcom fetches
    expect(portal.calls).toHaveLength(12);
  });

  it("fails the handshake when the portal answers without a token", async () => {
    const portal = fakePortal(() => jsonResponse({ js: {} }));
    const session = newSession(portal.fetchImpl);

    await expect(session.getToken()).rejects.toMatchObject({ code: "HandshakeFailed" });
  });

  it("clears a browser challenge through the solver and keeps its identity", async () => {
    const solver: ChallengeSolver = {
      solve: vi.fn().mockResolvedValue({
        status: 200,
        userAgent: "Mozilla/5.0 test",
        cookies: [{ name: "cf_clearance", value: "ok" }],
        body: JSON.stringify({ js: { token: "tok-cf" } }),
      }),
    };
    const portal = fakePortal((call) =>
      call.params.get("action") === "handshake"
        ? textResponse("<html><title>Just a moment...</title></html>", 403)
        : basicPortal(call),
    );
    const session = newSession(portal.fetchImpl, { challengeSolver: solver });

    await expect(session.getToken()).resolves.toBe("tok-cf");
    await session.listGenres();

    expect(solver.solve).toHaveBeenCalledWith(
      `${LOADER}?type=stb&action=handshake&token=&JsHttpRequest=1-xml`,
      [{ name: "mac", value: MAC }],
    );
    const genres = portal.calls[1];
    expect(genres.headers.get("user-agent")).toBe("Mozilla/5.0 test");
    expect(genres.headers.get("cookie")).toBe(
      `mac=${MAC}; stb_lang=en; timezone=Europe/London; cf_clearance=ok`,
    );
  });
});

describe("PortalSession requests", () => {
  it("re-handshakes once after an auth failure", async () => {
    let handshakes = 0;
    let genreCalls = 0;
    const portal = fakePortal((call) => {
      if (call.params.get("action") === "handshake") {
        handshakes += 1;
        return jsonResponse({ js: { token: `tok-${handshakes}` } });
      }
      genreCalls += 1;
      return genreCalls === 1 ? textResponse("", 401) : jsonResponse(genresBody);
    });
    const session = newSession(portal.fetchImpl);

    await expect(session.listGenres()).resolves.toEqual([{ id: "5", title: "News" }]);
    expect(portal.actions()).toEqual(["handshake", "get_genres", "handshake", "get_genres"]);
    expect(portal.calls[3].headers.get("authorization")).toBe("Bearer tok-2");
  });

  it("gives up with AuthExpired when the fresh token is rejected too", async () => {
    const portal = fakePortal((call) =>
      call.params.get("action") === "handshake"
        ? jsonResponse({ js: { token: "tok-1" } })
        : textResponse("Authorization failed."),
    );
    const session = newSession(portal.fetchImpl);

    await expect(session.listGenres()).rejects.toMatchObject({ code: "AuthExpired" });
    expect(portal.actions()).toEqual(["handshake", "get_genres", "handshake", "get_genres"]);
  });

  it("falls back to POST and then reports a malformed body", async () => {
    const portal = fakePortal((call) =>
      call.params.get("action") === "handshake"
        ? jsonResponse({ js: { token: "tok-1" } })
        : textResponse("<html>maintenance</html>"),
    );
    const session = newSession(portal.fetchImpl);

    await expect(session.listGenres()).rejects.toMatchObject({ code: "MalformedResponse" });
    const [, viaGet, viaPost] = portal.calls;
    expect(viaGet.method).toBe("GET");
    expect(viaPost.method).toBe("POST");
    expect(viaPost.headers.get("content-type")).toBe("application/x-www-form-urlencoded");
    expect(viaPost.params.get("JsHttpRequest")).toBe("1-xml");
  });

  it("maps server errors to PortalUnreachable", async () => {
    const portal = fakePortal((call) =>
      call.params.get("action") === "handshake"
        ? jsonResponse({ js: { token: "tok-1" } })
        : textResponse("upstream down", 503),
    );
    const session = newSession(portal.fetchImpl);

    await expect(session.listGenres()).rejects.toMatchObject({ code: "PortalUnreachable" });
  });

  it("reads the account expiry", async () => {
    const portal = fakePortal((call) =>
      call.params.get("action") === "get_main_info"
        ? jsonResponse({ js: { phone: "2026-11-05 00:00:00" } })
        : basicPortal(call),
    );
    const session = newSession(portal.fetchImpl);

    const info = await session.getAccountInfo();

    expect(info.expiresAt).toBe(Date.UTC(2026, 10, 5));
    expect(info.expiryText).toBe("2026-11-05 00:00:00");
  });

  it("pages through media lists and leaves series out of vod", async () => {
    const portal = fakePortal((call) => {
      if (call.params.get("action") !== "get_ordered_list") {
        return basicPortal(call);
      }
      return call.params.get("p") === "1"
        ? jsonResponse({
            js: {
              total_items: 3,
              max_page_items: 2,
              data: [
                { id: "1", name: "First" },
                { id: "2", name: "Second" },
              ],
            },
          })
        : jsonResponse({
            js: { total_items: 3, max_page_items: 2, data: [{ id: "3", name: "Show", is_series: "1" }] },
          });
    });
    const session = newSession(portal.fetchImpl);

    const items = await session.listVod();

    expect(items.map((item) => item.id)).toEqual(["1", "2"]);
    expect(portal.calls.filter((call) => call.params.get("action") === "get_ordered_list")).toHaveLength(2);
    expect(portal.calls[1].params.get("category")).toBe("*");
  });
});

describe("PortalSession stream links", () => {
  const linkPortal = (call: PortalCall) => {
    switch (call.params.get("action")) {
      case "get_all_channels":
        return jsonResponse({
          js: { data: [{ id: 101, name: "Das Erste", cmd: "ffrt http://localhost/ch/101" }] },
        });
      case "create_link":
        return jsonResponse({ js: { cmd: "ffmpeg http://edge.example.com/live/101.ts?play_token=abc" } });
      default:
        return basicPortal(call);
    }
  };

  it("uses a real url in the command without asking the portal", async () => {
    const portal = fakePortal(linkPortal);
    const session = newSession(portal.fetchImpl);

    await expect(
      session.resolveStreamLink("101", "ffmpeg http://direct.example.com/101.ts"),
    ).resolves.toBe("http://direct.example.com/101.ts");
    expect(portal.calls).toHaveLength(0);
  });

  it("asks create_link for localhost placeholders", async () => {
    const portal = fakePortal(linkPortal);
    const session = newSession(portal.fetchImpl);

    await expect(session.resolveStreamLink("101", "ffrt http://localhost/ch/101")).resolves.toBe(
      "http://edge.example.com/live/101.ts?play_token=abc",
    );
    const createLink = portal.calls[1];
    expect(createLink.params.get("type")).toBe("itv");
    expect(createLink.params.get("cmd")).toBe("ffrt http://localhost/ch/101");
  });

  it("looks the command up when none is given", async () => {
    const portal = fakePortal(linkPortal);
    const session = newSession(portal.fetchImpl);

    await expect(session.resolveStreamLink("101")).resolves.toBe(
      "http://edge.example.com/live/101.ts?play_token=abc",
    );
    expect(portal.actions()).toEqual(["handshake", "get_all_channels", "create_link"]);
    await expect(session.resolveStreamLink("999")).rejects.toMatchObject({ code: "StreamNotFound" });
  });
});
