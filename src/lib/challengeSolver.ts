import type { Response } from "undici";
import { GatewayError } from "./errors.js";
import { defaultFetch, fetchText, isRecord, type FetchLike } from "./http.js";

export interface ClearanceCookie {
  name: string;
  value: string;
}

export interface ChallengeClearance {
  status: number;
  userAgent: string | null;
  cookies: ClearanceCookie[];
  body: string;
}

export interface ChallengeSolver {
  solve(url: string, cookies: ClearanceCookie[]): Promise<ChallengeClearance>;
}

export interface FlareSolverrConfig {
  endpoint: string;
  maxTimeoutMs?: number;
}

const CHALLENGE_BODY_MARKERS = [/cf-chl/i, /challenge-platform/i, /cf_chl_opt/i];
const JUST_A_MOMENT = /<title>\s*Just a moment/i;

export const isChallengeResponse = (response: Response, body: string): boolean => {
  if (response.headers.get("cf-mitigated")?.toLowerCase() === "challenge") {
    return true;
  }
  if (JUST_A_MOMENT.test(body)) {
    return true;
  }
  if (response.status === 403 || response.status === 503) {
    return CHALLENGE_BODY_MARKERS.some((marker) => marker.test(body));
  }
  return false;
};

const stripPreWrapper = (html: string): string => {
  const match = /<pre[^>]*>([\s\S]*?)<\/pre>/i.exec(html);
  if (!match) {
    return html;
  }
  return match[1]
    .replace(/&quot;/g, "\"")
    .replace(/&#39;/g, "'")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&amp;/g, "&");
};

/**
 * Client for a FlareSolverr-compatible solver. The solver drives a real
 * browser through the challenge and hands back the clearance cookies and the
 * user agent they are bound to.
 */
export class FlareSolverrClient implements ChallengeSolver {
  private readonly endpoint: string;

  private readonly maxTimeoutMs: number;

  private readonly fetchImpl: FetchLike;

  constructor(config: FlareSolverrConfig, fetchImpl: FetchLike = defaultFetch) {
    this.endpoint = config.endpoint.replace(/\/+$/, "");
    this.maxTimeoutMs = config.maxTimeoutMs ?? 60_000;
    this.fetchImpl = fetchImpl;
  }

  async solve(url: string, cookies: ClearanceCookie[]): Promise<ChallengeClearance> {
    const { response, body: text } = await fetchText(
      this.fetchImpl,
      `${this.endpoint}/v1`,
      {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          cmd: "request.get",
          url,
          maxTimeout: this.maxTimeoutMs,
          cookies,
        }),
      },
      this.maxTimeoutMs + 5_000,
    );

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      throw new GatewayError("PortalUnreachable", "Challenge solver returned invalid JSON", {
        details: { status: response.status },
      });
    }

    const envelope: Record<string, unknown> = isRecord(parsed) ? parsed : {};
    const solution = envelope.solution;
    if (envelope.status !== "ok" || !isRecord(solution)) {
      const message = typeof envelope.message === "string" ? envelope.message : "unknown";
      throw new GatewayError("PortalUnreachable", `Challenge solver failed: ${message}`);
    }

    const solvedCookies = Array.isArray(solution.cookies)
      ? solution.cookies.flatMap((cookie): ClearanceCookie[] =>
          isRecord(cookie) && typeof cookie.name === "string" && typeof cookie.value === "string"
            ? [{ name: cookie.name, value: cookie.value }]
            : [],
        )
      : [];

    console.log(`[portal] challenge solved for ${new URL(url).host} (${solvedCookies.length} cookies)`);

    return {
      status: typeof solution.status === "number" ? solution.status : 200,
      userAgent: typeof solution.userAgent === "string" ? solution.userAgent : null,
      cookies: solvedCookies,
      body: typeof solution.response === "string" ? stripPreWrapper(solution.response) : "",
    };
  }
}
