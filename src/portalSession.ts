import type { Dispatcher, Headers, Response } from "undici";
import setCookie, { type Cookie } from "set-cookie-parser";
import { GatewayError, describeError } from "./lib/errors.js";
import {
  defaultFetch,
  fetchText,
  type FetchLike,
} from "./lib/http.js";
import {
  isChallengeResponse,
  type ChallengeSolver,
  type ClearanceCookie,
} from "./lib/challengeSolver.js";
import {
  PortalEndpointRegistry,
  buildEndpointCandidates,
  buildXpcomCandidates,
  parseXpcomLoader,
} from "./lib/portalEndpoints.js";
import {
  extractLink,
  isRecordEnvelope,
  readToken,
  toAccountInfo,
  toCreatedLink,
  toPortalCategories,
  toPortalChannels,
  toPortalEpg,
  toPortalGenres,
  toPortalMediaPage,
  type PortalAccountInfo,
  type PortalChannel,
  type PortalEpgEntry,
  type PortalGenre,
  type PortalMediaItem,
} from "./lib/portalPayloads.js";

export const MAG_USER_AGENT =
  "Mozilla/5.0 (QtEmbedded; U; Linux; C) AppleWebKit/533.3 (KHTML, like Gecko) MAG200 stbapp ver: 2 rev: 250 Safari/533.3";
export const MAG_X_USER_AGENT = "Model: MAG250; Link: WiFi";

const TOKEN_REFRESH_MS = 5 * 60 * 1000;
const DEFAULT_SHORT_TIMEOUT_MS = 10_000;
const DEFAULT_LONG_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_MEDIA_PAGES = 25;
const AUTH_FAILURE_BODY = /authorization failed/i;

type HttpMethod = "GET" | "POST";

const METHODS: HttpMethod[] = ["GET", "POST"];

type RequestParams = Record<string, string>;

interface FetchStrategy {
  endpoint: string;
  method: HttpMethod;
}

type AttemptResult =
  | { kind: "success"; envelope: Record<string, unknown> }
  | { kind: "auth"; status: number }
  | { kind: "challenge"; status: number }
  | { kind: "http"; status: number; snippet: string }
  | { kind: "malformed"; status: number; snippet: string }
  | { kind: "network"; error: Error };

type FailedAttempt = Exclude<AttemptResult, { kind: "success" }>;

interface CookieMeta {
  expiresAt: number | null;
}

export interface PortalSessionConfig {
  portalId: string;
  portalUrl: string;
  mac: string;
  shortTimeoutMs?: number;
  longTimeoutMs?: number;
  tokenRefreshMs?: number;
  maxMediaPages?: number;
  activateWithProfile?: boolean;
}

export interface PortalSessionDeps {
  fetchImpl?: FetchLike;
  dispatcher?: Dispatcher;
  endpoints?: PortalEndpointRegistry;
  challengeSolver?: ChallengeSolver | null;
  now?: () => number;
}

export interface PortalSessionState {
  portalId: string;
  mac: string;
  endpoint: string | null;
  hasToken: boolean;
  tokenAgeMs: number | null;
}

const sanitizeSnippet = (value: string): string => value.replace(/\s+/g, " ").slice(0, 200);

const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

/**
 * One (portal, MAC) conversation with a legacy set-top-box portal. Holds the
 * bearer token, the cookie jar and the endpoint that answered the handshake.
 */
export class PortalSession {
  readonly portalId: string;

  readonly mac: string;

  private readonly portalUrl: string;

  private readonly origin: string;

  private readonly cookieJar = new Map<string, string>();

  private readonly cookieMeta = new Map<string, CookieMeta>();

  private readonly fetchImpl: FetchLike;

  private readonly dispatcher?: Dispatcher;

  private readonly endpoints: PortalEndpointRegistry;

  private readonly challengeSolver: ChallengeSolver | null;

  private readonly now: () => number;

  private readonly shortTimeoutMs: number;

  private readonly longTimeoutMs: number;

  private readonly tokenRefreshMs: number;

  private readonly maxMediaPages: number;

  private readonly activateWithProfile: boolean;

  private userAgent = MAG_USER_AGENT;

  private token: string | null = null;

  private tokenIssuedAt = 0;

  private endpoint: string | null = null;

  private handshakePromise: Promise<string> | null = null;

  constructor(config: PortalSessionConfig, deps: PortalSessionDeps = {}) {
    this.portalId = config.portalId;
    this.mac = config.mac;
    this.portalUrl = config.portalUrl.trim();
    this.origin = new URL(this.portalUrl).origin;
    this.shortTimeoutMs = config.shortTimeoutMs ?? DEFAULT_SHORT_TIMEOUT_MS;
    this.longTimeoutMs = config.longTimeoutMs ?? DEFAULT_LONG_TIMEOUT_MS;
    this.tokenRefreshMs = config.tokenRefreshMs ?? TOKEN_REFRESH_MS;
    this.maxMediaPages = config.maxMediaPages ?? DEFAULT_MAX_MEDIA_PAGES;
    this.activateWithProfile = config.activateWithProfile ?? true;
    this.fetchImpl = deps.fetchImpl ?? defaultFetch;
    this.dispatcher = deps.dispatcher;
    this.endpoints = deps.endpoints ?? new PortalEndpointRegistry();
    this.challengeSolver = deps.challengeSolver ?? null;
    this.now = deps.now ?? Date.now;
  }

  describe(): PortalSessionState {
    return {
      portalId: this.portalId,
      mac: this.mac,
      endpoint: this.endpoint,
      hasToken: Boolean(this.token),
      tokenAgeMs: this.token ? this.now() - this.tokenIssuedAt : null,
    };
  }

  /**
   * Returns a valid bearer token, performing the handshake when there is no
   * token yet, when `force` is set, or when the token is older than the
   * refresh window. Concurrent callers share one in-flight handshake.
   */
  async handshake(force = false): Promise<string> {
    if (!force && this.token && !this.isTokenStale()) {
      return this.token;
    }

    if (this.handshakePromise) {
      return this.handshakePromise;
    }

    this.handshakePromise = this.performHandshake().finally(() => {
      this.handshakePromise = null;
    });

    return this.handshakePromise;
  }

  getToken(): Promise<string> {
    return this.handshake(false);
  }

  invalidate(): void {
    this.token = null;
    this.tokenIssuedAt = 0;
  }

  async getProfile(): Promise<Record<string, unknown>> {
    const envelope = await this.request(
      { type: "stb", action: "get_profile", hd: "1", stb_type: "MAG250" },
      this.shortTimeoutMs,
    );
    const profile = envelope.js;
    if (typeof profile !== "object" || profile === null || Array.isArray(profile)) {
      throw this.malformed("get_profile");
    }
    return { ...profile };
  }

  async getAccountInfo(): Promise<PortalAccountInfo> {
    const envelope = await this.request(
      { type: "account_info", action: "get_main_info" },
      this.shortTimeoutMs,
    );
    const info = toAccountInfo(envelope);
    if (!info) {
      throw this.malformed("get_main_info");
    }
    return info;
  }

  async listGenres(): Promise<PortalGenre[]> {
    const envelope = await this.request({ type: "itv", action: "get_genres" }, this.shortTimeoutMs);
    const genres = toPortalGenres(envelope);
    if (!genres) {
      throw this.malformed("get_genres");
    }
    return genres;
  }

  async listChannels(): Promise<PortalChannel[]> {
    const envelope = await this.request(
      { type: "itv", action: "get_all_channels", force_ch_link_check: "" },
      this.longTimeoutMs,
    );
    const channels = toPortalChannels(envelope, this.origin);
    if (!channels) {
      throw this.malformed("get_all_channels");
    }
    return channels;
  }

  /**
   * Resolves a playable URL for a channel. Commands that already carry a
   * real URL are used as-is; `localhost` placeholders need `create_link`.
   */
  async resolveStreamLink(channelId: string, cmd?: string): Promise<string> {
    let command = cmd?.trim() ?? "";
    if (!command) {
      const channels = await this.listChannels();
      command = channels.find((channel) => channel.id === channelId)?.cmd ?? "";
      if (!command) {
        throw new GatewayError("StreamNotFound", `Channel ${channelId} is not on portal ${this.portalId}`);
      }
    }

    if (!/localhost/i.test(command)) {
      const direct = extractLink(command);
      if (direct) {
        return direct;
      }
    }

    return this.createLink("itv", command);
  }

  async resolveVodLink(cmd: string): Promise<string> {
    return this.createLink("vod", cmd);
  }

  async getEpg(periodHours: number): Promise<Map<string, PortalEpgEntry[]>> {
    const envelope = await this.request(
      { type: "itv", action: "get_epg_info", period: String(periodHours) },
      this.longTimeoutMs,
    );
    const epg = toPortalEpg(envelope);
    if (!epg) {
      throw this.malformed("get_epg_info");
    }
    return epg;
  }

  async listVodCategories(): Promise<PortalGenre[]> {
    return this.listCategories("vod");
  }

  async listSeriesCategories(): Promise<PortalGenre[]> {
    return this.listCategories("series");
  }

  async listVod(categoryId = "*"): Promise<PortalMediaItem[]> {
    const items = await this.listMedia("vod", categoryId);
    return items.filter((item) => !item.isSeries);
  }

  async listSeries(categoryId = "*"): Promise<PortalMediaItem[]> {
    return this.listMedia("series", categoryId);
  }

  private async listCategories(type: "vod" | "series"): Promise<PortalGenre[]> {
    const envelope = await this.request({ type, action: "get_categories" }, this.shortTimeoutMs);
    const categories = toPortalCategories(envelope);
    if (!categories) {
      throw this.malformed(`${type}/get_categories`);
    }
    return categories;
  }

  private async listMedia(type: "vod" | "series", categoryId: string): Promise<PortalMediaItem[]> {
    const collected = new Map<string, PortalMediaItem>();

    for (let page = 1; page <= this.maxMediaPages; page += 1) {
      const envelope = await this.request(
        { type, action: "get_ordered_list", category: categoryId, p: String(page), sortby: "added" },
        this.longTimeoutMs,
      );
      const result = toPortalMediaPage(envelope, this.origin, categoryId);
      if (!result) {
        throw this.malformed(`${type}/get_ordered_list`);
      }

      result.items.forEach((item) => {
        if (!collected.has(item.id)) {
          collected.set(item.id, item);
        }
      });

      const pageSize = result.pageSize ?? result.items.length;
      const total = result.totalItems;
      if (result.items.length === 0 || pageSize === 0) {
        break;
      }
      if (total !== null && page * pageSize >= total) {
        break;
      }
      if (total === null && result.items.length < pageSize) {
        break;
      }
    }

    return Array.from(collected.values());
  }

  private async createLink(type: "itv" | "vod", cmd: string): Promise<string> {
    const envelope = await this.request(
      {
        type,
        action: "create_link",
        cmd,
        series: "0",
        forced_storage: "false",
        disable_ad: "false",
        download: "false",
        force_ch_link_check: "false",
      },
      this.longTimeoutMs,
    );
    const link = toCreatedLink(envelope);
    if (!link) {
      throw this.malformed(`${type}/create_link`);
    }
    return link;
  }

  private isTokenStale(): boolean {
    return this.now() - this.tokenIssuedAt >= this.tokenRefreshMs;
  }

  /**
   * Authenticated call against the resolved endpoint. GET is tried first
   * and POST once after it; an auth failure triggers at most one fresh
   * handshake before giving up with `AuthExpired`.
   */
  private async request(params: RequestParams, timeoutMs: number): Promise<Record<string, unknown>> {
    const action = `${params.type}/${params.action}`;
    let reauthenticated = false;

    for (;;) {
      await this.handshake();
      const endpoint = this.endpoint;
      if (!endpoint) {
        throw new GatewayError("HandshakeFailed", `No endpoint resolved for portal ${this.portalId}`);
      }

      const outcome = await this.runStrategies(endpoint, params, timeoutMs, true);
      if (outcome.kind === "success") {
        return outcome.envelope;
      }

      if (outcome.kind === "auth") {
        if (reauthenticated) {
          throw new GatewayError(
            "AuthExpired",
            `Portal ${this.portalId} rejected MAC ${this.mac} after re-handshake (${action})`,
            { details: { status: outcome.status } },
          );
        }
        reauthenticated = true;
        console.warn(`[portal] ${this.portalId} ${this.mac} ${action} auth failed, re-handshaking`);
        this.invalidate();
        continue;
      }

      throw this.failureToError(outcome, action);
    }
  }

  private async runStrategies(
    endpoint: string,
    params: RequestParams,
    timeoutMs: number,
    withAuth: boolean,
  ): Promise<AttemptResult> {
    let last: FailedAttempt | null = null;

    for (const method of METHODS) {
      const result = await this.attemptWithChallenge({ endpoint, method }, params, timeoutMs, withAuth);
      if (result.kind === "success" || result.kind === "auth") {
        return result;
      }
      last = result;
    }

    return last ?? { kind: "network", error: new Error("no strategy attempted") };
  }

  private async performHandshake(): Promise<string> {
    const params: RequestParams = { type: "stb", action: "handshake", token: "" };
    const tried = new Set<string>();
    const failures: FailedAttempt[] = [];
    let tokenless = false;

    const tryEndpoints = async (
      candidates: string[],
    ): Promise<{ endpoint: string; token: string } | null> => {
      for (const endpoint of candidates) {
        if (tried.has(endpoint)) {
          continue;
        }
        tried.add(endpoint);

        for (const method of METHODS) {
          const result = await this.attemptWithChallenge(
            { endpoint, method },
            params,
            this.shortTimeoutMs,
            false,
          );
          if (result.kind === "success") {
            const token = readToken(result.envelope);
            if (token) {
              return { endpoint, token };
            }
            tokenless = true;
            continue;
          }
          failures.push(result);
          if (result.kind === "network") {
            break;
          }
        }
      }
      return null;
    };

    const hinted = [this.endpoint, this.endpoints.hint(this.portalId)].filter(
      (value): value is string => Boolean(value),
    );
    let found = await tryEndpoints([
      ...hinted,
      ...(this.endpoints.discoveredFor(this.portalId) ?? []),
      ...buildEndpointCandidates(this.portalUrl),
    ]);

    if (!found) {
      found = await tryEndpoints(await this.discoverEndpoints());
    }

    if (!found) {
      this.token = null;
      throw this.handshakeError(failures, tokenless, tried.size);
    }

    this.token = found.token;
    this.tokenIssuedAt = this.now();
    this.endpoint = found.endpoint;
    this.endpoints.remember(this.portalId, found.endpoint);
    console.log(`[portal] ${this.portalId} ${this.mac} handshake ok via ${found.endpoint}`);

    if (this.activateWithProfile) {
      const activation = await this.runStrategies(
        found.endpoint,
        { type: "stb", action: "get_profile", hd: "1", stb_type: "MAG250" },
        this.shortTimeoutMs,
        true,
      );
      if (activation.kind !== "success") {
        console.warn(
          `[portal] ${this.portalId} ${this.mac} profile activation failed (${activation.kind})`,
        );
      }
    }

    return found.token;
  }

  private async discoverEndpoints(): Promise<string[]> {
    let lastError: unknown = null;

    for (const scriptUrl of buildXpcomCandidates(this.portalUrl)) {
      try {
        const { response, body: text } = await fetchText(
          this.fetchImpl,
          scriptUrl,
          { method: "GET", headers: this.buildHeaders(false), dispatcher: this.dispatcher },
          this.shortTimeoutMs,
        );
        this.updateFromSetCookie(response.headers);
        if (!response.ok) {
          continue;
        }
        const loader = parseXpcomLoader(text, scriptUrl);
        if (loader) {
          console.log(`[portal] ${this.portalId} discovered endpoint ${loader} from ${scriptUrl}`);
          this.endpoints.rememberDiscovered(this.portalId, [loader]);
          return [loader];
        }
      } catch (error) {
        lastError = error;
      }
    }

    if (lastError) {
      console.warn(`[portal] ${this.portalId} xpcom discovery failed`, describeError(lastError));
    }
    return [];
  }

  private handshakeError(
    failures: FailedAttempt[],
    tokenless: boolean,
    endpointsTried: number,
  ): GatewayError {
    const details = { endpointsTried, attempts: failures.length, mac: this.mac };
    if (tokenless) {
      return new GatewayError(
        "HandshakeFailed",
        `Portal ${this.portalId} answered the handshake without a token for ${this.mac}`,
        { details },
      );
    }
    if (failures.length > 0 && failures.every((failure) => failure.kind === "network")) {
      const last = failures[failures.length - 1];
      return new GatewayError("PortalUnreachable", `Portal ${this.portalId} is unreachable`, {
        details,
        cause: last.kind === "network" ? last.error : undefined,
      });
    }
    return new GatewayError(
      "AllEndpointsExhausted",
      `No endpoint of portal ${this.portalId} accepted MAC ${this.mac}`,
      { details },
    );
  }

  private failureToError(outcome: FailedAttempt, action: string): GatewayError {
    switch (outcome.kind) {
      case "network":
        return new GatewayError("PortalUnreachable", `${action} on ${this.portalId} failed: ${outcome.error.message}`, {
          cause: outcome.error,
        });
      case "challenge":
        return new GatewayError("PortalUnreachable", `${action} on ${this.portalId} is behind a browser challenge`, {
          details: { status: outcome.status },
        });
      case "http":
        return outcome.status >= 500 || outcome.status === 429
          ? new GatewayError("PortalUnreachable", `${action} on ${this.portalId} returned ${outcome.status}`, {
              details: { status: outcome.status, snippet: outcome.snippet },
            })
          : this.malformed(action, outcome.status, outcome.snippet);
      case "malformed":
        return this.malformed(action, outcome.status, outcome.snippet);
      case "auth":
        return new GatewayError("AuthExpired", `${action} on ${this.portalId} was not authorized`);
    }
  }

  private malformed(action: string, status?: number, snippet?: string): GatewayError {
    return new GatewayError("MalformedResponse", `Unexpected ${action} response from ${this.portalId}`, {
      details: { status, snippet, mac: this.mac },
    });
  }

  private async attemptWithChallenge(
    strategy: FetchStrategy,
    params: RequestParams,
    timeoutMs: number,
    withAuth: boolean,
  ): Promise<AttemptResult> {
    const result = await this.attempt(strategy, params, timeoutMs, withAuth);
    if (result.kind !== "challenge" || !this.challengeSolver) {
      return result;
    }

    const url = this.buildUrl(strategy.endpoint, params);
    try {
      const clearance = await this.challengeSolver.solve(url.toString(), this.jarCookies());
      if (clearance.userAgent) {
        this.userAgent = clearance.userAgent;
      }
      clearance.cookies.forEach((cookie) => {
        this.cookieJar.set(cookie.name, cookie.value);
        this.cookieMeta.set(cookie.name, { expiresAt: null });
      });

      if (strategy.method === "GET" && !withAuth) {
        const envelope = this.parseEnvelope(clearance.body);
        if (envelope) {
          return { kind: "success", envelope };
        }
      }
    } catch (error) {
      console.warn(`[portal] ${this.portalId} challenge solver failed`, describeError(error));
      return result;
    }

    return this.attempt(strategy, params, timeoutMs, withAuth);
  }

  private async attempt(
    strategy: FetchStrategy,
    params: RequestParams,
    timeoutMs: number,
    withAuth: boolean,
  ): Promise<AttemptResult> {
    const headers = this.buildHeaders(withAuth);
    let target: URL;
    let body: string | undefined;

    if (strategy.method === "GET") {
      target = this.buildUrl(strategy.endpoint, params);
    } else {
      target = new URL(strategy.endpoint);
      body = new URLSearchParams({ ...params, JsHttpRequest: "1-xml" }).toString();
      headers["content-type"] = "application/x-www-form-urlencoded";
    }

    let response: Response;
    let text: string;
    try {
      const fetched = await fetchText(
        this.fetchImpl,
        target,
        { method: strategy.method, headers, body, dispatcher: this.dispatcher },
        timeoutMs,
      );
      response = fetched.response;
      text = fetched.body;
      this.updateFromSetCookie(response.headers);
    } catch (error) {
      return { kind: "network", error: toError(error) };
    }

    if (isChallengeResponse(response, text)) {
      return { kind: "challenge", status: response.status };
    }

    if (response.status === 401 || response.status === 403 || AUTH_FAILURE_BODY.test(text.slice(0, 500))) {
      return { kind: "auth", status: response.status };
    }

    if (!response.ok) {
      return { kind: "http", status: response.status, snippet: sanitizeSnippet(text) };
    }

    const envelope = this.parseEnvelope(text);
    if (!envelope) {
      return { kind: "malformed", status: response.status, snippet: sanitizeSnippet(text) };
    }

    return { kind: "success", envelope };
  }

  private parseEnvelope(text: string): Record<string, unknown> | null {
    const trimmed = text.trim();
    if (!trimmed.startsWith("{")) {
      return null;
    }
    try {
      const parsed: unknown = JSON.parse(trimmed);
      return isRecordEnvelope(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }

  private buildUrl(endpoint: string, params: RequestParams): URL {
    const url = new URL(endpoint);
    Object.entries(params).forEach(([key, value]) => {
      url.searchParams.set(key, value);
    });
    url.searchParams.set("JsHttpRequest", "1-xml");
    return url;
  }

  private buildHeaders(withAuth: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      accept: "*/*",
      "user-agent": this.userAgent,
      "x-user-agent": MAG_X_USER_AGENT,
      referer: `${this.origin}/`,
      cookie: this.buildCookieHeader(),
    };
    if (withAuth && this.token) {
      headers.authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  private jarCookies(): ClearanceCookie[] {
    return [
      { name: "mac", value: this.mac },
      ...Array.from(this.cookieJar.entries()).map(([name, value]) => ({ name, value })),
    ];
  }

  private buildCookieHeader(): string {
    const now = this.now();
    const pairs = [`mac=${this.mac}`, "stb_lang=en", "timezone=Europe/London"];

    for (const [name, value] of this.cookieJar.entries()) {
      const meta = this.cookieMeta.get(name);
      if (meta?.expiresAt && meta.expiresAt <= now) {
        this.cookieJar.delete(name);
        this.cookieMeta.delete(name);
        continue;
      }
      if (name === "mac" || name === "stb_lang" || name === "timezone") {
        continue;
      }
      pairs.push(`${name}=${value}`);
    }

    return pairs.join("; ");
  }

  private updateFromSetCookie(headers: Headers): void {
    const rawSetCookie = headers.getSetCookie();
    if (rawSetCookie.length === 0) {
      return;
    }

    const parsed = setCookie.parse(rawSetCookie, { map: true });
    const now = this.now();

    for (const [name, details] of Object.entries(parsed)) {
      const value = details.value?.trim() ?? "";
      const expiresAt = this.resolveCookieExpiry(details, now);

      if (
        value === "" ||
        details.maxAge === 0 ||
        (typeof expiresAt === "number" && expiresAt <= now)
      ) {
        this.cookieJar.delete(name);
        this.cookieMeta.delete(name);
        continue;
      }

      this.cookieJar.set(name, value);
      this.cookieMeta.set(name, { expiresAt });
    }
  }

  private resolveCookieExpiry(details: Cookie, now: number): number | null {
    if (typeof details.maxAge === "number") {
      return Number.isFinite(details.maxAge) ? now + details.maxAge * 1000 : null;
    }

    if (details.expires instanceof Date) {
      const ts = details.expires.getTime();
      return Number.isFinite(ts) ? ts : null;
    }

    return null;
  }
}
