import { PortalSession } from "../portalSession.js";
import type { ChallengeSolver } from "./challengeSolver.js";
import { describeError } from "./errors.js";
import type { PortalConfig } from "./gatewayConfig.js";
import type { FetchLike } from "./http.js";
import { PortalEndpointRegistry } from "./portalEndpoints.js";
import { ProxyTunnelFactory, type OutboundTransport } from "./proxyTunnel.js";

export interface PortalClientsOptions {
  tunnels?: ProxyTunnelFactory;
  fetchImpl?: FetchLike;
  challengeSolver?: ChallengeSolver | null;
  shortTimeoutMs?: number;
  longTimeoutMs?: number;
  now?: () => number;
}

export interface PortalClientProvider {
  session(portal: PortalConfig, mac: string): Promise<PortalSession>;
  transport(portal: PortalConfig): Promise<OutboundTransport>;
}

const fingerprint = (portal: PortalConfig): string =>
  `${portal.url}|${portal.proxy?.raw ?? ""}`;

/**
 * Hands out one transport per portal and one session per (portal, MAC).
 * Transports open lazily and are shared by all sessions of the portal.
 */
export class PortalClients implements PortalClientProvider {
  private readonly tunnels: ProxyTunnelFactory;

  private readonly endpoints = new PortalEndpointRegistry();

  private readonly transports = new Map<string, { key: string; transport: OutboundTransport }>();

  private readonly opening = new Map<string, Promise<OutboundTransport>>();

  private readonly sessions = new Map<string, { key: string; session: PortalSession }>();

  private readonly options: PortalClientsOptions;

  constructor(options: PortalClientsOptions = {}) {
    this.tunnels = options.tunnels ?? new ProxyTunnelFactory();
    this.options = options;
  }

  async transport(portal: PortalConfig): Promise<OutboundTransport> {
    const key = fingerprint(portal);
    const cached = this.transports.get(portal.id);
    if (cached && cached.key === key) {
      return cached.transport;
    }

    const pending = this.opening.get(portal.id);
    if (pending) {
      return pending;
    }

    const promise = (async () => {
      if (cached) {
        await this.closePortal(portal.id);
      }
      const transport = await this.tunnels.open(portal.proxy);
      this.transports.set(portal.id, { key, transport });
      if (transport.descriptor) {
        console.log(`[tunnel] ${portal.id} using ${transport.label}`);
      }
      return transport;
    })().finally(() => {
      this.opening.delete(portal.id);
    });

    this.opening.set(portal.id, promise);
    return promise;
  }

  async session(portal: PortalConfig, mac: string): Promise<PortalSession> {
    const key = fingerprint(portal);
    const sessionKey = `${portal.id}|${mac}`;
    const transport = await this.transport(portal);
    const cached = this.sessions.get(sessionKey);
    if (cached && cached.key === key) {
      return cached.session;
    }

    const session = new PortalSession(
      {
        portalId: portal.id,
        portalUrl: portal.url,
        mac,
        shortTimeoutMs: this.options.shortTimeoutMs,
        longTimeoutMs: this.options.longTimeoutMs,
      },
      {
        fetchImpl: this.options.fetchImpl,
        dispatcher: transport.dispatcher,
        endpoints: this.endpoints,
        challengeSolver: this.options.challengeSolver,
        now: this.options.now,
      },
    );
    this.sessions.set(sessionKey, { key, session });
    return session;
  }

  /** Drops clients of portals that are gone or whose url/proxy changed. */
  async reconcile(portals: PortalConfig[]): Promise<void> {
    const current = new Map(portals.map((portal) => [portal.id, fingerprint(portal)]));
    const stale = Array.from(this.transports.entries())
      .filter(([portalId, entry]) => current.get(portalId) !== entry.key)
      .map(([portalId]) => portalId);

    for (const [sessionKey, entry] of Array.from(this.sessions.entries())) {
      const portalId = sessionKey.slice(0, sessionKey.lastIndexOf("|"));
      if (current.get(portalId) !== entry.key) {
        this.sessions.delete(sessionKey);
      }
    }

    await Promise.all(stale.map((portalId) => this.closePortal(portalId)));
  }

  async closeAll(): Promise<void> {
    this.sessions.clear();
    await Promise.all(Array.from(this.transports.keys()).map((portalId) => this.closePortal(portalId)));
  }

  private async closePortal(portalId: string): Promise<void> {
    const entry = this.transports.get(portalId);
    this.transports.delete(portalId);
    this.endpoints.forget(portalId);
    if (!entry) {
      return;
    }
    try {
      await entry.transport.close();
    } catch (error) {
      console.warn(`[tunnel] closing transport of ${portalId} failed`, describeError(error));
    }
  }
}
