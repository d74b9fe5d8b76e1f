import { createHash } from "node:crypto";
import { GatewayError } from "./errors.js";
import type { UserConfig } from "./gatewayConfig.js";

export type AuthResult = { ok: true; user: UserConfig } | { ok: false; message: string };

export interface AdmissionRequest {
  streamId: number;
  deviceId: string;
  ip: string;
  label?: string;
}

export interface ActiveConnection {
  readonly id: number;
  readonly username: string;
  readonly streamId: number;
  readonly deviceId: string;
  readonly ip: string;
  readonly label: string;
  readonly startedAt: number;
  lastActivity: number;
}

export interface ConnectionView {
  id: number;
  username: string;
  streamId: number;
  deviceId: string;
  ip: string;
  label: string;
  startedAt: string;
  lastActivity: string;
}

export interface SessionBrokerOptions {
  users: () => UserConfig[];
  idleTimeoutMs?: number;
  now?: () => number;
}

export const deviceFingerprint = (ip: string, userAgent: string): string =>
  createHash("sha1").update(`${ip}|${userAgent}`).digest("hex").slice(0, 16);

const isoDay = (ms: number): string => new Date(ms).toISOString().slice(0, 10);

/**
 * Authenticates downstream users and enforces their connection limits. All
 * mutations are synchronous so two requests can never both take the last slot.
 */
export class SessionBroker {
  private readonly users: () => UserConfig[];

  private readonly idleTimeoutMs: number;

  private readonly now: () => number;

  private readonly connections = new Map<number, ActiveConnection>();

  /** Open handles per row; a reused row stays until its last holder releases it. */
  private readonly holders = new Map<number, number>();

  private nextId = 1;

  constructor(options: SessionBrokerOptions) {
    this.users = options.users;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  authenticate(username: string | undefined, password: string | undefined): AuthResult {
    if (!username || !password) {
      return { ok: false, message: "Missing credentials" };
    }
    const user = this.users().find((candidate) => candidate.username === username);
    if (!user || user.password !== password) {
      return { ok: false, message: "Invalid credentials" };
    }
    if (!user.enabled) {
      return { ok: false, message: "Account disabled" };
    }
    if (user.expiresAt && isoDay(this.now()) > user.expiresAt) {
      return { ok: false, message: "Account expired" };
    }
    return { ok: true, user };
  }

  /**
   * Opens (or reuses) a connection row. The same device coming back for the
   * same stream keeps its row; anything else beyond the limit is refused.
   */
  admit(user: UserConfig, request: AdmissionRequest): ActiveConnection {
    this.expireIdle();
    const now = this.now();
    const mine = this.connectionsOf(user.username);

    const existing = mine.find(
      (connection) => connection.deviceId === request.deviceId && connection.streamId === request.streamId,
    );
    if (existing) {
      existing.lastActivity = now;
      this.holders.set(existing.id, (this.holders.get(existing.id) ?? 0) + 1);
      return existing;
    }

    if (mine.length >= user.maxConnections) {
      throw new GatewayError(
        "AdmissionDenied",
        `Max connections reached for ${user.username} (${mine.length}/${user.maxConnections})`,
        { details: { active: mine.length, max: user.maxConnections } },
      );
    }

    const connection: ActiveConnection = {
      id: this.nextId,
      username: user.username,
      streamId: request.streamId,
      deviceId: request.deviceId,
      ip: request.ip,
      label: request.label ?? "",
      startedAt: now,
      lastActivity: now,
    };
    this.nextId += 1;
    this.connections.set(connection.id, connection);
    this.holders.set(connection.id, 1);
    console.log(`[xc] ${user.username} connected to ${request.streamId} from ${request.ip}`);
    return connection;
  }

  /**
   * Drops one handle on the row and deletes the row with the last one.
   * Returns whether the row went away.
   */
  release(connection: ActiveConnection): boolean {
    const remaining = (this.holders.get(connection.id) ?? 0) - 1;
    if (remaining > 0) {
      this.holders.set(connection.id, remaining);
      return false;
    }
    const removed = this.drop(connection.id);
    if (removed) {
      console.log(`[xc] ${connection.username} disconnected from ${connection.streamId}`);
    }
    return removed;
  }

  touch(connection: ActiveConnection): void {
    if (this.connections.has(connection.id)) {
      connection.lastActivity = this.now();
    }
  }

  activeCount(username: string): number {
    this.expireIdle();
    return this.connectionsOf(username).length;
  }

  /** Drops every row of a user, e.g. when an operator kicks them. */
  kick(username: string): number {
    const rows = this.connectionsOf(username);
    rows.forEach((connection) => this.drop(connection.id));
    return rows.length;
  }

  expireIdle(): number {
    const cutoff = this.now() - this.idleTimeoutMs;
    let expired = 0;
    for (const connection of Array.from(this.connections.values())) {
      if (connection.lastActivity < cutoff) {
        this.drop(connection.id);
        expired += 1;
      }
    }
    return expired;
  }

  list(): ConnectionView[] {
    this.expireIdle();
    return Array.from(this.connections.values()).map((connection) => ({
      id: connection.id,
      username: connection.username,
      streamId: connection.streamId,
      deviceId: connection.deviceId,
      ip: connection.ip,
      label: connection.label,
      startedAt: new Date(connection.startedAt).toISOString(),
      lastActivity: new Date(connection.lastActivity).toISOString(),
    }));
  }

  private drop(id: number): boolean {
    this.holders.delete(id);
    return this.connections.delete(id);
  }

  private connectionsOf(username: string): ActiveConnection[] {
    return Array.from(this.connections.values()).filter(
      (connection) => connection.username === username,
    );
  }
}
