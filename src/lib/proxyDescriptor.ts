import { GatewayError } from "./errors.js";

export const SUPPORTED_SS_CIPHERS = [
  "aes-128-gcm",
  "aes-256-gcm",
  "chacha20-ietf-poly1305",
  "xchacha20-ietf-poly1305",
  "aes-128-cfb",
  "aes-192-cfb",
  "aes-256-cfb",
  "rc4-md5",
] as const;

export type ShadowsocksCipher = (typeof SUPPORTED_SS_CIPHERS)[number];

export const DEPRECATED_SS_CIPHERS: ReadonlySet<ShadowsocksCipher> = new Set<ShadowsocksCipher>(["rc4-md5"]);

interface ProxyEndpoint {
  host: string;
  port: number;
  raw: string;
}

export interface ForwardProxyDescriptor extends ProxyEndpoint {
  scheme: "http" | "https" | "socks4" | "socks5";
  username?: string;
  password?: string;
}

export interface ShadowsocksDescriptor extends ProxyEndpoint {
  scheme: "ss";
  method: ShadowsocksCipher;
  password: string;
}

export type ProxyDescriptor = ForwardProxyDescriptor | ShadowsocksDescriptor;

const DEFAULT_PORTS: Record<ForwardProxyDescriptor["scheme"], number> = {
  http: 80,
  https: 443,
  socks4: 1080,
  socks5: 1080,
};

const BARE_HOST_PORT = /^([A-Za-z0-9.-]+|\[[0-9A-Fa-f:.]+\]):(\d{1,5})$/;
const SCHEME_PREFIX = /^([A-Za-z][A-Za-z0-9+.-]*):\/\/(.*)$/;

const invalid = (raw: string, reason: string): GatewayError =>
  new GatewayError("InvalidProxyFormat", `Invalid proxy "${redactProxyString(raw)}": ${reason}`);

const parsePort = (raw: string, value: string): number => {
  if (!/^\d{1,5}$/.test(value)) {
    throw invalid(raw, "port must be numeric");
  }
  const port = Number.parseInt(value, 10);
  if (port < 1 || port > 65535) {
    throw invalid(raw, "port out of range");
  }
  return port;
};

const stripBrackets = (host: string): string =>
  host.startsWith("[") && host.endsWith("]") ? host.slice(1, -1) : host;

const splitHostPort = (raw: string, authority: string): { host: string; port: number } => {
  const match = BARE_HOST_PORT.exec(authority);
  if (!match) {
    throw invalid(raw, "expected host:port");
  }
  return { host: stripBrackets(match[1]), port: parsePort(raw, match[2]) };
};

const decodeBase64 = (value: string): string => {
  const normalized = value.replace(/-/g, "+").replace(/_/g, "/");
  const padded = normalized + "=".repeat((4 - (normalized.length % 4)) % 4);
  return Buffer.from(padded, "base64").toString("utf8");
};

const CIPHER_LOOKUP: ReadonlySet<string> = new Set(SUPPORTED_SS_CIPHERS);

const isCipher = (value: string): value is ShadowsocksCipher => CIPHER_LOOKUP.has(value);

const parseShadowsocks = (raw: string, rest: string): ShadowsocksDescriptor => {
  // SIP002 allows a "#tag" suffix and a "/?plugin=" query; neither matters to the bridge.
  const withoutTag = rest.split("#")[0];
  const body = withoutTag.split("/?")[0].replace(/\/$/, "");
  if (!body) {
    throw invalid(raw, "missing credentials and server");
  }

  let userInfo: string;
  let authority: string;
  const at = body.lastIndexOf("@");
  if (at === -1) {
    const decoded = decodeBase64(body);
    const decodedAt = decoded.lastIndexOf("@");
    if (decodedAt === -1) {
      throw invalid(raw, "missing server address");
    }
    userInfo = decoded.slice(0, decodedAt);
    authority = decoded.slice(decodedAt + 1);
  } else {
    const encoded = body.slice(0, at);
    authority = body.slice(at + 1);
    userInfo = encoded.includes(":") ? decodeURIComponent(encoded) : decodeBase64(encoded);
  }

  const separator = userInfo.indexOf(":");
  if (separator <= 0) {
    throw invalid(raw, "expected method:password");
  }
  const method = userInfo.slice(0, separator).toLowerCase();
  const password = userInfo.slice(separator + 1);
  if (!password) {
    throw invalid(raw, "missing password");
  }
  if (!isCipher(method)) {
    throw new GatewayError("UnsupportedCipher", `Unsupported Shadowsocks cipher "${method}"`, {
      details: { method },
    });
  }

  const { host, port } = splitHostPort(raw, authority);
  return { scheme: "ss", host, port, method, password, raw };
};

const parseForward = (
  raw: string,
  scheme: ForwardProxyDescriptor["scheme"],
): ForwardProxyDescriptor => {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw invalid(raw, "malformed URL");
  }

  const host = stripBrackets(url.hostname);
  if (!host) {
    throw invalid(raw, "missing host");
  }
  if (url.pathname && url.pathname !== "/" && url.pathname !== "") {
    throw invalid(raw, "unexpected path");
  }

  const port = url.port ? parsePort(raw, url.port) : DEFAULT_PORTS[scheme];
  const descriptor: ForwardProxyDescriptor = { scheme, host, port, raw };
  if (url.username) {
    descriptor.username = decodeURIComponent(url.username);
  }
  if (url.password) {
    descriptor.password = decodeURIComponent(url.password);
  }
  if (scheme === "socks4" && descriptor.password) {
    throw invalid(raw, "socks4 does not support passwords");
  }
  return descriptor;
};

/**
 * Parses a proxy descriptor string. An empty value means "connect directly"
 * and yields `null`; anything else either parses or throws
 * `InvalidProxyFormat` / `UnsupportedCipher`.
 */
export const parseProxyDescriptor = (value: string | null | undefined): ProxyDescriptor | null => {
  const raw = value?.trim() ?? "";
  if (!raw) {
    return null;
  }

  const bare = BARE_HOST_PORT.exec(raw);
  if (bare) {
    return {
      scheme: "http",
      host: stripBrackets(bare[1]),
      port: parsePort(raw, bare[2]),
      raw: `http://${raw}`,
    };
  }

  const prefixed = SCHEME_PREFIX.exec(raw);
  if (!prefixed) {
    throw invalid(raw, "expected scheme://host:port or host:port");
  }

  const scheme = prefixed[1].toLowerCase();
  switch (scheme) {
    case "ss":
      return parseShadowsocks(raw, prefixed[2]);
    case "http":
    case "https":
    case "socks4":
    case "socks5":
      return parseForward(raw, scheme);
    case "socks":
      return parseForward(`socks5://${prefixed[2]}`, "socks5");
    default:
      throw invalid(raw, `unsupported scheme "${scheme}"`);
  }
};

export const redactProxyString = (raw: string): string =>
  raw.replace(/\/\/[^@/]*@/, "//***@");

export const describeProxy = (descriptor: ProxyDescriptor | null): string => {
  if (!descriptor) {
    return "direct";
  }
  if (descriptor.scheme === "ss") {
    return `ss://${descriptor.method}@${descriptor.host}:${descriptor.port}`;
  }
  return `${descriptor.scheme}://${descriptor.host}:${descriptor.port}`;
};
