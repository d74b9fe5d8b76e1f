import { ProxyAgent } from "undici";
import type { Dispatcher } from "undici";
import { describeError } from "./errors.js";
import {
  describeProxy,
  parseProxyDescriptor,
  type ForwardProxyDescriptor,
  type ProxyDescriptor,
} from "./proxyDescriptor.js";
import { ShadowsocksBridgeLauncher, type RunningBridge } from "./shadowsocksBridge.js";
import { createSocksDispatcher } from "./socksDispatcher.js";

export interface OutboundTransport {
  readonly descriptor: ProxyDescriptor | null;
  /** `undefined` means the global dispatcher, i.e. a direct connection. */
  readonly dispatcher: Dispatcher | undefined;
  readonly label: string;
  close(): Promise<void>;
}

export interface ProxyTunnelFactoryOptions {
  connectTimeoutMs?: number;
}

const DIRECT_TRANSPORT: OutboundTransport = {
  descriptor: null,
  dispatcher: undefined,
  label: "direct",
  close: async () => undefined,
};

const buildForwardUrl = (descriptor: ForwardProxyDescriptor): string => {
  const auth =
    descriptor.username !== undefined
      ? `${encodeURIComponent(descriptor.username)}${
          descriptor.password !== undefined ? `:${encodeURIComponent(descriptor.password)}` : ""
        }@`
      : "";
  const host = descriptor.host.includes(":") ? `[${descriptor.host}]` : descriptor.host;
  return `${descriptor.scheme}://${auth}${host}:${descriptor.port}`;
};

export class ProxyTunnelFactory {
  private readonly launcher: ShadowsocksBridgeLauncher;

  private readonly connectTimeoutMs: number;

  constructor(
    launcher: ShadowsocksBridgeLauncher = new ShadowsocksBridgeLauncher(),
    options: ProxyTunnelFactoryOptions = {},
  ) {
    this.launcher = launcher;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
  }

  /**
   * Opens a transport for a descriptor string or an already parsed
   * descriptor. Failures surface as typed errors; there is no silent
   * fallback to a direct connection.
   */
  async open(input: string | ProxyDescriptor | null | undefined): Promise<OutboundTransport> {
    const descriptor =
      typeof input === "string" || input === null || input === undefined
        ? parseProxyDescriptor(input)
        : input;

    if (!descriptor) {
      return DIRECT_TRANSPORT;
    }

    switch (descriptor.scheme) {
      case "http":
      case "https": {
        const agent = new ProxyAgent({ uri: buildForwardUrl(descriptor) });
        return this.wrap(descriptor, agent);
      }
      case "socks4":
      case "socks5": {
        const agent = createSocksDispatcher(
          {
            host: descriptor.host,
            port: descriptor.port,
            type: descriptor.scheme === "socks4" ? 4 : 5,
            userId: descriptor.username,
            password: descriptor.password,
          },
          this.connectTimeoutMs,
        );
        return this.wrap(descriptor, agent);
      }
      case "ss": {
        const bridge = await this.launcher.launch(descriptor);
        const agent = createSocksDispatcher(
          { host: "127.0.0.1", port: bridge.localPort, type: 5 },
          this.connectTimeoutMs,
        );
        return this.wrap(descriptor, agent, bridge);
      }
    }
  }

  private wrap(
    descriptor: ProxyDescriptor,
    dispatcher: Dispatcher,
    bridge?: RunningBridge,
  ): OutboundTransport {
    const label = describeProxy(descriptor);
    let closing: Promise<void> | null = null;

    return {
      descriptor,
      dispatcher,
      label,
      close: () => {
        if (!closing) {
          closing = (async () => {
            try {
              await dispatcher.close();
            } catch (error) {
              console.warn(`[tunnel] closing ${label} failed`, describeError(error));
            }
            await bridge?.close();
          })();
        }
        return closing;
      },
    };
  }
}
