import { Agent, buildConnector } from "undici";
import { SocksClient, type SocksProxy } from "socks";

const DEFAULT_PORTS: Record<string, number> = {
  "http:": 80,
  "https:": 443,
};

/**
 * An undici Agent whose sockets are opened through a SOCKS4/5 proxy. TLS
 * origins get the handshake layered over the SOCKS socket.
 */
export const createSocksDispatcher = (proxy: SocksProxy, connectTimeoutMs: number): Agent => {
  const tlsConnect = buildConnector({ timeout: connectTimeoutMs });

  return new Agent({
    connect: (options, callback) => {
      const port = Number.parseInt(options.port, 10) || DEFAULT_PORTS[options.protocol] || 80;
      void SocksClient.createConnection({
        proxy,
        command: "connect",
        destination: { host: options.hostname, port },
        timeout: connectTimeoutMs,
      }).then(
        ({ socket }) => {
          if (options.protocol === "https:") {
            tlsConnect({ ...options, httpSocket: socket }, callback);
            return;
          }
          callback(null, socket);
        },
        (error: unknown) => {
          callback(error instanceof Error ? error : new Error(String(error)), null);
        },
      );
    },
  });
};
