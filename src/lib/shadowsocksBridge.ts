import { spawn } from "node:child_process";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import net from "node:net";
import { tmpdir } from "node:os";
import path from "node:path";
import type { Dispatcher } from "undici";
import { GatewayError, describeError } from "./errors.js";
import { defaultFetch, delay, fetchText } from "./http.js";
import { DEPRECATED_SS_CIPHERS, type ShadowsocksDescriptor } from "./proxyDescriptor.js";
import { createSocksDispatcher } from "./socksDispatcher.js";

export type BridgeSignal = "SIGTERM" | "SIGKILL";

export interface BridgeProcess {
  readonly pid?: number;
  kill(signal: BridgeSignal): void;
  /** Settles with the exit code once the process has gone away. */
  readonly exited: Promise<number | null>;
}

/** sslocal's JSON configuration; keeps the password out of the process table. */
export interface SslocalConfig {
  server: string;
  server_port: number;
  password: string;
  method: string;
  local_address: string;
  local_port: number;
}

export interface BridgeConfigFile {
  readonly path: string;
  remove(): Promise<void>;
}

export interface ShadowsocksBridgeDeps {
  checkTcp(host: string, port: number, timeoutMs: number): Promise<void>;
  allocatePort(): Promise<number>;
  writeConfig(config: SslocalConfig): Promise<BridgeConfigFile>;
  spawnBridge(command: string, args: string[]): BridgeProcess;
  verify(proxyUrl: string, ipCheckUrl: string, timeoutMs: number): Promise<string>;
  wait(ms: number): Promise<void>;
}

export interface ShadowsocksBridgeOptions {
  binary?: string;
  preflightTimeoutMs?: number;
  startupTimeoutMs?: number;
  maxAttempts?: number;
  backoffBaseMs?: number;
  ipCheckUrl?: string;
}

export interface RunningBridge {
  readonly localPort: number;
  readonly proxyUrl: string;
  readonly externalIp: string;
  close(): Promise<void>;
}

const DEFAULT_BINARY = "sslocal";
const DEFAULT_IP_CHECK_URL = "https://api.ipify.org?format=json";
const PORT_POLL_INTERVAL_MS = 150;
const KILL_GRACE_MS = 2_000;

const reservedPorts = new Set<number>();

export const checkTcp = (host: string, port: number, timeoutMs: number): Promise<void> =>
  new Promise((resolve, reject) => {
    const socket = net.connect({ host, port });
    const finish = (error?: Error) => {
      socket.removeAllListeners();
      socket.destroy();
      if (error) {
        reject(error);
        return;
      }
      resolve();
    };
    socket.setTimeout(timeoutMs, () => finish(new Error(`connect to ${host}:${port} timed out`)));
    socket.once("connect", () => finish());
    socket.once("error", (error) => finish(error));
  });

export const allocateEphemeralPort = (): Promise<number> =>
  new Promise((resolve, reject) => {
    const server = net.createServer();
    server.unref();
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      const port = typeof address === "object" && address ? address.port : 0;
      server.close(() => {
        if (!port) {
          reject(new Error("could not allocate a local port"));
          return;
        }
        resolve(port);
      });
    });
  });

export const writeBridgeConfig = async (config: SslocalConfig): Promise<BridgeConfigFile> => {
  const dir = await mkdtemp(path.join(tmpdir(), "ss-bridge-"));
  const file = path.join(dir, "config.json");
  await writeFile(file, JSON.stringify(config), { mode: 0o600 });
  return {
    path: file,
    remove: () => rm(dir, { recursive: true, force: true }),
  };
};

const spawnChildBridge = (command: string, args: string[]): BridgeProcess => {
  const child = spawn(command, args, { stdio: ["ignore", "ignore", "pipe"] });

  child.stderr?.on("data", (chunk: Buffer) => {
    const line = chunk.toString("utf8").trim();
    if (line) {
      console.warn(`[tunnel] sslocal: ${line.slice(0, 300)}`);
    }
  });

  const exited = new Promise<number | null>((resolve) => {
    child.once("exit", (code) => resolve(code));
    child.once("error", (error) => {
      console.warn("[tunnel] sslocal failed to start", describeError(error));
      resolve(null);
    });
  });

  return {
    pid: child.pid,
    kill: (signal) => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill(signal);
      }
    },
    exited,
  };
};

const verifyThroughSocks = async (
  proxyUrl: string,
  ipCheckUrl: string,
  timeoutMs: number,
): Promise<string> => {
  const url = new URL(proxyUrl);
  const dispatcher: Dispatcher = createSocksDispatcher(
    { host: url.hostname, port: Number(url.port), type: 5 },
    timeoutMs,
  );
  try {
    const { response, body } = await fetchText(defaultFetch, ipCheckUrl, { dispatcher }, timeoutMs);
    const text = body.trim();
    if (!response.ok) {
      throw new Error(`ip check returned ${response.status}`);
    }
    try {
      const parsed: unknown = JSON.parse(text);
      if (typeof parsed === "object" && parsed !== null && "ip" in parsed) {
        return String(parsed.ip);
      }
    } catch {
      // plain-text services answer with the address itself
    }
    return text.slice(0, 64);
  } finally {
    await dispatcher.close();
  }
};

export const defaultBridgeDeps: ShadowsocksBridgeDeps = {
  checkTcp,
  allocatePort: allocateEphemeralPort,
  writeConfig: writeBridgeConfig,
  spawnBridge: spawnChildBridge,
  verify: verifyThroughSocks,
  wait: delay,
};

export class ShadowsocksBridgeLauncher {
  private readonly deps: ShadowsocksBridgeDeps;

  private readonly binary: string;

  private readonly preflightTimeoutMs: number;

  private readonly startupTimeoutMs: number;

  private readonly maxAttempts: number;

  private readonly backoffBaseMs: number;

  private readonly ipCheckUrl: string;

  constructor(options: ShadowsocksBridgeOptions = {}, deps: Partial<ShadowsocksBridgeDeps> = {}) {
    this.deps = { ...defaultBridgeDeps, ...deps };
    this.binary = options.binary?.trim() || DEFAULT_BINARY;
    this.preflightTimeoutMs = options.preflightTimeoutMs ?? 5_000;
    this.startupTimeoutMs = options.startupTimeoutMs ?? 8_000;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.backoffBaseMs = options.backoffBaseMs ?? 500;
    this.ipCheckUrl = options.ipCheckUrl?.trim() || DEFAULT_IP_CHECK_URL;
  }

  async launch(descriptor: ShadowsocksDescriptor): Promise<RunningBridge> {
    const target = `${descriptor.host}:${descriptor.port}`;

    try {
      await this.deps.checkTcp(descriptor.host, descriptor.port, this.preflightTimeoutMs);
    } catch (error) {
      throw new GatewayError("ProxyUnreachable", `Shadowsocks server ${target} is not reachable`, {
        cause: error,
        details: { host: descriptor.host, port: descriptor.port },
      });
    }

    if (DEPRECATED_SS_CIPHERS.has(descriptor.method)) {
      console.warn(`[tunnel] cipher ${descriptor.method} for ${target} is deprecated and insecure`);
    }

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      const localPort = await this.reservePort();
      let config: BridgeConfigFile;
      try {
        config = await this.deps.writeConfig({
          server: descriptor.host,
          server_port: descriptor.port,
          password: descriptor.password,
          method: descriptor.method,
          local_address: "127.0.0.1",
          local_port: localPort,
        });
      } catch (error) {
        reservedPorts.delete(localPort);
        throw new GatewayError("BridgeStartupFailed", `Could not write the bridge config for ${target}`, {
          cause: error,
        });
      }
      const child = this.deps.spawnBridge(this.binary, ["-c", config.path]);
      const proxyUrl = `socks5://127.0.0.1:${localPort}`;

      try {
        await this.waitUntilListening(child, localPort);
        const externalIp = await this.deps.verify(proxyUrl, this.ipCheckUrl, this.startupTimeoutMs);
        console.log(
          `[tunnel] shadowsocks bridge ${target} ready on ${localPort} (exit ip ${externalIp || "unknown"})`,
        );
        return this.wrap(child, config, localPort, proxyUrl, externalIp);
      } catch (error) {
        lastError = error;
        await this.stop(child, config);
        reservedPorts.delete(localPort);
        console.warn(
          `[tunnel] bridge attempt ${attempt}/${this.maxAttempts} for ${target} failed`,
          describeError(error),
        );
        if (attempt < this.maxAttempts) {
          await this.deps.wait(this.backoffBaseMs * 2 ** (attempt - 1));
        }
      }
    }

    throw new GatewayError(
      "BridgeStartupFailed",
      `Shadowsocks bridge for ${target} did not start after ${this.maxAttempts} attempts`,
      { cause: lastError },
    );
  }

  private async reservePort(): Promise<number> {
    for (let tries = 0; tries < 10; tries += 1) {
      const port = await this.deps.allocatePort();
      if (!reservedPorts.has(port)) {
        reservedPorts.add(port);
        return port;
      }
    }
    throw new GatewayError("BridgeStartupFailed", "Could not reserve a unique local port");
  }

  private async waitUntilListening(child: BridgeProcess, port: number): Promise<void> {
    let exitCode: number | null | undefined;
    void child.exited.then((code) => {
      exitCode = code;
    });

    const deadline = Date.now() + this.startupTimeoutMs;
    while (Date.now() < deadline) {
      if (exitCode !== undefined) {
        throw new Error(`bridge exited early with code ${exitCode ?? "unknown"}`);
      }
      try {
        await this.deps.checkTcp("127.0.0.1", port, PORT_POLL_INTERVAL_MS * 4);
        return;
      } catch {
        await this.deps.wait(PORT_POLL_INTERVAL_MS);
      }
    }
    throw new Error(`bridge did not listen on ${port} within ${this.startupTimeoutMs}ms`);
  }

  /** SIGTERM, then SIGKILL if the bridge outlives the grace period. */
  private async stop(child: BridgeProcess, config: BridgeConfigFile): Promise<void> {
    child.kill("SIGTERM");
    const exited = await Promise.race([
      child.exited.then(() => true),
      this.deps.wait(KILL_GRACE_MS).then(() => false),
    ]);
    if (!exited) {
      console.warn(`[tunnel] sslocal ${child.pid ?? "?"} ignored SIGTERM, killing`);
      child.kill("SIGKILL");
    }
    try {
      await config.remove();
    } catch (error) {
      console.warn(`[tunnel] removing ${config.path} failed`, describeError(error));
    }
  }

  private wrap(
    child: BridgeProcess,
    config: BridgeConfigFile,
    localPort: number,
    proxyUrl: string,
    externalIp: string,
  ): RunningBridge {
    let closed: Promise<void> | null = null;
    return {
      localPort,
      proxyUrl,
      externalIp,
      close: () => {
        if (!closed) {
          closed = this.stop(child, config).finally(() => {
            reservedPorts.delete(localPort);
          });
        }
        return closed;
      },
    };
  }
}
