import { spawn, type ChildProcessByStdio } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { isRecord, toFiniteNumber, toTrimmedString } from "./http.js";

export interface CheckedStream {
  index: number;
  codecType: string;
  codecName: string;
  width: number | null;
  height: number | null;
}

export interface StreamCheckResult {
  ok: boolean;
  formatName: string;
  streams: CheckedStream[];
  error: string | null;
}

export const buildFfprobeArgs = (): string[] => [
  "-v",
  "error",
  "-show_entries",
  "stream=index,codec_type,codec_name,width,height:format=format_name",
  "-of",
  "json",
  "-i",
  "pipe:0",
];

/** Reads ffprobe's `-of json` output; anything unparseable yields no streams. */
export const parseFfprobeOutput = (text: string): Pick<StreamCheckResult, "formatName" | "streams"> => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { formatName: "", streams: [] };
  }
  if (!isRecord(parsed)) {
    return { formatName: "", streams: [] };
  }
  const streams = Array.isArray(parsed.streams)
    ? parsed.streams.filter(isRecord).map((stream, position) => ({
        index: toFiniteNumber(stream.index) ?? position,
        codecType: toTrimmedString(stream.codec_type),
        codecName: toTrimmedString(stream.codec_name),
        width: toFiniteNumber(stream.width),
        height: toFiniteNumber(stream.height),
      }))
    : [];
  const formatName = isRecord(parsed.format) ? toTrimmedString(parsed.format.format_name) : "";
  return { formatName, streams };
};

/**
 * Feeds `input` to ffprobe and reports what it found. Never rejects: a
 * missing binary, a timeout or a non-zero exit come back as `ok: false`.
 */
export const runStreamCheck = (ffprobeBin: string, input: Readable, timeoutMs: number): Promise<StreamCheckResult> =>
  new Promise((resolve) => {
    const child: ChildProcessByStdio<Writable, Readable, Readable> = spawn(ffprobeBin, buildFfprobeArgs(), {
      stdio: ["pipe", "pipe", "pipe"],
    });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;

    const finish = (result: StreamCheckResult) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      input.unpipe(child.stdin);
      input.destroy();
      resolve(result);
    };

    const timer = setTimeout(() => {
      child.kill("SIGKILL");
      finish({ ok: false, formatName: "", streams: [], error: `ffprobe timed out after ${timeoutMs}ms` });
    }, timeoutMs);

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.stdin.on("error", (error) => {
      // EPIPE: ffprobe stopped reading once it had seen enough.
      if (!("code" in error && error.code === "EPIPE")) {
        child.kill("SIGKILL");
        finish({ ok: false, formatName: "", streams: [], error: error.message });
      }
    });
    input.on("error", (error) => {
      child.kill("SIGKILL");
      finish({ ok: false, formatName: "", streams: [], error: `upstream failed: ${error.message}` });
    });
    input.pipe(child.stdin);

    child.on("error", (error) => {
      finish({ ok: false, formatName: "", streams: [], error: error.message });
    });
    child.on("close", (code) => {
      const { formatName, streams } = parseFfprobeOutput(Buffer.concat(stdout).toString("utf8"));
      if (code !== 0) {
        const message = Buffer.concat(stderr).toString("utf8").trim();
        finish({ ok: false, formatName, streams, error: message || `ffprobe exited with code ${code ?? "?"}` });
        return;
      }
      finish({ ok: streams.length > 0, formatName, streams, error: streams.length > 0 ? null : "no streams found" });
    });
  });
