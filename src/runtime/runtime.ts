/**
 * Runtime adapter: Node.js implementation
 *
 * Implements the RuntimePort contract on node:http, converting between
 * IncomingMessage/ServerResponse and Web Request/Response.
 *
 * @see types.ts for the port contract
 * @module marquee/runtime/runtime
 */

import { readFile } from "node:fs/promises";
import { createServer, type IncomingMessage } from "node:http";
import { isIPv6 } from "node:net";
import type { Readable } from "node:stream";
import type {
  FetchHandler,
  RuntimePort,
  ServeHandle,
  ServeOptions,
} from "./types.ts";

// Re-export types so consumers import from a single module
export type {
  ConnectionInfo,
  FetchHandler,
  ServeHandle,
  ServeOptions,
} from "./types.ts";

export class PayloadTooLargeError extends Error {
  constructor(maxBytes: number) {
    super(`Payload too large. Max ${maxBytes} bytes.`);
    this.name = "PayloadTooLargeError";
  }
}

/**
 * Get an environment variable.
 */
export function env(key: string): string | undefined {
  return process.env[key];
}

/**
 * Read a UTF-8 text file.
 * Returns null if the file does not exist.
 */
export async function readTextFile(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (
      err && typeof err === "object" && "code" in err && err.code === "ENOENT"
    ) {
      return null;
    }
    throw err;
  }
}

/**
 * Format a socket peer as `host:port`, bracketing IPv6 hosts.
 */
export function formatRemoteAddress(
  address: string | undefined,
  port: number | undefined,
): string {
  if (!address || port === undefined) return "";
  return isIPv6(address) ? `[${address}]:${port}` : `${address}:${port}`;
}

/**
 * Start an HTTP server with a fetch-style handler.
 */
export function serve(
  options: ServeOptions,
  handler: FetchHandler,
): ServeHandle {
  const hostname = options.hostname ?? "0.0.0.0";
  const maxBodyBytes = options.maxBodyBytes ?? null;

  const server = createServer(async (nodeReq, nodeRes) => {
    try {
      const contentLength = nodeReq.headers["content-length"];
      if (maxBodyBytes !== null && contentLength) {
        const length = Number(contentLength);
        if (!Number.isNaN(length) && length > maxBodyBytes) {
          nodeRes.writeHead(413, { connection: "close" });
          nodeRes.end(`Payload too large. Max ${maxBodyBytes} bytes.`);
          return;
        }
      }

      // Prefer Host header (correct behind reverse proxy) over bound hostname
      const host = nodeReq.headers.host ?? `${hostname}:${options.port}`;
      const url = `http://${host}${nodeReq.url ?? "/"}`;
      const headers = new Headers();
      for (const [key, value] of Object.entries(nodeReq.headers)) {
        if (value) {
          if (Array.isArray(value)) {
            for (const v of value) headers.append(key, v);
          } else {
            headers.set(key, value);
          }
        }
      }

      const body = nodeReq.method !== "GET" && nodeReq.method !== "HEAD"
        ? await collectBody(nodeReq, maxBodyBytes)
        : undefined;

      const request = new Request(url, {
        method: nodeReq.method ?? "GET",
        headers,
        body,
      });

      const response = await handler(request, {
        remoteAddress: formatRemoteAddress(
          nodeReq.socket.remoteAddress,
          nodeReq.socket.remotePort,
        ),
      });

      // Use raw header entries to preserve duplicate Set-Cookie headers
      const resHeaders: Record<string, string | string[]> = {};
      response.headers.forEach((value, key) => {
        const existing = resHeaders[key];
        if (existing !== undefined) {
          resHeaders[key] = Array.isArray(existing)
            ? [...existing, value]
            : [existing, value];
        } else {
          resHeaders[key] = value;
        }
      });
      if (nodeRes.headersSent) return;
      nodeRes.writeHead(response.status, resHeaders);

      if (response.body) {
        const reader = response.body.getReader();
        while (true) {
          const { done, value } = await reader.read();
          if (done) break;
          nodeRes.write(value);
        }
      }
      nodeRes.end();
    } catch (err) {
      if (err instanceof PayloadTooLargeError) {
        if (!nodeRes.headersSent) {
          nodeRes.writeHead(413, { connection: "close" });
          nodeRes.end(err.message);
        }
        return;
      }
      console.error("[runtime] Request handler error:", err);
      if (!nodeRes.headersSent) {
        nodeRes.writeHead(500, { connection: "close" });
        nodeRes.end("Internal Server Error");
      } else {
        nodeRes.destroy();
      }
    }
  });

  server.listen(options.port, hostname, () => {
    if (options.onListen) {
      options.onListen({ hostname, port: options.port });
    }
  });

  return {
    shutdown: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeIdleConnections();
      }),
  };
}

/**
 * Unref a timer so it doesn't block process exit.
 */
export function unrefTimer(timer: ReturnType<typeof setInterval>): void {
  timer.unref();
}

/** Compile-time check that this module satisfies RuntimePort */
void ({ env, readTextFile, serve, unrefTimer } satisfies RuntimePort);

// ─── Internal helpers ────────────────────────────────────

/**
 * Collect a request body into a fresh ArrayBuffer.
 *
 * Past `maxBytes` the promise rejects with PayloadTooLargeError, but the
 * stream keeps draining so the 413 can still be written on the socket.
 */
export function collectBody(
  req: Readable,
  maxBytes: number | null,
): Promise<ArrayBuffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    let rejected = false;
    req.on("data", (chunk: Buffer) => {
      if (rejected) return;
      total += chunk.length;
      if (maxBytes !== null && total > maxBytes) {
        rejected = true;
        chunks.length = 0;
        reject(new PayloadTooLargeError(maxBytes));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      if (!rejected) {
        const body = new ArrayBuffer(total);
        new Uint8Array(body).set(Buffer.concat(chunks));
        resolve(body);
      }
    });
    req.on("error", (err) => {
      if (!rejected) {
        reject(err);
      }
    });
  });
}
