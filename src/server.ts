// © Copyright 2025-2026, Query.Farm LLC - https://query.farm
// SPDX-License-Identifier: Apache-2.0

import {
  createServer,
  STATUS_CODES,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "node:http";
import type { AddressInfo } from "node:net";
import type { Duplex } from "node:stream";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createStaticHandler } from "./http/handler.js";
import { withCharset, TEXT_CONTENT_TYPE } from "./http/common.js";
import { silentLogger, type Logger } from "./logging.js";
import type { ServerConfig, StaticHandler } from "./types.js";

/** Methods the fetch Request constructor refuses; they never reach the handler. */
const FORBIDDEN_METHODS = new Set(["CONNECT", "TRACE", "TRACK"]);

/** Parser error codes mapped to the status sent before the socket is closed. */
const CLIENT_ERROR_STATUS: Readonly<Record<string, number>> = {
  HPE_INVALID_VERSION: 505,
  HPE_HEADER_OVERFLOW: 431,
  ERR_HTTP_REQUEST_TIMEOUT: 408,
};

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export interface DebugStaticServerOptions {
  logger?: Logger;
}

/**
 * HTTP/1.1 front end for the static handler, built on node:http.
 *
 * Bounds simultaneous sockets with `maxConnections`, keeps idle connections for
 * `keepAliveTimeout`, and answers parser-level failures itself.
 */
export class DebugStaticServer {
  private readonly config: ServerConfig;
  private readonly logger: Logger;
  private readonly handler: StaticHandler;
  private readonly server: Server;

  constructor(config: ServerConfig, options?: DebugStaticServerOptions) {
    this.config = config;
    this.logger = options?.logger ?? silentLogger;
    this.handler = createStaticHandler(config, { logger: this.logger });

    // Node only checks request deadlines on this interval, 30 s unless narrowed.
    const checkInterval =
      config.requestTimeout > 0 ? Math.min(config.requestTimeout, 30_000) : undefined;
    const serverOptions = {
      requestTimeout: config.requestTimeout,
      connectionsCheckingInterval: checkInterval,
    };
    this.server = createServer(serverOptions, (req, res) => {
      this.handle(req, res).catch((err: unknown) => {
        this.logger.error(`Unhandled failure: ${String(err)}`);
        res.destroy();
      });
    });
    this.server.keepAliveTimeout = config.keepAliveTimeout;
    this.server.maxConnections = config.maxConnections;
    this.server.on("clientError", (err, socket) => this.rejectClient(err, socket));
  }

  /** Bind the configured host and port. Resolves with the bound address. */
  listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off("error", reject);
        const address = this.address();
        this.logger.info("Listening", {
          host: address.address,
          port: address.port,
          root: this.config.root,
        });
        resolve(address);
      });
    });
  }

  address(): AddressInfo {
    const address = this.server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server is not listening on a TCP port");
    }
    return address;
  }

  /** Stop accepting connections, drop idle keep-alive sockets, wait for in-flight responses. */
  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
      this.server.closeIdleConnections();
    });
  }

  private toRequest(req: IncomingMessage): Request | null {
    const target = req.url ?? "/";
    let url: URL;
    try {
      // Origin-form is joined rather than resolved so "//x" stays a path.
      url = target.startsWith("/") ? new URL("http://localhost" + target) : new URL(target);
    } catch {
      return null;
    }

    // rawHeaders keeps repeated fields and their casing; req.headers folds them.
    const headers = new Headers();
    const raw = req.rawHeaders;
    for (let i = 0; i + 1 < raw.length; i += 2) {
      headers.append(raw[i], raw[i + 1]);
    }

    // The request body is never read; node:http discards it once the response ends.
    return new Request(url.href, { method: req.method, headers });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? "GET";
    res.setHeader("Server", this.config.serverName);

    // The parser admits HTTP/2.0 request lines; only HTTP/1.x is spoken here.
    if (req.httpVersionMajor !== 1) {
      res.shouldKeepAlive = false;
      this.sendStatus(res, 505);
      return;
    }

    if (FORBIDDEN_METHODS.has(method)) {
      this.sendStatus(res, 405);
      return;
    }

    let request: Request | null;
    try {
      request = this.toRequest(req);
    } catch (err) {
      this.logger.debug(`Rejected request: ${String(err)}`, { method, url: req.url });
      request = null;
    }
    if (request === null) {
      this.sendStatus(res, 400);
      return;
    }

    const response = await this.handler(request);
    res.statusCode = response.status;
    response.headers.forEach((value, key) => {
      res.setHeader(key, value);
    });

    if (response.body === null || method === "HEAD") {
      await response.body?.cancel();
      res.end();
      return;
    }

    try {
      await pipeline(Readable.fromWeb(response.body), res);
    } catch (err) {
      const code = errorCode(err);
      if (code === "ERR_STREAM_PREMATURE_CLOSE") {
        this.logger.debug("Client went away mid-response", { method, url: req.url });
      } else {
        this.logger.error(`Response stream failed: ${String(err)}`, { method, url: req.url });
      }
    }
  }

  private sendStatus(res: ServerResponse, status: number): void {
    const body = `${status} ${STATUS_CODES[status] ?? "Error"}\n`;
    res.writeHead(status, {
      "Content-Type": withCharset(TEXT_CONTENT_TYPE, this.config.charset),
      "Content-Length": Buffer.byteLength(body),
    });
    res.end(body);
  }

  /** Answer a request the parser could not accept, then close the socket. */
  private rejectClient(err: Error, socket: Duplex): void {
    const code = errorCode(err);
    if (code === "ECONNRESET" || !socket.writable) {
      socket.destroy();
      return;
    }

    const status = (code !== undefined ? CLIENT_ERROR_STATUS[code] : undefined) ?? 400;
    this.logger.info(`Rejected malformed request: ${err.message}`, { code, status });

    const body = `${status} ${STATUS_CODES[status] ?? "Error"}\n`;
    socket.end(
      `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? "Error"}\r\n` +
        `Server: ${this.config.serverName}\r\n` +
        `Content-Type: ${withCharset(TEXT_CONTENT_TYPE, this.config.charset)}\r\n` +
        `Content-Length: ${Buffer.byteLength(body)}\r\n` +
        "Connection: close\r\n\r\n" +
        body,
    );
  }
}
