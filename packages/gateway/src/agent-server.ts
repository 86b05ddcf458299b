import { createServer, type Server, type IncomingMessage, type ServerResponse } from 'node:http';
import type { JsonRpcResponse, Logger } from '@agent-mesh/core';
import { RpcErrorCode, describeError, noopLogger } from '@agent-mesh/core';
import type { AgentRuntime } from '@agent-mesh/agent-runtime';
import { encodeStreamEvent, errorResponse } from '@agent-mesh/agent-runtime';
import type { HealthStatus } from './types.js';

export const AGENT_CARD_PATH = '/.well-known/agent.json';
export const DEFAULT_RPC_PATH = '/a2a/v1';
const DEFAULT_MAX_BODY_BYTES = 1024 * 1024;

export interface AgentServerOptions {
  rpcPath?: string;
  /** Larger request bodies are answered with an internal-error envelope. */
  maxBodyBytes?: number;
  logger?: Logger;
}

/**
 * HTTP front for one `AgentRuntime`: serves the agent card, the JSON-RPC
 * endpoint (plain JSON or `text/event-stream`) and a health probe.
 */
export class AgentServer {
  private httpServer: Server | null = null;
  private startTime = Date.now();
  private readonly rpcPath: string;
  private readonly maxBodyBytes: number;
  private readonly logger: Logger;

  constructor(
    private readonly runtime: AgentRuntime,
    options: AgentServerOptions = {},
  ) {
    this.rpcPath = options.rpcPath ?? DEFAULT_RPC_PATH;
    this.maxBodyBytes = options.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES;
    this.logger = options.logger ?? noopLogger;
  }

  /** Listen and resolve with the bound port (useful with port 0). */
  async start(port: number, host = '127.0.0.1'): Promise<number> {
    if (this.httpServer) {
      throw new Error(`${this.runtime.name} is already listening`);
    }
    this.startTime = Date.now();

    const server = createServer((req, res) => {
      this.handleHttpRequest(req, res).catch((err: unknown) => {
        this.logger.error(`Unhandled error serving ${req.method ?? '?'} ${req.url ?? '/'}: ${describeError(err)}`);
        if (!res.headersSent) {
          res.writeHead(500);
        }
        res.end();
      });
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    this.httpServer = server;

    const address = server.address();
    const boundPort = typeof address === 'object' && address !== null ? address.port : port;
    this.logger.info(`${this.runtime.name} listening on http://${host}:${boundPort}${this.rpcPath}`);
    return boundPort;
  }

  get port(): number | null {
    const address = this.httpServer?.address();
    return typeof address === 'object' && address !== null ? address.port : null;
  }

  async close(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    this.httpServer = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      server.closeAllConnections();
    });
  }

  private async handleHttpRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;

    switch (path) {
      case AGENT_CARD_PATH:
        if (req.method !== 'GET') return this.methodNotAllowed(res, 'GET');
        return this.sendJson(res, 200, this.runtime.getAgentCard());

      case '/health': {
        if (req.method !== 'GET') return this.methodNotAllowed(res, 'GET');
        const status: HealthStatus = {
          status: 'ok',
          agent: this.runtime.name,
          tasks: this.runtime.tasks.size,
          uptime: Date.now() - this.startTime,
        };
        return this.sendJson(res, 200, status);
      }

      case this.rpcPath:
        if (req.method !== 'POST') return this.methodNotAllowed(res, 'POST');
        return this.handleRpc(req, res);

      default:
        res.writeHead(404);
        res.end();
    }
  }

  private async handleRpc(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await this.readBody(req);
    if (body === null) {
      this.logger.warn(`Rejected request body over ${this.maxBodyBytes} bytes`);
      return this.sendJson(
        res,
        200,
        errorResponse(null, RpcErrorCode.INTERNAL_ERROR, 'Internal error: request body too large'),
      );
    }

    const connection = new AbortController();
    res.once('close', () => {
      if (!res.writableFinished) connection.abort();
    });

    const outcome = await this.runtime.handle(body, {
      headers: req.headers,
      ...(req.socket.remoteAddress ? { remoteAddress: req.socket.remoteAddress } : {}),
      signal: connection.signal,
    });

    if (outcome.type === 'response') {
      return this.sendJson(res, 200, outcome.response);
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    for await (const event of outcome.events) {
      if (connection.signal.aborted) break;
      await this.writeEvent(res, event, connection.signal);
    }
    res.end();
  }

  /** Write one frame, waiting for `drain` when the socket buffer is full. */
  private async writeEvent(res: ServerResponse, event: JsonRpcResponse, signal: AbortSignal): Promise<void> {
    if (res.write(encodeStreamEvent(event)) || signal.aborted) return;
    await new Promise<void>((resolve) => {
      const done = (): void => {
        res.off('drain', done);
        signal.removeEventListener('abort', done);
        resolve();
      };
      res.once('drain', done);
      signal.addEventListener('abort', done, { once: true });
    });
  }

  /** Resolves with the body, or `null` once it exceeds `maxBodyBytes`. */
  private readBody(req: IncomingMessage): Promise<Buffer | null> {
    return new Promise((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let overflow = false;

      req.on('data', (chunk: Buffer) => {
        if (overflow) return;
        size += chunk.length;
        if (size > this.maxBodyBytes) {
          overflow = true;
          chunks.length = 0;
          return;
        }
        chunks.push(chunk);
      });
      req.on('end', () => resolve(overflow ? null : Buffer.concat(chunks)));
      req.on('error', reject);
    });
  }

  private sendJson(res: ServerResponse, statusCode: number, payload: unknown): void {
    res.writeHead(statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(payload));
  }

  private methodNotAllowed(res: ServerResponse, allow: string): void {
    res.writeHead(405, { Allow: allow });
    res.end();
  }
}
