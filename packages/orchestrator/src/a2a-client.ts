import type {
  AgentCard,
  AgentSkill,
  JsonRpcRequest,
  JsonRpcResponse,
  Logger,
  Message,
  SecurityScheme,
} from '@agent-mesh/core';
import { RpcMethod, describeError, generateId, isRecord, noopLogger } from '@agent-mesh/core';
import { ProtocolError, StreamFrameDecoder, decodeResponse, encodeEnvelope } from '@agent-mesh/agent-runtime';
import { AgentTimeoutError, AgentTransportError } from './errors.js';

export const AGENT_CARD_PATH = '/.well-known/agent.json';
const DEFAULT_TIMEOUT_MS = 30_000;

export interface A2AClientOptions {
  /** Per-request budget unless overridden. Default: 30s. */
  timeoutMs?: number;
  /** Sent on every request (e.g. an API key header). */
  headers?: Record<string, string>;
  logger?: Logger;
}

interface HttpRequest {
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
}

export interface RequestOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Outbound side of the protocol: fetches agent cards and sends messages to
 * other agents over HTTP.
 */
export class A2AClient {
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;

  constructor(options: A2AClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.headers = options.headers ?? {};
    this.logger = options.logger ?? noopLogger;
  }

  async fetchAgentCard(baseUrl: string, options: RequestOptions = {}): Promise<AgentCard> {
    const url = `${baseUrl.replace(/\/+$/, '')}${AGENT_CARD_PATH}`;
    const body = await this.request(url, { method: 'GET' }, options);

    let parsed: unknown;
    try {
      parsed = JSON.parse(body);
    } catch {
      throw new ProtocolError(`Agent card at ${url} is not valid JSON`);
    }
    return parseAgentCard(parsed, url);
  }

  /** One `message/send` round trip. Error envelopes are returned, not thrown. */
  async sendMessage(rpcUrl: string, message: Message, options: RequestOptions = {}): Promise<JsonRpcResponse> {
    const request = this.buildRequest(RpcMethod.SEND, message);
    this.logger.debug(`→ ${rpcUrl} ${request.method} (id=${request.id})`);

    const body = await this.request(
      rpcUrl,
      { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: encodeEnvelope(request) },
      options,
    );
    return decodeResponse(body);
  }

  /**
   * `message/stream`: yields each decoded event envelope as it arrives. A
   * plain JSON answer (an error envelope) is yielded as the only item.
   */
  async *streamMessage(
    rpcUrl: string,
    message: Message,
    options: { signal?: AbortSignal } = {},
  ): AsyncGenerator<JsonRpcResponse, void, undefined> {
    const request = this.buildRequest(RpcMethod.STREAM, message);
    this.logger.debug(`→ ${rpcUrl} ${request.method} (id=${request.id})`);

    let res: Response;
    try {
      res = await fetch(rpcUrl, {
        method: 'POST',
        headers: { ...this.headers, 'Content-Type': 'application/json', Accept: 'text/event-stream' },
        body: encodeEnvelope(request),
        ...(options.signal ? { signal: options.signal } : {}),
      });
    } catch (err) {
      throw new AgentTransportError(`Failed to reach ${rpcUrl}: ${describeError(err)}`);
    }

    if (!res.ok) {
      throw new AgentTransportError(`${rpcUrl} answered HTTP ${res.status}`, res.status);
    }

    const contentType = res.headers.get('content-type') ?? '';
    if (!contentType.startsWith('text/event-stream') || !res.body) {
      yield decodeResponse(await res.text());
      return;
    }

    const frames = new StreamFrameDecoder();
    const decoder = new TextDecoder();
    try {
      for await (const chunk of res.body) {
        for (const payload of frames.push(decoder.decode(chunk, { stream: true }))) {
          yield decodeResponse(payload);
        }
      }
    } catch (err) {
      if (err instanceof ProtocolError) throw err;
      throw new AgentTransportError(`Stream from ${rpcUrl} broke: ${describeError(err)}`);
    }

    if (frames.pending.trim().length > 0) {
      throw new ProtocolError(`Stream from ${rpcUrl} ended mid-frame`);
    }
  }

  private buildRequest(method: string, message: Message): JsonRpcRequest {
    return { jsonrpc: '2.0', id: generateId(), method, params: { message } };
  }

  /** Fetch `url` and return the body text, bounded by the request timeout. */
  private async request(url: string, init: HttpRequest, options: RequestOptions): Promise<string> {
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const timeout = AbortSignal.timeout(timeoutMs);
    const signal = options.signal ? AbortSignal.any([timeout, options.signal]) : timeout;

    try {
      const res = await fetch(url, {
        ...init,
        headers: { ...this.headers, ...init.headers },
        signal,
      });
      if (!res.ok) {
        throw new AgentTransportError(`${url} answered HTTP ${res.status}`, res.status);
      }
      return await res.text();
    } catch (err) {
      if (err instanceof AgentTransportError) throw err;
      if (timeout.aborted) throw new AgentTimeoutError(url, timeoutMs);
      throw new AgentTransportError(`Failed to reach ${url}: ${describeError(err)}`);
    }
  }
}

function requireString(value: Record<string, unknown>, key: string, url: string): string {
  const v = value[key];
  if (typeof v !== 'string') {
    throw new ProtocolError(`Agent card at ${url} has no "${key}"`);
  }
  return v;
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function parseSkill(value: unknown): AgentSkill | null {
  if (!isRecord(value)) return null;
  const { id, name, description } = value;
  if (typeof id !== 'string' || typeof name !== 'string' || typeof description !== 'string') return null;
  return { id, name, description, tags: stringArray(value['tags']) };
}

function parseSecurityScheme(value: unknown): SecurityScheme | null {
  if (!isRecord(value)) return null;
  if (value['type'] === 'apiKey' && value['in'] === 'header' && typeof value['name'] === 'string') {
    return { type: 'apiKey', in: 'header', name: value['name'] };
  }
  if (value['type'] === 'http' && value['scheme'] === 'bearer') {
    return typeof value['bearerFormat'] === 'string'
      ? { type: 'http', scheme: 'bearer', bearerFormat: value['bearerFormat'] }
      : { type: 'http', scheme: 'bearer' };
  }
  return null;
}

/** Validate the fields callers rely on; other card fields pass through as declared. */
export function parseAgentCard(value: unknown, url: string): AgentCard {
  if (!isRecord(value)) {
    throw new ProtocolError(`Agent card at ${url} is not an object`);
  }

  const capabilities = isRecord(value['capabilities']) ? value['capabilities'] : {};
  const flag = (key: string): boolean => capabilities[key] === true;

  const card: AgentCard = {
    name: requireString(value, 'name', url),
    description: typeof value['description'] === 'string' ? value['description'] : '',
    url: requireString(value, 'url', url),
    version: requireString(value, 'version', url),
    defaultInputModes: stringArray(value['defaultInputModes']),
    defaultOutputModes: stringArray(value['defaultOutputModes']),
    capabilities: {
      streaming: flag('streaming'),
      pushNotifications: flag('pushNotifications'),
      stateTransitionHistory: flag('stateTransitionHistory'),
    },
    skills: Array.isArray(value['skills'])
      ? value['skills'].map(parseSkill).filter((s): s is AgentSkill => s !== null)
      : [],
  };
  if (typeof value['documentationUrl'] === 'string') {
    card.documentationUrl = value['documentationUrl'];
  }
  if (isRecord(value['securitySchemes'])) {
    const schemes: Record<string, SecurityScheme> = {};
    for (const [name, raw] of Object.entries(value['securitySchemes'])) {
      const scheme = parseSecurityScheme(raw);
      if (scheme) schemes[name] = scheme;
    }
    card.securitySchemes = schemes;
  }
  return card;
}
