/** A downstream call did not answer within its time budget. */
export class AgentTimeoutError extends Error {
  constructor(
    public readonly target: string,
    public readonly timeoutMs: number,
  ) {
    super(`Timeout waiting for agent "${target}" (${timeoutMs}ms)`);
    this.name = 'AgentTimeoutError';
  }
}

/** Network failure, or a non-2xx HTTP status from a downstream agent. */
export class AgentTransportError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'AgentTransportError';
  }
}
