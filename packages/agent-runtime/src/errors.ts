import type { Part, RpcErrorCodeValue } from '@agent-mesh/core';
import { RpcErrorCode } from '@agent-mesh/core';

/**
 * Envelope-level failure. Raised before any Task exists and rendered as a
 * JSON-RPC `error` object.
 */
export class RpcError extends Error {
  constructor(
    public readonly code: RpcErrorCodeValue,
    message: string,
    public readonly data?: unknown,
  ) {
    super(message);
    this.name = 'RpcError';
  }
}

export class MethodNotFoundError extends RpcError {
  constructor(method: string) {
    super(RpcErrorCode.METHOD_NOT_FOUND, 'Method not found', { method });
    this.name = 'MethodNotFoundError';
  }
}

export class InvalidParamsError extends RpcError {
  constructor(detail: string) {
    super(RpcErrorCode.INVALID_PARAMS, `Invalid params: ${detail}`);
    this.name = 'InvalidParamsError';
  }
}

/** Thrown by a request interceptor to reject unauthenticated callers. */
export class AuthenticationRequiredError extends RpcError {
  constructor(message = 'Authentication required', data?: unknown) {
    super(RpcErrorCode.AUTHENTICATION_REQUIRED, message, data);
    this.name = 'AuthenticationRequiredError';
  }
}

/** Thrown when an invalid task state transition is attempted. */
export class InvalidTaskTransitionError extends Error {
  constructor(
    public readonly taskId: string,
    public readonly from: string,
    public readonly to: string,
  ) {
    super(`Invalid task transition for ${taskId}: ${from} → ${to}`);
    this.name = 'InvalidTaskTransitionError';
  }
}

/** Thrown when a task id is not in the store. */
export class TaskNotFoundError extends Error {
  constructor(public readonly taskId: string) {
    super(`Task not found: ${taskId}`);
    this.name = 'TaskNotFoundError';
  }
}

/**
 * Domain failure raised by a capability handler. The extra `parts` travel
 * in the failed task's reply message after the description text.
 */
export class HandlerError extends Error {
  constructor(
    message: string,
    public readonly parts: Part[] = [],
  ) {
    super(message);
    this.name = 'HandlerError';
  }
}

/** Thrown when a wire payload does not match the envelope shape. */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProtocolError';
  }
}
