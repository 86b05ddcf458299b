/** Free-form metadata attached to parts, messages and tasks. */
export type Metadata = Record<string, unknown>;

export interface TextPart {
  kind: 'text';
  text: string;
  metadata?: Metadata;
}

export interface DataPart {
  kind: 'data';
  data: Record<string, unknown>;
  metadata?: Metadata;
}

/** A single content unit of a message. */
export type Part = TextPart | DataPart;

export type MessageRole = 'user' | 'agent';

/** An immutable conversation turn. Identity is `messageId`. */
export interface Message {
  kind: 'message';
  role: MessageRole;
  parts: Part[];
  messageId: string;
  taskId?: string;
  contextId?: string;
  metadata?: Metadata;
}

/** Task lifecycle states. */
export enum TaskState {
  SUBMITTED = 'submitted',
  WORKING = 'working',
  INPUT_REQUIRED = 'input-required',
  COMPLETED = 'completed',
  CANCELED = 'canceled',
  FAILED = 'failed',
  REJECTED = 'rejected',
  AUTH_REQUIRED = 'auth-required',
  UNKNOWN = 'unknown',
}

/** States with no outgoing transitions. */
export const TERMINAL_TASK_STATES: ReadonlySet<TaskState> = new Set([
  TaskState.COMPLETED,
  TaskState.CANCELED,
  TaskState.FAILED,
  TaskState.REJECTED,
]);

export function isTerminalState(state: TaskState): boolean {
  return TERMINAL_TASK_STATES.has(state);
}

export interface TaskStatus {
  state: TaskState;
  message?: Message;
  /** RFC 3339 */
  timestamp: string;
}

export interface Artifact {
  artifactId: string;
  name?: string;
  description?: string;
  parts: Part[];
}

/**
 * Server-side record of one unit of requested work.
 * When `status.message` is set it is always the last entry of `history`.
 */
export interface Task {
  kind: 'task';
  id: string;
  contextId: string;
  status: TaskStatus;
  history: Message[];
  artifacts?: Artifact[];
  metadata?: Metadata;
}

/** Payload of one streamed progress event. */
export interface TaskStatusUpdateEvent {
  kind: 'status-update';
  taskId: string;
  contextId: string;
  status: TaskStatus;
  final: boolean;
}
