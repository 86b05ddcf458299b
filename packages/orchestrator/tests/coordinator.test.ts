import { describe, it, expect, vi } from 'vitest';
import type { JsonRpcResponse, Message, Task } from '@agent-mesh/core';
import { TaskState, createMessage, extractData, extractText, noopLogger, textPart } from '@agent-mesh/core';
import type { HandlerContext } from '@agent-mesh/agent-runtime';
import { HandlerError } from '@agent-mesh/agent-runtime';
import { createCoordinatorHandler, readStepReply } from '../src/coordinator.js';
import type { CoordinatorStep, DownstreamInvoker, InvokeOptions } from '../src/coordinator.js';

const STEPS: CoordinatorStep[] = [
  { id: 'patient', description: 'Checking patient information...', agent: 'patients', prompt: 'lookup patient in: {input}' },
  { id: 'doctors', description: 'Finding available doctors...', agent: 'roster', prompt: 'find doctors for: {input}' },
  { id: 'booking', description: 'Booking appointment...', agent: 'appointments', prompt: 'book appointment: {input}' },
];

const coordinatorTask: Task = {
  kind: 'task',
  id: 'coord-1',
  contextId: 'ctx-coord',
  status: { state: TaskState.WORKING, timestamp: '2026-01-01T00:00:00.000Z' },
  history: [],
};

function taskResponse(taskId: string, state: TaskState, text: string): JsonRpcResponse {
  return {
    jsonrpc: '2.0',
    id: `rpc-${taskId}`,
    result: {
      kind: 'task',
      id: taskId,
      contextId: 'ctx-downstream',
      status: {
        state,
        timestamp: '2026-01-01T00:00:00.000Z',
        message: { kind: 'message', role: 'agent', messageId: `${taskId}-reply`, parts: [{ kind: 'text', text }] },
      },
      history: [],
    },
  };
}

type Answer = (message: Message, options: InvokeOptions) => Promise<JsonRpcResponse>;

function fakeInvoker(answers: Record<string, Answer>) {
  const invoke = vi.fn<DownstreamInvoker['invoke']>(async (agent, message, options) => {
    const answer = answers[agent];
    if (!answer) throw new Error(`no fake for ${agent}`);
    return answer(message, options);
  });
  return { invoke };
}

function makeContext() {
  const progress = vi.fn(async (_text: string) => {});
  const ctx: HandlerContext = { logger: noopLogger, signal: new AbortController().signal, progress };
  return { ctx, progress };
}

const inbound = createMessage('user', [textPart('jane@example.com cardiology')]);

async function runFailing(handle: Promise<unknown>): Promise<HandlerError> {
  const err = await handle.then(
    () => new Error('expected the workflow to fail'),
    (e: unknown) => e,
  );
  if (!(err instanceof HandlerError)) throw err;
  return err;
}

describe('createCoordinatorHandler', () => {
  it('runs every step in order and aggregates the results', async () => {
    const invoker = fakeInvoker({
      patients: async () => taskResponse('t-p', TaskState.COMPLETED, 'Patient MR000001'),
      roster: async () => taskResponse('t-r', TaskState.COMPLETED, 'Dr. Sarah Johnson'),
      appointments: async () => taskResponse('t-a', TaskState.COMPLETED, 'Booked APT000001'),
    });
    const { ctx, progress } = makeContext();
    const handler = createCoordinatorHandler({ steps: STEPS, invoker });

    const result = await handler.handle(inbound, coordinatorTask, ctx);

    expect(invoker.invoke.mock.calls.map(([agent]) => agent)).toEqual(['patients', 'roster', 'appointments']);
    expect(invoker.invoke.mock.calls.map(([, message]) => extractText(message))).toEqual([
      'lookup patient in: jane@example.com cardiology',
      'find doctors for: jane@example.com cardiology',
      'book appointment: jane@example.com cardiology',
    ]);
    expect(progress.mock.calls.map(([text]) => text)).toEqual(STEPS.map((s) => s.description));

    expect(extractText(result)).toBe(
      'Workflow completed (3 steps)\npatient: Patient MR000001\ndoctors: Dr. Sarah Johnson\nbooking: Booked APT000001',
    );
    expect(extractData(result)).toEqual([
      {
        status: 'completed',
        workflowSteps: STEPS.map((s) => s.description),
        steps: [
          {
            id: 'patient',
            description: 'Checking patient information...',
            agent: 'patients',
            result: { taskId: 't-p', state: TaskState.COMPLETED, text: 'Patient MR000001', data: [] },
          },
          {
            id: 'doctors',
            description: 'Finding available doctors...',
            agent: 'roster',
            result: { taskId: 't-r', state: TaskState.COMPLETED, text: 'Dr. Sarah Johnson', data: [] },
          },
          {
            id: 'booking',
            description: 'Booking appointment...',
            agent: 'appointments',
            result: { taskId: 't-a', state: TaskState.COMPLETED, text: 'Booked APT000001', data: [] },
          },
        ],
      },
    ]);
  });

  it('carries the coordinator context to downstream calls', async () => {
    const invoker = fakeInvoker({
      patients: async () => taskResponse('t-p', TaskState.COMPLETED, 'ok'),
    });
    const handler = createCoordinatorHandler({ steps: STEPS.slice(0, 1), invoker });

    await handler.handle(inbound, coordinatorTask, makeContext().ctx);

    expect(invoker.invoke.mock.calls[0]?.[1].contextId).toBe('ctx-coord');
  });

  it('stops at an error envelope and never runs later steps', async () => {
    const invoker = fakeInvoker({
      patients: async () => taskResponse('t-p', TaskState.COMPLETED, 'Patient MR000001'),
      roster: async () => ({
        jsonrpc: '2.0',
        id: 'rpc-r',
        error: { code: -32601, message: 'Method not found' },
      }),
      appointments: async () => taskResponse('t-a', TaskState.COMPLETED, 'Booked'),
    });
    const handler = createCoordinatorHandler({ steps: STEPS, invoker });

    const err = await runFailing(handler.handle(inbound, coordinatorTask, makeContext().ctx));

    expect(invoker.invoke).toHaveBeenCalledTimes(2);
    expect(err.message).toBe('Workflow failed at step "doctors": Method not found (code -32601)');
    expect(err.parts).toEqual([
      {
        kind: 'data',
        data: {
          status: 'failed',
          workflowSteps: STEPS.map((s) => s.description),
          steps: [
            {
              id: 'patient',
              description: 'Checking patient information...',
              agent: 'patients',
              result: { taskId: 't-p', state: TaskState.COMPLETED, text: 'Patient MR000001', data: [] },
            },
          ],
          failedStep: {
            id: 'doctors',
            description: 'Finding available doctors...',
            error: 'Method not found (code -32601)',
          },
        },
      },
    ]);
  });

  it('treats a failed downstream task as a step failure', async () => {
    const invoker = fakeInvoker({
      patients: async () => taskResponse('t-p', TaskState.FAILED, 'Patient not found'),
    });
    const handler = createCoordinatorHandler({ steps: STEPS, invoker });

    const err = await runFailing(handler.handle(inbound, coordinatorTask, makeContext().ctx));

    expect(err.message).toBe('Workflow failed at step "patient": Agent task failed: Patient not found');
    expect(invoker.invoke).toHaveBeenCalledTimes(1);
  });

  it('treats a thrown transport error as a step failure', async () => {
    const invoker = fakeInvoker({
      patients: async () => {
        throw new Error('connect ECONNREFUSED');
      },
    });
    const handler = createCoordinatorHandler({ steps: STEPS, invoker });

    const err = await runFailing(handler.handle(inbound, coordinatorTask, makeContext().ctx));
    expect(err.message).toBe('Workflow failed at step "patient": connect ECONNREFUSED');
  });

  it('bounds each step by its own timeout and aborts the call', async () => {
    let seenSignal: AbortSignal | undefined;
    const invoker = fakeInvoker({
      patients: (_message, options) => {
        seenSignal = options.signal;
        return new Promise<JsonRpcResponse>(() => {});
      },
    });
    const steps: CoordinatorStep[] = [{ ...STEPS[0]!, timeoutMs: 20 }, STEPS[1]!];
    const handler = createCoordinatorHandler({ steps, invoker, defaultTimeoutMs: 60_000 });

    const err = await runFailing(handler.handle(inbound, coordinatorTask, makeContext().ctx));

    expect(err.message).toBe('Workflow failed at step "patient": Timeout waiting for agent "patients" (20ms)');
    expect(seenSignal?.aborted).toBe(true);
    expect(invoker.invoke).toHaveBeenCalledTimes(1);
    expect(invoker.invoke.mock.calls[0]?.[2].timeoutMs).toBe(20);
  });

  it('passes earlier results forward when asked', async () => {
    const invoker = fakeInvoker({
      patients: async () => taskResponse('t-p', TaskState.COMPLETED, 'Patient MR000001'),
      roster: async () => taskResponse('t-r', TaskState.COMPLETED, 'Dr. Sarah Johnson'),
    });
    const steps: CoordinatorStep[] = [STEPS[0]!, { ...STEPS[1]!, includePriorResults: true }];
    const handler = createCoordinatorHandler({ steps, invoker });

    await handler.handle(inbound, coordinatorTask, makeContext().ctx);

    const first = invoker.invoke.mock.calls[0]?.[1];
    const second = invoker.invoke.mock.calls[1]?.[1];
    expect(first && extractData(first)).toEqual([]);
    expect(second && extractData(second)).toEqual([
      { priorResults: [{ id: 'patient', agent: 'patients', text: 'Patient MR000001', data: [] }] },
    ]);
  });
});

describe('readStepReply', () => {
  it('accepts a bare message result as completed', () => {
    expect(
      readStepReply({ kind: 'message', role: 'agent', messageId: 'm', parts: [{ kind: 'data', data: { n: 1 } }] }),
    ).toEqual({ state: TaskState.COMPLETED, text: '', data: [{ n: 1 }] });
  });

  it('rejects an unknown task state', () => {
    expect(() =>
      readStepReply({ kind: 'task', id: 't', status: { state: 'paused', timestamp: 'x' } }),
    ).toThrow('Downstream task has unknown state "paused"');
  });
});
