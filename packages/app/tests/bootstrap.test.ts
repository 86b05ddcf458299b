import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { AgentEntry, JsonRpcResponse } from '@agent-mesh/core';
import { TaskState, createMessage, isErrorResponse, textPart } from '@agent-mesh/core';
import { A2AClient, readStepReply } from '@agent-mesh/orchestrator';
import type { StepReply } from '@agent-mesh/orchestrator';
import { bootstrap } from '../src/bootstrap.js';
import type { AppServer } from '../src/bootstrap.js';
import { cleanupTempDir, createTempDir, createTestLogger, testAgents, writeTestConfig } from './helpers/fixtures.js';

const user = (text: string) => createMessage('user', [textPart(text)]);

function replyOf(response: JsonRpcResponse): StepReply {
  if (isErrorResponse(response)) {
    throw new Error(`unexpected error envelope: ${response.error.message}`);
  }
  return readStepReply(response.result);
}

describe('bootstrap', () => {
  let dir: string;
  let app: AppServer | null = null;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await app?.shutdown();
    app = null;
    await cleanupTempDir(dir);
  });

  async function start(agents?: AgentEntry[], extra?: Record<string, unknown>, env: Record<string, string> = {}) {
    const configPath = await writeTestConfig(dir, { ...(agents ? { agents } : {}), ...(extra ? { extra } : {}) });
    app = await bootstrap({ configPath, logger: createTestLogger(), env });
    return app;
  }

  function rpcUrl(server: AppServer, id: string): string {
    const wired = server.agents.get(id);
    if (!wired) throw new Error(`agent ${id} not wired`);
    return `${wired.baseUrl}/a2a/v1`;
  }

  it('wires every configured agent on its own port', async () => {
    const server = await start();

    expect([...server.agents.keys()]).toEqual([
      'patient-registry',
      'physician-roster',
      'appointment-book',
      'medical-analysis',
      'care-coordinator',
    ]);
    const ports = new Set([...server.agents.values()].map((a) => a.port));
    expect(ports.size).toBe(5);

    const coordinator = server.agents.get('care-coordinator');
    const card = await new A2AClient().fetchAgentCard(coordinator?.baseUrl ?? '');
    expect(card.url).toBe(`${coordinator?.baseUrl}/a2a/v1`);
    expect(card.capabilities.streaming).toBe(false);
  });

  it('runs the coordinator workflow across the domain agents', async () => {
    const server = await start();
    const client = new A2AClient();

    const registered = replyOf(
      await client.sendMessage(
        rpcUrl(server, 'patient-registry'),
        user('register name: Jane Doe, email: jane@example.com, phone: 555-0100'),
      ),
    );
    expect(registered.text).toBe('Patient registered successfully!');

    const reply = replyOf(
      await client.sendMessage(rpcUrl(server, 'care-coordinator'), user('jane@example.com cardiology')),
    );

    expect(reply.state).toBe(TaskState.COMPLETED);
    expect(reply.text).toBe(
      [
        'Workflow completed (3 steps)',
        'patient: Patient found!',
        'physicians: Found 1 physicians matching your criteria:',
        'Dr. Sarah Johnson (Cardiology)',
        'booking: Appointment APT000001 booked successfully!',
      ].join('\n'),
    );
    expect(reply.data[0]).toMatchObject({
      status: 'completed',
      workflowSteps: ['Checking patient information...', 'Finding available doctors...', 'Booking appointment...'],
    });
    expect(server.agents.get('appointment-book')?.runtime.tasks.size).toBe(1);
  });

  it('stops the workflow at the first failing step', async () => {
    const server = await start();

    const reply = replyOf(
      await new A2AClient().sendMessage(rpcUrl(server, 'care-coordinator'), user('ghost@example.com cardiology')),
    );

    expect(reply.state).toBe(TaskState.FAILED);
    expect(reply.text).toBe(
      'Workflow failed at step "patient": Agent task failed: Patient not found in our records.',
    );
    expect(reply.data[0]).toMatchObject({
      status: 'failed',
      steps: [],
      failedStep: { id: 'patient', description: 'Checking patient information...' },
    });
    expect(server.agents.get('physician-roster')?.runtime.tasks.size).toBe(0);
    expect(server.agents.get('appointment-book')?.runtime.tasks.size).toBe(0);
  });

  it('streams the staged analysis', async () => {
    const server = await start();

    const events: JsonRpcResponse[] = [];
    for await (const event of new A2AClient().streamMessage(
      rpcUrl(server, 'medical-analysis'),
      user('patient reports shortness of breath'),
    )) {
      events.push(event);
    }

    expect(events).toHaveLength(7);
    expect(events[6]).toMatchObject({
      result: {
        status: { state: 'completed', message: { parts: [{ text: 'Analysis complete. Risk level: high.' }] } },
        final: true,
      },
    });
  });

  it('guards agents configured with credentials', async () => {
    const [registry, ...rest] = testAgents();
    const guarded: AgentEntry = { ...registry!, security: { apiKeys: ['test-key'] } };
    const server = await start([guarded, ...rest], {
      client: { timeoutMs: 5_000, cardCacheTtlMs: 60_000, apiKey: 'test-key' },
    });
    const url = rpcUrl(server, 'patient-registry');

    const card = await new A2AClient().fetchAgentCard(server.agents.get('patient-registry')?.baseUrl ?? '');
    expect(card.securitySchemes).toEqual({ apiKey: { type: 'apiKey', in: 'header', name: 'X-API-Key' } });

    const anonymous = await new A2AClient().sendMessage(url, user('lookup jane@example.com'));
    expect(anonymous).toMatchObject({ error: { code: -32001, message: 'Authentication required' } });

    // The coordinator's outbound client carries the configured key.
    const reply = replyOf(
      await new A2AClient().sendMessage(rpcUrl(server, 'care-coordinator'), user('ghost@example.com')),
    );
    expect(reply.text).toBe(
      'Workflow failed at step "patient": Agent task failed: Patient not found in our records.',
    );
  });

  it('applies environment overrides without leaking entry variables into the config', async () => {
    const server = await start(undefined, undefined, {
      AGENT_MESH_AGENTS__0__NAME: 'Registry East',
      AGENT_MESH_CONFIG: '/elsewhere/default.json5',
      AGENT_MESH_LOG_LEVEL: 'debug',
    });

    expect(server.config.agents[0]?.name).toBe('Registry East');
    expect(Object.keys(server.config).sort()).toEqual(['agents', 'client', 'taskStore']);
    const card = await new A2AClient().fetchAgentCard(server.agents.get('patient-registry')?.baseUrl ?? '');
    expect(card.name).toBe('Registry East');
  });

  it('rejects invalid configuration', async () => {
    const [registry] = testAgents();
    const configPath = await writeTestConfig(dir, { agents: [{ ...registry!, version: 'one' }] });

    await expect(bootstrap({ configPath, logger: createTestLogger(), env: {} })).rejects.toThrow(
      'Invalid configuration: agents[0].version: Not a valid semver version: "one"',
    );
  });

  it('rejects overrides that break the configuration', async () => {
    const configPath = await writeTestConfig(dir);

    await expect(
      bootstrap({ configPath, logger: createTestLogger(), env: { AGENT_MESH_CLIENT__TIMEOUTMS: '-1' } }),
    ).rejects.toThrow(
      'Invalid configuration after environment overrides: client.timeoutMs: Must be a positive number',
    );
  });

  it('keeps running when one agent cannot be wired', async () => {
    const logger = { ...createTestLogger(), error: vi.fn() };
    const [registry] = testAgents();
    const configPath = await writeTestConfig(dir, {
      agents: [registry!, { ...registry!, id: 'triage-desk', handler: 'triage' }],
    });

    app = await bootstrap({ configPath, logger, env: {} });

    expect([...app.agents.keys()]).toEqual(['patient-registry']);
    expect(logger.error).toHaveBeenCalledWith(
      'Failed to wire agent "triage-desk": Unknown handler "triage" (known: patient-registry, physician-roster, appointment-book, medical-analysis, coordinator)',
    );
  });

  it('shuts down idempotently and stops serving', async () => {
    const server = await start();
    const baseUrl = server.agents.get('patient-registry')?.baseUrl ?? '';

    await server.shutdown();
    await server.shutdown();
    app = null;

    await expect(new A2AClient().fetchAgentCard(baseUrl)).rejects.toThrow();
  });
});
