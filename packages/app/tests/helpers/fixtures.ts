import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import type { AgentEntry, Logger, Task } from '@agent-mesh/core';
import { TaskState } from '@agent-mesh/core';

/** Create a temp directory for test data. */
export async function createTempDir(prefix = 'agent-mesh-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/** Clean up a temp directory. */
export async function cleanupTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Create a silent logger for tests. */
export function createTestLogger(): Logger {
  return {
    info: () => {},
    warn: () => {},
    error: () => {},
    debug: () => {},
  };
}

export function workingTask(id = 'task-1'): Task {
  return {
    kind: 'task',
    id,
    contextId: 'ctx-1',
    status: { state: TaskState.WORKING, timestamp: '2026-03-02T08:00:00.000Z' },
    history: [],
  };
}

export const TEST_ROSTER = [
  { id: 'PHY001', name: 'Dr. Sarah Johnson', specialty: 'Cardiology', department: 'Heart Center' },
  { id: 'PHY002', name: 'Dr. Michael Chen', specialty: 'Dermatology', department: 'Skin Care' },
];

function agent(id: string, handler: string, extra: Partial<AgentEntry> = {}): AgentEntry {
  return {
    id,
    name: id,
    description: `${id} for tests`,
    version: '1.0.0',
    handler,
    port: 0,
    skills: [],
    ...extra,
  };
}

/** The reference mesh, every agent on an ephemeral port. */
export function testAgents(): AgentEntry[] {
  return [
    agent('patient-registry', 'patient-registry'),
    agent('physician-roster', 'physician-roster'),
    agent('appointment-book', 'appointment-book'),
    agent('medical-analysis', 'medical-analysis', { streaming: true, stageDelayMs: 0 }),
    agent('care-coordinator', 'coordinator', {
      pipeline: [
        { id: 'patient', description: 'Checking patient information...', agent: 'patient-registry', prompt: 'lookup patient in: {input}' },
        { id: 'physicians', description: 'Finding available doctors...', agent: 'physician-roster', prompt: 'find doctors for: {input}' },
        {
          id: 'booking',
          description: 'Booking appointment...',
          agent: 'appointment-book',
          prompt: 'book appointment: {input}',
          includePriorResults: true,
        },
      ],
    }),
  ];
}

/** Write `default.json5` and `roster.json` into `dir`; returns the config path. */
export async function writeTestConfig(
  dir: string,
  overrides: { agents?: AgentEntry[]; extra?: Record<string, unknown> } = {},
): Promise<string> {
  const config = {
    agents: overrides.agents ?? testAgents(),
    taskStore: { ttlMs: 60_000, maxTasks: 100 },
    client: { timeoutMs: 5_000, cardCacheTtlMs: 60_000 },
    ...overrides.extra,
  };
  const configPath = path.join(dir, 'default.json5');
  await fs.writeFile(configPath, JSON.stringify(config, null, 2), 'utf-8');
  await fs.writeFile(path.join(dir, 'roster.json'), JSON.stringify(TEST_ROSTER), 'utf-8');
  return configPath;
}
