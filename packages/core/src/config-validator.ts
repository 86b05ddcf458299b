import JSON5 from 'json5';
import { valid as validSemver } from 'semver';
import { readFileSync } from 'node:fs';
import type { MeshConfig } from './config.js';
import { isRecord } from './utils.js';

/** Sections that must exist at the top level of the config. */
const REQUIRED_SECTIONS = ['agents', 'taskStore', 'client'] as const;

/** All valid top-level keys (required + optional). */
const VALID_TOP_LEVEL_KEYS = new Set<string>([...REQUIRED_SECTIONS, 'logging']);

const REQUIRED_AGENT_STRINGS = ['id', 'name', 'description', 'version', 'handler'] as const;

const LOG_LEVELS = new Set(['debug', 'info', 'warn', 'error']);

const SECURITY_KEYS = new Set(['apiKeys', 'bearerTokens', 'headerName']);

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: MeshConfig;
}

/**
 * Parse and validate a JSON5 config string.
 * Rejects unknown top-level keys (strict mode).
 */
export function validateConfig(json5String: string): ConfigValidationResult {
  const errors: ConfigValidationError[] = [];

  let parsed: unknown;
  try {
    parsed = JSON5.parse(json5String);
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Invalid JSON5: ${String(err)}` }],
    };
  }

  if (!isRecord(parsed)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be an object' }],
    };
  }

  for (const key of Object.keys(parsed)) {
    if (!VALID_TOP_LEVEL_KEYS.has(key)) {
      errors.push({ path: key, message: `Unknown top-level key: "${key}"` });
    }
  }

  for (const section of REQUIRED_SECTIONS) {
    if (!(section in parsed)) {
      errors.push({ path: section, message: `Missing required section: "${section}"` });
    }
  }

  if ('agents' in parsed) {
    validateAgents(parsed['agents'], errors);
  }
  if ('taskStore' in parsed) {
    validatePositiveNumbers(parsed['taskStore'], 'taskStore', ['ttlMs', 'maxTasks'], errors);
  }
  if ('client' in parsed) {
    validatePositiveNumbers(parsed['client'], 'client', ['timeoutMs', 'cardCacheTtlMs'], errors);
  }
  if ('logging' in parsed) {
    const logging = parsed['logging'];
    if (!isRecord(logging) || typeof logging['level'] !== 'string' || !LOG_LEVELS.has(logging['level'])) {
      errors.push({ path: 'logging.level', message: 'Must be one of debug, info, warn, error' });
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    config: errors.length === 0 ? (parsed as unknown as MeshConfig) : undefined,
  };
}

/**
 * Load and validate a JSON5 config file from disk.
 */
export function loadConfig(filePath: string): ConfigValidationResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Cannot read config file: ${String(err)}` }],
    };
  }
  return validateConfig(content);
}

function validateAgents(value: unknown, errors: ConfigValidationError[]): void {
  if (!Array.isArray(value)) {
    errors.push({ path: 'agents', message: 'Section "agents" must be an array' });
    return;
  }

  const ids = new Set<string>();
  const ports = new Set<number>();

  value.forEach((agent: unknown, index) => {
    const path = `agents[${index}]`;
    if (!isRecord(agent)) {
      errors.push({ path, message: 'Agent entry must be an object' });
      return;
    }

    for (const field of REQUIRED_AGENT_STRINGS) {
      const v = agent[field];
      if (typeof v !== 'string' || v.length === 0) {
        errors.push({ path: `${path}.${field}`, message: `Missing required field: "${field}"` });
      }
    }

    const id = agent['id'];
    if (typeof id === 'string') {
      if (ids.has(id)) errors.push({ path: `${path}.id`, message: `Duplicate agent id: "${id}"` });
      ids.add(id);
    }

    const version = agent['version'];
    if (typeof version === 'string' && validSemver(version) === null) {
      errors.push({ path: `${path}.version`, message: `Not a valid semver version: "${version}"` });
    }

    const port = agent['port'];
    if (typeof port !== 'number' || !Number.isInteger(port) || port < 0 || port > 65535) {
      errors.push({ path: `${path}.port`, message: 'Port must be an integer between 0 and 65535' });
    } else if (port !== 0) {
      if (ports.has(port)) errors.push({ path: `${path}.port`, message: `Duplicate port: ${port}` });
      ports.add(port);
    }

    if (!Array.isArray(agent['skills'])) {
      errors.push({ path: `${path}.skills`, message: 'Skills must be an array' });
    }

    if (agent['handler'] === 'coordinator' && !Array.isArray(agent['pipeline'])) {
      errors.push({ path: `${path}.pipeline`, message: 'Coordinator agents require a pipeline' });
    }

    if ('security' in agent) {
      validateSecurity(agent['security'], `${path}.security`, errors);
    }
    if ('stages' in agent && !isStringArray(agent['stages'])) {
      errors.push({ path: `${path}.stages`, message: 'Stages must be an array of strings' });
    }
    const stageDelayMs = agent['stageDelayMs'];
    if (stageDelayMs !== undefined && (typeof stageDelayMs !== 'number' || !(stageDelayMs >= 0))) {
      errors.push({ path: `${path}.stageDelayMs`, message: 'Must be a non-negative number' });
    }
  });

  // Pipeline targets can reference any agent, so check once all ids are known.
  value.forEach((agent: unknown, index) => {
    if (!isRecord(agent) || !Array.isArray(agent['pipeline'])) return;
    agent['pipeline'].forEach((step: unknown, stepIndex) => {
      const path = `agents[${index}].pipeline[${stepIndex}]`;
      if (!isRecord(step)) {
        errors.push({ path, message: 'Pipeline step must be an object' });
        return;
      }
      for (const field of ['id', 'description', 'agent', 'prompt'] as const) {
        if (typeof step[field] !== 'string') {
          errors.push({ path: `${path}.${field}`, message: `Missing required field: "${field}"` });
        }
      }
      const target = step['agent'];
      if (typeof target === 'string' && !ids.has(target) && !/^https?:\/\//.test(target)) {
        errors.push({
          path: `${path}.agent`,
          message: `Unknown pipeline target: "${target}" (expected an agent id or http(s) URL)`,
        });
      } else if (typeof target === 'string' && target === agent['id']) {
        errors.push({ path: `${path}.agent`, message: `Pipeline step cannot target its own agent: "${target}"` });
      }
      const timeoutMs = step['timeoutMs'];
      if (timeoutMs !== undefined && (typeof timeoutMs !== 'number' || !(timeoutMs > 0))) {
        errors.push({ path: `${path}.timeoutMs`, message: 'Must be a positive number' });
      }
      if ('includePriorResults' in step && typeof step['includePriorResults'] !== 'boolean') {
        errors.push({ path: `${path}.includePriorResults`, message: 'Must be a boolean' });
      }
    });
  });
}

function validateSecurity(value: unknown, path: string, errors: ConfigValidationError[]): void {
  if (!isRecord(value)) {
    errors.push({ path, message: 'Security must be an object' });
    return;
  }
  for (const key of Object.keys(value)) {
    if (!SECURITY_KEYS.has(key)) {
      errors.push({ path: `${path}.${key}`, message: `Unknown security key: "${key}"` });
    }
  }
  for (const field of ['apiKeys', 'bearerTokens'] as const) {
    const list = value[field];
    if (list === undefined) continue;
    if (!isStringArray(list) || list.some((entry) => entry.length === 0)) {
      errors.push({ path: `${path}.${field}`, message: 'Must be an array of non-empty strings' });
    }
  }
  const headerName = value['headerName'];
  if (headerName !== undefined && (typeof headerName !== 'string' || headerName.length === 0)) {
    errors.push({ path: `${path}.headerName`, message: 'Must be a non-empty string' });
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

function validatePositiveNumbers(
  value: unknown,
  section: string,
  fields: string[],
  errors: ConfigValidationError[],
): void {
  if (!isRecord(value)) {
    errors.push({ path: section, message: `Section "${section}" must be an object` });
    return;
  }
  for (const field of fields) {
    const v = value[field];
    if (typeof v !== 'number' || !(v > 0)) {
      errors.push({ path: `${section}.${field}`, message: 'Must be a positive number' });
    }
  }
}
