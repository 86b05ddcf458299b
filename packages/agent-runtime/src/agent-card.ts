import type {
  AgentCapabilities,
  AgentCard,
  AgentSkill,
  SecurityScheme,
} from '@agent-mesh/core';

/** Static identity an agent is configured with. */
export interface AgentIdentity {
  name: string;
  description: string;
  /** RPC endpoint URL advertised to callers. */
  url: string;
  version: string;
  skills: AgentSkill[];
  capabilities?: Partial<AgentCapabilities>;
  defaultInputModes?: string[];
  defaultOutputModes?: string[];
  documentationUrl?: string;
  securitySchemes?: Record<string, SecurityScheme>;
}

export const DEFAULT_MODES: readonly string[] = ['application/json', 'text/plain'];

const DEFAULT_CAPABILITIES: AgentCapabilities = {
  streaming: false,
  pushNotifications: false,
  stateTransitionHistory: false,
};

function buildSkill(skill: AgentSkill): AgentSkill {
  return {
    id: skill.id,
    name: skill.name,
    description: skill.description,
    tags: [...new Set(skill.tags)],
    ...(skill.examples ? { examples: [...skill.examples] } : {}),
    ...(skill.inputModes ? { inputModes: [...skill.inputModes] } : {}),
    ...(skill.outputModes ? { outputModes: [...skill.outputModes] } : {}),
  };
}

function buildCapabilities(declared: Partial<AgentCapabilities> = {}): AgentCapabilities {
  const capabilities: AgentCapabilities = { ...DEFAULT_CAPABILITIES };
  for (const [flag, enabled] of Object.entries(declared)) {
    if (typeof enabled === 'boolean') capabilities[flag] = enabled;
  }
  return capabilities;
}

/**
 * Build the agent card from static identity. Pure: no task state is read and
 * the key order is fixed, so equal identities serialize to identical bytes.
 */
export function buildAgentCard(identity: AgentIdentity): AgentCard {
  const card: AgentCard = {
    name: identity.name,
    description: identity.description,
    url: identity.url,
    version: identity.version,
    defaultInputModes: [...(identity.defaultInputModes ?? DEFAULT_MODES)],
    defaultOutputModes: [...(identity.defaultOutputModes ?? DEFAULT_MODES)],
    capabilities: buildCapabilities(identity.capabilities),
    skills: identity.skills.map(buildSkill),
  };

  if (identity.documentationUrl) {
    card.documentationUrl = identity.documentationUrl;
  }

  const schemes = identity.securitySchemes;
  if (schemes && Object.keys(schemes).length > 0) {
    card.securitySchemes = { ...schemes };
    card.security = Object.keys(schemes).map((name) => ({ [name]: [] }));
  }

  return card;
}
