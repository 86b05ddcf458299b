/** Static capability metadata advertised in the agent card. */
export interface AgentSkill {
  id: string;
  name: string;
  description: string;
  tags: string[];
  examples?: string[];
  inputModes?: string[];
  outputModes?: string[];
}

export interface AgentCapabilities {
  streaming: boolean;
  pushNotifications: boolean;
  stateTransitionHistory: boolean;
  [flag: string]: boolean;
}

export interface ApiKeySecurityScheme {
  type: 'apiKey';
  in: 'header';
  name: string;
}

export interface HttpSecurityScheme {
  type: 'http';
  scheme: 'bearer';
  bearerFormat?: string;
}

export type SecurityScheme = ApiKeySecurityScheme | HttpSecurityScheme;

/** Complete self-description of one agent, served at `/.well-known/agent.json`. */
export interface AgentCard {
  name: string;
  description: string;
  /** RPC endpoint URL. */
  url: string;
  version: string;
  defaultInputModes: string[];
  defaultOutputModes: string[];
  capabilities: AgentCapabilities;
  skills: AgentSkill[];
  documentationUrl?: string;
  securitySchemes?: Record<string, SecurityScheme>;
  /** Alternatives: any one entry satisfies the requirement. */
  security?: Array<Record<string, string[]>>;
}
