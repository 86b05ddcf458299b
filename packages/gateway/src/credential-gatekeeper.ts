import type { SecurityScheme } from '@agent-mesh/core';
import type { RequestInterceptor } from '@agent-mesh/agent-runtime';
import { AuthenticationRequiredError } from '@agent-mesh/agent-runtime';

export const DEFAULT_API_KEY_HEADER = 'X-API-Key';

export interface CredentialOptions {
  apiKeys?: readonly string[];
  bearerTokens?: readonly string[];
  /** Header carrying the API key. Default: `X-API-Key`. */
  headerName?: string;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Interceptor that admits a request carrying a configured API key or
 * `Authorization: Bearer` token, and rejects it with `-32001` otherwise.
 */
export function createCredentialGatekeeper(options: CredentialOptions): RequestInterceptor {
  const apiKeys = new Set(options.apiKeys ?? []);
  const bearerTokens = new Set(options.bearerTokens ?? []);
  const headerName = (options.headerName ?? DEFAULT_API_KEY_HEADER).toLowerCase();
  const requiredAuth = Object.keys(securitySchemesFor(options));

  return ({ transport }) => {
    const apiKey = headerValue(transport.headers[headerName]);
    if (apiKey !== undefined && apiKeys.has(apiKey)) return;

    const authorization = headerValue(transport.headers['authorization']);
    const match = authorization?.match(/^Bearer\s+(.+)$/i);
    if (match?.[1] !== undefined && bearerTokens.has(match[1].trim())) return;

    throw new AuthenticationRequiredError(
      apiKey !== undefined || authorization !== undefined
        ? 'Authentication required: invalid credentials'
        : 'Authentication required',
      { required_auth: requiredAuth },
    );
  };
}

/** Card `securitySchemes` matching what the gatekeeper accepts. */
export function securitySchemesFor(options: CredentialOptions): Record<string, SecurityScheme> {
  const schemes: Record<string, SecurityScheme> = {};
  if (options.apiKeys && options.apiKeys.length > 0) {
    schemes['apiKey'] = { type: 'apiKey', in: 'header', name: options.headerName ?? DEFAULT_API_KEY_HEADER };
  }
  if (options.bearerTokens && options.bearerTokens.length > 0) {
    schemes['bearer'] = { type: 'http', scheme: 'bearer' };
  }
  return schemes;
}
