// Missing or malformed Action environment. Raised before any API call.
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface GraphqlRequest {
  query: string;
  variables: Record<string, unknown>;
}

// The request never got a successful HTTP response (network failure or non-2xx status).
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly request: GraphqlRequest,
    public readonly status?: number,
    public readonly response?: unknown
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

// The API answered but reported GraphQL errors; message is the first one, verbatim.
export class QueryError extends Error {
  constructor(
    message: string,
    public readonly request: GraphqlRequest,
    public readonly response?: unknown
  ) {
    super(message);
    this.name = 'QueryError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
