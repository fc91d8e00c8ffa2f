import { TimeoutError, describeError, isCancellation } from '../core/errors';

/**
 * One entry of a flag snapshot: a flag's value under a label
 *
 * An entry without a label applies to every environment; a labelled entry
 * applies only to the environment of that name and wins over the unlabelled one.
 */
export interface FlagSnapshotEntry {
  name: string;
  label: string | null;
  enabled: boolean;
}

export interface FlagSnapshotSource {
  readonly description: string;
  fetchSnapshot(environment: string, signal: AbortSignal): Promise<FlagSnapshotEntry[]>;
}

export type FlagSourceFailure =
  | 'invalid-endpoint'
  | 'auth'
  | 'timeout'
  | 'network'
  | 'http-status'
  | 'malformed-snapshot'
  | 'unknown';

export class FlagSourceError extends Error {
  readonly category: FlagSourceFailure;

  constructor(category: FlagSourceFailure, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'FlagSourceError';
    this.category = category;
  }
}

export function classifyFlagSourceError(error: unknown): FlagSourceFailure {
  if (error instanceof FlagSourceError) {
    return error.category;
  }
  if (error instanceof TimeoutError || isCancellation(error)) {
    return 'timeout';
  }
  // fetch reports DNS failures, refused connections and resets as TypeError
  if (error instanceof TypeError) {
    return 'network';
  }
  return 'unknown';
}

export interface HttpFlagSnapshotSourceOptions {
  endpoint: string;
  /** Bearer credential, when the flag service wants one */
  token?: string;
  fetchImpl?: typeof fetch;
}

/**
 * Pulls `GET {endpoint}/feature-flags?label={environment}`
 *
 * The body must be a JSON array of `{ name, label, enabled }`.
 */
export class HttpFlagSnapshotSource implements FlagSnapshotSource {
  private readonly url: URL;
  private readonly token?: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpFlagSnapshotSourceOptions) {
    this.url = parseEndpoint(options.endpoint);
    this.token = options.token;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get description(): string {
    return this.url.origin;
  }

  async fetchSnapshot(environment: string, signal: AbortSignal): Promise<FlagSnapshotEntry[]> {
    const url = new URL(this.url);
    url.searchParams.set('label', environment);

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const response = await this.fetchImpl(url.toString(), { method: 'GET', headers, signal });

    if (response.status === 401 || response.status === 403) {
      throw new FlagSourceError('auth', `Flag source rejected credentials: HTTP ${response.status}`);
    }
    if (!response.ok) {
      throw new FlagSourceError('http-status', `Flag source answered HTTP ${response.status} ${response.statusText}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new FlagSourceError('malformed-snapshot', `Flag snapshot is not JSON: ${describeError(error)}`, error);
    }

    return parseSnapshot(body);
  }
}

export function parseSnapshot(body: unknown): FlagSnapshotEntry[] {
  if (!Array.isArray(body)) {
    throw new FlagSourceError('malformed-snapshot', 'Flag snapshot must be an array');
  }

  return body.map((entry: unknown, index) => {
    if (
      typeof entry !== 'object' ||
      entry === null ||
      !('name' in entry) ||
      !('enabled' in entry) ||
      typeof entry.name !== 'string' ||
      typeof entry.enabled !== 'boolean'
    ) {
      throw new FlagSourceError('malformed-snapshot', `Flag snapshot entry ${index} is malformed`);
    }

    const label = 'label' in entry && typeof entry.label === 'string' && entry.label.length > 0 ? entry.label : null;
    return { name: entry.name, label, enabled: entry.enabled };
  });
}

function parseEndpoint(endpoint: string): URL {
  let base: URL;
  try {
    base = new URL(endpoint);
  } catch (error) {
    throw new FlagSourceError('invalid-endpoint', `Flag source endpoint is not a URL: ${endpoint}`, error);
  }
  if (base.protocol !== 'http:' && base.protocol !== 'https:') {
    throw new FlagSourceError('invalid-endpoint', `Flag source endpoint must be http(s): ${endpoint}`);
  }

  const path = base.pathname.endsWith('/') ? base.pathname : `${base.pathname}/`;
  return new URL(`${path}feature-flags`, base);
}
