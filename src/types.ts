/**
 * HTTP response bodies shared by the API service and the web gateway
 */

import type { CircuitBreakerSnapshot } from './core/circuit-breaker';

export interface ErrorResponse {
  error: string;
  // Set by the gateway when it is answering without the API behind it
  degraded?: boolean;
}

export interface VersionResponse {
  version: string;
  commitSha: string;
  service: string;
  environment: string;
  timestamp: string;
}

export interface HealthResponse {
  status: 'healthy';
}

export interface DetailedHealthResponse extends HealthResponse {
  service: string;
  version: string;
  commitSha: string;
  environment: string;
  uptimeSeconds: number;
  timestamp: string;
  featureFlags: {
    backing: 'remote' | 'local';
    values: Record<string, boolean>;
  };
  cache: {
    pendingWrites: number;
  };
}

export interface GatewayHealthResponse extends HealthResponse {
  weatherService: {
    url: string;
    circuit: CircuitBreakerSnapshot;
  };
}

/** Who is answering, as reported by /version and /health/detailed */
export interface ServiceInfo {
  name: string;
  version: string;
  commitSha: string;
  environment: string;
}
