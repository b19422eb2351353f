import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ServiceContainer } from '../services/index.js';
import type { Registries } from '../types/index.js';

export const SERVER_VERSION = '0.1.0';

/**
 * Tool definition for health check
 */
export const healthTool: Tool = {
  name: 'strategos_health',
  description: `Check the health status of the Strategos server.

Returns:
- Overall health status (healthy or unhealthy)
- Whether the planning registries load and validate
- Registry counts (templates, phase types, profiles)
- Version information

Use this for monitoring and for checking a custom STRATEGOS_CONFIG_DIR.`,

  inputSchema: {
    type: 'object',
    properties: {
      verbose: {
        type: 'boolean',
        description: 'Include registry counts',
        default: false,
      },
    },
  },
};

type HealthStatus = 'healthy' | 'unhealthy';

interface HealthResult {
  status: HealthStatus;
  timestamp: string;
  version: string;
  checks: {
    registries: {
      status: HealthStatus;
      message: string;
      latencyMs?: number;
    };
  };
  metrics?: {
    templates: number;
    domains: number;
    phaseTypes: number;
    profiles: number;
  };
}

/**
 * Handle health check request
 */
export async function handleHealth(
  args: Record<string, unknown>,
  container: ServiceContainer
): Promise<HealthResult> {
  const verbose = args['verbose'] === true;
  const start = Date.now();

  let registries: Registries | undefined;
  let check: HealthResult['checks']['registries'];
  try {
    registries = await container.getRegistries();
    const latencyMs = Date.now() - start;
    check = { status: 'healthy', message: 'Registries loaded', latencyMs };
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown registry error';
    check = { status: 'unhealthy', message: `Registry error: ${message}` };
  }

  const result: HealthResult = {
    status: check.status,
    timestamp: new Date().toISOString(),
    version: SERVER_VERSION,
    checks: { registries: check },
  };

  if (verbose && registries) {
    result.metrics = {
      templates: Object.keys(registries.phaseTemplates).length,
      domains: Object.keys(registries.domainIndex).length,
      phaseTypes: registries.phaseTypes.length,
      profiles: registries.profiles.length,
    };
  }

  return result;
}
