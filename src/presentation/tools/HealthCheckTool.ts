import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AgentTurnService } from '../../application/services/AgentTurnService.js';
import type { DatabaseConnection } from '../../infrastructure/database/DatabaseConnection.js';
import type { CortexApiClient } from '../../infrastructure/http/CortexApiClient.js';
import type { TokenProvider } from '../../infrastructure/http/TokenProvider.js';

type ComponentStatus = 'healthy' | 'error' | 'unknown';

interface ComponentHealth {
  status: ComponentStatus;
  message: string;
  [detail: string]: unknown;
}

export interface HealthReport {
  timestamp: string;
  status: 'healthy' | 'degraded';
  components: {
    database: ComponentHealth;
    credentials: ComponentHealth;
    agent: ComponentHealth;
    circuitBreaker: {
      state: ReturnType<CortexApiClient['getCircuitBreakerState']>;
      stats: ReturnType<CortexApiClient['getCircuitBreakerStats']>;
    };
  };
}

export interface HealthDependencies {
  client: Pick<CortexApiClient, 'getCircuitBreakerState' | 'getCircuitBreakerStats'>;
  tokens: Pick<TokenProvider, 'hasCredentials'>;
  turnService: Pick<AgentTurnService, 'listAgents' | 'defaultAgent'>;
  dbConnection: Pick<DatabaseConnection, 'getStatistics'>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check the database, credentials and agent reachability
 */
export async function checkHealth(deps: HealthDependencies): Promise<HealthReport> {
  const health: HealthReport = {
    timestamp: new Date().toISOString(),
    status: 'healthy',
    components: {
      database: { status: 'unknown', message: '' },
      credentials: { status: 'unknown', message: '' },
      agent: { status: 'unknown', message: '' },
      circuitBreaker: {
        state: deps.client.getCircuitBreakerState(),
        stats: deps.client.getCircuitBreakerStats(),
      },
    },
  };

  try {
    const stats = deps.dbConnection.getStatistics();
    health.components.database = {
      status: 'healthy',
      message: `Database connected - ${stats.totalMessages} messages in ${stats.totalThreads} threads`,
      statistics: stats,
    };
  } catch (error) {
    health.components.database = { status: 'error', message: errorMessage(error) };
    health.status = 'degraded';
  }

  if (!deps.tokens.hasCredentials()) {
    health.components.credentials = {
      status: 'error',
      message: 'No session token, OAuth token or programmatic access token configured',
    };
    health.components.agent = { status: 'unknown', message: 'Skipped: no credentials' };
    health.status = 'degraded';
    return health;
  }
  health.components.credentials = { status: 'healthy', message: 'Credentials available' };

  const agent = deps.turnService.defaultAgent;
  try {
    const agents = await deps.turnService.listAgents();
    const found = agents.some((candidate) => candidate.name.toUpperCase() === agent.name.toUpperCase());
    health.components.agent = {
      status: found ? 'healthy' : 'error',
      message: found
        ? `Agent ${agent.database}.${agent.schema}.${agent.name} is available`
        : `Agent ${agent.name} not found among ${agents.length} agent(s) in ${agent.database}.${agent.schema}`,
      agents_count: agents.length,
    };
    if (!found) {
      health.status = 'degraded';
    }
  } catch (error) {
    health.components.agent = { status: 'error', message: errorMessage(error) };
    health.status = 'degraded';
  }

  return health;
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(server: McpServer, deps: HealthDependencies) {
  server.tool(
    'health-check',
    'Check the health of the server and its components (database, Snowflake credentials, agent availability, circuit breaker state)',
    {},
    async () => {
      try {
        const health = await checkHealth(deps);
        return {
          content: [
            {
              type: 'text',
              text: `# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``,
            },
          ],
        };
      } catch (error) {
        return {
          isError: true,
          content: [
            {
              type: 'text',
              text: `Health check error: ${errorMessage(error)}`,
            },
          ],
        };
      }
    }
  );
}
