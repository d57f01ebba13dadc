import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_MAX_TABLE_ROWS } from './core/stream/index.js';

export const DEFAULT_SESSION_TOKEN_PATH = '/snowflake/session/token';

// Zod validation schema
const ConfigSchema = z.object({
  server: z.object({
    name: z.string().min(1, 'Server name must not be empty'),
    version: z.string().min(1, 'Version must not be empty'),
    debug: z.boolean(),
  }),
  snowflake: z
    .object({
      account: z.string(),
      host: z.string().optional(),
      pat: z.string().optional(),
      oauthToken: z.string().optional(),
      sessionTokenPath: z.string().min(1),
      requestTimeoutMs: z.number().int().min(1000).max(600000),
      originApplication: z.string().max(16, 'Origin application must be at most 16 characters'),
    })
    .refine((snowflake) => Boolean(snowflake.account || snowflake.host), {
      message: 'Either SNOWFLAKE_ACCOUNT or SNOWFLAKE_HOST is required',
      path: ['account'],
    }),
  agent: z.object({
    database: z.string().min(1, 'Agent database must not be empty'),
    schema: z.string().min(1, 'Agent schema must not be empty'),
    name: z.string().min(1, 'Agent name must not be empty'),
    orchestrationModel: z.string().optional(),
  }),
  display: z.object({
    maxTableRows: z.number().int().min(1).max(100000),
    enableCitations: z.boolean(),
  }),
  database: z.object({
    path: z.string().min(1),
  }),
  webUI: z.object({
    enabled: z.boolean(),
    port: z.number().int().min(1024).max(65535),
  }),
  mcp: z.object({
    enabled: z.boolean(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigValidationError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(`Invalid configuration: ${issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`).join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parse command line arguments
 * Usage: node dist/index.js --account myorg-myacct --agent-name SALES_AGENT --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build and validate configuration from CLI arguments and environment (CLI > env > default)
 * @throws ConfigValidationError when validation fails
 */
export function loadConfig(argv: string[] = process.argv.slice(2), env: NodeJS.ProcessEnv = process.env): Config {
  const cliArgs = parseArgs(argv);

  const getOptional = (cliKey: string, envKey: string): string | undefined => {
    const cli = cliArgs[cliKey];
    if (typeof cli === 'string' && cli) return cli;
    return env[envKey] || undefined;
  };

  const getString = (cliKey: string, envKey: string, defaultValue: string): string =>
    getOptional(cliKey, envKey) ?? defaultValue;

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey]?.toLowerCase();
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const value = getOptional(cliKey, envKey);
    return value ? parseInt(value, 10) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'cortex-agent-chat'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    snowflake: {
      account: getString('account', 'SNOWFLAKE_ACCOUNT', ''),
      host: getOptional('host', 'SNOWFLAKE_HOST'),
      pat: getOptional('pat', 'SNOWFLAKE_PAT'),
      oauthToken: getOptional('oauth-token', 'SNOWFLAKE_OAUTH_TOKEN'),
      sessionTokenPath: getString('session-token-path', 'SNOWFLAKE_SESSION_TOKEN_PATH', DEFAULT_SESSION_TOKEN_PATH),
      requestTimeoutMs: getNumber('timeout', 'API_TIMEOUT_MS', 50000),
      originApplication: getString('origin-application', 'ORIGIN_APPLICATION', 'cortex_chat'),
    },
    agent: {
      database: getString('database', 'SNOWFLAKE_DATABASE', 'SNOWFLAKE_INTELLIGENCE'),
      schema: getString('schema', 'SNOWFLAKE_SCHEMA', 'AGENTS'),
      name: getString('agent-name', 'CORTEX_AGENT_NAME', ''),
      orchestrationModel: getOptional('orchestration-model', 'ORCHESTRATION_MODEL'),
    },
    display: {
      maxTableRows: getNumber('max-rows', 'MAX_DATAFRAME_ROWS', DEFAULT_MAX_TABLE_ROWS),
      enableCitations: getBoolean('citations', 'ENABLE_CITATIONS', true),
    },
    database: {
      path: getString('db-path', 'DATABASE_PATH', path.join(process.cwd(), 'data', 'threads.db')),
    },
    webUI: {
      enabled: getBoolean('web-ui', 'WEB_UI_ENABLED', true),
      port: getNumber('port', 'WEB_UI_PORT', 3001),
    },
    mcp: {
      enabled: getBoolean('mcp', 'MCP_ENABLED', true),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues);
  }
  return result.data;
}

/**
 * Load `.env`, then configuration; prints every issue and exits when invalid
 */
export function getConfig(): Config {
  dotenv.config();

  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.issues.forEach((issue) => {
        console.error(`  • ${issue.path.join('.') || 'root'}: ${issue.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - SNOWFLAKE_ACCOUNT (or SNOWFLAKE_HOST) and CORTEX_AGENT_NAME are required');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary to stderr
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║              Cortex Agent Chat Server - Configuration             ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  console.error(`❄️  Snowflake: ${config.snowflake.host || `${config.snowflake.account}.snowflakecomputing.com`}`);
  console.error(`🤖 Agent: ${config.agent.database}.${config.agent.schema}.${config.agent.name}`);
  if (config.agent.orchestrationModel) {
    console.error(`   Orchestration model: ${config.agent.orchestrationModel}`);
  }
  console.error(`⏱️  Timeout: ${config.snowflake.requestTimeoutMs}ms | Origin: ${config.snowflake.originApplication}`);
  console.error(
    `📋 Display: up to ${config.display.maxTableRows} table rows | Citations ${config.display.enableCitations ? 'on' : 'off'}`
  );
  console.error(`💾 Database: ${config.database.path}`);

  if (config.webUI.enabled) {
    console.error(`\n🌐 Web UI: http://localhost:${config.webUI.port}`);
  }
  console.error(`📡 MCP: ${config.mcp.enabled ? 'stdio' : 'disabled'}`);

  console.error('\n' + '─'.repeat(68));
}
