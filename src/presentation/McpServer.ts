import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Config } from '../config.js';
import { DatabaseConnection } from '../infrastructure/database/DatabaseConnection.js';
import { ThreadRepository } from '../infrastructure/database/repositories/ThreadRepository.js';
import { CortexApiClient } from '../infrastructure/http/CortexApiClient.js';
import { TokenProvider } from '../infrastructure/http/TokenProvider.js';
import { WebServer } from '../infrastructure/web/WebServer.js';
import { AgentTurnService } from '../application/services/AgentTurnService.js';
import { ThreadService } from '../application/services/ThreadService.js';
import { CircuitBreaker, DEFAULT_RETRY_CONFIG } from '../utils/retry.js';
import { registerAskAgentTool } from './tools/AskAgentTool.js';
import { registerDescribeAgentTool } from './tools/DescribeAgentTool.js';
import { registerManageThreadsTool } from './tools/ManageThreadsTool.js';
import { checkHealth, registerHealthCheckTool, type HealthDependencies } from './tools/HealthCheckTool.js';

/**
 * Main server class that wires storage, the Cortex client and services to
 * the MCP tools and the web UI
 */
export class McpServer {
  private server: BaseMcpServer | null = null;
  private webServer: WebServer | null = null;
  private dbConnection: DatabaseConnection;
  private threadRepo: ThreadRepository;
  private tokens: TokenProvider;
  private cortexClient: CortexApiClient;
  private threadService: ThreadService;
  private turnService: AgentTurnService;
  private debugLog: (message: string) => void;

  constructor(private config: Config) {
    // Initialize debug logger
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    // Initialize database
    this.dbConnection = new DatabaseConnection(config.database.path);
    this.threadRepo = new ThreadRepository(this.dbConnection.getDatabase());

    // Initialize infrastructure
    this.tokens = new TokenProvider({
      sessionTokenPath: config.snowflake.sessionTokenPath,
      oauthToken: config.snowflake.oauthToken,
      pat: config.snowflake.pat,
    });
    this.cortexClient = new CortexApiClient(
      {
        account: config.snowflake.account,
        host: config.snowflake.host,
        requestTimeoutMs: config.snowflake.requestTimeoutMs,
        debugLog: this.debugLog,
      },
      this.tokens,
      new CircuitBreaker(5, 60000),
      { ...DEFAULT_RETRY_CONFIG, timeoutMs: config.snowflake.requestTimeoutMs }
    );

    // Initialize services
    this.threadService = new ThreadService(
      this.cortexClient,
      this.threadRepo,
      config.snowflake.originApplication,
      this.debugLog
    );
    this.turnService = new AgentTurnService(
      this.cortexClient,
      this.threadRepo,
      {
        agent: {
          database: config.agent.database,
          schema: config.agent.schema,
          name: config.agent.name,
        },
        orchestrationModel: config.agent.orchestrationModel,
        maxTableRows: config.display.maxTableRows,
        enableCitations: config.display.enableCitations,
      },
      this.debugLog
    );

    // Initialize Web Server if enabled
    if (config.webUI.enabled) {
      this.webServer = new WebServer(
        this.threadService,
        this.turnService,
        () => checkHealth(this.healthDependencies()),
        config.webUI.port
      );
    }

    if (config.mcp.enabled) {
      this.server = new BaseMcpServer({
        name: config.server.name,
        version: config.server.version,
      });
      this.registerTools(this.server);
    }
  }

  private healthDependencies(): HealthDependencies {
    return {
      client: this.cortexClient,
      tokens: this.tokens,
      turnService: this.turnService,
      dbConnection: this.dbConnection,
    };
  }

  /**
   * Register tools on a server instance
   */
  private registerTools(server: BaseMcpServer) {
    // Keep the web UI's thread list in step with changes made through MCP
    const notifyThreadUpdate = (threadId: string) => {
      this.webServer?.notifyThreadUpdate(threadId);
    };

    registerAskAgentTool(server, this.turnService, this.threadService, this.debugLog, notifyThreadUpdate);
    registerManageThreadsTool(server, this.threadService, notifyThreadUpdate);
    registerDescribeAgentTool(server, this.turnService);
    registerHealthCheckTool(server, this.healthDependencies());
  }

  /**
   * Print database statistics
   */
  printStats() {
    const stats = this.dbConnection.getStatistics();
    console.error(
      `📊 Database Statistics: ${stats.totalThreads} threads, ${stats.totalMessages} messages, ${(stats.databaseSize / 1024).toFixed(2)} KB`
    );
    console.error(`📋 Turn Statistics: ${stats.totalTurns} total, ${stats.erroredTurns} errored`);
  }

  /**
   * Start the web UI and the stdio transport
   */
  async start() {
    this.debugLog(`Database initialized at: ${this.dbConnection.getDatabasePath()}`);

    if (!this.tokens.hasCredentials()) {
      console.error('⚠️ No Snowflake credentials found: set SNOWFLAKE_PAT or SNOWFLAKE_OAUTH_TOKEN');
    }

    // Start Web Server if enabled
    if (this.webServer) {
      try {
        await this.webServer.start();
      } catch (error) {
        console.error(`⚠️ Failed to start Web UI:`, error);
      }
    }

    if (this.server) {
      const transport = new StdioServerTransport();

      // Add stdio error handling to prevent unexpected disconnections
      process.stdin.on('error', (error) => {
        console.error('⚠️ stdin error (non-fatal):', error.message);
      });

      process.stdout.on('error', (error) => {
        console.error('⚠️ stdout error (non-fatal):', error.message);
      });

      process.stdin.on('end', () => {
        console.error('⚠️ stdin ended - client may have disconnected');
      });

      await this.server.connect(transport);
      console.error(`\n✅ Cortex Agent Chat MCP server running on stdio`);
      this.debugLog('stdio transport connected successfully');
    }
  }

  /**
   * Graceful shutdown
   */
  async shutdown() {
    console.error('\n👋 Shutting down gracefully...');

    // Stop Web Server
    if (this.webServer) {
      await this.webServer.stop();
    }

    if (this.server) {
      await this.server.close();
    }

    this.dbConnection.close();
  }
}
