import express, { Express, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import path from 'path';
import { z } from 'zod';
import { NothingToRegenerateError, type AgentTurnService } from '../../application/services/AgentTurnService.js';
import type { ThreadService } from '../../application/services/ThreadService.js';
import { CortexApiError } from '../../core/interfaces/ICortexClient.js';
import { TurnInProgressError } from '../../core/stream/index.js';
import { WebSocketRenderSink, type RenderBroadcast, type RenderBroadcaster } from './WebSocketRenderSink.js';

export type ServerBroadcast =
  | RenderBroadcast
  | { type: 'connected'; timestamp: string }
  | { type: 'thread_updated' | 'thread_deleted'; threadId: string; timestamp: string };

const CreateThreadBody = z.object({
  thread_name: z.string().max(256).optional(),
});

const RenameThreadBody = z.object({
  thread_name: z.string().min(1).max(256),
});

const SendMessageBody = z.object({
  message: z.string().trim().min(1, 'message must not be empty'),
  agent_name: z.string().min(1).optional(),
});

const ListAgentsQuery = z.object({
  database: z.string().optional(),
  schema: z.string().optional(),
});

const AgentQuery = z.object({
  name: z.string().min(1).optional(),
});

const RegenerateBody = z.object({
  agent_name: z.string().min(1).optional(),
});

const HistoryQuery = z.object({
  page_size: z.coerce.number().int().min(1).max(100).optional(),
  last_message_id: z.coerce.number().int().nonnegative().optional(),
});

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function statusFor(error: unknown): number {
  if (error instanceof TurnInProgressError) return 409;
  if (error instanceof NothingToRegenerateError) return 404;
  if (error instanceof z.ZodError) return 400;
  if (error instanceof CortexApiError && error.status === 404) return 404;
  if (error instanceof CortexApiError) return 502;
  return 500;
}

function sendError(res: Response, error: unknown): void {
  const message = error instanceof z.ZodError ? error.issues.map((issue) => issue.message).join('; ') : errorMessage(error);
  res.status(statusFor(error)).json({ success: false, error: message });
}

/**
 * Browser-facing API: REST routes for threads and turns, live render
 * operations over WebSocket, and the static chat page
 */
export class WebServer implements RenderBroadcaster {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();

  constructor(
    private threadService: ThreadService,
    private turnService: AgentTurnService,
    private healthCheck: () => Promise<unknown>,
    private port: number = 3001,
    private publicDir: string = path.join(__dirname, '../../../public')
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
    this.app.use(express.static(this.publicDir));
  }

  private setupRoutes(): void {
    // Serve main page
    this.app.get('/', (req: Request, res: Response) => {
      res.sendFile(path.join(this.publicDir, 'index.html'));
    });

    this.app.get('/api/health', async (req: Request, res: Response) => {
      try {
        res.json({ success: true, data: await this.healthCheck() });
      } catch (error) {
        sendError(res, error);
      }
    });

    this.app.get('/api/agents', async (req: Request, res: Response) => {
      try {
        const query = ListAgentsQuery.parse(req.query);
        const agents = await this.turnService.listAgents(query.database, query.schema);
        res.json({ success: true, data: { default: this.turnService.defaultAgent, agents } });
      } catch (error) {
        sendError(res, error);
      }
    });

    // Sample questions, tools and model of the default agent, or of ?name=
    this.app.get('/api/agent', async (req: Request, res: Response) => {
      try {
        const query = AgentQuery.parse(req.query);
        res.json({ success: true, data: await this.turnService.describeAgent(query.name) });
      } catch (error) {
        sendError(res, error);
      }
    });

    this.app.get('/api/threads', async (req: Request, res: Response) => {
      try {
        res.json({ success: true, data: await this.threadService.listThreads() });
      } catch (error) {
        sendError(res, error);
      }
    });

    this.app.post('/api/threads', async (req: Request, res: Response) => {
      try {
        const body = CreateThreadBody.parse(req.body ?? {});
        const thread = await this.threadService.createThread(body.thread_name);
        this.notifyThreadUpdate(thread.threadId);
        res.status(201).json({ success: true, data: thread });
      } catch (error) {
        sendError(res, error);
      }
    });

    this.app.patch('/api/threads/:threadId', async (req: Request, res: Response) => {
      try {
        const { threadId } = req.params;
        const body = RenameThreadBody.parse(req.body);
        await this.threadService.renameThread(threadId, body.thread_name);
        this.notifyThreadUpdate(threadId);
        res.json({ success: true, data: this.threadService.getThread(threadId) });
      } catch (error) {
        sendError(res, error);
      }
    });

    this.app.delete('/api/threads/:threadId', async (req: Request, res: Response) => {
      try {
        const { threadId } = req.params;
        if (this.turnService.isBusy(threadId)) {
          throw new TurnInProgressError(threadId);
        }
        await this.threadService.deleteThread(threadId);
        this.turnService.forgetSession(threadId);
        this.broadcast({ type: 'thread_deleted', threadId, timestamp: new Date().toISOString() });
        res.json({ success: true, message: 'Thread deleted' });
      } catch (error) {
        sendError(res, error);
      }
    });

    this.app.get('/api/threads/:threadId/messages', (req: Request, res: Response) => {
      try {
        const { threadId } = req.params;
        res.json({
          success: true,
          data: {
            messages: this.threadService.getMessages(threadId),
            busy: this.turnService.isBusy(threadId),
            canRegenerate: this.turnService.lastQuestion(threadId) !== null,
          },
        });
      } catch (error) {
        sendError(res, error);
      }
    });

    // Messages as the Threads API keeps them, newest first
    this.app.get('/api/threads/:threadId/history', async (req: Request, res: Response) => {
      try {
        const { threadId } = req.params;
        const query = HistoryQuery.parse(req.query);
        res.json({
          success: true,
          data: await this.threadService.getRemoteThread(threadId, query.page_size, query.last_message_id),
        });
      } catch (error) {
        sendError(res, error);
      }
    });

    // Asks the thread's last question again; streams like a new message
    this.app.post('/api/threads/:threadId/regenerate', async (req: Request, res: Response) => {
      try {
        const { threadId } = req.params;
        const body = RegenerateBody.parse(req.body ?? {});
        const sink = new WebSocketRenderSink(this, threadId);
        const agent = body.agent_name ? { ...this.turnService.defaultAgent, name: body.agent_name } : undefined;

        const message = await this.turnService.regenerate(threadId, sink, {
          agent,
          onRequestStarted: (requestId) => sink.bindRequest(requestId),
        });
        this.notifyThreadUpdate(threadId);
        res.json({ success: true, data: message });
      } catch (error) {
        sendError(res, error);
      }
    });

    // Runs one turn; render operations stream over WebSocket while the request is open
    this.app.post('/api/threads/:threadId/messages', async (req: Request, res: Response) => {
      try {
        const { threadId } = req.params;
        const body = SendMessageBody.parse(req.body);
        const sink = new WebSocketRenderSink(this, threadId);
        const agent = body.agent_name ? { ...this.turnService.defaultAgent, name: body.agent_name } : undefined;

        const message = await this.turnService.sendMessage(threadId, body.message, sink, {
          agent,
          onRequestStarted: (requestId) => sink.bindRequest(requestId),
        });
        this.notifyThreadUpdate(threadId);
        res.json({ success: true, data: message });
      } catch (error) {
        sendError(res, error);
      }
    });
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      console.error('[WebServer] New WebSocket client connected');
      this.clients.add(ws);

      ws.on('close', () => {
        console.error('[WebServer] WebSocket client disconnected');
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        console.error('[WebServer] WebSocket error:', error);
        this.clients.delete(ws);
      });

      // Send initial connection confirmation
      ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() } satisfies ServerBroadcast));
    });
  }

  public broadcast(message: ServerBroadcast): void {
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  public notifyThreadUpdate(threadId: string): void {
    this.broadcast({
      type: 'thread_updated',
      threadId,
      timestamp: new Date().toISOString(),
    });
  }

  /**
   * Port the server is bound to; differs from the configured one when that was 0
   */
  public get listeningPort(): number | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : null;
  }

  public start(): Promise<void> {
    return new Promise((resolve, reject) => {
      try {
        this.httpServer = this.app.listen(this.port, () => {
          console.error(`[WebServer] Chat UI and API available at http://localhost:${this.listeningPort ?? this.port}`);
          this.setupWebSocket();
          resolve();
        });

        this.httpServer.on('error', (error) => {
          console.error('[WebServer] Server error:', error);
          reject(error);
        });
      } catch (error) {
        reject(error);
      }
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve) => {
      // Close all WebSocket connections
      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();

      // Close WebSocket server
      if (this.wss) {
        this.wss.close(() => {
          console.error('[WebServer] WebSocket server closed');
        });
      }

      // Close HTTP server
      if (this.httpServer) {
        this.httpServer.close(() => {
          console.error('[WebServer] HTTP server closed');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }
}
