import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { createServer, type Server as HttpServer, type IncomingMessage } from 'node:http';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { Logger } from '../logging/logger.js';
import type { ChatSession } from '../session/chat-session.js';
import type { AgentRunStatus } from '../agent/agent.js';
import type { AgentEventSink } from '../agent/events.js';
import type { OriginResolver } from '../agent/tool-router.js';
import { describeError } from '../agent/errors.js';

/**
 * Gateway configuration
 */
export interface GatewayConfig {
  port: number;
  host: string;
  /** How long a `choose_origin` request waits before the first origin is used */
  originChoiceTimeoutMs: number;
  /** How long `stop` waits for running turns */
  shutdownTimeoutMs: number;
}

export const DEFAULT_GATEWAY_CONFIG: GatewayConfig = {
  port: 18790,
  host: '127.0.0.1',
  originChoiceTimeoutMs: 30_000,
  shutdownTimeoutMs: 30_000,
};

export type SessionFactory = () => Promise<ChatSession>;

const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('message'), content: z.string().min(1) }),
  z.object({ type: z.literal('origin_choice'), requestId: z.string().min(1), origin: z.string().min(1) }),
  z.object({ type: z.literal('reset') }),
]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

/**
 * Messages sent to clients
 */
export type ServerMessage =
  | { type: 'ready'; sessionId: string; tools: string[]; servers: string[]; failedServers: string[] }
  | { type: 'tool_call'; callId: string; name: string; arguments: string }
  | { type: 'tool_result'; callId: string; name: string; origin: string | null; result: string }
  | { type: 'choose_origin'; requestId: string; toolName: string; origins: string[] }
  | { type: 'done'; content: string; status: AgentRunStatus; iterations: number }
  | { type: 'error'; error: string };

interface PendingChoice {
  origins: string[];
  resolve: (origin: string) => void;
  timer: NodeJS.Timeout;
}

/**
 * Client connection state
 */
interface ClientConnection {
  id: string;
  ws: WebSocket;
  session: Promise<ChatSession>;
  pendingChoices: Map<string, PendingChoice>;
  turns: Set<Promise<void>>;
  connectedAt: number;
}

/**
 * GatewayServer - WebSocket front end for chat sessions.
 *
 * Every connection gets its own ChatSession. Tool activity is streamed as it
 * happens; ambiguous tool origins are put to the client as `choose_origin`
 * requests.
 */
export class GatewayServer {
  private config: GatewayConfig;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Map<string, ClientConnection> = new Map();
  private inFlightTurns = 0;
  private isShuttingDown = false;
  private sessionFactory: SessionFactory;
  private logger: Logger;

  constructor(config: Partial<GatewayConfig>, sessionFactory: SessionFactory, logger?: Logger) {
    this.config = { ...DEFAULT_GATEWAY_CONFIG, ...config };
    this.sessionFactory = sessionFactory;
    this.logger = (logger ?? new Logger()).child({ component: 'gateway' });
  }

  getConfig(): GatewayConfig {
    return { ...this.config };
  }

  get clientCount(): number {
    return this.clients.size;
  }

  get inFlightCount(): number {
    return this.inFlightTurns;
  }

  get isRunning(): boolean {
    return this.httpServer !== null && this.httpServer.listening;
  }

  /**
   * The bound port; differs from the configured one when that was 0
   */
  get port(): number {
    const address = this.httpServer?.address();
    return typeof address === 'object' && address !== null ? address.port : this.config.port;
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error('Gateway server is already running');
    }

    const httpServer = createServer();
    const wss = new WebSocketServer({ server: httpServer, clientTracking: true });
    wss.on('connection', (ws, req) => this.handleConnection(ws, req));
    wss.on('error', (error) => this.handleServerError(error));

    await new Promise<void>((resolve, reject) => {
      httpServer.on('error', reject);
      httpServer.listen(this.config.port, this.config.host, () => {
        httpServer.removeListener('error', reject);
        resolve();
      });
    });

    this.httpServer = httpServer;
    this.wss = wss;

    await this.logger.info('Gateway server started', {
      operation: 'gateway_start',
      port: this.port,
      host: this.config.host,
    });
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const clientId = randomUUID();
    const connection: ClientConnection = {
      id: clientId,
      ws,
      session: this.sessionFactory(),
      pendingChoices: new Map(),
      turns: new Set(),
      connectedAt: Date.now(),
    };
    this.clients.set(clientId, connection);

    this.logger.info('Client connected', {
      operation: 'client_connect',
      clientId,
      remoteAddress: req.socket.remoteAddress,
    }).catch(() => {});

    ws.on('message', (data) => {
      this.handleMessage(connection, data).catch((error: unknown) => this.handleClientError(clientId, error));
    });
    ws.on('close', () => this.handleDisconnect(clientId));
    ws.on('error', (error) => this.handleClientError(clientId, error));

    connection.session
      .then(
        (session) => this.sendReady(connection, session),
        (error: unknown) => {
          this.send(ws, { type: 'error', error: `Failed to create session: ${describeError(error)}` });
          ws.close(1011, 'Session unavailable');
          throw error;
        }
      )
      .catch((error: unknown) => this.handleClientError(clientId, error));
  }

  private sendReady(connection: ClientConnection, session: ChatSession): void {
    this.send(connection.ws, {
      type: 'ready',
      sessionId: session.id,
      tools: session.toolManager.getActiveTools().map((tool) => tool.name),
      servers: session.connectedServers,
      failedServers: session.failedServers.map((failure) => failure.name),
    });
  }

  private async handleMessage(connection: ClientConnection, data: RawData): Promise<void> {
    let raw: unknown;
    try {
      raw = JSON.parse(data.toString());
    } catch {
      this.send(connection.ws, { type: 'error', error: 'Invalid JSON message' });
      return;
    }

    const parsed = ClientMessageSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'message'}: ${issue.message}`);
      this.send(connection.ws, { type: 'error', error: `Invalid message: ${issues.join('; ')}` });
      return;
    }

    const message = parsed.data;
    switch (message.type) {
      case 'origin_choice':
        this.handleOriginChoice(connection, message.requestId, message.origin);
        return;
      case 'reset': {
        const session = await connection.session;
        await session.reset();
        this.sendReady(connection, session);
        return;
      }
      case 'message':
        await this.trackTurn(connection, this.handleUserMessage(connection, message.content));
        return;
    }
  }

  private async trackTurn(connection: ClientConnection, turn: Promise<void>): Promise<void> {
    this.inFlightTurns++;
    connection.turns.add(turn);
    try {
      await turn;
    } finally {
      connection.turns.delete(turn);
      this.inFlightTurns--;
    }
  }

  private async handleUserMessage(connection: ClientConnection, content: string): Promise<void> {
    if (this.isShuttingDown) {
      this.send(connection.ws, { type: 'error', error: 'Server is shutting down. Please try again later.' });
      return;
    }

    const session = await connection.session;
    const events: AgentEventSink = {
      onToolCall: (call) =>
        this.send(connection.ws, { type: 'tool_call', callId: call.id, name: call.name, arguments: call.arguments }),
      onToolResult: (call, result, origin) =>
        this.send(connection.ws, { type: 'tool_result', callId: call.id, name: call.name, origin, result }),
    };

    try {
      const result = await session.send(content, { events, resolver: this.createResolver(connection) });
      this.send(connection.ws, {
        type: 'done',
        content: result.content,
        status: result.status,
        iterations: result.iterations,
      });
    } catch (error) {
      await this.logger.error('Error processing message', error, {
        operation: 'message_process',
        clientId: connection.id,
        sessionId: session.id,
      });
      this.send(connection.ws, { type: 'error', error: `Failed to process message: ${describeError(error)}` });
    }
  }

  /**
   * Asks the client to pick an origin; unanswered requests fall back to the
   * first origin after `originChoiceTimeoutMs`
   */
  private createResolver(connection: ClientConnection): OriginResolver {
    return (toolName, origins) =>
      new Promise<string>((resolve) => {
        const requestId = randomUUID();
        const fallback = origins[0] ?? '';
        const timer = setTimeout(() => {
          connection.pendingChoices.delete(requestId);
          this.logger.warn('Origin choice timed out', { clientId: connection.id, toolName, origin: fallback }).catch(
            () => {}
          );
          resolve(fallback);
        }, this.config.originChoiceTimeoutMs);

        connection.pendingChoices.set(requestId, { origins, resolve, timer });

        if (connection.ws.readyState !== WebSocket.OPEN) {
          this.handleOriginChoice(connection, requestId, fallback);
          return;
        }
        this.send(connection.ws, { type: 'choose_origin', requestId, toolName, origins });
      });
  }

  private handleOriginChoice(connection: ClientConnection, requestId: string, origin: string): void {
    const pending = connection.pendingChoices.get(requestId);
    if (!pending) {
      this.send(connection.ws, { type: 'error', error: `No pending origin choice '${requestId}'` });
      return;
    }
    clearTimeout(pending.timer);
    connection.pendingChoices.delete(requestId);
    pending.resolve(origin);
  }

  /**
   * Resolves outstanding choices with their first origin, lets running turns
   * finish, then closes the connection's session
   */
  private handleDisconnect(clientId: string): void {
    const connection = this.clients.get(clientId);
    if (!connection) return;
    this.clients.delete(clientId);

    for (const [requestId, pending] of connection.pendingChoices) {
      this.handleOriginChoice(connection, requestId, pending.origins[0] ?? '');
    }

    this.logger.info('Client disconnected', { operation: 'client_disconnect', clientId }).catch(() => {});
    this.closeSession(connection).catch((error: unknown) => this.handleClientError(clientId, error));
  }

  private async closeSession(connection: ClientConnection): Promise<void> {
    await Promise.allSettled([...connection.turns]);
    const [outcome] = await Promise.allSettled([connection.session]);
    if (outcome?.status === 'fulfilled') {
      await outcome.value.close();
    }
  }

  private handleClientError(clientId: string, error: unknown): void {
    this.logger.error('Client error', error, { operation: 'client_error', clientId }).catch(() => {});
  }

  private handleServerError(error: Error): void {
    this.logger.error('Gateway server error', error, { operation: 'gateway_error' }).catch(() => {});
  }

  private send(ws: WebSocket, message: ServerMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  /**
   * Stops accepting connections, waits for running turns (up to
   * `shutdownTimeoutMs`), then closes every client and its session
   */
  async stop(): Promise<void> {
    const httpServer = this.httpServer;
    if (!httpServer || !this.isRunning) {
      return;
    }

    this.isShuttingDown = true;
    await this.logger.info('Gateway server shutting down', {
      operation: 'gateway_shutdown',
      inFlightTurns: this.inFlightTurns,
      connectedClients: this.clients.size,
    });

    this.wss?.close();

    const startTime = Date.now();
    while (this.inFlightTurns > 0 && Date.now() - startTime < this.config.shutdownTimeoutMs) {
      await new Promise((resolve) => setTimeout(resolve, 50));
    }

    const connections = [...this.clients.values()];
    this.clients.clear();
    for (const connection of connections) {
      for (const [requestId, pending] of connection.pendingChoices) {
        this.handleOriginChoice(connection, requestId, pending.origins[0] ?? '');
      }
      connection.ws.close(1001, 'Server shutting down');
    }
    await Promise.allSettled(connections.map((connection) => this.closeSession(connection)));

    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
    });
    this.httpServer = null;
    this.wss = null;
    this.isShuttingDown = false;

    await this.logger.info('Gateway server stopped', { operation: 'gateway_stopped' });
  }
}
