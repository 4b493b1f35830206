/**
 * pkgrelay WebSocket server: the transport in front of the executor.
 *
 * - Validates the auth token and protocol version from handshake headers
 * - Handles task, cancel, ping and tools_query messages
 * - Aborts a client's in-flight tasks when it disconnects
 */
import { WebSocketServer, WebSocket } from 'ws';
import type { IncomingMessage } from 'http';
import { z } from 'zod';
import { RELAY_AUTH_HEADER, RELAY_PROTOCOL_HEADER, RELAY_PROTOCOL_VERSION } from './protocol/types.js';
import type {
  ClientToRelayMessage,
  RelayPongMessage,
  RelayRegisterMessage,
  RelayTaskMessage,
  RelayTaskResultMessage,
  RelayToClientMessage,
  RelayToolsReportMessage,
} from './protocol/types.js';
import type { PkgRelayConfig } from './config.js';
import type { RelayExecutor } from './executor.js';
import type { Logger } from './logger.js';
import { createConsoleLogger } from './logger.js';
import { errorMessage } from './devkit/errors.js';

export interface RelayServerOptions {
  config: PkgRelayConfig;
  authToken: string;
  executor: Pick<RelayExecutor, 'execute' | 'getCapabilities' | 'describeTools'>;
  /** Reported in pong messages. */
  activeTasks?: () => number;
  onLog?: Logger;
}

const MAX_PAYLOAD_BYTES = 1 * 1024 * 1024; // 1 MB

const ClientMessageSchema: z.ZodType<ClientToRelayMessage> = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('task'),
    id: z.string().min(1),
    payload: z.object({ tool: z.string(), args: z.record(z.unknown()) }),
  }),
  z.object({ type: z.literal('cancel'), id: z.string().min(1) }),
  z.object({ type: z.literal('ping'), timestamp: z.number() }),
  z.object({ type: z.literal('tools_query') }),
]);

export class RelayServer {
  private wss: WebSocketServer | null = null;
  private config: PkgRelayConfig;
  private authToken: string;
  private executor: RelayServerOptions['executor'];
  private log: Logger;
  private clients = new Set<WebSocket>();
  /** In-flight tasks per client, keyed by task id. */
  private inflight = new Map<WebSocket, Map<string, AbortController>>();
  private startedAt = Date.now();
  private activeTasks: () => number;

  constructor(options: RelayServerOptions) {
    this.config = options.config;
    this.authToken = options.authToken;
    this.executor = options.executor;
    this.activeTasks = options.activeTasks ?? (() => [...this.inflight.values()].reduce((n, tasks) => n + tasks.size, 0));
    this.log = options.onLog ?? createConsoleLogger(options.config.log_level);
  }

  /** Start the WebSocket server */
  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const verifyClient = (info: { req: IncomingMessage }, callback: (res: boolean) => void) => {
        const valid = this.verifyAuth(info.req);
        if (!valid) {
          this.log(`Rejected connection: invalid auth from ${info.req.socket.remoteAddress}`, 'warn');
        }
        callback(valid);
      };

      const wss = new WebSocketServer({ port: this.config.port, verifyClient, maxPayload: MAX_PAYLOAD_BYTES });
      this.wss = wss;
      wss.on('listening', () => {
        this.log(`pkgrelay listening on ws://0.0.0.0:${this.port} (project: ${this.config.project_dir})`, 'info');
        resolve();
      });
      wss.on('error', (err) => {
        this.log(`WebSocket server error: ${err.message}`, 'error');
        reject(err);
      });
      wss.on('connection', (ws, req) => {
        this.handleConnection(ws, req);
      });
    });
  }

  /** Stop the WebSocket server gracefully, aborting whatever is still running */
  async stop(): Promise<void> {
    const wss = this.wss;
    if (!wss) return;

    for (const client of this.clients) {
      this.abortAll(client);
      client.close(1001, 'pkgrelay shutting down');
    }
    this.clients.clear();

    return new Promise((resolve) => {
      wss.close(() => {
        this.wss = null;
        this.log('WebSocket server stopped', 'info');
        resolve();
      });
    });
  }

  /** Bound port (useful when configured with port 0) */
  get port(): number {
    const address = this.wss?.address();
    return typeof address === 'object' && address !== null ? address.port : this.config.port;
  }

  /** Get number of connected clients */
  get connectionCount(): number {
    return this.clients.size;
  }

  // ─── Private ───

  private verifyAuth(req: IncomingMessage): boolean {
    const token = req.headers[RELAY_AUTH_HEADER];
    const protocolVersion = req.headers[RELAY_PROTOCOL_HEADER];

    if (typeof token !== 'string' || token !== this.authToken) {
      return false;
    }

    if (typeof protocolVersion === 'string' && parseInt(protocolVersion, 10) !== RELAY_PROTOCOL_VERSION) {
      this.log(`Protocol version mismatch: expected ${RELAY_PROTOCOL_VERSION}, got ${protocolVersion}`, 'warn');
      return false;
    }

    return true;
  }

  private send(ws: WebSocket, message: RelayToClientMessage): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const remoteAddr = req.socket.remoteAddress ?? 'unknown';
    this.clients.add(ws);
    this.inflight.set(ws, new Map());
    this.log(`Client connected from ${remoteAddr}`, 'info');

    const registerMsg: RelayRegisterMessage = {
      type: 'register',
      capabilities: this.executor.getCapabilities(),
      protocol_version: RELAY_PROTOCOL_VERSION,
    };
    this.send(ws, registerMsg);

    ws.on('message', (data) => {
      let message: ClientToRelayMessage;
      try {
        message = ClientMessageSchema.parse(JSON.parse(data.toString()));
      } catch (err) {
        this.log(`Invalid message from ${remoteAddr}: ${errorMessage(err)}`, 'warn');
        this.send(ws, { type: 'error', message: 'Invalid message' });
        return;
      }
      this.handleMessage(ws, remoteAddr, message).catch((err: unknown) => {
        this.log(`Failed to handle ${message.type} from ${remoteAddr}: ${errorMessage(err)}`, 'error');
      });
    });

    ws.on('close', (code) => {
      this.abortAll(ws);
      this.clients.delete(ws);
      this.inflight.delete(ws);
      this.log(`Client disconnected (code: ${code})`, 'info');
    });

    ws.on('error', (err) => {
      this.log(`WebSocket client error: ${err.message}`, 'error');
    });
  }

  private abortAll(ws: WebSocket): void {
    for (const [id, controller] of this.inflight.get(ws) ?? []) {
      this.log(`Aborting task ${id}`, 'info');
      controller.abort();
    }
  }

  private async handleMessage(ws: WebSocket, remoteAddr: string, message: ClientToRelayMessage): Promise<void> {
    switch (message.type) {
      case 'task':
        await this.handleTask(ws, remoteAddr, message);
        break;

      case 'cancel':
        this.inflight.get(ws)?.get(message.id)?.abort();
        break;

      case 'ping': {
        const pong: RelayPongMessage = {
          type: 'pong',
          timestamp: message.timestamp,
          active_tasks: this.activeTasks(),
          uptime_seconds: Math.round((Date.now() - this.startedAt) / 1000),
        };
        this.send(ws, pong);
        break;
      }

      case 'tools_query': {
        const report: RelayToolsReportMessage = { type: 'tools_report', tools: this.executor.describeTools() };
        this.send(ws, report);
        break;
      }
    }
  }

  private async handleTask(ws: WebSocket, remoteAddr: string, message: RelayTaskMessage): Promise<void> {
    const { id, payload } = message;
    const tasks = this.inflight.get(ws);
    if (!tasks) return;
    if (tasks.has(id)) {
      this.send(ws, { type: 'task_result', id, result: { status: 'error', kind: 'CommandBuildError', message: `Task id '${id}' is already running` } });
      return;
    }

    const controller = new AbortController();
    tasks.set(id, controller);
    this.log(`[AUDIT] task_start id=${id} tool=${payload.tool} client=${remoteAddr}`, 'info');

    let status = 'error';
    let duration_ms = 0;
    try {
      const result = await this.executor.execute(payload.tool, payload.args, controller.signal);
      status = result.status === 'ok' ? 'ok' : `error:${result.kind}`;
      duration_ms = result.duration_ms ?? 0;
      const response: RelayTaskResultMessage = { type: 'task_result', id, result };
      this.send(ws, response);
    } finally {
      tasks.delete(id);
      this.log(`[AUDIT] task_end id=${id} tool=${payload.tool} status=${status} duration=${duration_ms}ms`, 'info');
    }
  }
}
