/**
 * WebSocket server for real-time list sync
 * One WebSocketSession per connection; commands go to the router,
 * store changes fan out through the broadcaster.
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import { ListSyncError } from '../errors';
import type { ListStore } from '../store/list-store';
import type { ChangeNotification } from '../types';
import { SubscriptionBroadcaster, type SubscriberSession } from './broadcaster';
import type { ServerMessage } from './protocol';
import { CommandRouter } from './router';

export interface WSServerOptions {
  port: number;
  host?: string;
  heartbeatIntervalMs?: number; // 0 disables heartbeats
  maxBufferedBytes?: number;
}

export class WebSocketSession implements SubscriberSession {
  readonly id: string = uuidv4();
  alive = true;
  private socket: WebSocket;
  private maxBufferedBytes: number;

  constructor(socket: WebSocket, maxBufferedBytes: number) {
    this.socket = socket;
    this.maxBufferedBytes = maxBufferedBytes;
  }

  /** Bytes queued on the socket but not yet written out */
  get bufferedBytes(): number {
    return this.socket.bufferedAmount;
  }

  deliver(message: ServerMessage): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.socket.readyState !== WebSocket.OPEN) {
        reject(new ListSyncError('TransportFailure', 'Socket is not open'));
        return;
      }
      if (this.bufferedBytes > this.maxBufferedBytes) {
        reject(new ListSyncError('TransportFailure', `Send buffer over ${this.maxBufferedBytes} bytes`));
        return;
      }
      this.socket.send(JSON.stringify(message), (error) => {
        if (error) {
          reject(new ListSyncError('TransportFailure', error.message, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  terminate(): void {
    this.socket.terminate();
  }
}

export class CartSyncWSServer {
  private wss: WebSocketServer;
  private store: ListStore;
  private broadcaster = new SubscriptionBroadcaster();
  private router: CommandRouter;
  private sessions = new Map<WebSocket, WebSocketSession>();
  private heartbeat: NodeJS.Timeout | null = null;
  private maxBufferedBytes: number;
  private listening: Promise<void>;
  private onChange = (notification: ChangeNotification): void => {
    this.broadcaster.notify(notification.listId, notification);
  };

  constructor(options: WSServerOptions, store: ListStore) {
    this.store = store;
    this.router = new CommandRouter(store, this.broadcaster);
    this.maxBufferedBytes = options.maxBufferedBytes ?? 1024 * 1024;
    this.wss = new WebSocketServer({ port: options.port, host: options.host });
    this.listening = new Promise((resolve, reject) => {
      this.wss.once('listening', () => resolve());
      this.wss.once('error', reject);
    });
    // Startup failures surface through ready(); later ones are logged below
    this.listening.catch(() => undefined);
    this.wss.on('error', (error) => {
      console.error('[ws] Server error:', error);
    });

    this.store.on('change', this.onChange);
    this.broadcaster.on('evicted', (session: SubscriberSession) => {
      if (session instanceof WebSocketSession) session.terminate();
    });

    this.setupServer();
    this.startHeartbeat(options.heartbeatIntervalMs ?? 30000);
  }

  /** Resolves with the bound port once the server is listening */
  async ready(): Promise<number> {
    await this.listening;
    const address = this.wss.address();
    return typeof address === 'string' ? 0 : address.port;
  }

  get connectionCount(): number {
    return this.sessions.size;
  }

  private setupServer(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      const session = new WebSocketSession(ws, this.maxBufferedBytes);
      this.sessions.set(ws, session);
      console.log(`[ws] Client connected: ${session.id}`);

      ws.on('pong', () => {
        session.alive = true;
      });

      ws.on('message', (data: RawData) => {
        this.router.handleRaw(session, data.toString()).catch((error: unknown) => {
          console.error('[ws] Failed to handle message:', error);
        });
      });

      ws.on('close', () => {
        console.log(`[ws] Client disconnected: ${session.id}`);
        this.dropSession(ws, session);
      });

      ws.on('error', (error) => {
        console.error(`[ws] Socket error on ${session.id}:`, error);
        this.dropSession(ws, session);
      });

      // Let the client pick lists before subscribing
      this.broadcaster.deliver(session, {
        type: 'hello',
        data: { sessionId: session.id, lists: this.store.listSummaries() },
      });
    });

    this.wss.on('listening', () => {
      const address = this.wss.address();
      const where = typeof address === 'string' ? address : `port ${address.port}`;
      console.log(`[ws] WebSocket server running on ${where}`);
    });
  }

  private dropSession(ws: WebSocket, session: WebSocketSession): void {
    this.broadcaster.unsubscribeAll(session);
    this.sessions.delete(ws);
  }

  private startHeartbeat(intervalMs: number): void {
    if (intervalMs <= 0) return;
    this.heartbeat = setInterval(() => {
      for (const [ws, session] of this.sessions) {
        if (!session.alive) {
          console.warn(`[ws] Session ${session.id} missed a heartbeat, terminating`);
          ws.terminate();
          continue;
        }
        session.alive = false;
        ws.ping();
      }
    }, intervalMs);
  }

  async close(): Promise<void> {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    this.store.off('change', this.onChange);
    this.sessions.forEach((session, ws) => {
      this.broadcaster.unsubscribeAll(session);
      ws.terminate();
    });
    this.sessions.clear();
    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }
}
