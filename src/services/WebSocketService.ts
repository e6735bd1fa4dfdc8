import { WebSocketServer, WebSocket, RawData } from 'ws';
import { Server } from 'http';
import { EntriesUpdate, WebSocketMessage } from '../types';
import { EntriesBroadcaster } from './LeaderboardService';

export const WEBSOCKET_PATH = '/leaderboard';

export class WebSocketService implements EntriesBroadcaster {
  private wss: WebSocketServer;
  private clients: Set<WebSocket> = new Set();
  private heartbeat: NodeJS.Timeout | null = null;

  constructor(server: Server) {
    this.wss = new WebSocketServer({ server, path: WEBSOCKET_PATH });
    this.setupWebSocketServer();
  }

  /**
   * Track connections on the feed path and route their messages
   */
  private setupWebSocketServer(): void {
    this.wss.on('connection', (ws: WebSocket, req) => {
      console.log(`[WebSocket] New client connected from ${req.socket.remoteAddress}`);

      this.clients.add(ws);
      console.log(`[WebSocket] Total clients: ${this.clients.size}`);

      this.send(ws, {
        type: 'connected',
        message: 'Connected to crossword leaderboard feed',
        timestamp: Date.now(),
      });

      ws.on('message', (message: RawData) => {
        let data: unknown;
        try {
          data = JSON.parse(message.toString());
        } catch (error) {
          console.error('[WebSocket] Error parsing client message:', error);
          this.send(ws, { type: 'error', message: 'Invalid message format' });
          return;
        }
        this.handleClientMessage(ws, data);
      });

      ws.on('close', () => {
        this.clients.delete(ws);
        console.log(`[WebSocket] Client disconnected. Total clients: ${this.clients.size}`);
      });

      ws.on('error', (error) => {
        console.error('[WebSocket] Client error:', error);
        this.clients.delete(ws);
      });
    });

    console.log(`[WebSocket] Server initialized on path ${WEBSOCKET_PATH}`);
  }

  /**
   * Handle messages from clients (ping, subscribe)
   */
  private handleClientMessage(ws: WebSocket, data: unknown): void {
    const type = typeof data === 'object' && data !== null ? Reflect.get(data, 'type') : undefined;

    switch (type) {
      case 'ping':
        this.send(ws, { type: 'pong', timestamp: Date.now() });
        break;
      case 'subscribe':
        this.send(ws, { type: 'subscribed', message: 'Subscribed to recent entries' });
        break;
      default:
        this.send(ws, { type: 'error', message: 'Unknown message type' });
    }
  }

  /**
   * Push the refreshed recent-entries list to every open connection
   */
  broadcastEntries(update: EntriesUpdate): void {
    const payload: WebSocketMessage = { type: 'entries_update', data: update };
    const message = JSON.stringify(payload);

    let successCount = 0;
    let failCount = 0;

    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        try {
          client.send(message);
          successCount++;
        } catch (error) {
          console.error('[WebSocket] Error sending to client:', error);
          failCount++;
        }
      } else {
        this.clients.delete(client);
        failCount++;
      }
    });

    console.log(`[WebSocket] Broadcasted to ${successCount} clients (${failCount} failed)`);
  }

  private send(client: WebSocket, message: WebSocketMessage): void {
    if (client.readyState === WebSocket.OPEN) {
      client.send(JSON.stringify(message));
    }
  }

  /**
   * Send a heartbeat to open connections and drop closed ones
   */
  private sendHeartbeat(): void {
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        try {
          this.send(client, { type: 'heartbeat', timestamp: Date.now() });
        } catch (error) {
          console.error('[WebSocket] Error sending heartbeat:', error);
          this.clients.delete(client);
        }
      } else {
        this.clients.delete(client);
      }
    });
  }

  /**
   * Start periodic heartbeat (every 30 seconds)
   */
  startHeartbeat(intervalMs: number = 30000): void {
    this.stopHeartbeat();
    this.heartbeat = setInterval(() => this.sendHeartbeat(), intervalMs);
  }

  /**
   * Stop the heartbeat timer
   */
  stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }

  /**
   * Notify clients of shutdown and close the server
   */
  close(): Promise<void> {
    console.log('[WebSocket] Closing all connections...');
    this.stopHeartbeat();

    this.clients.forEach((client) => {
      try {
        this.send(client, { type: 'server_shutdown', message: 'Server is shutting down' });
        client.close();
      } catch (error) {
        console.error('[WebSocket] Error closing client:', error);
      }
    });
    this.clients.clear();

    return new Promise((resolve, reject) => {
      this.wss.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        console.log('[WebSocket] Server closed');
        resolve();
      });
    });
  }
}
