import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type { PositionPublisherPort, ProcessedRecord } from '@uwb-locator/domain';

type WsMessage = { type: 'positions'; data: readonly ProcessedRecord[] };

let _instance: WsGateway | null = null;

export class WsGateway implements PositionPublisherPort {
  private readonly wss: WebSocketServer;
  private readonly clients = new Set<WebSocket>();

  constructor(server: Server) {
    this.wss = new WebSocketServer({ server, path: '/ws' });

    this.wss.on('connection', (ws) => {
      this.clients.add(ws);
      ws.on('close', () => this.clients.delete(ws));
      ws.on('error', () => this.clients.delete(ws));
    });

    _instance = this;
    console.log('[ws-gateway] listening on /ws');
  }

  static getInstance(): WsGateway | null {
    return _instance;
  }

  async publishPositions(records: readonly ProcessedRecord[]): Promise<void> {
    this.broadcast({ type: 'positions', data: records });
  }

  close(): void {
    for (const ws of this.clients) ws.terminate();
    this.clients.clear();
    this.wss.close();
    if (_instance === this) _instance = null;
  }

  private broadcast(msg: WsMessage): void {
    const payload = JSON.stringify(msg);
    for (const ws of this.clients) {
      if (ws.readyState === WebSocket.OPEN) ws.send(payload);
    }
  }
}

/** Publishes through the gateway once the HTTP server has created it. */
export const gatewayPublisher: PositionPublisherPort = {
  async publishPositions(records) {
    await WsGateway.getInstance()?.publishPositions(records);
  },
};
