import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { IncomingMessage, Server } from 'http';
import { v4 as uuidv4 } from 'uuid';
import { ConnectionFault } from '@transit-pulse/domain';
import type { BroadcastHub, RealtimeConnection } from '../realtime/broadcast-hub.js';
import { resolveChannel, topicFor, type Channel } from '../realtime/channels.js';
import {
  toCountsMessage,
  toNotificationMessage,
  type RealtimeMessage,
} from '../realtime/hub-publisher.js';
import type { RealtimeSnapshots } from '../realtime/realtime-snapshots.js';

class WsConnection implements RealtimeConnection {
  constructor(
    readonly id: string,
    private readonly socket: WebSocket,
    private readonly onFault: (err: Error) => void,
  ) {}

  send(frame: string): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new ConnectionFault(`connection ${this.id} is not open`);
    }
    this.socket.send(frame, (err) => {
      if (err) this.onFault(err);
    });
  }
}

/**
 * Accepts `/ws/...` upgrades, subscribes each socket to its channel's topic,
 * sends a snapshot, then only answers keep-alives until the socket closes.
 */
export class WsGateway {
  private readonly wss: WebSocketServer;

  constructor(
    server: Server,
    private readonly hub: BroadcastHub,
    private readonly snapshots: RealtimeSnapshots,
  ) {
    this.wss = new WebSocketServer({ server });
    this.wss.on('connection', (ws, req) => this.accept(ws, req));
    console.log('[ws-gateway] listening on /ws/*');
  }

  async close(): Promise<void> {
    for (const client of this.wss.clients) client.terminate();
    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private accept(ws: WebSocket, req: IncomingMessage): void {
    const channel = resolveChannel(req.url);
    if (!channel) {
      ws.close(1008, 'unknown channel');
      return;
    }

    const connection = new WsConnection(uuidv4(), ws, (err) => {
      console.warn(`[ws-gateway] send to ${connection.id} failed: ${err.message}`);
      this.hub.removeConnection(connection);
    });
    this.hub.subscribe(connection, topicFor(channel));

    ws.on('message', (data: RawData) => {
      if (data.toString() === 'ping' && ws.readyState === WebSocket.OPEN) ws.send('pong');
    });
    ws.on('close', () => this.hub.removeConnection(connection));
    ws.on('error', (err) => {
      console.warn(`[ws-gateway] socket ${connection.id} error: ${err.message}`);
      this.hub.removeConnection(connection);
    });

    void this.sendSnapshot(connection, channel);
  }

  private async sendSnapshot(connection: RealtimeConnection, channel: Channel): Promise<void> {
    try {
      const message = await this.snapshotFor(channel);
      connection.send(JSON.stringify(message));
    } catch (err) {
      console.warn(
        `[ws-gateway] snapshot for ${channel.kind} failed`,
        err instanceof Error ? err.message : err,
      );
    }
  }

  private async snapshotFor(channel: Channel): Promise<RealtimeMessage> {
    switch (channel.kind) {
      case 'vehicle-location':
        return {
          type: 'location_snapshot',
          vehicleId: channel.vehicleId,
          data: await this.snapshots.vehicleLocation(channel.vehicleId),
        };
      case 'vehicle-eta':
        return { type: 'connected', channel: topicFor(channel), message: 'Connected to real-time ETA updates' };
      case 'fleet-vehicles':
        return {
          type: 'vehicle_list',
          fleetId: channel.fleetId,
          data: await this.snapshots.fleetVehicles(channel.fleetId),
        };
      case 'user-notifications': {
        const records = await this.snapshots.recentNotifications(channel.userId);
        return { type: 'notification_history', data: records.map(toNotificationMessage) };
      }
      case 'stats':
        return { type: 'stats', data: toCountsMessage(await this.snapshots.counts()) };
    }
  }
}
