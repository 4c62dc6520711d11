import { Server } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import type { MarketEvent } from '../../contracts/src';
import { toJson, type Json } from './utils/json';

export type MarketChannelEvent = {
  type: MarketEvent['type'];
  payload: Json;
};

const isChannelRequest = (value: unknown): value is { type: 'subscribe' | 'unsubscribe'; channel: string } =>
  typeof value === 'object' &&
  value !== null &&
  'type' in value &&
  (value.type === 'subscribe' || value.type === 'unsubscribe') &&
  'channel' in value &&
  typeof value.channel === 'string';

class Hub {
  private wss: WebSocketServer;
  private channelMap = new Map<string, Set<WebSocket>>();

  constructor(server: Server) {
    this.wss = new WebSocketServer({ server, path: '/ws' });
    this.wss.on('connection', (socket) => this.bindSocket(socket));
  }

  private bindSocket(socket: WebSocket) {
    const channels = new Set<string>();

    socket.on('message', (data) => {
      let request: unknown;
      try {
        request = JSON.parse(data.toString());
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        socket.send(JSON.stringify({ type: 'error', message: `Invalid message: ${reason}` }));
        return;
      }
      if (!isChannelRequest(request)) {
        socket.send(JSON.stringify({ type: 'error', message: 'Unsupported message' }));
        return;
      }
      if (request.type === 'subscribe') {
        this.subscribe(request.channel, socket, channels);
      } else {
        this.unsubscribe(request.channel, socket, channels);
      }
    });

    socket.on('close', () => {
      channels.forEach((channel) => this.unsubscribe(channel, socket, channels));
    });
  }

  private subscribe(channel: string, socket: WebSocket, channelRegistry: Set<string>) {
    const sockets = this.channelMap.get(channel) ?? new Set<WebSocket>();
    this.channelMap.set(channel, sockets);
    sockets.add(socket);
    channelRegistry.add(channel);

    socket.send(
      JSON.stringify({ type: 'subscribed', channel, timestamp: new Date().toISOString() })
    );
  }

  private unsubscribe(channel: string, socket: WebSocket, channelRegistry: Set<string>) {
    const sockets = this.channelMap.get(channel);
    if (!sockets) return;
    sockets.delete(socket);
    if (sockets.size === 0) {
      this.channelMap.delete(channel);
    }
    channelRegistry.delete(channel);
  }

  broadcast(channel: string, event: MarketChannelEvent) {
    const sockets = this.channelMap.get(channel);
    if (!sockets) return;
    const payload = JSON.stringify(event);
    sockets.forEach((socket) => {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(payload);
      }
    });
  }

  close() {
    this.wss.close();
  }
}

let hubInstance: Hub | null = null;

export const initWebSocketHub = (server: Server) => {
  hubInstance = new Hub(server);
  return hubInstance;
};

export const isWebSocketHealthy = (): boolean => hubInstance !== null;

export const channelName = (marketId: string) => `market:${marketId}`;

export const toChannelEvent = (event: MarketEvent): MarketChannelEvent => ({ type: event.type, payload: toJson(event) });

export const broadcastMarketEvent = (event: MarketEvent) => {
  if (!hubInstance) return;
  hubInstance.broadcast(channelName(event.marketId), toChannelEvent(event));
};
