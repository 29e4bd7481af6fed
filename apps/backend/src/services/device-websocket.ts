/**
 * WebSocket Device Events
 *
 * Push hotplug events to connected clients via WebSocket.
 * Events: connection, device:added, device:removed, device:list
 */

import type { FastifyInstance } from "fastify";
import { nanoid } from "nanoid";
import { WebSocket, WebSocketServer } from "ws";
import { API_ENDPOINTS } from "@camctl/config";
import type { DeviceEvent, DeviceEventType } from "@camctl/types";
import { createLogger } from "@camctl/utils";
import type { ControllerPool } from "./controller-pool";

const logger = createLogger("ws-devices");

interface WSClient {
  ws: WebSocket;
  id: string;
  subscriptions: Set<string>;
}

interface ClientMessage {
  action: string;
  events: string[];
}

function parseClientMessage(raw: string): ClientMessage | null {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || !("action" in parsed)) {
    return null;
  }
  const { action } = parsed;
  if (typeof action !== "string") {
    return null;
  }
  const events =
    "events" in parsed && Array.isArray(parsed.events)
      ? parsed.events.filter((event): event is string => typeof event === "string")
      : [];
  return { action, events };
}

export function createEvent<T>(type: DeviceEventType, data: T): DeviceEvent<T> {
  return { type, data, timestamp: new Date().toISOString() };
}

export class DeviceWebSocketServer {
  private wss: WebSocketServer | null = null;
  private clients: Map<string, WSClient> = new Map();

  constructor(
    fastify: FastifyInstance,
    private readonly pool: ControllerPool,
  ) {
    this.setupWebSocket(fastify);
  }

  private setupWebSocket(fastify: FastifyInstance): void {
    this.wss = new WebSocketServer({
      server: fastify.server,
      path: API_ENDPOINTS.WS_DEVICES,
    });

    this.wss.on("connection", (ws: WebSocket) => {
      const client: WSClient = { ws, id: `client-${nanoid(10)}`, subscriptions: new Set() };

      this.clients.set(client.id, client);
      logger.info(`WebSocket: Client ${client.id} connected (${this.clients.size} total)`);

      this.sendToClient(client, createEvent("connection", { status: "connected", clientId: client.id }));

      ws.on("message", (data: Buffer) => {
        try {
          const message = parseClientMessage(data.toString());
          if (message) {
            this.handleClientMessage(client, message);
          } else {
            logger.warn("WebSocket: Message without an action", { clientId: client.id });
          }
        } catch (error) {
          logger.warn("WebSocket: Invalid message from client", {
            error: error instanceof Error ? error.message : String(error),
          });
        }
      });

      ws.on("close", () => {
        this.clients.delete(client.id);
        logger.info(`WebSocket: Client ${client.id} disconnected (${this.clients.size} remaining)`);
      });

      ws.on("error", (error) => {
        logger.error(`WebSocket: Client ${client.id} error`, { error: error.message });
        this.clients.delete(client.id);
      });
    });

    logger.info(`WebSocket: Device events server initialized on ${API_ENDPOINTS.WS_DEVICES}`);
  }

  private handleClientMessage(client: WSClient, message: ClientMessage): void {
    switch (message.action) {
      case "subscribe":
        message.events.forEach((event) => client.subscriptions.add(event));
        logger.debug(`WebSocket: Client ${client.id} subscribed to ${message.events.join(", ")}`);
        break;

      case "unsubscribe":
        message.events.forEach((event) => client.subscriptions.delete(event));
        break;

      case "getDevices":
        this.sendDeviceList(client);
        break;

      default:
        logger.warn(`WebSocket: Unknown action ${message.action}`);
    }
  }

  private sendDeviceList(client: WSClient): void {
    try {
      this.sendToClient(client, createEvent("device:list", this.pool.listDevices()));
    } catch (error) {
      logger.error("WebSocket: Error listing devices", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Broadcast event to every client subscribed to its type (or to everything)
   */
  broadcast<T>(event: DeviceEvent<T>): void {
    for (const client of this.clients.values()) {
      if (client.subscriptions.size === 0 || client.subscriptions.has(event.type)) {
        this.sendToClient(client, event);
      }
    }
  }

  private sendToClient<T>(client: WSClient, event: DeviceEvent<T>): void {
    if (client.ws.readyState === WebSocket.OPEN) {
      try {
        client.ws.send(JSON.stringify(event));
      } catch (error) {
        logger.error(`WebSocket: Error sending to client ${client.id}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  getClientCount(): number {
    return this.clients.size;
  }

  close(): void {
    if (this.wss) {
      for (const client of this.clients.values()) {
        client.ws.close();
      }
      this.clients.clear();

      this.wss.close();
      this.wss = null;
      logger.info("WebSocket: Server closed");
    }
  }
}
