/**
 * Backend Index - Server Entry Point
 *
 * Selects the device backend from configuration, starts the HTTP API, and
 * forwards hotplug events to WebSocket clients on /ws/devices. Routes are
 * listed in app.ts.
 */

import type { FastifyInstance } from "fastify";
import {
  LogLevel,
  createBackend,
  parseLogLevel,
  resetBackend,
  setBackend,
  setLogLevel,
} from "@camctl/device-control";
import type { HotplugEventData } from "@camctl/types";
import { createLogger } from "@camctl/utils";
import { createApp } from "./app";
import { configuredBackendType, env, validateEnv } from "./config/env";
import { DeviceMonitor } from "./services/device-monitor";
import { DeviceWebSocketServer, createEvent } from "./services/device-websocket";

const logger = createLogger("server");

let app: FastifyInstance | null = null;
let monitor: DeviceMonitor | null = null;
let wsServer: DeviceWebSocketServer | null = null;

export interface ServerOptions {
  port?: number;
  host?: string;
}

export async function startServer(options: ServerOptions = {}): Promise<void> {
  if (app) {
    logger.warn("Server already started");
    return;
  }

  logger.info("Starting camctl backend server...");

  const problems = validateEnv();
  const backendType = configuredBackendType();
  if (problems.length > 0 || backendType === null) {
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  const logLevel = env.logLevel ? parseLogLevel(env.logLevel) : null;
  setLogLevel(logLevel ?? LogLevel.Info);
  setBackend(createBackend(backendType, { simulatedDevices: env.simulatedDevices }));

  const instance = await createApp();
  app = instance;

  const port = options.port ?? env.port;
  const host = options.host ?? env.host;
  await instance.listen({ port, host });

  logger.info(`Server listening on http://${host}:${port}`);
  logger.info(`Environment: ${env.nodeEnv}`);
  logger.info(`Device backend: ${backendType}`);

  // Subscribe hotplug events to WebSocket
  wsServer = new DeviceWebSocketServer(instance, instance.controllerPool);
  monitor = new DeviceMonitor(instance.controllerPool);
  const server = wsServer;
  monitor.on("device:added", (data: HotplugEventData) => {
    server.broadcast(createEvent("device:added", data));
  });
  monitor.on("device:removed", (data: HotplugEventData) => {
    server.broadcast(createEvent("device:removed", data));
  });
  monitor.start();

  logger.info("=== camctl backend server started ===");
}

export async function stopServer(): Promise<void> {
  if (!app) {
    logger.warn("Server not started");
    return;
  }

  logger.info("Stopping camctl backend server...");

  monitor?.stop();
  monitor = null;

  wsServer?.close();
  wsServer = null;

  // Closes every controller through the onClose hook
  await app.close();
  app = null;

  resetBackend();
  logger.info("Server stopped successfully");
}

// CLI mode (when run directly)
if (require.main === module) {
  const gracefulShutdown = async (signal: string) => {
    logger.info(`Received ${signal}, starting graceful shutdown...`);
    try {
      await stopServer();
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown:", error);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Rejection:", { reason });
  });

  process.on("uncaughtException", (error) => {
    logger.error("Uncaught Exception:", error);
    process.exit(1);
  });

  startServer().catch((error) => {
    logger.error("Failed to start server:", error);
    process.exit(1);
  });
}
