import Fastify from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import { APP_CONFIG, HTTP_STATUS } from "@camctl/config";
import { getBackend, type DeviceBackend, type StepPolicy } from "@camctl/device-control";
import { createLogger } from "@camctl/utils";
import { env } from "./config/env";
import { deviceRoutes } from "./routes/devices";
import { diagnosticsRoutes } from "./routes/diagnostics";
import { presetRoutes } from "./routes/presets";
import { propertyRoutes } from "./routes/properties";
import { vendorRoutes } from "./routes/vendor";
import { ControllerPool } from "./services/controller-pool";

const logger = createLogger("app");

export interface AppOptions {
  /** Defaults to the process-wide backend */
  backend?: DeviceBackend;
  clampValues?: boolean;
  stepPolicy?: StepPolicy;
  openAttempts?: number;
  openRetryDelayMs?: number;
}

/**
 * Create and configure the Fastify application
 *
 * ROUTES MANIFEST:
 * =================
 *   GET    /health                                   - Service health check
 *   GET    /                                         - API info
 *
 * Device Routes:
 *   GET    /api/devices                              - List devices
 *   GET    /api/devices/:index                       - Device identity and state
 *   GET    /api/devices/:index/capabilities          - Capability snapshot
 *   GET    /api/devices/:index/info                  - Full device report
 *
 * Property Routes:
 *   GET    /api/devices/:index/properties            - Supported names and values
 *   PATCH  /api/devices/:index/properties            - Batch write
 *   GET    /api/devices/:index/properties/:name      - Read one property
 *   PUT    /api/devices/:index/properties/:name      - Write one property
 *   GET    /api/devices/:index/properties/:name/range - Property range
 *   POST   /api/devices/:index/properties/:name/move - Relative move
 *   POST   /api/devices/:index/reset                 - Restore defaults
 *   POST   /api/devices/:index/center                - Center pan and tilt
 *
 * Preset Routes:
 *   GET    /api/devices/:index/presets               - Preset names and custom presets
 *   POST   /api/devices/:index/presets/:preset/apply - Apply a preset
 *   PUT    /api/devices/:index/presets/:preset       - Save a custom preset
 *   DELETE /api/devices/:index/presets/:preset       - Delete a custom preset
 *
 * Vendor Routes:
 *   GET    /api/devices/:index/vendor/:guid/:propertyId - Read a payload
 *   PUT    /api/devices/:index/vendor/:guid/:propertyId - Write a payload
 *
 * Diagnostics:
 *   GET    /api/diagnostics                          - Report and error statistics
 *   DELETE /api/diagnostics                          - Reset error statistics
 *
 * WebSocket:
 *   WS     /ws/devices                               - Hotplug events
 */
export async function createApp(options: AppOptions = {}) {
  const app = Fastify({
    logger: false, // We use Winston instead
  });

  const pool = new ControllerPool({
    backend: options.backend ?? getBackend(),
    clampValues: options.clampValues ?? env.clampValues,
    stepPolicy: options.stepPolicy ?? (env.strictStep ? "strict" : "lenient"),
    openAttempts: options.openAttempts,
    openRetryDelayMs: options.openRetryDelayMs,
  });
  app.decorate("controllerPool", pool);
  app.addHook("onClose", async () => {
    pool.closeAll();
  });

  // Register plugins
  await app.register(cors, {
    origin: true,
    credentials: true,
  });

  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  // Register routes
  await app.register(deviceRoutes, { pool });
  await app.register(propertyRoutes, { pool });
  await app.register(presetRoutes, { pool });
  await app.register(vendorRoutes, { pool });
  await app.register(diagnosticsRoutes);

  // Health check endpoint
  app.get("/health", async () => {
    return {
      status: "ok",
      timestamp: new Date().toISOString(),
      environment: env.nodeEnv,
      backend: pool.backend.kind,
      uptime: process.uptime(),
    };
  });

  app.get("/", async () => {
    return {
      name: APP_CONFIG.APP_NAME,
      version: APP_CONFIG.APP_VERSION,
      status: "running",
    };
  });

  // Error handler
  app.setErrorHandler((error, request, reply) => {
    logger.error("Request error:", {
      error: error.message,
      stack: error.stack,
      url: request.url,
      method: request.method,
    });

    const statusCode = error.statusCode ?? HTTP_STATUS.INTERNAL_SERVER_ERROR;
    reply.status(statusCode).send({
      success: false,
      error: error.name || "Internal Server Error",
      message: error.message || "An unexpected error occurred",
    });
  });

  app.setNotFoundHandler((request, reply) => {
    reply.status(HTTP_STATUS.NOT_FOUND).send({
      success: false,
      error: "Not Found",
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
}

declare module "fastify" {
  interface FastifyInstance {
    controllerPool: ControllerPool;
  }
}
