/**
 * Device Routes
 * Enumeration, capability dumps and full device reports
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { API_ENDPOINTS } from "@camctl/config";
import { getDeviceInfo } from "@camctl/device-control";
import type { ControllerPool } from "../services/controller-pool";
import { type IndexParams, invalidIndex, ok, parseIndex, sendError } from "./helpers";

export interface RouteOptions {
  pool: ControllerPool;
}

export async function deviceRoutes(fastify: FastifyInstance, options: RouteOptions) {
  const { pool } = options;

  /**
   * GET /api/devices
   * List connected devices with their enumeration index
   */
  fastify.get(API_ENDPOINTS.DEVICES, async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      return ok(reply, pool.listDevices());
    } catch (error) {
      return sendError(reply, error, "list devices");
    }
  });

  /**
   * GET /api/devices/:index
   * Identity and connection state of one device
   */
  fastify.get(
    API_ENDPOINTS.DEVICE,
    async (request: FastifyRequest<{ Params: IndexParams }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      try {
        const device = pool.resolveDevice(index);
        const connected = pool.backend.isDeviceConnected(device);
        return ok(reply, {
          index,
          name: device.name,
          path: device.path,
          connected: connected.isOk() && connected.value(),
        });
      } catch (error) {
        return sendError(reply, error, "get device");
      }
    },
  );

  /**
   * GET /api/devices/:index/capabilities
   * Capability snapshot: range, auto support and current value per property
   */
  fastify.get(
    API_ENDPOINTS.DEVICE_CAPABILITIES,
    async (request: FastifyRequest<{ Params: IndexParams }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      try {
        const controller = await pool.acquire(index);
        controller.refreshCapabilities();
        return ok(reply, controller.capabilities().toJSON());
      } catch (error) {
        return sendError(reply, error, "read capabilities");
      }
    },
  );

  /**
   * GET /api/devices/:index/info
   * Full device report with per-property errors
   */
  fastify.get(
    API_ENDPOINTS.DEVICE_INFO,
    async (request: FastifyRequest<{ Params: IndexParams }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      try {
        return ok(reply, getDeviceInfo(pool.resolveDevice(index), pool.backend));
      } catch (error) {
        return sendError(reply, error, "read device info");
      }
    },
  );
}
