/**
 * Property Routes
 * Get/set by name or alias, ranges, batch writes, relative moves, reset and
 * centering
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { API_ENDPOINTS, ERROR_MESSAGES, HTTP_STATUS } from "@camctl/config";
import { unwrapOrThrow } from "@camctl/device-control";
import { createLogger } from "@camctl/utils";
import type { RouteOptions } from "./devices";
import {
  type IndexParams,
  fail,
  invalidIndex,
  isControlMode,
  isPropertyValue,
  ok,
  parseIndex,
  readField,
  readPropertyMap,
  sendError,
} from "./helpers";

const logger = createLogger("property-routes");

interface PropertyParams extends IndexParams {
  name: string;
}

export async function propertyRoutes(fastify: FastifyInstance, options: RouteOptions) {
  const { pool } = options;

  /**
   * GET /api/devices/:index/properties
   * Supported property names and the current value of each readable one
   */
  fastify.get(
    API_ENDPOINTS.PROPERTIES,
    async (request: FastifyRequest<{ Params: IndexParams }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      try {
        const controller = await pool.acquire(index);
        const supported = controller.getSupportedProperties();
        const values = controller.getMultiple([...supported.camera, ...supported.video]);
        return ok(reply, { supported, values });
      } catch (error) {
        return sendError(reply, error, "list properties");
      }
    },
  );

  /**
   * PATCH /api/devices/:index/properties
   * Batch write; every entry is attempted and reported
   */
  fastify.patch(
    API_ENDPOINTS.PROPERTIES,
    async (request: FastifyRequest<{ Params: IndexParams; Body: unknown }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      const values = readPropertyMap(request.body);
      if (!values) {
        return fail(reply, HTTP_STATUS.BAD_REQUEST, "InvalidArgument", ERROR_MESSAGES.PRESET_BODY_INVALID);
      }

      try {
        const controller = await pool.acquire(index);
        const status = controller.setMultiple(values);
        logger.info("Batch write", { device: controller.deviceName, status });
        return ok(reply, status);
      } catch (error) {
        return sendError(reply, error, "write properties");
      }
    },
  );

  /**
   * GET /api/devices/:index/properties/:name
   */
  fastify.get(
    API_ENDPOINTS.PROPERTY,
    async (request: FastifyRequest<{ Params: PropertyParams }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      try {
        const controller = await pool.acquire(index);
        const { name } = request.params;
        return ok(reply, { name, value: controller.get(name) });
      } catch (error) {
        return sendError(reply, error, `read ${request.params.name}`);
      }
    },
  );

  /**
   * PUT /api/devices/:index/properties/:name
   * Body: { value: number | boolean | "auto", mode?: "auto" | "manual" }
   */
  fastify.put(
    API_ENDPOINTS.PROPERTY,
    async (request: FastifyRequest<{ Params: PropertyParams; Body: unknown }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      const value = readField(request.body, "value");
      if (!isPropertyValue(value)) {
        return fail(reply, HTTP_STATUS.BAD_REQUEST, "InvalidArgument", ERROR_MESSAGES.PROPERTY_VALUE_INVALID);
      }
      const rawMode = readField(request.body, "mode");
      const mode = rawMode === undefined ? undefined : isControlMode(rawMode) ? rawMode : null;
      if (mode === null) {
        return fail(reply, HTTP_STATUS.BAD_REQUEST, "InvalidArgument", ERROR_MESSAGES.PROPERTY_MODE_INVALID);
      }

      try {
        const controller = await pool.acquire(index);
        const { name } = request.params;
        controller.set(name, value, mode);
        logger.info("Property set", { device: controller.deviceName, name, value, mode });
        return ok(reply, { name, value: controller.get(name) });
      } catch (error) {
        return sendError(reply, error, `set ${request.params.name}`);
      }
    },
  );

  /**
   * GET /api/devices/:index/properties/:name/range
   */
  fastify.get(
    API_ENDPOINTS.PROPERTY_RANGE,
    async (request: FastifyRequest<{ Params: PropertyParams }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      try {
        const controller = await pool.acquire(index);
        return ok(reply, controller.getPropertyRange(request.params.name));
      } catch (error) {
        return sendError(reply, error, `read range of ${request.params.name}`);
      }
    },
  );

  /**
   * POST /api/devices/:index/properties/:name/move
   * Body: { delta: integer }
   */
  fastify.post(
    API_ENDPOINTS.PROPERTY_MOVE,
    async (request: FastifyRequest<{ Params: PropertyParams; Body: unknown }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      const delta = readField(request.body, "delta");
      if (typeof delta !== "number" || !Number.isInteger(delta)) {
        return fail(reply, HTTP_STATUS.BAD_REQUEST, "InvalidArgument", ERROR_MESSAGES.DELTA_INVALID);
      }

      try {
        const controller = await pool.acquire(index);
        const { name } = request.params;
        unwrapOrThrow(controller.moveRelativeResult(name, delta), `move ${name}`);
        return ok(reply, { name, value: controller.get(name) });
      } catch (error) {
        return sendError(reply, error, `move ${request.params.name}`);
      }
    },
  );

  /**
   * POST /api/devices/:index/reset
   * Restore every property's default; reports the ones that failed
   */
  fastify.post(
    API_ENDPOINTS.PROPERTY_RESET,
    async (request: FastifyRequest<{ Params: IndexParams }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      try {
        const controller = await pool.acquire(index);
        return ok(reply, { failed: controller.resetToDefaults() });
      } catch (error) {
        return sendError(reply, error, "reset device");
      }
    },
  );

  /**
   * POST /api/devices/:index/center
   * Pan and tilt to zero where supported
   */
  fastify.post(
    API_ENDPOINTS.PROPERTY_CENTER,
    async (request: FastifyRequest<{ Params: IndexParams }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      try {
        const controller = await pool.acquire(index);
        return ok(reply, { failed: controller.centerCamera() });
      } catch (error) {
        return sendError(reply, error, "center camera");
      }
    },
  );
}
