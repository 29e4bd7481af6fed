/**
 * Preset Routes
 * Built-in and per-device custom presets
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { API_ENDPOINTS, ERROR_MESSAGES, HTTP_STATUS } from "@camctl/config";
import type { RouteOptions } from "./devices";
import { type IndexParams, fail, invalidIndex, ok, parseIndex, readPropertyMap, sendError } from "./helpers";

interface PresetParams extends IndexParams {
  preset: string;
}

export async function presetRoutes(fastify: FastifyInstance, options: RouteOptions) {
  const { pool } = options;

  /**
   * GET /api/devices/:index/presets
   * Preset names (built-in first) and the device's custom presets
   */
  fastify.get(
    API_ENDPOINTS.PRESETS,
    async (request: FastifyRequest<{ Params: IndexParams }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      try {
        const controller = await pool.acquire(index);
        return ok(reply, { names: controller.getPresetNames(), custom: controller.getCustomPresets() });
      } catch (error) {
        return sendError(reply, error, "list presets");
      }
    },
  );

  /**
   * POST /api/devices/:index/presets/:preset/apply
   * applied is false when any entry could not be set
   */
  fastify.post(
    API_ENDPOINTS.PRESET_APPLY,
    async (request: FastifyRequest<{ Params: PresetParams }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      try {
        const controller = await pool.acquire(index);
        const { preset } = request.params;
        return ok(reply, { preset, applied: controller.applyPreset(preset) });
      } catch (error) {
        return sendError(reply, error, `apply preset ${request.params.preset}`);
      }
    },
  );

  /**
   * PUT /api/devices/:index/presets/:preset
   * Body: { property: value, ... }
   */
  fastify.put(
    API_ENDPOINTS.PRESET,
    async (request: FastifyRequest<{ Params: PresetParams; Body: unknown }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      const properties = readPropertyMap(request.body);
      if (!properties) {
        return fail(reply, HTTP_STATUS.BAD_REQUEST, "InvalidArgument", ERROR_MESSAGES.PRESET_BODY_INVALID);
      }

      try {
        const controller = await pool.acquire(index);
        const { preset } = request.params;
        controller.createCustomPreset(preset, properties);
        return ok(reply, { preset, properties }, HTTP_STATUS.CREATED);
      } catch (error) {
        return sendError(reply, error, `save preset ${request.params.preset}`);
      }
    },
  );

  /**
   * DELETE /api/devices/:index/presets/:preset
   * Only custom presets can be deleted
   */
  fastify.delete(
    API_ENDPOINTS.PRESET,
    async (request: FastifyRequest<{ Params: PresetParams }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      try {
        const controller = await pool.acquire(index);
        const { preset } = request.params;
        if (!controller.deleteCustomPreset(preset)) {
          return fail(reply, HTTP_STATUS.NOT_FOUND, "PresetNotFound", `No custom preset '${preset}'`);
        }
        return ok(reply, { preset, deleted: true });
      } catch (error) {
        return sendError(reply, error, `delete preset ${request.params.preset}`);
      }
    },
  );
}
