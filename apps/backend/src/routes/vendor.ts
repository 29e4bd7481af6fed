/**
 * Vendor Property Routes
 * Raw extension-unit payloads, exchanged as lowercase hex
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { API_ENDPOINTS, ERROR_MESSAGES, HTTP_STATUS } from "@camctl/config";
import {
  Guid,
  readVendorPropertyResult,
  unwrapOrThrow,
  writeVendorPropertyResult,
} from "@camctl/device-control";
import { formatHex, parseHex } from "@camctl/utils";
import type { RouteOptions } from "./devices";
import { type IndexParams, fail, invalidIndex, ok, parseIndex, readField, sendError } from "./helpers";

interface VendorParams extends IndexParams {
  guid: string;
  propertyId: string;
}

/**
 * Payload from a hex string or an array of byte values
 */
function readVendorData(body: unknown): Uint8Array | readonly number[] | null {
  const data = readField(body, "data");
  if (typeof data === "string") {
    return parseHex(data);
  }
  if (Array.isArray(data)) {
    const bytes = data.filter((byte): byte is number => typeof byte === "number");
    return bytes.length === data.length ? bytes : null;
  }
  return null;
}

export async function vendorRoutes(fastify: FastifyInstance, options: RouteOptions) {
  const { pool } = options;

  /**
   * GET /api/devices/:index/vendor/:guid/:propertyId
   */
  fastify.get(
    API_ENDPOINTS.VENDOR_PROPERTY,
    async (request: FastifyRequest<{ Params: VendorParams }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      try {
        const device = pool.resolveDevice(index);
        const guid = unwrapOrThrow(Guid.fromString(request.params.guid), "vendor property set");
        const propertyId = Number(request.params.propertyId);
        const data = unwrapOrThrow(
          readVendorPropertyResult(device, guid, propertyId, pool.backend),
          "read vendor property",
        );
        return ok(reply, { guid: guid.toString(), propertyId, data: formatHex(data) });
      } catch (error) {
        return sendError(reply, error, "read vendor property");
      }
    },
  );

  /**
   * PUT /api/devices/:index/vendor/:guid/:propertyId
   * Body: { data: "0a0b" | [10, 11] }
   */
  fastify.put(
    API_ENDPOINTS.VENDOR_PROPERTY,
    async (request: FastifyRequest<{ Params: VendorParams; Body: unknown }>, reply: FastifyReply) => {
      const index = parseIndex(request.params.index);
      if (index === null) return invalidIndex(reply);

      const data = readVendorData(request.body);
      if (!data) {
        return fail(reply, HTTP_STATUS.BAD_REQUEST, "InvalidArgument", ERROR_MESSAGES.VENDOR_DATA_INVALID);
      }

      try {
        const device = pool.resolveDevice(index);
        const guid = unwrapOrThrow(Guid.fromString(request.params.guid), "vendor property set");
        const propertyId = Number(request.params.propertyId);
        unwrapOrThrow(
          writeVendorPropertyResult(device, guid, propertyId, data, pool.backend),
          "write vendor property",
        );
        return ok(reply, { guid: guid.toString(), propertyId, data: formatHex(data) });
      } catch (error) {
        return sendError(reply, error, "write vendor property");
      }
    },
  );
}
