/**
 * Diagnostics Routes
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { API_ENDPOINTS } from "@camctl/config";
import { getDiagnosticInfo, getErrorStatistics, resetErrorStatistics } from "@camctl/device-control";
import { ok, sendError } from "./helpers";

export async function diagnosticsRoutes(fastify: FastifyInstance) {
  /**
   * GET /api/diagnostics
   * Text report plus the error statistics behind it
   */
  fastify.get(API_ENDPOINTS.DIAGNOSTICS, async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      return ok(reply, { report: getDiagnosticInfo(), statistics: getErrorStatistics() });
    } catch (error) {
      return sendError(reply, error, "collect diagnostics");
    }
  });

  /**
   * DELETE /api/diagnostics
   * Reset the error statistics
   */
  fastify.delete(API_ENDPOINTS.DIAGNOSTICS, async (_request: FastifyRequest, reply: FastifyReply) => {
    resetErrorStatistics();
    return ok(reply, { reset: true });
  });
}
