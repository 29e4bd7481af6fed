/**
 * Shared route helpers: the API envelope and ErrorKind to HTTP status mapping
 */

import type { FastifyReply } from "fastify";
import { ERROR_MESSAGES, HTTP_STATUS, type HttpStatus } from "@camctl/config";
import {
  CameraControlError,
  ErrorKind,
  PresetNotFoundError,
  errorKindName,
  suggestErrorResolution,
} from "@camctl/device-control";
import type { ApiFailure, ApiSuccess, ControlMode, PropertyValue } from "@camctl/types";
import { createLogger } from "@camctl/utils";

const logger = createLogger("routes");

export interface IndexParams {
  index: string;
}

export function statusForErrorKind(kind: ErrorKind): HttpStatus {
  switch (kind) {
    case ErrorKind.DeviceNotFound:
      return HTTP_STATUS.NOT_FOUND;
    case ErrorKind.DeviceBusy:
      return HTTP_STATUS.CONFLICT;
    case ErrorKind.PropertyNotSupported:
    case ErrorKind.InvalidValue:
      return HTTP_STATUS.UNPROCESSABLE_ENTITY;
    case ErrorKind.PermissionDenied:
      return HTTP_STATUS.FORBIDDEN;
    case ErrorKind.InvalidArgument:
      return HTTP_STATUS.BAD_REQUEST;
    case ErrorKind.NotImplemented:
      return HTTP_STATUS.NOT_IMPLEMENTED;
    case ErrorKind.SystemError:
    case ErrorKind.Success:
      return HTTP_STATUS.INTERNAL_SERVER_ERROR;
  }
}

export function ok<T>(reply: FastifyReply, data: T, status: HttpStatus = HTTP_STATUS.OK): FastifyReply {
  const body: ApiSuccess<T> = { success: true, data };
  return reply.code(status).send(body);
}

export function fail(reply: FastifyReply, status: HttpStatus, error: string, message: string): FastifyReply {
  const body: ApiFailure = { success: false, error, message };
  return reply.code(status).send(body);
}

/**
 * Send a thrown error in the failure envelope. Camera errors keep their kind
 * and carry resolution hints.
 */
export function sendError(reply: FastifyReply, error: unknown, action: string): FastifyReply {
  if (error instanceof CameraControlError) {
    const status = statusForErrorKind(error.errorKind);
    const body: ApiFailure = {
      success: false,
      error: errorKindName(error.errorKind),
      message: error.message,
      errorKind: errorKindName(error.errorKind),
      suggestions: suggestErrorResolution(error.errorKind),
    };
    logger.warn(`Failed to ${action}`, { error: error.toString() });
    return reply.code(status).send(body);
  }

  if (error instanceof PresetNotFoundError) {
    return fail(reply, HTTP_STATUS.NOT_FOUND, "PresetNotFound", error.message);
  }

  logger.error(`Failed to ${action}`, {
    error: error instanceof Error ? error.message : String(error),
  });
  return fail(reply, HTTP_STATUS.INTERNAL_SERVER_ERROR, "InternalError", ERROR_MESSAGES.INTERNAL_ERROR);
}

/**
 * Device index from a route parameter, or null when it is not a
 * non-negative integer
 */
export function parseIndex(raw: string): number | null {
  if (!/^\d+$/.test(raw)) {
    return null;
  }
  return Number(raw);
}

export function invalidIndex(reply: FastifyReply): FastifyReply {
  return fail(reply, HTTP_STATUS.BAD_REQUEST, "InvalidArgument", ERROR_MESSAGES.DEVICE_INDEX_INVALID);
}

export function isControlMode(value: unknown): value is ControlMode {
  return value === "auto" || value === "manual";
}

export function isPropertyValue(value: unknown): value is PropertyValue {
  return typeof value === "number" || typeof value === "boolean" || value === "auto";
}

/**
 * A { name: value } body, or null when it is not an object of property values
 */
export function readPropertyMap(body: unknown): Record<string, PropertyValue> | null {
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return null;
  }
  const values: Record<string, PropertyValue> = {};
  for (const [name, value] of Object.entries(body)) {
    if (!isPropertyValue(value)) {
      return null;
    }
    values[name] = value;
  }
  return values;
}

/**
 * A named field of a JSON object body
 */
export function readField(body: unknown, field: string): unknown {
  if (typeof body !== "object" || body === null || !(field in body)) {
    return undefined;
  }
  return Object.getOwnPropertyDescriptor(body, field)?.value;
}
