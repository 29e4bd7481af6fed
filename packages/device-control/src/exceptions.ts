/**
 * Device Control Exceptions
 *
 * Exception view over the Result-based core. Every ErrorKind except Success
 * maps to exactly one exception class, and every exception maps back to its
 * kind, so a failure can cross between the two APIs without losing its
 * classification.
 */

import { ErrorInfo, ErrorKind, errorKindName, isErrorKind } from "./errors";
import { Result, err, ok } from "./result";

// ============================================================================
// Base Error
// ============================================================================

export class CameraControlError extends Error {
  public readonly errorKind: ErrorKind;
  public readonly context: string | undefined;
  public readonly timestamp: string;

  constructor(message: string, errorKind: ErrorKind = ErrorKind.SystemError, context?: string) {
    super(message);
    this.name = "CameraControlError";
    this.errorKind = errorKind;
    this.context = context;
    this.timestamp = new Date().toISOString();

    // Ensure prototype chain is correct
    Object.setPrototypeOf(this, CameraControlError.prototype);
  }

  /**
   * The failure as a plain ErrorInfo, for handing back to Result-based code
   */
  toErrorInfo(): ErrorInfo {
    return new ErrorInfo(this.errorKind, this.message);
  }

  override toString(): string {
    const base = `[${errorKindName(this.errorKind)}] ${this.message}`;
    return this.context ? `${base} (Context: ${this.context})` : base;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      errorKind: errorKindName(this.errorKind),
      message: this.message,
      context: this.context,
      timestamp: this.timestamp,
    };
  }
}

// ============================================================================
// Device Errors
// ============================================================================

export class DeviceNotFoundError extends CameraControlError {
  constructor(message = "Camera device not found or disconnected", context?: string) {
    super(message, ErrorKind.DeviceNotFound, context);
    this.name = "DeviceNotFoundError";
    Object.setPrototypeOf(this, DeviceNotFoundError.prototype);
  }
}

export class DeviceBusyError extends CameraControlError {
  constructor(message = "Camera device is busy or in use", context?: string) {
    super(message, ErrorKind.DeviceBusy, context);
    this.name = "DeviceBusyError";
    Object.setPrototypeOf(this, DeviceBusyError.prototype);
  }
}

export class PermissionDeniedError extends CameraControlError {
  constructor(message = "Insufficient permissions to access device", context?: string) {
    super(message, ErrorKind.PermissionDenied, context);
    this.name = "PermissionDeniedError";
    Object.setPrototypeOf(this, PermissionDeniedError.prototype);
  }
}

// ============================================================================
// Property Errors
// ============================================================================

export class PropertyNotSupportedError extends CameraControlError {
  constructor(message = "Property not supported by device", context?: string) {
    super(message, ErrorKind.PropertyNotSupported, context);
    this.name = "PropertyNotSupportedError";
    Object.setPrototypeOf(this, PropertyNotSupportedError.prototype);
  }
}

export class InvalidValueError extends CameraControlError {
  constructor(message = "Property value is out of range or invalid", context?: string) {
    super(message, ErrorKind.InvalidValue, context);
    this.name = "InvalidValueError";
    Object.setPrototypeOf(this, InvalidValueError.prototype);
  }
}

// ============================================================================
// Platform / Usage Errors
// ============================================================================

export class SystemError extends CameraControlError {
  constructor(message = "System or platform error occurred", context?: string) {
    super(message, ErrorKind.SystemError, context);
    this.name = "SystemError";
    Object.setPrototypeOf(this, SystemError.prototype);
  }
}

export class InvalidArgumentError extends CameraControlError {
  constructor(message = "Invalid function argument provided", context?: string) {
    super(message, ErrorKind.InvalidArgument, context);
    this.name = "InvalidArgumentError";
    Object.setPrototypeOf(this, InvalidArgumentError.prototype);
  }
}

export class NotImplementedError extends CameraControlError {
  constructor(message = "Feature not implemented on this platform", context?: string) {
    super(message, ErrorKind.NotImplemented, context);
    this.name = "NotImplementedError";
    Object.setPrototypeOf(this, NotImplementedError.prototype);
  }
}

/**
 * Raised by the façade for an unknown preset name. No device call has been
 * attempted, so this is a usage error rather than a device error.
 */
export class PresetNotFoundError extends RangeError {
  public readonly preset: string;

  constructor(preset: string, available: readonly string[]) {
    super(`Unknown preset '${preset}'. Available: ${available.join(", ")}`);
    this.name = "PresetNotFoundError";
    this.preset = preset;
    Object.setPrototypeOf(this, PresetNotFoundError.prototype);
  }
}

// ============================================================================
// Kind <-> Exception Mapping
// ============================================================================

type FailureKind = Exclude<ErrorKind, ErrorKind.Success>;
type CameraControlErrorClass = new (message?: string, context?: string) => CameraControlError;

export const ERROR_KIND_TO_EXCEPTION: Readonly<Record<FailureKind, CameraControlErrorClass>> = {
  [ErrorKind.DeviceNotFound]: DeviceNotFoundError,
  [ErrorKind.DeviceBusy]: DeviceBusyError,
  [ErrorKind.PropertyNotSupported]: PropertyNotSupportedError,
  [ErrorKind.InvalidValue]: InvalidValueError,
  [ErrorKind.PermissionDenied]: PermissionDeniedError,
  [ErrorKind.SystemError]: SystemError,
  [ErrorKind.InvalidArgument]: InvalidArgumentError,
  [ErrorKind.NotImplemented]: NotImplementedError,
};

function isFailureKind(code: number): code is FailureKind {
  return isErrorKind(code) && code !== ErrorKind.Success;
}

/**
 * Build the exception for an error code. Codes outside the table (including
 * Success) produce the base class with an "Unknown error code" message.
 */
export function createExceptionFromErrorKind(
  code: number,
  message = "",
  context?: string,
): CameraControlError {
  if (isFailureKind(code)) {
    const ExceptionClass = ERROR_KIND_TO_EXCEPTION[code];
    return message ? new ExceptionClass(message, context) : new ExceptionClass(undefined, context);
  }
  return new CameraControlError(`Unknown error code ${code}: ${message}`, ErrorKind.SystemError, context);
}

export function createExceptionFromErrorInfo(info: ErrorInfo, context?: string): CameraControlError {
  return createExceptionFromErrorKind(info.code, info.message, context);
}

/**
 * Unwrap a Result, throwing the mapped exception on failure
 */
export function unwrapOrThrow<T>(result: Result<T>, context?: string): T {
  if (result.isErr()) {
    throw createExceptionFromErrorInfo(result.error(), context);
  }
  return result.value();
}

/**
 * Map a thrown value back into a failed Result
 */
export function exceptionToResult<T = never>(error: unknown): Result<T> {
  if (error instanceof CameraControlError) {
    return err(error.errorKind, error.message);
  }
  if (error instanceof PresetNotFoundError) {
    return err(ErrorKind.InvalidArgument, error.message);
  }
  if (error instanceof Error) {
    return err(ErrorKind.SystemError, error.message);
  }
  return err(ErrorKind.SystemError, String(error));
}

/**
 * Run a throwing call and capture its outcome as a Result
 */
export function tryResult<T>(fn: () => T): Result<T> {
  try {
    return ok(fn());
  } catch (error) {
    return exceptionToResult<T>(error);
  }
}
