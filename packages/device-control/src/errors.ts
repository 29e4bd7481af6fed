/**
 * Error Model
 *
 * Closed taxonomy of failure kinds shared by the Result-based core and the
 * exception-based façade. Kinds originate from the device backend or from
 * local validation; this layer never invents new kinds.
 */

export enum ErrorKind {
  Success = 0,
  DeviceNotFound = 1,
  DeviceBusy = 2,
  PropertyNotSupported = 3,
  InvalidValue = 4,
  PermissionDenied = 5,
  SystemError = 6,
  InvalidArgument = 7,
  NotImplemented = 8,
}

export const ALL_ERROR_KINDS: readonly ErrorKind[] = [
  ErrorKind.Success,
  ErrorKind.DeviceNotFound,
  ErrorKind.DeviceBusy,
  ErrorKind.PropertyNotSupported,
  ErrorKind.InvalidValue,
  ErrorKind.PermissionDenied,
  ErrorKind.SystemError,
  ErrorKind.InvalidArgument,
  ErrorKind.NotImplemented,
];

const ERROR_KIND_DESCRIPTIONS: Record<ErrorKind, string> = {
  [ErrorKind.Success]: "Success",
  [ErrorKind.DeviceNotFound]: "Device not found or disconnected",
  [ErrorKind.DeviceBusy]: "Device is busy or in use",
  [ErrorKind.PropertyNotSupported]: "Property not supported by device",
  [ErrorKind.InvalidValue]: "Property value out of range",
  [ErrorKind.PermissionDenied]: "Insufficient permissions",
  [ErrorKind.SystemError]: "System/platform error",
  [ErrorKind.InvalidArgument]: "Invalid function argument",
  [ErrorKind.NotImplemented]: "Feature not implemented on this platform",
};

export function isErrorKind(code: number): code is ErrorKind {
  return ALL_ERROR_KINDS.some((kind) => kind === code);
}

/**
 * Human-readable description of an error kind ("Unknown error" for codes
 * outside the taxonomy)
 */
export function errorKindToString(code: number): string {
  return isErrorKind(code) ? ERROR_KIND_DESCRIPTIONS[code] : "Unknown error";
}

/**
 * Identifier of an error kind, e.g. "DeviceNotFound"
 */
export function errorKindName(code: number): string {
  return isErrorKind(code) ? ErrorKind[code] : `Unknown(${code})`;
}

// ============================================================================
// ErrorInfo
// ============================================================================

export class ErrorInfo {
  constructor(
    public readonly code: ErrorKind,
    public readonly message: string = "",
  ) {}

  /**
   * Kind description, followed by the message when there is one
   */
  description(): string {
    const base = errorKindToString(this.code);
    return this.message ? `${base}: ${this.message}` : base;
  }

  toJSON(): { code: ErrorKind; kind: string; message: string } {
    return { code: this.code, kind: errorKindName(this.code), message: this.message };
  }
}
