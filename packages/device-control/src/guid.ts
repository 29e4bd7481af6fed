/**
 * Property-set GUIDs
 *
 * Canonical 16-byte GUID in the Windows in-memory layout: Data1 as a
 * little-endian uint32, Data2 and Data3 as little-endian uint16, then the
 * eight Data4 bytes in order.
 */

import { formatHex, parseHex } from "@camctl/utils";
import { ErrorKind } from "./errors";
import { Result, err, ok } from "./result";

export interface GuidFields {
  data1: number;
  data2: number;
  data3: number;
  data4: readonly number[];
}

export type GuidInput = Guid | GuidFields | string | Uint8Array;

const GUID_PATTERN = /^\{?([0-9a-f]{8})-?([0-9a-f]{4})-?([0-9a-f]{4})-?([0-9a-f]{4})-?([0-9a-f]{12})\}?$/i;

export class Guid {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = Uint8Array.from(bytes);
  }

  static fromBytes(bytes: Uint8Array): Result<Guid> {
    if (bytes.length !== 16) {
      return err(ErrorKind.InvalidArgument, `GUID must be 16 bytes (got ${bytes.length})`);
    }
    return ok(new Guid(bytes));
  }

  /**
   * Accepts "XXXXXXXX-XXXX-XXXX-XXXX-XXXXXXXXXXXX", with or without braces or
   * hyphens, in either case
   */
  static fromString(text: string): Result<Guid> {
    const match = GUID_PATTERN.exec(text.trim());
    if (!match) {
      return err(ErrorKind.InvalidArgument, `Malformed GUID string '${text}'`);
    }
    const [, d1, d2, d3, d4a, d4b] = match;
    return Guid.fromFields({
      data1: parseInt(d1, 16),
      data2: parseInt(d2, 16),
      data3: parseInt(d3, 16),
      data4: Array.from(parseHex(d4a + d4b) ?? []),
    });
  }

  static fromFields(fields: GuidFields): Result<Guid> {
    const inRange = (value: number, max: number) => Number.isInteger(value) && value >= 0 && value <= max;
    if (
      !inRange(fields.data1, 0xffffffff) ||
      !inRange(fields.data2, 0xffff) ||
      !inRange(fields.data3, 0xffff) ||
      fields.data4.length !== 8 ||
      !fields.data4.every((byte) => inRange(byte, 0xff))
    ) {
      return err(ErrorKind.InvalidArgument, "GUID fields out of range");
    }

    const buffer = Buffer.alloc(16);
    buffer.writeUInt32LE(fields.data1, 0);
    buffer.writeUInt16LE(fields.data2, 4);
    buffer.writeUInt16LE(fields.data3, 6);
    Buffer.from(fields.data4).copy(buffer, 8);
    return ok(new Guid(buffer));
  }

  static normalize(input: GuidInput): Result<Guid> {
    if (input instanceof Guid) {
      return ok(input);
    }
    if (typeof input === "string") {
      return Guid.fromString(input);
    }
    if (input instanceof Uint8Array) {
      return Guid.fromBytes(input);
    }
    return Guid.fromFields(input);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  get fields(): GuidFields {
    const view = Buffer.from(this.bytes);
    return {
      data1: view.readUInt32LE(0),
      data2: view.readUInt16LE(4),
      data3: view.readUInt16LE(6),
      data4: Array.from(this.bytes.subarray(8)),
    };
  }

  equals(other: Guid): boolean {
    return this.toString() === other.toString();
  }

  toString(): string {
    const { data1, data2, data3, data4 } = this.fields;
    const hex = (value: number, width: number) => value.toString(16).padStart(width, "0");
    return [
      hex(data1, 8),
      hex(data2, 4),
      hex(data3, 4),
      formatHex(data4.slice(0, 2)),
      formatHex(data4.slice(2)),
    ]
      .join("-")
      .toUpperCase();
  }

  toJSON(): string {
    return this.toString();
  }
}
