/**
 * Property name registry
 *
 * Maps user-facing names to typed property keys in two pure stages: alias
 * resolution (many names to one canonical name), then a lookup of the
 * canonical name's descriptor. No reflection; every name is listed in the
 * bundled property table.
 */

import { ErrorKind } from "./errors";
import { Result, err, ok } from "./result";
import { parseCamProp, parseVidProp } from "./strings";
import type { PropertyKey } from "./types";
import table from "./data/properties.json";

export type ValueKind = "int" | "bool";

export interface PropertyDescriptor {
  /** Canonical snake_case name */
  readonly name: string;
  readonly key: PropertyKey;
  /** bool properties read back as booleans through the façade */
  readonly kind: ValueKind;
  /** Writes move the absolute counterpart by the written delta */
  readonly relative: boolean;
  /** Carries pan and tilt together in one value */
  readonly combined: boolean;
  readonly aliases: readonly string[];
}

interface PropertyTableEntry {
  name: string;
  domain: string;
  id: string;
  kind?: string;
  relative?: boolean;
  combined?: boolean;
}

interface PropertyTable {
  properties: PropertyTableEntry[];
  aliases: Record<string, string>;
}

function keyId(key: PropertyKey): string {
  return `${key.domain}:${key.id}`;
}

function toKey(entry: PropertyTableEntry): PropertyKey {
  if (entry.domain === "camera") {
    const id = parseCamProp(entry.id);
    if (id !== null) return { domain: "camera", id };
  } else if (entry.domain === "video") {
    const id = parseVidProp(entry.id);
    if (id !== null) return { domain: "video", id };
  }
  throw new Error(`Property table entry '${entry.name}' names unknown ${entry.domain} property ${entry.id}`);
}

export class PropertyRegistry {
  private static instance: PropertyRegistry | null = null;

  private readonly byName = new Map<string, PropertyDescriptor>();
  private readonly byKey = new Map<string, PropertyDescriptor>();
  private readonly aliases = new Map<string, string>();

  constructor(data: PropertyTable) {
    const aliasesByTarget = new Map<string, string[]>();
    for (const [alias, target] of Object.entries(data.aliases)) {
      this.aliases.set(alias, target);
      aliasesByTarget.set(target, [...(aliasesByTarget.get(target) ?? []), alias]);
    }

    for (const entry of data.properties) {
      const descriptor: PropertyDescriptor = {
        name: entry.name,
        key: toKey(entry),
        kind: entry.kind === "bool" ? "bool" : "int",
        relative: entry.relative ?? false,
        combined: entry.combined ?? false,
        aliases: aliasesByTarget.get(entry.name) ?? [],
      };
      this.byName.set(descriptor.name, descriptor);
      this.byKey.set(keyId(descriptor.key), descriptor);
    }

    for (const [alias, target] of this.aliases) {
      if (!this.byName.has(target)) {
        throw new Error(`Alias '${alias}' points at unknown property '${target}'`);
      }
    }
  }

  /**
   * Registry built from the bundled property table
   */
  static default(): PropertyRegistry {
    if (!PropertyRegistry.instance) {
      PropertyRegistry.instance = new PropertyRegistry(table);
    }
    return PropertyRegistry.instance;
  }

  /**
   * Trim, lowercase, and turn hyphens and spaces into underscores
   */
  static normalizeName(name: string): string {
    return name.trim().toLowerCase().replace(/[\s-]+/g, "_");
  }

  /**
   * Canonical name for a name or alias
   */
  resolveName(name: string): Result<string> {
    const normalized = PropertyRegistry.normalizeName(name);
    const canonical = this.aliases.get(normalized) ?? normalized;
    if (!this.byName.has(canonical)) {
      return err(ErrorKind.InvalidArgument, `Unknown property '${name}'`);
    }
    return ok(canonical);
  }

  resolve(name: string): Result<PropertyDescriptor> {
    const canonical = this.resolveName(name);
    if (canonical.isErr()) {
      return err(canonical.error());
    }
    const descriptor = this.byName.get(canonical.value());
    return descriptor ? ok(descriptor) : err(ErrorKind.InvalidArgument, `Unknown property '${name}'`);
  }

  /**
   * Descriptor for a property key, the reverse of resolve()
   */
  describe(key: PropertyKey): PropertyDescriptor | undefined {
    return this.byKey.get(keyId(key));
  }

  has(name: string): boolean {
    return this.resolveName(name).isOk();
  }

  descriptors(): PropertyDescriptor[] {
    return Array.from(this.byName.values());
  }

  /**
   * Every canonical name, sorted
   */
  listPropertyNames(): string[] {
    return Array.from(this.byName.keys()).sort();
  }

  /**
   * Canonical name to its aliases, for names that have any
   */
  getPropertyAliases(): Record<string, string[]> {
    const result: Record<string, string[]> = {};
    for (const descriptor of this.byName.values()) {
      if (descriptor.aliases.length > 0) {
        result[descriptor.name] = [...descriptor.aliases];
      }
    }
    return result;
  }
}

export function resolveProperty(name: string): Result<PropertyDescriptor> {
  return PropertyRegistry.default().resolve(name);
}
