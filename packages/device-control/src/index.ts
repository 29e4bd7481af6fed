/**
 * @camctl/device-control
 *
 * Property control and capability negotiation for UVC-class cameras.
 */

export * from "./result";
export * from "./errors";
export * from "./exceptions";
export * from "./types";
export * from "./strings";
export * from "./logging";
export * from "./motion";
export * from "./guid";

export * from "./backend/types";
export * from "./backend/simulated";
export * from "./backend/unavailable";
export * from "./backend/factory";

export * from "./devices";
export * from "./camera";
export * from "./capabilities";
export * from "./registry";
export * from "./presets";
export * from "./hotplug";
export * from "./diagnostics";
export * from "./device-utils";
export * from "./controller";

export * from "./vendor/properties";
export * from "./vendor/logitech";
