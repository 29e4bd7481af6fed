/**
 * Device Monitor
 *
 * Bridges backend hotplug notifications to "device:added" and
 * "device:removed" events (payload: HotplugEventData) and releases the
 * controller of a removed device.
 */

import { EventEmitter } from "events";
import {
  registerDeviceChangeCallback,
  unregisterDeviceChangeCallback,
} from "@camctl/device-control";
import type { HotplugEventData } from "@camctl/types";
import { createLogger } from "@camctl/utils";
import type { ControllerPool } from "./controller-pool";

const logger = createLogger("device-monitor");

export class DeviceMonitor extends EventEmitter {
  private running = false;

  constructor(private readonly pool: ControllerPool) {
    super();
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) {
      return;
    }
    registerDeviceChangeCallback((added, path) => this.handleChange(added, path), this.pool.backend);
    this.running = true;
    logger.info("Device monitor started");
  }

  stop(): void {
    if (!this.running) {
      return;
    }
    unregisterDeviceChangeCallback();
    this.running = false;
    logger.info("Device monitor stopped");
  }

  private handleChange(added: boolean, path: string): void {
    if (added) {
      const devices = this.pool.backend.listDevices();
      const device = devices.isOk() ? devices.value().find((candidate) => candidate.path === path) : undefined;
      logger.info("Device added", { path, name: device?.name });
      const data: HotplugEventData = { path, name: device?.name };
      this.emit("device:added", data);
      return;
    }

    this.pool.release(path);
    logger.info("Device removed", { path });
    const data: HotplugEventData = { path };
    this.emit("device:removed", data);
  }
}
