/**
 * Controller Pool
 *
 * One CameraController per connected device, keyed by device path, so custom
 * presets live as long as the device stays plugged in. Devices are addressed
 * by their current enumeration index. Concurrent acquisitions of one device
 * share a single open.
 */

import { APP_CONFIG } from "@camctl/config";
import {
  CameraController,
  CameraControlError,
  Device,
  DeviceNotFoundError,
  resolveDevice,
  shouldRetryOperation,
  unwrapOrThrow,
  type DeviceBackend,
  type StepPolicy,
} from "@camctl/device-control";
import type { DeviceDTO } from "@camctl/types";
import { createLogger, retry } from "@camctl/utils";

const logger = createLogger("controller-pool");

export interface ControllerPoolOptions {
  backend: DeviceBackend;
  clampValues?: boolean;
  stepPolicy?: StepPolicy;
  /** Attempts to open a busy device before giving up */
  openAttempts?: number;
  openRetryDelayMs?: number;
}

export class ControllerPool {
  private readonly controllers = new Map<string, CameraController>();
  private readonly opening = new Map<string, Promise<CameraController>>();

  constructor(private readonly options: ControllerPoolOptions) {}

  get backend(): DeviceBackend {
    return this.options.backend;
  }

  get size(): number {
    return this.controllers.size;
  }

  listDevices(): DeviceDTO[] {
    const devices = unwrapOrThrow(this.backend.listDevices(), "list devices");
    return devices.map((device, index) => ({ index, name: device.name, path: device.path }));
  }

  resolveDevice(index: number): Device {
    return unwrapOrThrow(resolveDevice(index, this.backend), `device ${index}`);
  }

  /**
   * The controller for a device index, opening one when the device has none
   * or its previous connection has gone away. Busy devices are retried.
   */
  async acquire(index: number): Promise<CameraController> {
    const device = this.resolveDevice(index);
    const existing = this.controllers.get(device.path);
    if (existing?.isConnected) {
      return existing;
    }

    const pending = this.opening.get(device.path);
    if (pending) {
      return pending;
    }

    existing?.close();
    this.controllers.delete(device.path);
    return this.open(device);
  }

  private open(device: Device): Promise<CameraController> {
    const opening: Promise<CameraController> = retry(
      async () =>
        new CameraController({
          device,
          backend: this.backend,
          clampValues: this.options.clampValues,
          stepPolicy: this.options.stepPolicy,
        }),
      {
        maxAttempts: this.options.openAttempts ?? APP_CONFIG.MAX_RETRY_ATTEMPTS,
        delayMs: this.options.openRetryDelayMs ?? APP_CONFIG.RETRY_DELAY_MS,
        shouldRetry: (error) => error instanceof CameraControlError && shouldRetryOperation(error.errorKind),
      },
    )
      .then((controller) => {
        // released while the open was in flight
        if (this.opening.get(device.path) !== opening) {
          controller.close();
          throw new DeviceNotFoundError(`Device ${device.name} was released while opening`, "acquire");
        }
        this.controllers.set(device.path, controller);
        logger.info("Opened controller", { name: device.name, path: device.path });
        return controller;
      })
      .finally(() => {
        if (this.opening.get(device.path) === opening) {
          this.opening.delete(device.path);
        }
      });

    this.opening.set(device.path, opening);
    return opening;
  }

  /**
   * Close and forget the controller for a device path
   */
  release(path: string): boolean {
    const wasOpening = this.opening.delete(path);
    const controller = this.controllers.get(path);
    if (!controller) {
      return wasOpening;
    }
    controller.close();
    this.controllers.delete(path);
    logger.info("Released controller", { path });
    return true;
  }

  closeAll(): void {
    for (const path of new Set([...this.controllers.keys(), ...this.opening.keys()])) {
      this.release(path);
    }
  }
}
