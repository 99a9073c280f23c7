import type { Device, DeviceId } from '../types/index.js'

function copyDevice(device: Device): Device {
  return { ...device, capabilities: { ...device.capabilities } }
}

/**
 * Last-known record of every live device.
 *
 * Every operation is synchronous, so on the event loop each one is atomic:
 * a reader never sees half of an upsert. Records go in and come out as
 * copies; callers that want to change one field read, modify the copy and
 * upsert it back.
 */
export class DeviceCache {
  private readonly devices = new Map<DeviceId, Device>()

  get size(): number {
    return this.devices.size
  }

  getAll(): Device[] {
    return Array.from(this.devices.values(), copyDevice)
  }

  get(id: DeviceId): Device | undefined {
    const device = this.devices.get(id)
    return device ? copyDevice(device) : undefined
  }

  has(id: DeviceId): boolean {
    return this.devices.has(id)
  }

  /** Full overwrite by id. */
  upsert(device: Device): void {
    this.devices.set(device.id, copyDevice(device))
  }

  remove(id: DeviceId): boolean {
    return this.devices.delete(id)
  }
}
