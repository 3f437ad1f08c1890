import type { StatusFields } from '../schemas/payloads.js';
import { deviceFamilyOf, type DeviceFamily, type DeviceType } from './DeviceType.js';

export interface ModuleInit {
  id: string;
  name: string;
  deviceType: DeviceType;
  homeId: string;
  roomId?: string;
  /** Module this one relays through */
  bridgeId?: string;
  /** Modules this one relays for */
  bridgedModuleIds?: readonly string[];
}

/**
 * A physical device of a home (valve, thermostat, relay, camera, ...)
 */
export class Module {
  readonly id: string;
  readonly name: string;
  readonly deviceType: DeviceType;
  readonly homeId: string;
  readonly roomId: string | undefined;
  readonly bridgeId: string | undefined;
  readonly bridgedModuleIds: readonly string[];

  reachable = false;
  boilerStatus: boolean | undefined;
  batteryLevel: number | undefined;
  batteryState: string | undefined;

  constructor(init: ModuleInit) {
    this.id = init.id;
    this.name = init.name;
    this.deviceType = init.deviceType;
    this.homeId = init.homeId;
    this.roomId = init.roomId;
    this.bridgeId = init.bridgeId;
    this.bridgedModuleIds = [...(init.bridgedModuleIds ?? [])];
  }

  get family(): DeviceFamily {
    return deviceFamilyOf(this.deviceType);
  }

  /**
   * Overwrite status with the payload; fields it omits fall back to their defaults
   */
  applyStatus(raw: StatusFields): void {
    this.reachable = raw.reachable ?? false;
    this.boilerStatus = raw.boiler_status ?? undefined;
    this.batteryLevel = raw.battery_level ?? undefined;
    this.batteryState = raw.battery_state ?? undefined;
  }
}
