import type { StatusFields } from '../schemas/payloads.js';
import type { Module } from './Module.js';

export interface RoomInit {
  id: string;
  name: string;
  homeId: string;
  modules: ReadonlyMap<string, Module>;
}

/**
 * A room of a home and the modules assigned to it
 */
export class Room {
  readonly id: string;
  readonly name: string;
  readonly homeId: string;
  readonly modules: ReadonlyMap<string, Module>;

  reachable = false;
  setpointTemperature: number | undefined;
  setpointMode: string | undefined;
  measuredTemperature: number | undefined;
  heatingPowerRequest: number | undefined;

  constructor(init: RoomInit) {
    this.id = init.id;
    this.name = init.name;
    this.homeId = init.homeId;
    this.modules = new Map(init.modules);
  }

  applyStatus(raw: StatusFields): void {
    this.reachable = raw.reachable ?? false;
    this.measuredTemperature = raw.therm_measured_temperature ?? undefined;
    this.setpointMode = raw.therm_setpoint_mode ?? undefined;
    this.setpointTemperature = raw.therm_setpoint_temperature ?? undefined;
    this.heatingPowerRequest = raw.heating_power_request ?? undefined;
  }
}
