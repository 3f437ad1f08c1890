import type { DeviceFamily } from './DeviceType.js';
import type { Module } from './Module.js';
import type { Room } from './Room.js';
import type { Schedule } from './Schedule.js';

export interface HomeInit {
  id: string;
  name: string;
  modules: ReadonlyMap<string, Module>;
  rooms: ReadonlyMap<string, Room>;
  schedules: ReadonlyMap<string, Schedule>;
}

/**
 * A registered home with its full topology.
 * Rooms and modules refer back to it by id only.
 */
export class Home {
  readonly id: string;
  readonly name: string;
  readonly modules: ReadonlyMap<string, Module>;
  readonly rooms: ReadonlyMap<string, Room>;
  readonly schedules: ReadonlyMap<string, Schedule>;

  constructor(init: HomeInit) {
    this.id = init.id;
    this.name = init.name;
    this.modules = new Map(init.modules);
    this.rooms = new Map(init.rooms);
    this.schedules = new Map(init.schedules);
  }

  getModule(moduleId: string): Module | undefined {
    return this.modules.get(moduleId);
  }

  getRoom(roomId: string): Room | undefined {
    return this.rooms.get(roomId);
  }

  /**
   * First schedule flagged as selected, if any
   */
  selectedSchedule(): Schedule | undefined {
    for (const schedule of this.schedules.values()) {
      if (schedule.selected) {
        return schedule;
      }
    }
    return undefined;
  }

  isValidSchedule(scheduleId: string): boolean {
    return this.schedules.has(scheduleId);
  }

  /**
   * Frost guard temperature of the selected schedule
   */
  hgTemp(): number | undefined {
    return this.selectedSchedule()?.hgTemp;
  }

  awayTemp(): number | undefined {
    return this.selectedSchedule()?.awayTemp;
  }

  modulesOfFamily(family: DeviceFamily): Module[] {
    return [...this.modules.values()].filter((m) => m.family === family);
  }
}
