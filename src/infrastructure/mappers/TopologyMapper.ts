import { Home } from '../../domain/entities/Home.js';
import { Module } from '../../domain/entities/Module.js';
import { Room } from '../../domain/entities/Room.js';
import { Schedule } from '../../domain/entities/Schedule.js';
import { isDeviceType } from '../../domain/entities/DeviceType.js';
import { UnknownDeviceTypeError } from '../../domain/errors/index.js';
import type {
  HomeDescriptor,
  ModuleDescriptor,
  RoomDescriptor,
  ScheduleDescriptor,
  TopologyPayload,
} from '../../domain/schemas/payloads.js';

export interface TopologyBuild {
  homes: Map<string, Home>;
  /** Homes left out, keyed by id, because a module has an unsupported device type */
  rejected: Map<string, UnknownDeviceTypeError>;
}

/**
 * Builds the Home graph from a topology (homesdata) payload
 */
export class TopologyMapper {
  /**
   * Map every home descriptor to a Home, keyed by id. A home that fails to
   * build does not prevent the others from being built.
   */
  static mapHomes(payload: TopologyPayload): TopologyBuild {
    const homes = new Map<string, Home>();
    const rejected = new Map<string, UnknownDeviceTypeError>();
    for (const descriptor of payload.homes) {
      try {
        homes.set(descriptor.id, this.mapHome(descriptor));
      } catch (error) {
        if (!(error instanceof UnknownDeviceTypeError)) {
          throw error;
        }
        rejected.set(descriptor.id, error);
      }
    }
    return { homes, rejected };
  }

  static mapHome(descriptor: HomeDescriptor): Home {
    const homeId = descriptor.id;

    // Modules first: rooms pick their members out of this map
    const modules = new Map<string, Module>();
    for (const module of descriptor.modules) {
      modules.set(module.id, this.mapModule(module, homeId));
    }

    const rooms = new Map<string, Room>();
    for (const room of descriptor.rooms) {
      rooms.set(room.id, this.mapRoom(room, homeId, modules));
    }

    const schedules = new Map<string, Schedule>();
    for (const schedule of descriptor.schedules) {
      schedules.set(schedule.id, this.mapSchedule(schedule, homeId));
    }

    return new Home({
      id: homeId,
      name: descriptor.name,
      modules,
      rooms,
      schedules,
    });
  }

  static mapModule(descriptor: ModuleDescriptor, homeId: string): Module {
    if (!isDeviceType(descriptor.type)) {
      throw new UnknownDeviceTypeError(descriptor.type, descriptor.id);
    }

    return new Module({
      id: descriptor.id,
      name: descriptor.name,
      deviceType: descriptor.type,
      homeId,
      roomId: descriptor.room_id ?? undefined,
      bridgeId: descriptor.bridge ?? undefined,
      bridgedModuleIds: descriptor.modules_bridged,
    });
  }

  /**
   * Ids in `module_ids` that are not in `modules` are left out
   */
  static mapRoom(
    descriptor: RoomDescriptor,
    homeId: string,
    modules: ReadonlyMap<string, Module>
  ): Room {
    const memberIds = new Set(descriptor.module_ids);
    const members = new Map<string, Module>();
    for (const [id, module] of modules) {
      if (memberIds.has(id)) {
        members.set(id, module);
      }
    }

    return new Room({
      id: descriptor.id,
      name: descriptor.name,
      homeId,
      modules: members,
    });
  }

  static mapSchedule(descriptor: ScheduleDescriptor, homeId: string): Schedule {
    return new Schedule({
      id: descriptor.id,
      name: descriptor.name,
      homeId,
      selected: descriptor.selected,
      hgTemp: descriptor.hg_temp ?? undefined,
      awayTemp: descriptor.away_temp ?? undefined,
    });
  }
}
