import { vi } from 'vitest';
import type { Home } from '../domain/entities/Home.js';
import type { Module } from '../domain/entities/Module.js';
import type { Room } from '../domain/entities/Room.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import { homeDescriptorSchema } from '../domain/schemas/payloads.js';
import { TopologyMapper } from '../infrastructure/mappers/TopologyMapper.js';

export function createMockLogger(): ILogger {
  return {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
  };
}

/**
 * One home: a relay bridging a valve (room-1) and a thermostat (room-2),
 * plus a camera outside any room
 */
export function homeDescriptor() {
  return {
    id: 'home-1',
    name: 'Maison',
    modules: [
      { id: 'relay-1', name: 'Relay', type: 'NAPlug', modules_bridged: ['valve-1', 'therm-1'] },
      { id: 'valve-1', name: 'Valve', type: 'NRV', room_id: 'room-1', bridge: 'relay-1' },
      { id: 'therm-1', name: 'Thermostat', type: 'NATherm1', room_id: 'room-2', bridge: 'relay-1' },
      { id: 'cam-1', name: 'Camera', type: 'NACamera' },
    ],
    rooms: [
      { id: 'room-1', name: 'Living room', module_ids: ['valve-1', 'ghost-1'] },
      { id: 'room-2', name: 'Bedroom', module_ids: ['therm-1'] },
    ],
    schedules: [
      { id: 'sched-1', name: 'Standard', selected: true, hg_temp: 7, away_temp: 14 },
      { id: 'sched-2', name: 'Eco' },
    ],
  };
}

export function topologyPayload() {
  return { homes: [homeDescriptor()] };
}

export function buildHome(descriptor: unknown = homeDescriptor()): Home {
  return TopologyMapper.mapHome(homeDescriptorSchema.parse(descriptor));
}

export function moduleOf(home: Home, id: string): Module {
  const module = home.getModule(id);
  if (!module) throw new Error(`fixture has no module ${id}`);
  return module;
}

export function roomOf(home: Home, id: string): Room {
  const room = home.getRoom(id);
  if (!room) throw new Error(`fixture has no room ${id}`);
  return room;
}

/**
 * Plain snapshot of every status field, for state comparisons
 */
export function statusOf(home: Home) {
  return {
    modules: [...home.modules.values()].map((m) => ({
      id: m.id,
      reachable: m.reachable,
      boilerStatus: m.boilerStatus,
      batteryLevel: m.batteryLevel,
      batteryState: m.batteryState,
    })),
    rooms: [...home.rooms.values()].map((r) => ({
      id: r.id,
      reachable: r.reachable,
      measuredTemperature: r.measuredTemperature,
      setpointMode: r.setpointMode,
      setpointTemperature: r.setpointTemperature,
      heatingPowerRequest: r.heatingPowerRequest,
    })),
  };
}

/**
 * API response envelope around `body`
 */
export function envelope(body: Record<string, unknown>) {
  return { status: 200, body: { body, status: 'ok', time_server: 1700000000 } };
}

export function statusResponse() {
  return envelope({
    home: {
      id: 'home-1',
      modules: [
        { id: 'relay-1', reachable: false },
        { id: 'cam-1', reachable: true },
      ],
      rooms: [{ id: 'room-2', reachable: true, therm_measured_temperature: 18.5 }],
    },
    errors: [],
  });
}

/**
 * Canned answer for each endpoint the climate clients call
 */
export function respond(url: string) {
  switch (url) {
    case 'homesdata':
      return envelope({ homes: [homeDescriptor()] });
    case 'homestatus':
      return statusResponse();
    default:
      return { status: 200, body: { status: 'ok', time_server: 1700000000 } };
  }
}
