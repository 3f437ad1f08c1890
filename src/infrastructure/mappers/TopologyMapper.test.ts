import { describe, it, expect } from 'vitest';
import { TopologyMapper } from './TopologyMapper.js';
import { topologyPayloadSchema } from '../../domain/schemas/payloads.js';
import { UnknownDeviceTypeError } from '../../domain/errors/index.js';
import { buildHome, homeDescriptor, moduleOf, roomOf, topologyPayload } from '../../test-utils/fixtures.js';

describe('TopologyMapper', () => {
  it('should build one home per descriptor', () => {
    const { homes, rejected } = TopologyMapper.mapHomes(
      topologyPayloadSchema.parse(topologyPayload())
    );

    expect([...homes.keys()]).toEqual(['home-1']);
    expect(homes.get('home-1')?.name).toBe('Maison');
    expect(rejected.size).toBe(0);
  });

  it('should reject only the home with an unsupported module', () => {
    const broken = { ...homeDescriptor(), id: 'home-2' };
    broken.modules = [...broken.modules, { id: 'toaster-1', name: 'Toaster', type: 'TOASTER' }];

    const { homes, rejected } = TopologyMapper.mapHomes(
      topologyPayloadSchema.parse({ homes: [broken, homeDescriptor()] })
    );

    expect([...homes.keys()]).toEqual(['home-1']);
    expect([...rejected.keys()]).toEqual(['home-2']);
    expect(rejected.get('home-2')?.moduleId).toBe('toaster-1');
  });

  it('should default the home name to Unknown', () => {
    const { name: _name, ...descriptor } = homeDescriptor();

    const home = buildHome(descriptor);

    expect(home.name).toBe('Unknown');
  });

  it('should build every module unreachable with no status', () => {
    const home = buildHome();

    expect(home.modules.size).toBe(4);
    for (const module of home.modules.values()) {
      expect(module.reachable).toBe(false);
      expect(module.boilerStatus).toBeUndefined();
      expect(module.batteryLevel).toBeUndefined();
      expect(module.batteryState).toBeUndefined();
    }
  });

  it('should map module links', () => {
    const home = buildHome();

    const relay = moduleOf(home, 'relay-1');
    expect(relay.deviceType).toBe('NAPlug');
    expect(relay.family).toBe('relay');
    expect(relay.bridgedModuleIds).toEqual(['valve-1', 'therm-1']);
    expect(relay.roomId).toBeUndefined();

    const valve = moduleOf(home, 'valve-1');
    expect(valve.roomId).toBe('room-1');
    expect(valve.bridgeId).toBe('relay-1');
    expect(valve.bridgedModuleIds).toEqual([]);
    expect(valve.homeId).toBe('home-1');
  });

  it('should exclude room members that are not modules of the home', () => {
    const home = buildHome();

    expect([...roomOf(home, 'room-1').modules.keys()]).toEqual(['valve-1']);
  });

  it('should share module instances between the home and its rooms', () => {
    const home = buildHome();

    expect(roomOf(home, 'room-2').modules.get('therm-1')).toBe(moduleOf(home, 'therm-1'));
  });

  it('should not depend on the order of module_ids', () => {
    const descriptor = homeDescriptor();
    descriptor.rooms = [{ id: 'room-1', name: 'All', module_ids: ['cam-1', 'valve-1', 'relay-1'] }];
    const reversed = homeDescriptor();
    reversed.rooms = [{ id: 'room-1', name: 'All', module_ids: ['relay-1', 'valve-1', 'cam-1'] }];

    const a = roomOf(buildHome(descriptor), 'room-1');
    const b = roomOf(buildHome(reversed), 'room-1');

    expect([...a.modules.keys()]).toEqual(['relay-1', 'valve-1', 'cam-1']);
    expect([...b.modules.keys()]).toEqual([...a.modules.keys()]);
  });

  it('should map schedules with defaults', () => {
    const home = buildHome();

    const standard = home.schedules.get('sched-1');
    expect(standard?.selected).toBe(true);
    expect(standard?.hgTemp).toBe(7);
    expect(standard?.awayTemp).toBe(14);
    expect(standard?.homeId).toBe('home-1');

    const eco = home.schedules.get('sched-2');
    expect(eco?.selected).toBe(false);
    expect(eco?.hgTemp).toBeUndefined();
    expect(eco?.awayTemp).toBeUndefined();
  });

  it('should reject an unknown device type', () => {
    const descriptor = homeDescriptor();
    descriptor.modules.push({ id: 'toaster-1', name: 'Toaster', type: 'TOASTER' });

    expect(() => buildHome(descriptor)).toThrow(UnknownDeviceTypeError);
    expect(() => buildHome(descriptor)).toThrow(
      'Module toaster-1 has unsupported device type "TOASTER"'
    );
  });
});
