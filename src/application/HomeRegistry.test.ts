import { describe, it, expect, beforeEach } from 'vitest';
import { HomeRegistry } from './HomeRegistry.js';
import {
  InvalidHomeError,
  InvalidPayloadError,
  UnknownDeviceTypeError,
} from '../domain/errors/index.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import { createMockLogger, homeDescriptor, topologyPayload } from '../test-utils/fixtures.js';

describe('HomeRegistry', () => {
  let mockLogger: ILogger;
  let registry: HomeRegistry;

  beforeEach(() => {
    mockLogger = createMockLogger();
    registry = new HomeRegistry(mockLogger);
  });

  it('should start empty', () => {
    expect(registry.isEmpty()).toBe(true);
    expect(registry.size).toBe(0);
    expect(registry.homeIds()).toEqual([]);
  });

  describe('topology payloads', () => {
    it('should build the homes', () => {
      const result = registry.process(topologyPayload());

      expect(result).toEqual({ kind: 'topology', homeIds: ['home-1'], skippedHomeIds: [] });
      expect(registry.hasHome('home-1')).toBe(true);
      expect(registry.getHome('home-1').modules.size).toBe(4);
    });

    it('should replace previously held homes wholesale', () => {
      registry.process(topologyPayload());
      const before = registry.getHome('home-1');

      registry.process({ homes: [{ ...homeDescriptor(), id: 'home-2' }] });

      expect(registry.homeIds()).toEqual(['home-2']);
      expect(registry.findHome('home-1')).toBeUndefined();

      registry.process(topologyPayload());
      expect(registry.getHome('home-1')).not.toBe(before);
    });

    it('should keep the previous graph of a home that fails to build', () => {
      registry.process(topologyPayload());
      const before = registry.getHome('home-1');
      const broken = homeDescriptor();
      broken.modules.push({ id: 'x-1', name: 'X', type: 'UNKNOWN' });

      const result = registry.process({ homes: [broken] });

      expect(result).toEqual({ kind: 'topology', homeIds: ['home-1'], skippedHomeIds: ['home-1'] });
      expect(registry.getHome('home-1')).toBe(before);
      expect(mockLogger.error).toHaveBeenCalledWith(
        'Skipping home with an unsupported module',
        expect.any(UnknownDeviceTypeError),
        { homeId: 'home-1', keptPrevious: true }
      );
    });

    it('should build the other homes when one has an unsupported module', () => {
      const broken = { ...homeDescriptor(), id: 'home-2' };
      broken.modules = [...broken.modules, { id: 'x-1', name: 'X', type: 'UNKNOWN' }];

      const result = registry.process({ homes: [homeDescriptor(), broken] });

      expect(result).toEqual({ kind: 'topology', homeIds: ['home-1'], skippedHomeIds: ['home-2'] });
      expect(registry.hasHome('home-2')).toBe(false);
      expect(registry.getHome('home-1').modules.size).toBe(4);
    });

    it('should reject a home without id', () => {
      expect(() => registry.process({ homes: [{ name: 'Nameless' }] })).toThrow(InvalidPayloadError);
      expect(() => registry.process({ homes: [{ name: 'Nameless' }] })).toThrow(
        'Invalid homes topology payload: homes.0.id: Required'
      );
    });

    it('should ignore unknown fields', () => {
      const descriptor = { ...homeDescriptor(), altitude: 120, coordinates: [2.3, 48.8] };

      registry.process({ homes: [descriptor], status: 'ok' });

      expect(registry.getHome('home-1').name).toBe('Maison');
    });
  });

  describe('status payloads', () => {
    beforeEach(() => {
      registry.process(topologyPayload());
    });

    it('should reconcile the matching home', () => {
      const result = registry.process({
        errors: [],
        home: { id: 'home-1', modules: [{ id: 'cam-1', reachable: true }], rooms: [] },
      });

      expect(result).toEqual({ kind: 'status', homeId: 'home-1', modulesUpdated: 1, roomsUpdated: 0 });
      expect(registry.getHome('home-1').getModule('cam-1')?.reachable).toBe(true);
    });

    it('should accept a payload without errors, modules or rooms', () => {
      const result = registry.process({ home: { id: 'home-1' } });

      expect(result).toEqual({ kind: 'status', homeId: 'home-1', modulesUpdated: 0, roomsUpdated: 0 });
    });

    it('should fail for an unregistered home', () => {
      expect(() => registry.process({ home: { id: 'home-9' } })).toThrow(InvalidHomeError);
      expect(() => registry.process({ home: { id: 'home-9' } })).toThrow(
        'home-9 is not a valid home id.'
      );
    });

    it('should route on home before homes', () => {
      const result = registry.process({ home: { id: 'home-1' }, homes: [] });

      expect(result.kind).toBe('status');
      expect(registry.hasHome('home-1')).toBe(true);
    });
  });

  describe('unrecognized payloads', () => {
    it('should leave the registry unchanged', () => {
      registry.process(topologyPayload());
      const before = registry.getHome('home-1');

      const result = registry.process({ body: { devices: [] } });

      expect(result).toEqual({ kind: 'ignored' });
      expect(registry.homeIds()).toEqual(['home-1']);
      expect(registry.getHome('home-1')).toBe(before);
      expect(mockLogger.warn).toHaveBeenCalledWith('Ignoring payload without home or homes key', {
        keys: ['body'],
      });
    });

    it('should ignore non-object payloads', () => {
      expect(registry.process(null)).toEqual({ kind: 'ignored' });
      expect(registry.process([{ homes: [] }])).toEqual({ kind: 'ignored' });
    });
  });

  it('should throw InvalidHomeError from getHome for an unknown id', () => {
    expect(() => registry.getHome('nope')).toThrow(InvalidHomeError);
  });
});
