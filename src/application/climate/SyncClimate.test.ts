import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SyncClimate } from './SyncClimate.js';
import { AsyncClimate } from './AsyncClimate.js';
import { InvalidHomeError, NoScheduleError } from '../../domain/errors/index.js';
import type { ISyncTransport } from '../../domain/ports/ITransport.js';
import type { ILogger } from '../../domain/ports/ILogger.js';
import { createMockLogger, respond, statusOf } from '../../test-utils/fixtures.js';

describe('SyncClimate', () => {
  let mockTransport: ISyncTransport;
  let mockLogger: ILogger;
  let climate: SyncClimate;

  beforeEach(() => {
    mockTransport = {
      post: vi.fn().mockImplementation((url: string) => respond(url)),
    };
    mockLogger = createMockLogger();
    climate = new SyncClimate(mockTransport, mockLogger);
  });

  it('should fetch topology and status without awaiting', () => {
    const results = climate.update();

    expect(mockTransport.post).toHaveBeenNthCalledWith(1, 'homesdata', undefined);
    expect(mockTransport.post).toHaveBeenNthCalledWith(2, 'homestatus', { home_id: 'home-1' });
    expect(results).toEqual([
      { kind: 'status', homeId: 'home-1', modulesUpdated: 4, roomsUpdated: 2 },
    ]);
  });

  it('should reach the same state as the async client', async () => {
    const asyncClimate = new AsyncClimate(
      { post: (url: string) => Promise.resolve(respond(url)) },
      createMockLogger()
    );

    climate.update();
    await asyncClimate.update();

    expect(statusOf(climate.registry.getHome('home-1'))).toEqual(
      statusOf(asyncClimate.registry.getHome('home-1'))
    );
  });

  it('should route raw payloads through process', () => {
    climate.process({ homes: [{ id: 'home-2', name: 'Chalet' }] });

    expect(climate.registry.homeIds()).toEqual(['home-2']);
    expect(mockTransport.post).not.toHaveBeenCalled();
  });

  it('should set the thermostat mode', () => {
    climate.updateTopology();

    const result = climate.setThermMode({ homeId: 'home-1', mode: 'hg', endTime: 7200 });

    expect(mockTransport.post).toHaveBeenLastCalledWith('setthermmode', {
      home_id: 'home-1',
      mode: 'hg',
      endtime: '7200',
    });
    expect(result).toEqual({ status: 'ok', time_server: 1700000000 });
  });

  it('should validate before sending', () => {
    expect(() => climate.setThermMode({ homeId: 'home-1', mode: 'away' })).toThrow(InvalidHomeError);

    climate.updateTopology();
    expect(() => climate.switchHomeSchedule({ homeId: 'home-1', scheduleId: 'bogus' })).toThrow(
      NoScheduleError
    );
    expect(mockTransport.post).toHaveBeenCalledTimes(1);
  });

  it('should switch the home schedule', () => {
    climate.updateTopology();

    climate.switchHomeSchedule({ homeId: 'home-1', scheduleId: 'sched-1' });

    expect(mockTransport.post).toHaveBeenLastCalledWith('switchhomeschedule', {
      home_id: 'home-1',
      schedule_id: 'sched-1',
    });
  });
});
