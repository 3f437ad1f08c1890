import type { ILogger } from '../../domain/ports/ILogger.js';
import type { ISyncTransport, TransportResponse } from '../../domain/ports/ITransport.js';
import type { HomeRegistry, ProcessResult } from '../HomeRegistry.js';
import { AbstractClimate, type OutboundRequest } from './AbstractClimate.js';
import type {
  SetRoomThermpointInput,
  SetThermModeInput,
  SwitchHomeScheduleInput,
} from './requests.js';

/**
 * Climate client over a blocking transport. Same payload handling as AsyncClimate.
 */
export class SyncClimate extends AbstractClimate {
  constructor(
    private readonly transport: ISyncTransport,
    logger: ILogger,
    registry?: HomeRegistry
  ) {
    super(logger, registry);
  }

  /**
   * Fetch the topology if none is held yet, then the status of every home
   */
  update(): ProcessResult[] {
    if (this.registry.isEmpty()) {
      this.updateTopology();
    }

    const results: ProcessResult[] = [];
    for (const homeId of this.registry.homeIds()) {
      const response = this.send(this.statusRequest(homeId));
      results.push(this.handleStatusResponse(response));
    }
    return results;
  }

  updateTopology(): ProcessResult {
    const response = this.send(this.topologyRequest());
    return this.handleTopologyResponse(response);
  }

  /**
   * @returns the parsed response body
   */
  setThermMode(input: SetThermModeInput): unknown {
    const request = this.setThermModeRequest(input);
    this.logger.info('Setting thermostat mode', { ...request.params });
    const response = this.send(request);
    return response.body;
  }

  switchHomeSchedule(input: SwitchHomeScheduleInput): void {
    const request = this.switchHomeScheduleRequest(input);
    const response = this.send(request);
    this.logger.debug('Home schedule switched', { ...request.params, status: response.status });
  }

  setRoomThermpoint(input: SetRoomThermpointInput): unknown {
    const request = this.setRoomThermpointRequest(input);
    this.logger.info('Setting room thermpoint', { ...request.params });
    const response = this.send(request);
    return response.body;
  }

  private send(request: OutboundRequest): TransportResponse {
    return this.transport.post(request.url, request.params);
  }
}
