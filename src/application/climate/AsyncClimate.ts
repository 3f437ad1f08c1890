import type { ILogger } from '../../domain/ports/ILogger.js';
import type { IAsyncTransport, TransportResponse } from '../../domain/ports/ITransport.js';
import type { HomeRegistry, ProcessResult } from '../HomeRegistry.js';
import { AbstractClimate, type OutboundRequest } from './AbstractClimate.js';
import type {
  SetRoomThermpointInput,
  SetThermModeInput,
  SwitchHomeScheduleInput,
} from './requests.js';

/**
 * Climate client over a promise-based transport
 */
export class AsyncClimate extends AbstractClimate {
  constructor(
    private readonly transport: IAsyncTransport,
    logger: ILogger,
    registry?: HomeRegistry
  ) {
    super(logger, registry);
  }

  /**
   * Fetch the topology if none is held yet, then the status of every home
   */
  async update(): Promise<ProcessResult[]> {
    if (this.registry.isEmpty()) {
      await this.updateTopology();
    }

    const results: ProcessResult[] = [];
    for (const homeId of this.registry.homeIds()) {
      const response = await this.send(this.statusRequest(homeId));
      results.push(this.handleStatusResponse(response));
    }
    return results;
  }

  async updateTopology(): Promise<ProcessResult> {
    const response = await this.send(this.topologyRequest());
    return this.handleTopologyResponse(response);
  }

  /**
   * @returns the parsed response body
   */
  async setThermMode(input: SetThermModeInput): Promise<unknown> {
    const request = this.setThermModeRequest(input);
    this.logger.info('Setting thermostat mode', { ...request.params });
    const response = await this.send(request);
    return response.body;
  }

  async switchHomeSchedule(input: SwitchHomeScheduleInput): Promise<void> {
    const request = this.switchHomeScheduleRequest(input);
    const response = await this.send(request);
    this.logger.debug('Home schedule switched', { ...request.params, status: response.status });
  }

  async setRoomThermpoint(input: SetRoomThermpointInput): Promise<unknown> {
    const request = this.setRoomThermpointRequest(input);
    this.logger.info('Setting room thermpoint', { ...request.params });
    const response = await this.send(request);
    return response.body;
  }

  private send(request: OutboundRequest): Promise<TransportResponse> {
    return this.transport.post(request.url, request.params);
  }
}
