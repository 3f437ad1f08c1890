import type { ILogger } from '../../domain/ports/ILogger.js';
import type { RequestParams, TransportResponse } from '../../domain/ports/ITransport.js';
import { unwrapEnvelope } from '../../infrastructure/http/envelope.js';
import { HomeRegistry, type ProcessResult } from '../HomeRegistry.js';
import {
  ENDPOINTS,
  buildSetRoomThermpointParams,
  buildSetThermModeParams,
  buildSwitchHomeScheduleParams,
  type SetRoomThermpointInput,
  type SetThermModeInput,
  type SwitchHomeScheduleInput,
} from './requests.js';

export interface OutboundRequest {
  url: string;
  params?: RequestParams;
}

/**
 * State and request construction shared by the sync and async climate clients.
 * Subclasses only decide how a request is sent.
 */
export abstract class AbstractClimate {
  readonly registry: HomeRegistry;
  protected readonly logger: ILogger;

  constructor(logger: ILogger, registry?: HomeRegistry) {
    this.logger = logger;
    this.registry = registry ?? new HomeRegistry(logger);
  }

  /**
   * Route a raw (already unwrapped) payload into the registry
   */
  process(raw: unknown): ProcessResult {
    return this.registry.process(raw);
  }

  protected topologyRequest(): OutboundRequest {
    return { url: ENDPOINTS.homesData };
  }

  protected statusRequest(homeId: string): OutboundRequest {
    return { url: ENDPOINTS.homeStatus, params: { home_id: homeId } };
  }

  protected setThermModeRequest(input: SetThermModeInput): OutboundRequest {
    const home = this.registry.getHome(input.homeId);
    return { url: ENDPOINTS.setThermMode, params: buildSetThermModeParams(home, input) };
  }

  protected switchHomeScheduleRequest(input: SwitchHomeScheduleInput): OutboundRequest {
    const home = this.registry.getHome(input.homeId);
    return {
      url: ENDPOINTS.switchHomeSchedule,
      params: buildSwitchHomeScheduleParams(home, input),
    };
  }

  protected setRoomThermpointRequest(input: SetRoomThermpointInput): OutboundRequest {
    const home = this.registry.getHome(input.homeId);
    return {
      url: ENDPOINTS.setRoomThermpoint,
      params: buildSetRoomThermpointParams(home, input),
    };
  }

  protected handleTopologyResponse(response: TransportResponse): ProcessResult {
    return this.process(unwrapEnvelope(response.body, 'homes'));
  }

  protected handleStatusResponse(response: TransportResponse): ProcessResult {
    return this.process(unwrapEnvelope(response.body, 'home'));
  }
}
