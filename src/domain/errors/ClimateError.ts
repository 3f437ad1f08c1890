/**
 * Stable error codes exposed to callers
 */
export type ClimateErrorCode =
  | 'INVALID_HOME'
  | 'NO_SCHEDULE'
  | 'LOOKUP_FAILURE'
  | 'UNKNOWN_DEVICE_TYPE'
  | 'NO_DEVICE'
  | 'INVALID_PAYLOAD';

/**
 * Base class for every error raised by the climate core
 */
export abstract class ClimateError extends Error {
  abstract readonly code: ClimateErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Operation referenced a home id that is not registered
 */
export class InvalidHomeError extends ClimateError {
  readonly code = 'INVALID_HOME';

  constructor(readonly homeId: string) {
    super(`${homeId} is not a valid home id.`);
  }
}

/**
 * Schedule id not valid for the home, or an absent/invalid thermostat mode
 */
export class NoScheduleError extends ClimateError {
  readonly code = 'NO_SCHEDULE';
}

/**
 * Status update or command referenced modules/rooms missing from the home topology.
 * Usually means the topology is stale and must be fetched again.
 */
export class LookupFailureError extends ClimateError {
  readonly code = 'LOOKUP_FAILURE';

  constructor(
    readonly homeId: string,
    readonly moduleIds: readonly string[],
    readonly roomIds: readonly string[] = []
  ) {
    const parts: string[] = [];
    if (moduleIds.length > 0) parts.push(`modules [${moduleIds.join(', ')}]`);
    if (roomIds.length > 0) parts.push(`rooms [${roomIds.join(', ')}]`);
    super(`Unknown ${parts.join(' and ')} in home ${homeId}`);
  }
}

export class UnknownDeviceTypeError extends ClimateError {
  readonly code = 'UNKNOWN_DEVICE_TYPE';

  constructor(readonly deviceType: string, readonly moduleId: string) {
    super(`Module ${moduleId} has unsupported device type "${deviceType}"`);
  }
}

/**
 * API response envelope carried no data for the requested key
 */
export class NoDeviceError extends ClimateError {
  readonly code = 'NO_DEVICE';
}

/**
 * Payload did not match the shape expected for its kind
 */
export class InvalidPayloadError extends ClimateError {
  readonly code = 'INVALID_PAYLOAD';

  constructor(
    readonly kind: string,
    readonly issues: readonly string[]
  ) {
    super(`Invalid ${kind} payload: ${issues.join('; ')}`);
  }
}
