import { NoDeviceError } from '../../domain/errors/index.js';
import { isRecord } from '../../domain/schemas/payloads.js';

export type EnvelopeKey = 'home' | 'homes';

/**
 * Extract `body[key]` (and `body.errors`) from an API response envelope
 */
export function unwrapEnvelope(response: unknown, key: EnvelopeKey): Record<string, unknown> {
  const body = isRecord(response) ? response.body : undefined;
  if (!isRecord(body) || !(key in body)) {
    throw new NoDeviceError('No device found, errors in response');
  }

  return {
    [key]: body[key],
    errors: body.errors ?? [],
  };
}
