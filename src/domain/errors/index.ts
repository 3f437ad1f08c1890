export {
  ClimateError,
  InvalidHomeError,
  NoScheduleError,
  LookupFailureError,
  UnknownDeviceTypeError,
  NoDeviceError,
  InvalidPayloadError,
  type ClimateErrorCode,
} from './ClimateError.js';
