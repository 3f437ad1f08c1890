export { Home, type HomeInit } from "./domain/entities/Home.js";
export { Room, type RoomInit } from "./domain/entities/Room.js";
export { Module, type ModuleInit } from "./domain/entities/Module.js";
export { Schedule, type ScheduleInit } from "./domain/entities/Schedule.js";
export {
  DEVICE_TYPES,
  DEVICE_FAMILIES,
  isDeviceType,
  deviceFamilyOf,
  type DeviceType,
  type DeviceFamily,
} from "./domain/entities/DeviceType.js";
export * from "./domain/errors/index.js";
export * from "./domain/schemas/payloads.js";
export type { ILogger, LogLevel } from "./domain/ports/ILogger.js";
export type {
  IAsyncTransport,
  ISyncTransport,
  RequestParams,
  TransportResponse,
} from "./domain/ports/ITransport.js";

export { StatusReconciler, type ReconcileSummary } from "./application/StatusReconciler.js";
export { HomeRegistry, type ProcessResult } from "./application/HomeRegistry.js";
export { ClimatePoller, type RefreshableClimate } from "./application/ClimatePoller.js";
export { AbstractClimate } from "./application/climate/AbstractClimate.js";
export { AsyncClimate } from "./application/climate/AsyncClimate.js";
export { SyncClimate } from "./application/climate/SyncClimate.js";
export * from "./application/climate/requests.js";

export { TopologyMapper } from "./infrastructure/mappers/TopologyMapper.js";
export { unwrapEnvelope, type EnvelopeKey } from "./infrastructure/http/envelope.js";
export { AxiosTransport, type AxiosTransportConfig } from "./infrastructure/http/AxiosTransport.js";
export { FixtureTransport } from "./infrastructure/http/FixtureTransport.js";
export { PinoLogger, type PinoLoggerOptions } from "./infrastructure/logging/PinoLogger.js";
export { loadConfig, validateConfig, type AppConfig } from "./infrastructure/config/Config.js";
