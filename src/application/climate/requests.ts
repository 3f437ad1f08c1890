import type { Home } from '../../domain/entities/Home.js';
import { LookupFailureError, NoScheduleError } from '../../domain/errors/index.js';
import type { RequestParams } from '../../domain/ports/ITransport.js';

/**
 * API paths, relative to the configured base URL
 */
export const ENDPOINTS = {
  homesData: 'homesdata',
  homeStatus: 'homestatus',
  setThermMode: 'setthermmode',
  switchHomeSchedule: 'switchhomeschedule',
  setRoomThermpoint: 'setroomthermpoint',
} as const;

export const THERM_MODES = ['schedule', 'away', 'hg'] as const;
export type ThermMode = (typeof THERM_MODES)[number];

export const ROOM_THERMPOINT_MODES = ['manual', 'max', 'home'] as const;
export type RoomThermpointMode = (typeof ROOM_THERMPOINT_MODES)[number];

export interface SetThermModeInput {
  homeId: string;
  mode?: ThermMode;
  /** Unix timestamp (seconds), only sent for `hg` and `away` */
  endTime?: number;
  /** Only sent for `schedule` */
  scheduleId?: string;
}

export interface SwitchHomeScheduleInput {
  homeId: string;
  scheduleId: string;
}

export interface SetRoomThermpointInput {
  homeId: string;
  roomId: string;
  mode?: RoomThermpointMode;
  /** Only sent for `manual` */
  temp?: number;
  /** Only sent for `manual` and `max` */
  endTime?: number;
}

function isThermMode(mode: string): mode is ThermMode {
  return THERM_MODES.some((m) => m === mode);
}

function isRoomThermpointMode(mode: string): mode is RoomThermpointMode {
  return ROOM_THERMPOINT_MODES.some((m) => m === mode);
}

export function buildSetThermModeParams(home: Home, input: SetThermModeInput): RequestParams {
  const { mode, endTime, scheduleId } = input;

  if (scheduleId !== undefined && !home.isValidSchedule(scheduleId)) {
    throw new NoScheduleError(`${scheduleId} is not a valid schedule id.`);
  }

  if (mode === undefined || !isThermMode(mode)) {
    throw new NoScheduleError(`${mode} is not a valid mode.`);
  }

  const params: RequestParams = { home_id: home.id, mode };

  if (endTime !== undefined && (mode === 'hg' || mode === 'away')) {
    params.endtime = String(endTime);
  }

  if (scheduleId !== undefined && mode === 'schedule') {
    params.schedule_id = scheduleId;
  }

  return params;
}

export function buildSwitchHomeScheduleParams(
  home: Home,
  input: SwitchHomeScheduleInput
): RequestParams {
  if (!home.isValidSchedule(input.scheduleId)) {
    throw new NoScheduleError(`${input.scheduleId} is not a valid schedule id`);
  }

  return { home_id: home.id, schedule_id: input.scheduleId };
}

export function buildSetRoomThermpointParams(
  home: Home,
  input: SetRoomThermpointInput
): RequestParams {
  const { roomId, mode, temp, endTime } = input;

  if (!home.getRoom(roomId)) {
    throw new LookupFailureError(home.id, [], [roomId]);
  }

  if (mode === undefined || !isRoomThermpointMode(mode)) {
    throw new NoScheduleError(`${mode} is not a valid room mode.`);
  }

  const params: RequestParams = { home_id: home.id, room_id: roomId, mode };

  if (temp !== undefined && mode === 'manual') {
    params.temp = String(temp);
  }

  if (endTime !== undefined && mode !== 'home') {
    params.endtime = String(endTime);
  }

  return params;
}
