/**
 * Device type tags reported by the climate cloud API
 */
export const DEVICE_TYPES = [
  // Climate/Energy
  'NRV', // Smart valve
  'NATherm1', // Smart thermostat
  'OTM', // OpenTherm modulating thermostat
  'NAPlug', // Relay
  'OTH', // OpenTherm relay

  // Cameras/Security
  'NOC', // Outdoor camera (with siren)
  'NACamera', // Indoor camera
  'NSD', // Smoke detector
  'NIS', // Indoor siren
  'NACamDoorTag', // Door and window sensor

  // Weather
  'NAMain', // Weather station
  'NAModule1',
  'NAModule2',
  'NAModule3',
  'NAModule4',

  // Home Coach
  'NHC', // Indoor air quality monitor
] as const;

export type DeviceType = (typeof DEVICE_TYPES)[number];

export type DeviceFamily =
  | 'valve'
  | 'thermostat'
  | 'relay'
  | 'camera'
  | 'weather'
  | 'air_quality';

export const DEVICE_FAMILIES: Record<DeviceType, DeviceFamily> = {
  NRV: 'valve',
  NATherm1: 'thermostat',
  OTM: 'thermostat',
  NAPlug: 'relay',
  OTH: 'relay',
  NOC: 'camera',
  NACamera: 'camera',
  NSD: 'camera',
  NIS: 'camera',
  NACamDoorTag: 'camera',
  NAMain: 'weather',
  NAModule1: 'weather',
  NAModule2: 'weather',
  NAModule3: 'weather',
  NAModule4: 'weather',
  NHC: 'air_quality',
};

export function isDeviceType(value: string): value is DeviceType {
  return DEVICE_TYPES.some((type) => type === value);
}

export function deviceFamilyOf(type: DeviceType): DeviceFamily {
  return DEVICE_FAMILIES[type];
}
