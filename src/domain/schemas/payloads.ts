import { z, type ZodError, type ZodTypeAny } from 'zod';
import { InvalidPayloadError } from '../errors/index.js';

// ============================================
// Topology (homesdata)
// ============================================

export const moduleDescriptorSchema = z.object({
  id: z.string(),
  name: z.string(),
  type: z.string(),
  room_id: z.string().nullish(),
  bridge: z.string().nullish(),
  modules_bridged: z.array(z.string()).default([]),
});

export type ModuleDescriptor = z.infer<typeof moduleDescriptorSchema>;

export const roomDescriptorSchema = z.object({
  id: z.string(),
  name: z.string(),
  module_ids: z.array(z.string()).default([]),
});

export type RoomDescriptor = z.infer<typeof roomDescriptorSchema>;

export const scheduleDescriptorSchema = z.object({
  id: z.string(),
  name: z.string(),
  selected: z.boolean().default(false),
  hg_temp: z.number().nullish(),
  away_temp: z.number().nullish(),
});

export type ScheduleDescriptor = z.infer<typeof scheduleDescriptorSchema>;

export const homeDescriptorSchema = z.object({
  id: z.string(),
  name: z.string().default('Unknown'),
  modules: z.array(moduleDescriptorSchema).default([]),
  rooms: z.array(roomDescriptorSchema).default([]),
  schedules: z.array(scheduleDescriptorSchema).default([]),
});

export type HomeDescriptor = z.infer<typeof homeDescriptorSchema>;

export const topologyPayloadSchema = z.object({
  homes: z.array(homeDescriptorSchema),
});

export type TopologyPayload = z.infer<typeof topologyPayloadSchema>;

// ============================================
// Status (homestatus)
// ============================================

/**
 * Status fields a module or room entry may carry. Module entries are also
 * replayed onto rooms when a bridge goes offline, so both share one shape.
 */
export const statusFieldsSchema = z.object({
  reachable: z.boolean().nullish(),
  boiler_status: z.boolean().nullish(),
  battery_level: z.number().nullish(),
  battery_state: z.string().nullish(),
  therm_measured_temperature: z.number().nullish(),
  therm_setpoint_mode: z.string().nullish(),
  therm_setpoint_temperature: z.number().nullish(),
  heating_power_request: z.number().nullish(),
});

export type StatusFields = z.infer<typeof statusFieldsSchema>;

export const statusEntrySchema = statusFieldsSchema.extend({
  id: z.string(),
});

export type StatusEntry = z.infer<typeof statusEntrySchema>;

export const statusErrorSchema = z.object({
  id: z.string(),
  code: z.number().optional(),
});

export type StatusError = z.infer<typeof statusErrorSchema>;

export const statusPayloadSchema = z.object({
  errors: z.array(statusErrorSchema).default([]),
  home: z.object({
    id: z.string(),
    modules: z.array(statusEntrySchema).default([]),
    rooms: z.array(statusEntrySchema).default([]),
  }),
});

export type StatusPayload = z.infer<typeof statusPayloadSchema>;

/**
 * Flatten zod issues into "path: message" strings
 */
export function describeIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Validate `raw` against `schema`, raising InvalidPayloadError on mismatch.
 * Unknown keys are stripped, not rejected.
 */
export function parsePayload<S extends ZodTypeAny>(schema: S, raw: unknown, kind: string): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new InvalidPayloadError(kind, describeIssues(result.error));
  }
  return result.data;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
