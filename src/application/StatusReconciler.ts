import type { Home } from '../domain/entities/Home.js';
import type { Module } from '../domain/entities/Module.js';
import { LookupFailureError } from '../domain/errors/index.js';
import type { StatusFields, StatusPayload } from '../domain/schemas/payloads.js';
import type { ILogger } from '../domain/ports/ILogger.js';

export interface ReconcileSummary {
  homeId: string;
  modulesUpdated: number;
  roomsUpdated: number;
}

interface ReconcileContext {
  home: Home;
  /** Ids with their own entry in the payload; a cascade never writes these */
  ownModules: Set<string>;
  ownRooms: Set<string>;
  /** Ids already written by a cascade during this payload */
  cascadedModules: Set<string>;
  cascadedRooms: Set<string>;
  missingModules: Set<string>;
  missingRooms: Set<string>;
  updatedModules: Set<string>;
  updatedRooms: Set<string>;
}

/**
 * Applies a status (homestatus) payload onto an already built Home.
 *
 * A module that ends up unreachable replays its own payload onto every module
 * it bridges, and onto the rooms of those modules, recursively. Every module
 * and room is written at most once per payload: an entity with its own entry
 * only takes that entry, and the first cascade to reach any other one wins.
 */
export class StatusReconciler {
  constructor(private readonly logger: ILogger) {}

  /**
   * Update `home` in place. Known ids are always applied; unknown ones are
   * reported afterwards through a single LookupFailureError.
   */
  reconcile(home: Home, payload: StatusPayload): ReconcileSummary {
    const ownModules = new Set(payload.home.modules.map((entry) => entry.id));
    const errorIds = payload.errors
      .map((error) => error.id)
      .filter((id) => !ownModules.has(id));

    const ctx: ReconcileContext = {
      home,
      ownModules: new Set([...errorIds, ...ownModules]),
      ownRooms: new Set(payload.home.rooms.map((entry) => entry.id)),
      cascadedModules: new Set(),
      cascadedRooms: new Set(),
      missingModules: new Set(),
      missingRooms: new Set(),
      updatedModules: new Set(),
      updatedRooms: new Set(),
    };

    // A module listed in errors reported no data at all, unless it also has an entry
    for (const id of new Set(errorIds)) {
      this.updateModule(ctx, id, {});
    }

    for (const entry of payload.home.modules) {
      this.updateModule(ctx, entry.id, entry);
    }

    for (const entry of payload.home.rooms) {
      const room = home.getRoom(entry.id);
      if (!room) {
        ctx.missingRooms.add(entry.id);
        continue;
      }
      room.applyStatus(entry);
      ctx.updatedRooms.add(room.id);
    }

    const summary: ReconcileSummary = {
      homeId: home.id,
      modulesUpdated: ctx.updatedModules.size,
      roomsUpdated: ctx.updatedRooms.size,
    };

    if (ctx.missingModules.size > 0 || ctx.missingRooms.size > 0) {
      const error = new LookupFailureError(
        home.id,
        [...ctx.missingModules],
        [...ctx.missingRooms]
      );
      this.logger.warn('Status payload references unknown ids', {
        ...summary,
        missingModules: error.moduleIds,
        missingRooms: error.roomIds,
      });
      throw error;
    }

    this.logger.debug('Home status reconciled', { ...summary });
    return summary;
  }

  private updateModule(ctx: ReconcileContext, moduleId: string, raw: StatusFields): void {
    const module = ctx.home.getModule(moduleId);
    if (!module) {
      ctx.missingModules.add(moduleId);
      return;
    }

    module.applyStatus(raw);
    ctx.updatedModules.add(module.id);

    if (!module.reachable) {
      this.cascade(ctx, module, raw);
    }
  }

  private cascade(ctx: ReconcileContext, bridge: Module, raw: StatusFields): void {
    for (const bridgedId of bridge.bridgedModuleIds) {
      if (ctx.ownModules.has(bridgedId) || ctx.cascadedModules.has(bridgedId)) {
        continue;
      }
      ctx.cascadedModules.add(bridgedId);

      const bridged = ctx.home.getModule(bridgedId);
      if (!bridged) {
        ctx.missingModules.add(bridgedId);
        continue;
      }

      bridged.applyStatus(raw);
      ctx.updatedModules.add(bridged.id);

      const roomId = bridged.roomId;
      if (
        roomId !== undefined &&
        !ctx.ownRooms.has(roomId) &&
        !ctx.cascadedRooms.has(roomId)
      ) {
        ctx.cascadedRooms.add(roomId);
        const room = ctx.home.getRoom(roomId);
        if (room) {
          room.applyStatus(raw);
          ctx.updatedRooms.add(room.id);
        } else {
          ctx.missingRooms.add(roomId);
        }
      }

      if (!bridged.reachable) {
        this.cascade(ctx, bridged, raw);
      }
    }
  }
}
