import type { Home } from '../domain/entities/Home.js';
import { InvalidHomeError } from '../domain/errors/index.js';
import type { ILogger } from '../domain/ports/ILogger.js';
import {
  isRecord,
  parsePayload,
  statusPayloadSchema,
  topologyPayloadSchema,
} from '../domain/schemas/payloads.js';
import { TopologyMapper } from '../infrastructure/mappers/TopologyMapper.js';
import { StatusReconciler, type ReconcileSummary } from './StatusReconciler.js';

export type ProcessResult =
  | { kind: 'topology'; homeIds: string[]; skippedHomeIds: string[] }
  | ({ kind: 'status' } & ReconcileSummary)
  | { kind: 'ignored' };

/**
 * Holds the homes of the account and routes raw payloads:
 * `home` → status reconciliation, `homes` → full topology rebuild.
 */
export class HomeRegistry {
  private homes = new Map<string, Home>();
  private readonly logger: ILogger;
  private readonly reconciler: StatusReconciler;

  constructor(logger: ILogger, reconciler?: StatusReconciler) {
    this.logger = logger.child({ component: 'HomeRegistry' });
    this.reconciler = reconciler ?? new StatusReconciler(this.logger);
  }

  process(raw: unknown): ProcessResult {
    if (isRecord(raw) && 'home' in raw) {
      const payload = parsePayload(statusPayloadSchema, raw, 'home status');
      const home = this.getHome(payload.home.id);
      return { kind: 'status', ...this.reconciler.reconcile(home, payload) };
    }

    if (isRecord(raw) && 'homes' in raw) {
      const payload = parsePayload(topologyPayloadSchema, raw, 'homes topology');
      const { homes, rejected } = TopologyMapper.mapHomes(payload);

      // A home that failed to build keeps its previous graph, if it had one
      for (const [homeId, error] of rejected) {
        const previous = this.homes.get(homeId);
        if (previous) {
          homes.set(homeId, previous);
        }
        this.logger.error('Skipping home with an unsupported module', error, {
          homeId,
          keptPrevious: previous !== undefined,
        });
      }

      this.homes = homes;
      const homeIds = [...this.homes.keys()];
      const skippedHomeIds = [...rejected.keys()];
      this.logger.info('Topology rebuilt', { homes: homeIds.length, homeIds, skippedHomeIds });
      return { kind: 'topology', homeIds, skippedHomeIds };
    }

    this.logger.warn('Ignoring payload without home or homes key', {
      keys: isRecord(raw) ? Object.keys(raw) : [],
    });
    return { kind: 'ignored' };
  }

  /**
   * @throws InvalidHomeError when the id is not registered
   */
  getHome(homeId: string): Home {
    const home = this.homes.get(homeId);
    if (!home) {
      throw new InvalidHomeError(homeId);
    }
    return home;
  }

  findHome(homeId: string): Home | undefined {
    return this.homes.get(homeId);
  }

  hasHome(homeId: string): boolean {
    return this.homes.has(homeId);
  }

  homeIds(): string[] {
    return [...this.homes.keys()];
  }

  get size(): number {
    return this.homes.size;
  }

  isEmpty(): boolean {
    return this.homes.size === 0;
  }
}
