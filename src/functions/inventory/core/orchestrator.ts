/**
 * Discovery orchestrator for Cloud Cost Inventory.
 *
 * Runs one scan per (kind, region) pair through a bounded worker pool
 * and merges the results into per-kind collections. A failed region
 * scan is recorded and skipped; it never interrupts the overall run.
 */

import type {
  CanonicalResource,
  InventoryOptions,
  RegionScanResult,
  ResourceKind,
  ScanError,
  ScanSession,
} from '@shared/types';
import { GLOBAL_REGION } from '@shared/types';
import { ofKind } from '@shared/utils/kinds';
import { setupLogger } from '@shared/utils/logger';
import {
  getScanner,
  SCAN_ABORTED,
  toScanError,
  type RegionScanner,
  type ScannerContext,
} from '../scanners';
import { createClientFactory, type ClientFactory } from './clients';
import { listEnabledRegions } from './regions';

const logger = setupLogger('cost-inventory:orchestrator');

/**
 * Region label recorded on a failed region listing.
 */
export const ALL_REGIONS_LABEL = '*';

/**
 * Default number of scans in flight at once.
 */
export const DEFAULT_CONCURRENCY = 4;

/**
 * One (kind, region) scan.
 */
interface ScanTask {
  kind: ResourceKind;
  region: string;
  scanner: RegionScanner;
}

/**
 * Seams for tests and alternative providers.
 */
export interface OrchestratorDependencies {
  clients?: ClientFactory;
  scannerFactory?: (kind: ResourceKind, context: ScannerContext) => RegionScanner;
}

export class Orchestrator {
  private readonly options: InventoryOptions;
  private readonly clients: ClientFactory;
  private readonly scannerFactory: (kind: ResourceKind, context: ScannerContext) => RegionScanner;

  constructor(options: InventoryOptions, dependencies: OrchestratorDependencies = {}) {
    this.options = options;
    this.clients =
      dependencies.clients ??
      createClientFactory({ profile: options.profile, maxAttempts: options.maxAttempts });
    this.scannerFactory = dependencies.scannerFactory ?? getScanner;
  }

  /**
   * Discover every configured kind across the configured regions.
   *
   * When the signal aborts, no further scans start and the session holds
   * whatever completed before; `interrupted` is set on the result.
   *
   * @param signal - Optional abort signal (e.g. from SIGINT)
   * @returns Read-only scan session
   */
  async discover(signal?: AbortSignal): Promise<ScanSession> {
    const startedAt = new Date().toISOString();
    const errors: ScanError[] = [];
    const kinds = this.options.kinds;

    logger.info(
      {
        kinds,
        regions: this.options.regions,
        concurrency: this.options.concurrency,
      },
      'Starting resource discovery'
    );

    const regions = this.needsRegions(kinds) ? await this.resolveRegions(errors, signal) : [];
    const context: ScannerContext = {
      pricing: this.options.pricing,
      clients: this.clients,
      signal,
    };
    const tasks = this.planTasks(kinds, regions, context);

    logger.info(
      { taskCount: tasks.length, regionCount: regions.length },
      `Scanning ${kinds.length} resource kind(s) across ${regions.length} region(s)`
    );

    const results = await this.executeTasks(tasks, signal);
    const discovered: CanonicalResource[] = [];

    // Results are read in task order, so collection order does not
    // depend on which worker finished first.
    for (const result of results) {
      if (!result) {
        continue;
      }
      if (result.ok) {
        discovered.push(...result.resources);
      } else if (result.error.code !== SCAN_ABORTED) {
        errors.push(result.error);
      }
    }

    const interrupted = signal?.aborted ?? false;
    const session: ScanSession = {
      regions: Object.freeze([...regions]),
      kinds: Object.freeze([...kinds]),
      collections: Object.freeze({
        compute: Object.freeze(ofKind(discovered, 'compute')),
        'block-volume': Object.freeze(ofKind(discovered, 'block-volume')),
        'object-store': Object.freeze(ofKind(discovered, 'object-store')),
        'floating-ip': Object.freeze(ofKind(discovered, 'floating-ip')),
        snapshot: Object.freeze(ofKind(discovered, 'snapshot')),
      }),
      errors: Object.freeze(errors),
      interrupted,
      startedAt,
      completedAt: new Date().toISOString(),
    };

    if (interrupted) {
      logger.warn(
        { completed: results.filter(Boolean).length, total: tasks.length },
        'Discovery interrupted; continuing with partial results'
      );
    }

    for (const error of errors) {
      logger.warn(
        { kind: error.kind, region: error.region, code: error.code },
        `Skipped ${error.kind} in ${error.region}: ${error.message}`
      );
    }

    logger.info(
      {
        total: discovered.length,
        errors: errors.length,
        interrupted,
      },
      'Discovery completed'
    );

    return Object.freeze(session);
  }

  private needsRegions(kinds: readonly ResourceKind[]): boolean {
    return kinds.some((kind) => kind !== 'object-store');
  }

  /**
   * Use the explicit region list, or ask the provider for every enabled
   * region. A failed listing yields no regions and a recorded error.
   */
  private async resolveRegions(errors: ScanError[], signal?: AbortSignal): Promise<string[]> {
    if (this.options.regions !== 'all') {
      return [...this.options.regions];
    }

    try {
      return await listEnabledRegions(this.clients, signal);
    } catch (error) {
      const scanError = toScanError(error, 'regions', ALL_REGIONS_LABEL, signal);
      if (scanError.code !== SCAN_ABORTED) {
        logger.error(
          { code: scanError.code, error: scanError.message },
          'Error retrieving regions; region-scoped kinds will be empty'
        );
        errors.push(scanError);
      }
      return [];
    }
  }

  /**
   * Kinds outer, regions inner. Global kinds get a single task.
   */
  private planTasks(
    kinds: readonly ResourceKind[],
    regions: readonly string[],
    context: ScannerContext
  ): ScanTask[] {
    const tasks: ScanTask[] = [];

    for (const kind of kinds) {
      const scanner = this.scannerFactory(kind, context);

      if (scanner.isGlobal) {
        tasks.push({ kind, region: GLOBAL_REGION, scanner });
        continue;
      }

      for (const region of regions) {
        tasks.push({ kind, region, scanner });
      }
    }

    return tasks;
  }

  /**
   * Run tasks with at most `concurrency` in flight. Each result is stored
   * at its task's index; tasks never started (after an abort) stay
   * undefined.
   */
  private async executeTasks(
    tasks: readonly ScanTask[],
    signal?: AbortSignal
  ): Promise<Array<RegionScanResult | undefined>> {
    const results: Array<RegionScanResult | undefined> = new Array<RegionScanResult | undefined>(
      tasks.length
    ).fill(undefined);
    const workerCount = Math.max(1, Math.min(this.options.concurrency, tasks.length));
    let nextIndex = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < tasks.length) {
        if (signal?.aborted) {
          return;
        }
        const index = nextIndex++;
        const task = tasks[index];

        logger.debug({ kind: task.kind, region: task.region }, 'Scanning');
        results[index] = await task.scanner.scan(task.region);
      }
    };

    const workers: Promise<void>[] = [];
    for (let i = 0; i < workerCount; i++) {
      workers.push(worker());
    }
    await Promise.all(workers);

    return results;
  }
}
