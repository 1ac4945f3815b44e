/**
 * Core types for region scanners.
 *
 * A scanner lists one resource kind in one region, follows every page of
 * the provider's listing call and normalizes each record. Failures never
 * leave the scanner: they come back as an error result so the
 * orchestrator can carry on with other regions and kinds.
 */

import type { Logger } from 'pino';
import type { PriceTable, RegionScanResult, ResourceByKind, ResourceKind } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import type { ClientFactory } from '../core/clients';
import { SCAN_ABORTED, toScanError } from './errors';

const scannerLogger = setupLogger('cost-inventory:scanner');

/**
 * Dependencies shared by every scanner in a run.
 */
export interface ScannerContext {
  pricing: PriceTable;
  clients: ClientFactory;
  /** Stops pagination and aborts in-flight provider requests. */
  signal?: AbortSignal;
}

/**
 * Interface that all concrete scanners implement.
 */
export interface RegionScanner<K extends ResourceKind = ResourceKind> {
  readonly kind: K;

  /**
   * True when the provider lists this kind once for the whole account
   * rather than per region.
   */
  readonly isGlobal: boolean;

  /**
   * Scan one region. Never rejects.
   */
  scan(region: string): Promise<RegionScanResult<K>>;
}

/**
 * Base class handling logging, abort checks and error isolation.
 */
export abstract class BaseScanner<K extends ResourceKind> implements RegionScanner<K> {
  readonly isGlobal: boolean = false;
  protected readonly logger: Logger = scannerLogger;

  constructor(
    readonly kind: K,
    protected readonly context: ScannerContext
  ) {}

  /**
   * List and normalize every resource of this kind in the region,
   * appending to `found` as each page arrives. May throw; scan() contains
   * the failure.
   */
  protected abstract collect(region: string, found: ResourceByKind[K][]): Promise<void>;

  async scan(region: string): Promise<RegionScanResult<K>> {
    const resources: ResourceByKind[K][] = [];

    try {
      this.throwIfAborted();
      await this.collect(region, resources);

      this.logger.debug(
        { kind: this.kind, region, count: resources.length },
        `Found ${resources.length} ${this.kind} resources in ${region}`
      );

      return { ok: true, kind: this.kind, region, resources };
    } catch (error) {
      const scanError = toScanError(error, this.kind, region, this.context.signal);

      // Resources listed before an interrupt are still reported.
      if (scanError.code === SCAN_ABORTED && resources.length > 0) {
        this.logger.debug(
          { kind: this.kind, region, count: resources.length },
          `Interrupted after ${resources.length} ${this.kind} resources in ${region}`
        );
        return { ok: true, kind: this.kind, region, resources };
      }

      if (scanError.code !== SCAN_ABORTED) {
        this.logger.warn(
          {
            kind: this.kind,
            region,
            code: scanError.code,
            recoverable: scanError.recoverable,
            error: scanError.message,
          },
          `Error scanning ${this.kind} in region ${region}`
        );
      }

      return { ok: false, kind: this.kind, region, error: scanError };
    }
  }

  /**
   * Options for client.send(), carrying the abort signal when there is one.
   */
  protected get sendOptions(): { abortSignal?: AbortSignal } {
    return this.context.signal ? { abortSignal: this.context.signal } : {};
  }

  protected throwIfAborted(): void {
    if (this.context.signal?.aborted) {
      throw new Error(SCAN_ABORTED);
    }
  }
}
