/**
 * Inventory service: discovery, cost aggregation and waste classification
 * in one call.
 */

import type {
  InventoryOptions,
  InventoryResult,
  InventoryStatus,
  ScanSession,
} from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { formatCurrency } from '@shared/utils/money';
import { aggregateCosts, classifyWaste } from '../analysis';
import { Orchestrator, type OrchestratorDependencies } from './orchestrator';

const logger = setupLogger('cost-inventory:inventory');

/**
 * Raised when an inventory run fails outright. Region failures do not
 * raise; they are reported in `session.errors`.
 */
export class InventoryError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'InventoryError';
  }
}

export interface InventoryDependencies extends OrchestratorDependencies {
  signal?: AbortSignal;
}

export function inventoryStatus(session: ScanSession): InventoryStatus {
  if (session.interrupted) {
    return 'interrupted';
  }
  return session.errors.length > 0 ? 'partial' : 'complete';
}

/**
 * Run one inventory.
 *
 * @throws {InventoryError} If discovery fails with an unexpected error
 */
export async function runInventory(
  options: InventoryOptions,
  dependencies: InventoryDependencies = {}
): Promise<InventoryResult> {
  const { signal, ...orchestratorDeps } = dependencies;
  const orchestrator = new Orchestrator(options, orchestratorDeps);

  let session: ScanSession;
  try {
    session = await orchestrator.discover(signal);
  } catch (error) {
    throw new InventoryError(`Inventory failed: ${String(error)}`, { cause: error });
  }

  const costSummary = aggregateCosts(session);
  const waste = classifyWaste(session);
  const status = inventoryStatus(session);

  logger.info(
    {
      status,
      overallTotal: formatCurrency(costSummary.overallTotal),
      errors: session.errors.length,
    },
    'Inventory completed'
  );

  return { status, session, costSummary, waste };
}
