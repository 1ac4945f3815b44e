/**
 * Monthly cost totals.
 */

import type { CostSummary, ScanSession } from '@shared/types';
import { mapKinds } from '@shared/utils/kinds';
import { sumAmounts } from '@shared/utils/money';

/**
 * Sum monthly costs per kind and overall. The overall total is the sum of
 * the per-kind totals, so it matches the per-kind figures exactly.
 */
export function aggregateCosts(session: ScanSession): CostSummary {
  const byKind = mapKinds((kind) =>
    sumAmounts(session.collections[kind].map((resource) => resource.monthlyCost))
  );

  return {
    byKind,
    overallTotal: sumAmounts(Object.values(byKind)),
  };
}
