/**
 * Static unit price tables.
 *
 * Compute and floating IP prices are per hour; block volume, object
 * store and snapshot prices are per GiB-month. Figures are on-demand
 * us-east-1 list prices, good for order-of-magnitude estimates only.
 */

import type { KindPricing, PriceTable, PricingOverride, ResourceKind } from '@shared/types';
import { RESOURCE_KINDS } from '@shared/types';
import { mapKinds } from '@shared/utils/kinds';

/**
 * Floating IP variants. Only unassociated addresses are billed.
 */
export const FLOATING_IP_ASSOCIATED = 'associated';
export const FLOATING_IP_UNASSOCIATED = 'unassociated';

/**
 * Storage tier used for object-store pricing.
 */
export const OBJECT_STORE_TIER = 'standard';

/**
 * Snapshots have a single rate.
 */
export const SNAPSHOT_TIER = 'standard';

function freezeTable(table: Record<ResourceKind, KindPricing>): PriceTable {
  for (const kind of RESOURCE_KINDS) {
    Object.freeze(table[kind].rates);
    Object.freeze(table[kind]);
  }
  return Object.freeze(table);
}

export const DEFAULT_PRICE_TABLE: PriceTable = freezeTable({
  compute: {
    rates: {
      't2.micro': 0.0116,
      't2.small': 0.023,
      't2.medium': 0.0467,
      't2.large': 0.093,
      't3.micro': 0.0104,
      't3.small': 0.0208,
      't3.medium': 0.0416,
      't3.large': 0.0832,
    },
    fallback: 0.05,
  },
  'block-volume': {
    rates: {
      gp2: 0.1,
      gp3: 0.08,
      io1: 0.125,
      io2: 0.125,
      st1: 0.045,
      sc1: 0.015,
    },
    fallback: 0.1,
  },
  'object-store': {
    rates: {
      standard: 0.023,
      intelligent_tiering: 0.0125,
      standard_ia: 0.0125,
      onezone_ia: 0.01,
      glacier: 0.004,
      glacier_ir: 0.0036,
    },
    fallback: 0.023,
  },
  'floating-ip': {
    rates: {
      [FLOATING_IP_UNASSOCIATED]: 0.005,
      [FLOATING_IP_ASSOCIATED]: 0,
    },
    fallback: 0.005,
  },
  snapshot: {
    rates: {
      [SNAPSHOT_TIER]: 0.05,
    },
    fallback: 0.05,
  },
});

/**
 * Same variants as the default table, every price zero. Used for no-cost mode.
 */
export const ZERO_PRICE_TABLE: PriceTable = zeroPriceTable(DEFAULT_PRICE_TABLE);

function zeroPriceTable(source: PriceTable): PriceTable {
  return freezeTable(
    mapKinds((kind) => {
      const rates: Record<string, number> = {};
      for (const variant of Object.keys(source[kind].rates)) {
        rates[variant] = 0;
      }
      return { rates, fallback: 0 };
    })
  );
}

/**
 * Look up the unit price of a variant, falling back to the kind's default
 * when the variant is missing from the table.
 *
 * @example
 * unitPrice(DEFAULT_PRICE_TABLE, 'compute', 't3.micro'); // 0.0104
 * unitPrice(DEFAULT_PRICE_TABLE, 'compute', 'x9.huge');  // 0.05
 */
export function unitPrice(table: PriceTable, kind: ResourceKind, variant?: string): number {
  const pricing = table[kind];
  if (variant !== undefined && Object.prototype.hasOwnProperty.call(pricing.rates, variant)) {
    return pricing.rates[variant];
  }
  return pricing.fallback;
}

/**
 * Merge a partial override over a base table. Override prices must be
 * non-negative; negative values are ignored.
 */
export function withPriceOverrides(base: PriceTable, override: PricingOverride = {}): PriceTable {
  return freezeTable(
    mapKinds((kind) => {
      const rates: Record<string, number> = { ...base[kind].rates };
      for (const [variant, price] of Object.entries(override[kind] ?? {})) {
        if (price >= 0) {
          rates[variant] = price;
        }
      }
      return { rates, fallback: base[kind].fallback };
    })
  );
}
