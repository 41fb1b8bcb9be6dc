/**
 * SERIES CATALOG
 *
 * Source of truth for which series the orchestrator tracks and where each
 * one comes from. Definitions are frozen once the catalog is built; config
 * overrides are applied while building, never afterwards.
 */

import { ConfigError } from '../../../common/errors.js';
import type { Cadence, SeriesDefinition } from '../contracts/macro.contracts.js';
import { isValidPeriod, periodFromDate, periodStartDate } from './period.js';

// ═══════════════════════════════════════════════════════════════
// DEFAULT REGISTRY
// ═══════════════════════════════════════════════════════════════

export const DEFAULT_SERIES: SeriesDefinition[] = [
  // ─── FRED ───────────────────────────────────────────────────
  {
    key: 'GDP',
    provider: 'FRED',
    providerId: 'GDP',
    cadence: 'quarterly',
    unit: 'dollars (SAAR)',
    scale: 'billions',
    displayName: 'Gross Domestic Product',
    backfillStart: '1990-Q1',
  },
  {
    key: 'CPIAUCSL',
    provider: 'FRED',
    providerId: 'CPIAUCSL',
    cadence: 'monthly',
    unit: 'index 1982-84=100',
    scale: 'units',
    displayName: 'CPI (Headline)',
    backfillStart: '1990-01',
  },
  {
    key: 'CPILFESL',
    provider: 'FRED',
    providerId: 'CPILFESL',
    cadence: 'monthly',
    unit: 'index 1982-84=100',
    scale: 'units',
    displayName: 'CPI (Core)',
    backfillStart: '1990-01',
  },
  {
    key: 'UNRATE',
    provider: 'FRED',
    providerId: 'UNRATE',
    cadence: 'monthly',
    unit: 'percent',
    scale: 'units',
    displayName: 'Unemployment Rate',
    backfillStart: '1990-01',
  },
  {
    key: 'PAYEMS',
    provider: 'FRED',
    providerId: 'PAYEMS',
    cadence: 'monthly',
    unit: 'persons',
    scale: 'thousands',
    displayName: 'Total Nonfarm Payrolls',
    backfillStart: '1990-01',
  },
  {
    key: 'FEDFUNDS',
    provider: 'FRED',
    providerId: 'FEDFUNDS',
    cadence: 'monthly',
    unit: 'percent',
    scale: 'units',
    displayName: 'Fed Funds Rate',
    backfillStart: '1990-01',
  },
  {
    key: 'PPIACO',
    provider: 'FRED',
    providerId: 'PPIACO',
    cadence: 'monthly',
    unit: 'index 1982=100',
    scale: 'units',
    displayName: 'Producer Price Index (All Commodities)',
    backfillStart: '1990-01',
  },
  {
    key: 'ICSA',
    provider: 'FRED',
    providerId: 'ICSA',
    cadence: 'weekly',
    unit: 'claims',
    scale: 'units',
    displayName: 'Initial Jobless Claims',
    backfillStart: '2015-01-03',
  },
  {
    key: 'DGS10',
    provider: 'FRED',
    providerId: 'DGS10',
    cadence: 'daily',
    unit: 'percent',
    scale: 'units',
    displayName: '10-Year Treasury Yield',
    backfillStart: '2015-01-02',
  },
  {
    key: 'T10Y2Y',
    provider: 'FRED',
    providerId: 'T10Y2Y',
    cadence: 'daily',
    unit: 'percentage points',
    scale: 'units',
    displayName: '10Y-2Y Treasury Spread',
    backfillStart: '2015-01-02',
  },

  // ─── BLS ────────────────────────────────────────────────────
  {
    key: 'BLS_CPI_U_SA',
    provider: 'BLS',
    providerId: 'CUSR0000SA0',
    cadence: 'monthly',
    unit: 'index 1982-84=100',
    scale: 'units',
    displayName: 'CPI-U All Items (BLS, SA)',
    backfillStart: '2015-01',
  },
  {
    key: 'BLS_UNEMPLOYMENT',
    provider: 'BLS',
    providerId: 'LNS14000000',
    cadence: 'monthly',
    unit: 'percent',
    scale: 'units',
    displayName: 'Unemployment Rate (BLS CPS)',
    backfillStart: '2015-01',
  },
  {
    key: 'BLS_PAYROLLS',
    provider: 'BLS',
    providerId: 'CES0000000001',
    cadence: 'monthly',
    unit: 'persons',
    scale: 'thousands',
    displayName: 'Nonfarm Payrolls (BLS CES)',
    backfillStart: '2015-01',
  },
  {
    key: 'BLS_PRODUCTIVITY',
    provider: 'BLS',
    providerId: 'PRS85006092',
    cadence: 'quarterly',
    unit: 'percent change, annualized',
    scale: 'units',
    displayName: 'Nonfarm Business Labor Productivity',
    backfillStart: '2015-Q1',
  },
];

// ═══════════════════════════════════════════════════════════════
// CATALOG
// ═══════════════════════════════════════════════════════════════

export interface SeriesOverride {
  cadence?: Cadence;
  pollIntervalMs?: number;
}

export class SeriesCatalog {
  private readonly byKey: ReadonlyMap<string, SeriesDefinition>;

  constructor(definitions: readonly SeriesDefinition[]) {
    const map = new Map<string, SeriesDefinition>();
    for (const def of definitions) {
      if (map.has(def.key)) {
        throw new ConfigError(`Duplicate series key in catalog: ${def.key}`);
      }
      if (!isValidPeriod(def.cadence, def.backfillStart)) {
        throw new ConfigError(`Invalid backfillStart "${def.backfillStart}" for ${def.cadence} series ${def.key}`);
      }
      map.set(def.key, Object.freeze({ ...def }));
    }
    this.byKey = map;
  }

  get(key: string): SeriesDefinition | undefined {
    return this.byKey.get(key);
  }

  has(key: string): boolean {
    return this.byKey.has(key);
  }

  list(): SeriesDefinition[] {
    return [...this.byKey.values()];
  }

  keys(): string[] {
    return [...this.byKey.keys()];
  }

  get size(): number {
    return this.byKey.size;
  }
}

function applyOverride(def: SeriesDefinition, override: SeriesOverride): SeriesDefinition {
  if (!override.cadence || override.cadence === def.cadence) {
    return { ...def, pollIntervalMs: override.pollIntervalMs ?? def.pollIntervalMs };
  }

  // re-key the backfill start onto the new cadence
  const backfillStart = periodFromDate(override.cadence, periodStartDate(def.cadence, def.backfillStart));
  if (!backfillStart) {
    throw new ConfigError(`Cannot move ${def.key} to cadence ${override.cadence}`);
  }

  return {
    ...def,
    cadence: override.cadence,
    backfillStart,
    pollIntervalMs: override.pollIntervalMs ?? def.pollIntervalMs,
  };
}

/**
 * Build the catalog from definitions plus config.
 *
 * @param enabledKeys - when given, only these series are registered
 */
export function buildSeriesCatalog(
  definitions: readonly SeriesDefinition[],
  overrides: Readonly<Record<string, SeriesOverride>> = {},
  enabledKeys?: readonly string[],
): SeriesCatalog {
  const known = new Set(definitions.map((d) => d.key));

  for (const key of Object.keys(overrides)) {
    if (!known.has(key)) throw new ConfigError(`Override for unknown series: ${key}`);
  }
  for (const key of enabledKeys ?? []) {
    if (!known.has(key)) throw new ConfigError(`Enabled series not in catalog: ${key}`);
  }

  const enabled = enabledKeys ? new Set(enabledKeys) : null;
  const selected = definitions
    .filter((def) => !enabled || enabled.has(def.key))
    .map((def) => {
      const override = overrides[def.key];
      return override ? applyOverride(def, override) : def;
    });

  return new SeriesCatalog(selected);
}
