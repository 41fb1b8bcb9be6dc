/**
 * Adapters keyed by provider id.
 */

import { ConfigError } from '../../../common/errors.js';
import type { ProviderId } from '../contracts/macro.contracts.js';
import type { SeriesCatalog } from '../data/series.catalog.js';
import { BlsAdapter } from './bls.adapter.js';
import { FredAdapter } from './fred.adapter.js';
import type { HttpClient, ProviderAdapter } from './provider.types.js';

export class ProviderRegistry {
  private readonly adapters = new Map<ProviderId, ProviderAdapter>();

  constructor(adapters: readonly ProviderAdapter[] = []) {
    for (const adapter of adapters) this.register(adapter);
  }

  register(adapter: ProviderAdapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new ConfigError(`Provider adapter already registered: ${adapter.id}`);
    }
    this.adapters.set(adapter.id, adapter);
  }

  get(id: ProviderId): ProviderAdapter {
    const adapter = this.adapters.get(id);
    if (!adapter) throw new ConfigError(`No adapter registered for provider ${id}`);
    return adapter;
  }

  has(id: ProviderId): boolean {
    return this.adapters.has(id);
  }

  /** Fail at startup, not at first poll, when a catalog series has no adapter. */
  assertCovers(catalog: SeriesCatalog): void {
    const missing = catalog.list().filter((s) => !this.adapters.has(s.provider));
    if (missing.length > 0) {
      throw new ConfigError(`No adapter for series: ${missing.map((s) => `${s.key} (${s.provider})`).join(', ')}`);
    }
  }
}

export interface DefaultProviderKeys {
  fredApiKey?: string;
  blsApiKey?: string;
  http?: HttpClient;
}

export function createDefaultProviders(keys: DefaultProviderKeys): ProviderRegistry {
  return new ProviderRegistry([
    new FredAdapter({ apiKey: keys.fredApiKey, http: keys.http }),
    new BlsAdapter({ apiKey: keys.blsApiKey, http: keys.http }),
  ]);
}
