import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { featureCatalogSchema } from '../lib/validators';
import { storeLogger } from '../logger';
import type { FeatureBundle, FeatureCatalog, FeatureCatalogEntry } from '../types';

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../data/feature-catalog.json', import.meta.url));

/**
 * Read and validate the catalog file. Throws ZodError on a malformed file.
 */
export function loadFeatureCatalog(path: string = DEFAULT_CATALOG_PATH): FeatureCatalog {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));
  const catalog = featureCatalogSchema.parse(raw);
  storeLogger.debug({ path, features: catalog.features.length, bundles: catalog.bundles.length }, 'Feature catalog loaded');
  return catalog;
}

/**
 * Indexed, read-only view over a catalog.
 */
export class FeatureCatalogIndex {
  private readonly features: Map<string, FeatureCatalogEntry>;
  private readonly bundles: Map<string, FeatureBundle>;

  constructor(readonly catalog: FeatureCatalog) {
    this.features = new Map(catalog.features.map((f) => [f.id, f]));
    this.bundles = new Map(catalog.bundles.map((b) => [b.id, b]));
  }

  getFeature(featureId: string): FeatureCatalogEntry | undefined {
    return this.features.get(featureId);
  }

  getBundle(bundleId: string): FeatureBundle | undefined {
    return this.bundles.get(bundleId);
  }

  listFeatures(): FeatureCatalogEntry[] {
    return [...this.features.values()];
  }

  listBundles(): FeatureBundle[] {
    return [...this.bundles.values()];
  }

  byCategory(category: FeatureCatalogEntry['category']): FeatureCatalogEntry[] {
    return this.listFeatures().filter((f) => f.category === category);
  }
}
