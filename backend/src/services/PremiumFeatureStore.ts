/**
 * PremiumFeatureStore v1.0.0
 *
 * Permanent feature unlocks paid in spendable XP. Ownership is the
 * feature_purchases relation keyed by (account_id, feature_id); nothing is
 * stored on the account row, and nothing is ever revoked.
 *
 * Purchase = ownership check + spend + purchase row(s), all inside one
 * account critical section. A failed spend leaves no purchase behind.
 */

import { ulid } from 'ulidx';
import { failure } from '../lib/errors/error-handler';
import { AlreadyOwnedError, FeatureNotFoundError, NotFoundError } from '../lib/errors';
import { accountIdSchema, parseOrThrow } from '../lib/validators';
import { storeLogger } from '../logger';
import type { FeatureCatalogIndex, LedgerStore } from '../repositories';
import type {
  Account,
  FeatureBundle,
  FeatureCatalogEntry,
  FeaturePurchase,
  ServiceResult,
} from '../types';
import { throwIfAborted, type TransactionManager } from './TransactionManager';

export interface PurchaseOptions {
  signal?: AbortSignal;
}

export interface FeatureListing extends FeatureCatalogEntry {
  owned: boolean;
  affordable: boolean;
  missing_prerequisites: string[];
}

export interface BundleListing extends FeatureBundle {
  /** price charged now, given what the account already owns */
  effective_price: number;
  owned_feature_ids: string[];
  fully_owned: boolean;
}

export interface ChunkingProgression {
  owned: string[];
  next: FeatureCatalogEntry | null;
  can_afford_next: boolean;
}

/**
 * Bundle price for an account that already owns some of its features:
 * never more than buying the remaining features one by one.
 */
export function effectiveBundlePrice(bundle: FeatureBundle, unowned: FeatureCatalogEntry[]): number {
  const separately = unowned.reduce((sum, feature) => sum + feature.price, 0);
  return Math.min(bundle.price, separately);
}

/**
 * Split a bundle charge across features in proportion to list price, so
 * cost_paid over the bundle's purchase rows sums to the charge exactly.
 */
export function allocateBundleCost(charge: number, features: FeatureCatalogEntry[]): number[] {
  const listTotal = features.reduce((sum, feature) => sum + feature.price, 0);
  let allocated = 0;
  return features.map((feature, index) => {
    if (index === features.length - 1) return charge - allocated;
    const share = listTotal === 0 ? 0 : Math.floor((charge * feature.price) / listTotal);
    allocated += share;
    return share;
  });
}

export class PremiumFeatureStore {
  constructor(
    private readonly store: LedgerStore,
    private readonly transactions: TransactionManager,
    private readonly catalog: FeatureCatalogIndex
  ) {}

  async purchaseFeature(
    accountId: string,
    featureId: string,
    options: PurchaseOptions = {}
  ): Promise<ServiceResult<FeaturePurchase>> {
    try {
      const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
      const feature = this.requireFeature(featureId);
      throwIfAborted(options.signal, 'feature purchase');

      const purchase = await this.transactions.runExclusive(id, async (tx) => {
        const owned = await tx.getOwnedFeatureIds();
        if (owned.has(feature.id)) {
          throw new AlreadyOwnedError(feature.id);
        }

        const purchaseId = ulid();
        const spend = await this.transactions.spendInTx(
          tx,
          feature.price,
          'feature_purchase',
          `Unlock ${feature.name}`,
          { featurePurchaseRef: purchaseId, signal: options.signal }
        );

        const row: FeaturePurchase = {
          id: purchaseId,
          account_id: id,
          feature_id: feature.id,
          cost_paid: feature.price,
          transaction_id: spend.id,
          bundle_id: null,
          created_at: new Date(),
        };
        await tx.insertPurchase(row);
        return row;
      });

      storeLogger.info({ accountId: id, featureId: feature.id, cost: feature.price }, 'Feature purchased');
      return { success: true, data: purchase };
    } catch (error) {
      return failure(error);
    }
  }

  /**
   * One spend, every unowned bundled feature granted in the same critical
   * section. Fully owned bundles fail with ALREADY_OWNED.
   */
  async purchaseBundle(
    accountId: string,
    bundleId: string,
    options: PurchaseOptions = {}
  ): Promise<ServiceResult<FeaturePurchase[]>> {
    try {
      const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
      const bundle = this.catalog.getBundle(bundleId);
      if (!bundle) {
        throw new FeatureNotFoundError(bundleId);
      }
      const features = bundle.feature_ids.map((featureId) => this.requireFeature(featureId));
      throwIfAborted(options.signal, 'bundle purchase');

      const purchases = await this.transactions.runExclusive(id, async (tx) => {
        const owned = await tx.getOwnedFeatureIds();
        const unowned = features.filter((feature) => !owned.has(feature.id));
        if (unowned.length === 0) {
          throw new AlreadyOwnedError(bundle.id);
        }

        // The spend references the bundle's first purchase row
        const purchaseIds = unowned.map(() => ulid());
        const charge = effectiveBundlePrice(bundle, unowned);
        const spend = await this.transactions.spendInTx(
          tx,
          charge,
          'bundle_purchase',
          `Unlock bundle ${bundle.name}`,
          { featurePurchaseRef: purchaseIds[0], signal: options.signal }
        );

        const costs = allocateBundleCost(charge, unowned);
        const createdAt = new Date();
        const rows: FeaturePurchase[] = unowned.map((feature, index) => ({
          id: purchaseIds[index],
          account_id: id,
          feature_id: feature.id,
          cost_paid: costs[index] ?? 0,
          transaction_id: spend.id,
          bundle_id: bundle.id,
          created_at: createdAt,
        }));

        for (const row of rows) {
          await tx.insertPurchase(row);
        }
        return rows;
      });

      storeLogger.info(
        { accountId: id, bundleId: bundle.id, granted: purchases.map((p) => p.feature_id) },
        'Bundle purchased'
      );
      return { success: true, data: purchases };
    } catch (error) {
      return failure(error);
    }
  }

  async ownsFeature(accountId: string, featureId: string): Promise<ServiceResult<boolean>> {
    try {
      const account = await this.requireAccount(accountId);
      const feature = this.requireFeature(featureId);
      const owned = await this.ownedIds(account.id);
      return { success: true, data: owned.has(feature.id) };
    } catch (error) {
      return failure(error);
    }
  }

  async getPurchases(accountId: string): Promise<ServiceResult<FeaturePurchase[]>> {
    try {
      const account = await this.requireAccount(accountId);
      return { success: true, data: await this.store.listPurchases(account.id) };
    } catch (error) {
      return failure(error);
    }
  }

  async listFeatures(accountId: string): Promise<ServiceResult<FeatureListing[]>> {
    try {
      const account = await this.requireAccount(accountId);
      const owned = await this.ownedIds(account.id);

      const listings = this.catalog.listFeatures().map((feature) => ({
        ...feature,
        owned: owned.has(feature.id),
        affordable: !owned.has(feature.id) && account.spendable_xp >= feature.price,
        missing_prerequisites: feature.prerequisites.filter((id) => !owned.has(id)),
      }));
      return { success: true, data: listings };
    } catch (error) {
      return failure(error);
    }
  }

  async listBundles(accountId: string): Promise<ServiceResult<BundleListing[]>> {
    try {
      const account = await this.requireAccount(accountId);
      const owned = await this.ownedIds(account.id);

      const listings = this.catalog.listBundles().map((bundle) => {
        const features = bundle.feature_ids.map((id) => this.requireFeature(id));
        const unowned = features.filter((feature) => !owned.has(feature.id));
        return {
          ...bundle,
          effective_price: unowned.length > 0 ? effectiveBundlePrice(bundle, unowned) : 0,
          owned_feature_ids: bundle.feature_ids.filter((id) => owned.has(id)),
          fully_owned: unowned.length === 0,
        };
      });
      return { success: true, data: listings };
    } catch (error) {
      return failure(error);
    }
  }

  /**
   * Chunking levels in price order; `next` is the cheapest unowned level
   * whose prerequisites are all owned.
   */
  async getChunkingProgression(accountId: string): Promise<ServiceResult<ChunkingProgression>> {
    try {
      const account = await this.requireAccount(accountId);
      const owned = await this.ownedIds(account.id);
      const levels = [...this.catalog.byCategory('chunking')].sort((a, b) => a.price - b.price);

      const next =
        levels.find((level) => !owned.has(level.id) && level.prerequisites.every((id) => owned.has(id))) ?? null;

      return {
        success: true,
        data: {
          owned: levels.filter((level) => owned.has(level.id)).map((level) => level.id),
          next,
          can_afford_next: next !== null && account.spendable_xp >= next.price,
        },
      };
    } catch (error) {
      return failure(error);
    }
  }

  private async ownedIds(accountId: string): Promise<Set<string>> {
    const purchases = await this.store.listPurchases(accountId);
    return new Set(purchases.map((p) => p.feature_id));
  }

  private requireFeature(featureId: string): FeatureCatalogEntry {
    const feature = this.catalog.getFeature(featureId);
    if (!feature) {
      throw new FeatureNotFoundError(featureId);
    }
    return feature;
  }

  private async requireAccount(accountId: string): Promise<Account> {
    const id = parseOrThrow(accountIdSchema, accountId, 'accountId');
    const account = await this.store.getAccount(id);
    if (!account) {
      throw new NotFoundError(`Account with id '${id}' not found`);
    }
    return account;
  }
}
