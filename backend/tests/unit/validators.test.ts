/**
 * Validator Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../src/lib/errors';
import {
  accountIdSchema,
  authorizeCommentSchema,
  featureCatalogSchema,
  parseOrThrow,
  transactionHistorySchema,
  xpAmountSchema,
} from '../../src/lib/validators';

describe('Validators: identifiers and amounts', () => {
  it('should trim account ids', () => {
    expect(parseOrThrow(accountIdSchema, '  reader-1  ', 'accountId')).toBe('reader-1');
  });

  it('should reject blank ids', () => {
    expect(() => parseOrThrow(accountIdSchema, '   ', 'accountId')).toThrow(ValidationError);
  });

  it('should accept XP amounts up to one billion', () => {
    expect(xpAmountSchema.safeParse(1_000_000_000).success).toBe(true);
    expect(xpAmountSchema.safeParse(1_000_000_001).success).toBe(false);
  });

  it.each([0, -5, 1.5, Number.NaN])('should reject amount %s', (amount) => {
    expect(xpAmountSchema.safeParse(amount).success).toBe(false);
  });
});

describe('Validators: request shapes', () => {
  it('should default isReply to false', () => {
    const parsed = authorizeCommentSchema.parse({ accountId: 'a', contentId: 'c', commentId: 'm' });
    expect(parsed.isReply).toBe(false);
    expect(parsed.requestId).toBeUndefined();
  });

  it('should default the history limit to 50 and cap it at 500', () => {
    expect(transactionHistorySchema.parse({}).limit).toBe(50);
    expect(transactionHistorySchema.safeParse({ limit: 501 }).success).toBe(false);
  });
});

describe('parseOrThrow', () => {
  it('should prefix issues with their path', () => {
    try {
      parseOrThrow(transactionHistorySchema, { limit: 0 }, 'history query');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.message).toBe('Invalid history query: limit: Number must be greater than or equal to 1');
        expect(error.details).toHaveProperty('issues');
      }
    }
  });

  it('should fall back to the label for top-level issues', () => {
    expect(() => parseOrThrow(xpAmountSchema, 'ten', 'amount')).toThrow(
      'Invalid amount: amount: Expected number, received string'
    );
  });
});

describe('featureCatalogSchema', () => {
  const feature = (id: string, prerequisites: string[] = []) => ({
    id,
    name: id,
    price: 10,
    category: 'themes',
    prerequisites,
  });

  it('should fill defaults', () => {
    const catalog = featureCatalogSchema.parse({ features: [feature('theme_dark')], bundles: [] });
    expect(catalog.features[0]).toEqual({
      id: 'theme_dark',
      name: 'theme_dark',
      description: '',
      price: 10,
      category: 'themes',
      bundle_ids: [],
      prerequisites: [],
    });
  });

  it('should reject duplicate feature ids', () => {
    const result = featureCatalogSchema.safeParse({ features: [feature('a'), feature('a')], bundles: [] });
    expect(result.success).toBe(false);
  });

  it('should reject bundles referencing unknown features', () => {
    const result = featureCatalogSchema.safeParse({
      features: [feature('a')],
      bundles: [{ id: 'pack', name: 'Pack', price: 5, feature_ids: ['a', 'b'] }],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("Bundle references unknown feature 'b'");
    }
  });

  it('should reject unknown prerequisites', () => {
    const result = featureCatalogSchema.safeParse({ features: [feature('a', ['missing'])], bundles: [] });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("Unknown prerequisite 'missing'");
    }
  });

  it('should reject ids outside [a-z0-9_]', () => {
    expect(featureCatalogSchema.safeParse({ features: [feature('Theme-Dark')], bundles: [] }).success).toBe(false);
  });
});
