export type CardSource = 'catalog' | 'marketplace';

export const VARIANT_TYPES = ['Normal', 'Reverse Holo', 'Holo'] as const;

export type VariantType = (typeof VARIANT_TYPES)[number];

/**
 * One card record as extracted from a saved page, before its identity is fixed.
 * Optional fields are absent (not empty strings) when the page did not carry them.
 */
export interface RawCardRecord {
  name: string;
  source: CardSource;
  /** Canonical set name, or `Unknown Set (<code>)` for marketplace-only sets. */
  setName: string;
  setCode?: string;
  number?: string;
  /** Printed size of the standard set, e.g. "165" from "001/165". */
  totalCount?: string;
  variantType: VariantType;
  /** Catalog: owned. Marketplace: always false (still in transit). */
  hasCard: boolean;
  /** Catalog reference id, used for imagery. */
  cardId?: string;
}

export interface IdentityKey {
  setCode: string | null;
  number: string | null;
  variantType: VariantType;
}

export interface NormalizedCardRecord extends RawCardRecord {
  key: IdentityKey;
}

export type OwnershipStatus = 'have' | 'need' | 'pending_delivery' | 'have_pending_duplicate';

export interface UnifiedCardRecord extends RawCardRecord {
  key: IdentityKey;
  cardmarketPending: boolean;
  status: OwnershipStatus;
}
