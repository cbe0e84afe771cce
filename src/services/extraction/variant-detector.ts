import type { VariantType } from '../../types/cards.js';

export type IndicatorKind = 'standard-set' | 'parallel-set' | 'other-variants';

export interface VariantIndicator {
  kind: IndicatorKind;
  hasDot: boolean;
  active: boolean;
}

export interface VariantSignal {
  variantType: VariantType;
  /** The variant is printed for this card in this set. */
  exists: boolean;
  /** The collector has marked it as owned. */
  owned: boolean;
}

const INDICATOR_CLASS = 'card-collection-card-indicator';
const DOT_CLASS = `${INDICATOR_CLASS}-with-dot`;

const INDICATOR_KINDS: IndicatorKind[] = ['standard-set', 'parallel-set', 'other-variants'];

/**
 * Read one indicator span's class attribute. Returns null for spans that are not
 * variant indicators (or are indicators of an unknown kind).
 */
export function parseIndicatorClasses(classAttr: string): VariantIndicator | null {
  const classes = new Set(classAttr.split(/\s+/).filter(Boolean));
  if (!classes.has(INDICATOR_CLASS)) return null;

  const kind = INDICATOR_KINDS.find((k) => classes.has(`${INDICATOR_CLASS}-${k}`));
  if (!kind) return null;

  return {
    kind,
    hasDot: classes.has(DOT_CLASS),
    active: classes.has('active'),
  };
}

/**
 * Turn an entry's indicators into per-variant existence/ownership signals.
 * Only the first indicator of each kind counts. "other-variants" is recognised
 * but never produces a record.
 */
export function evaluateIndicators(indicators: VariantIndicator[]): VariantSignal[] {
  const standard = indicators.find((i) => i.kind === 'standard-set');
  const parallel = indicators.find((i) => i.kind === 'parallel-set');

  return [
    {
      variantType: 'Normal',
      exists: standard !== undefined && (standard.hasDot || standard.active),
      owned: standard?.active ?? false,
    },
    {
      // A parallel span is only rendered when the set has a reverse holo of this card
      variantType: 'Reverse Holo',
      exists: parallel !== undefined,
      owned: parallel?.active ?? false,
    },
  ];
}

/**
 * Variants to emit records for. No existing variant means Normal exists and is not owned.
 */
export function selectExistingVariants(signals: VariantSignal[]): VariantSignal[] {
  const existing = signals.filter((s) => s.exists);
  if (existing.length === 0) {
    return [{ variantType: 'Normal', exists: true, owned: false }];
  }
  return existing;
}

// Order matters: "Reverse Holo" also contains "Holo"
const MARKETPLACE_VARIANT_PATTERNS: [RegExp, VariantType][] = [
  [/\bReverse Holo\b/, 'Reverse Holo'],
  [/\bHolo\b/, 'Holo'],
];

/**
 * Infer the purchased variant from a marketplace row's markup (labels, tooltips).
 */
export function detectMarketplaceVariant(rowMarkup: string): VariantType {
  // Serialised markup spells non-breaking spaces as entities
  const normalized = rowMarkup.replace(/&nbsp;|&#160;|&#xa0;/gi, ' ').replace(/\s+/g, ' ');
  for (const [pattern, variant] of MARKETPLACE_VARIANT_PATTERNS) {
    if (pattern.test(normalized)) {
      return variant;
    }
  }
  return 'Normal';
}
