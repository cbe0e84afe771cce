import type { UnifiedCardRecord, VariantType } from '../../types/cards.js';
import { completionPercent, pendingPercent } from '../metrics/completion.js';
import type { CompletionCounter } from '../metrics/completion.js';
import type { SetSummary } from '../metrics/collection-summary.js';
import { UNKNOWN_NUMBER } from '../reconciliation/identity.js';
import { STATUS_LABELS } from '../reconciliation/status.js';
import { BASE_STYLES, escapeHtml, formatPercent, renderProgressBar } from './html.js';

type Card = Readonly<UnifiedCardRecord>;

const VARIANT_ORDER: Record<VariantType, number> = {
  Normal: 0,
  'Reverse Holo': 1,
  Holo: 2,
};

const ROW_CLASSES: Record<UnifiedCardRecord['status'], string> = {
  have: 'has-card',
  have_pending_duplicate: 'has-card',
  pending_delivery: 'pending',
  need: 'missing-card',
};

/**
 * Table order: card number (as text, so "001" < "010" < "TG01"), then variant.
 */
export function sortSetCards(cards: readonly Card[]): Card[] {
  return [...cards].sort((a, b) => {
    const byNumber = (a.number ?? '').localeCompare(b.number ?? '');
    if (byNumber !== 0) return byNumber;
    return VARIANT_ORDER[a.variantType] - VARIANT_ORDER[b.variantType];
  });
}

function renderRow(card: Card, images: ReadonlyMap<string, string>): string {
  const image = card.cardId ? images.get(card.cardId) : undefined;
  const preview = image
    ? `<a class="camera-icon" href="${escapeHtml(image)}" target="_blank" rel="noopener">📷</a>`
    : '';

  return `
      <tr class="${ROW_CLASSES[card.status]}">
        <td>${preview}</td>
        <td>${escapeHtml(card.number ?? UNKNOWN_NUMBER)}</td>
        <td>${escapeHtml(card.totalCount ?? '')}</td>
        <td>${escapeHtml(card.name)}</td>
        <td>${escapeHtml(card.variantType)}</td>
        <td>${card.hasCard ? '✓' : '✗'}</td>
        <td>${STATUS_LABELS[card.status]}</td>
      </tr>`;
}

function renderMetricRow(label: string, counter: CompletionCounter): string {
  return `
      <tr>
        <td>${label}</td>
        <td>${counter.total}</td>
        <td>${counter.owned}</td>
        <td>${counter.pending}</td>
        <td>${formatPercent(completionPercent(counter))}%</td>
      </tr>`;
}

export function renderSetPage(set: SetSummary, images: ReadonlyMap<string, string> = new Map()): string {
  const { completion } = set;
  const all = completion.allCards;
  const boundaryLabel = completion.boundary === null ? 'unbounded' : `1–${completion.boundary}`;

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(set.setName)} - Card Collection</title>
  <style>${BASE_STYLES}
    table { width: 100%; border-collapse: collapse; background: white; }
    th, td { padding: 8px; border-bottom: 1px solid #ddd; text-align: left; }
    tr.has-card { background-color: #d4edda; }
    tr.pending { background-color: #e2e3e5; }
    tr.missing-card { background-color: #f8d7da; }
  </style>
</head>
<body>
  <p><a href="index.html">← Back to overview</a></p>
  <h1>${escapeHtml(set.setName)} (${escapeHtml(set.setCode)})</h1>

  <div class="panel">
    <strong>${all.owned}</strong> of <strong>${all.total}</strong> cards owned
    (<strong>${formatPercent(completionPercent(all))}%</strong> complete),
    <strong>${all.pending}</strong> pending purchase
    ${renderProgressBar(completionPercent(all), pendingPercent(all))}
  </div>

  <div class="panel">
    <h2>Completion (standard set: ${boundaryLabel})</h2>
    <table class="metrics">
      <tr><th>Cards</th><th>Total</th><th>Owned</th><th>Pending</th><th>Complete</th></tr>${[
        renderMetricRow('All cards', completion.allCards),
        renderMetricRow('Standard set', completion.standardSet),
        renderMetricRow('Standard set (Normal)', completion.standardNormal),
        renderMetricRow('Standard set (Reverse Holo)', completion.standardReverse),
        renderMetricRow('Secret cards', completion.secretCards),
      ].join('')}
    </table>
  </div>

  <table id="cardTable">
      <tr><th></th><th>Number</th><th>Of</th><th>Name</th><th>Variant</th><th>Have</th><th>Status</th></tr>${sortSetCards(
        set.cards,
      )
        .map((card) => renderRow(card, images))
        .join('')}
  </table>
</body>
</html>
`;
}
