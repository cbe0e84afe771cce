import { completionPercent, pendingPercent } from '../metrics/completion.js';
import type { CollectionSummary, SetSummary } from '../metrics/collection-summary.js';
import { BASE_STYLES, escapeHtml, formatPercent, renderProgressBar, safeFileName } from './html.js';

function renderSetCard(set: SetSummary): string {
  const counter = set.completion.allCards;
  const owned = completionPercent(counter);
  const pending = pendingPercent(counter);
  const pendingLine =
    counter.pending > 0
      ? `<br><strong>${counter.pending}</strong> cards pending purchase (${formatPercent(pending)}%)`
      : '';

  return `
    <div class="set-card">
      <div class="set-title">${escapeHtml(set.setName)}</div>
      <div class="set-code">Set Code: ${escapeHtml(set.setCode)}</div>
      ${renderProgressBar(owned, pending)}
      <div class="set-stats">
        <strong>${counter.owned}</strong> of <strong>${counter.total}</strong> cards owned
        (<strong>${formatPercent(owned)}%</strong> complete)${pendingLine}
      </div>
      <a href="${escapeHtml(safeFileName(set.setName))}.html" class="set-link">View Set Details →</a>
    </div>`;
}

export function renderOverviewPage(summary: CollectionSummary): string {
  const { totals } = summary;

  return `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <title>Card Collection Overview</title>
  <style>${BASE_STYLES}
    .set-grid { display: grid; grid-template-columns: repeat(auto-fill, minmax(350px, 1fr)); gap: 20px; }
    .set-card { background: white; padding: 20px; border-radius: 10px; box-shadow: 0 2px 5px rgba(0,0,0,0.1); }
    .set-title { font-size: 18px; font-weight: bold; color: #333; margin-bottom: 5px; }
    .set-code { color: #666; font-size: 14px; margin-bottom: 15px; }
    .set-stats { font-size: 14px; color: #666; }
    .set-link { display: inline-block; margin-top: 15px; padding: 8px 16px; background-color: #007bff; color: white; text-decoration: none; border-radius: 5px; font-size: 14px; }
  </style>
</head>
<body>
  <h1>Card Collection Overview</h1>

  <div class="panel">
    <h2>Overall Collection Statistics</h2>
    <div class="stat-grid">
      <div class="stat-box"><div class="stat-number">${totals.total}</div><div class="stat-label">Total Cards Tracked</div></div>
      <div class="stat-box"><div class="stat-number">${totals.owned}</div><div class="stat-label">Cards Owned</div></div>
      <div class="stat-box"><div class="stat-number">${totals.pending}</div><div class="stat-label">Pending Purchase</div></div>
      <div class="stat-box"><div class="stat-number">${formatPercent(completionPercent(totals))}%</div><div class="stat-label">Collection Complete</div></div>
    </div>
  </div>

  <h2>Sets</h2>
  <div class="set-grid">${summary.sets.map(renderSetCard).join('')}
  </div>
</body>
</html>
`;
}
