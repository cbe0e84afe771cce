const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * File name for a set page: "Scarlet & Violet 151" → "Scarlet_and_Violet_151".
 */
export function safeFileName(setName: string): string {
  return setName
    .replace(/ /g, '_')
    .replace(/&/g, 'and')
    .replace(/['./\\]/g, '');
}

export function formatPercent(value: number): string {
  return value.toFixed(1);
}

export const BASE_STYLES = `
  body { font-family: Arial, sans-serif; margin: 20px; background-color: #f5f5f5; }
  h1 { color: #333; text-align: center; }
  h2 { color: #666; border-bottom: 2px solid #007bff; padding-bottom: 10px; }
  .panel { background: white; padding: 20px; border-radius: 10px; margin-bottom: 30px; box-shadow: 0 2px 5px rgba(0,0,0,0.1); }
  .progress-bar { width: 100%; height: 20px; background-color: #e9ecef; border-radius: 10px; overflow: hidden; margin: 10px 0; }
  .progress-fill { height: 100%; display: flex; }
  .progress-owned { background: linear-gradient(90deg, #28a745 0%, #20c997 100%); }
  .progress-pending { background: linear-gradient(90deg, #6c757d 0%, #495057 100%); }
  .stat-grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(200px, 1fr)); gap: 15px; }
  .stat-box { text-align: center; padding: 15px; background: white; border-radius: 8px; }
  .stat-number { font-size: 24px; font-weight: bold; color: #007bff; }
  .stat-label { font-size: 14px; color: #666; }
`;

/**
 * Two-tone progress bar: the filled width is owned + pending, split between them.
 */
export function renderProgressBar(ownedPercent: number, pendingPercent: number): string {
  const filled = ownedPercent + pendingPercent;
  const ownedShare = filled > 0 ? (ownedPercent / filled) * 100 : 0;
  const pendingShare = filled > 0 ? (pendingPercent / filled) * 100 : 0;
  return `<div class="progress-bar">
      <div class="progress-fill" style="width: ${formatPercent(filled)}%">
        <div class="progress-owned" style="width: ${formatPercent(ownedShare)}%"></div>
        <div class="progress-pending" style="width: ${formatPercent(pendingShare)}%"></div>
      </div>
    </div>`;
}
