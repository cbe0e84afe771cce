export { writeReports } from './report-writer.js';
export type { WriteReportsOptions, WriteReportsResult } from './report-writer.js';
export { renderOverviewPage } from './overview-page.js';
export { renderSetPage, sortSetCards } from './set-page.js';
export {
  renderSimpleWantList,
  renderCardmarketWantList,
  renderDecklistWantList,
  renderWantList,
  WANT_LIST_FORMATS,
} from './want-lists.js';
export type { WantListFormat, WantLists } from './want-lists.js';
export { escapeHtml, safeFileName, formatPercent } from './html.js';
