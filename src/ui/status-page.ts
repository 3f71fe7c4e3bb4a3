import { tierLabel } from '../mirrors/reports.js';
import type { StatusPage } from '../mirrors/views.js';
import { escapeHtml, formatDateTime, formatDuration, renderLayout } from './html.js';
import { ERROR_TABLE_HEAD, URL_TABLE_HEAD, renderErrorRows, renderUrlRows } from './mirror-pages.js';

export function renderStatusPage(page: StatusPage) {
  const title = page.tier === null ? 'Mirror Status' : `Mirror Status: ${tierLabel(page.tier)}`;
  const jsonHref = page.tier === null ? '/mirrors/status/json/' : `/mirrors/status/tier/${page.tier}/json/`;
  const empty = (colspan: number) => `<tr><td class="muted" colspan="${colspan}">None.</td></tr>`;

  return renderLayout({
    title,
    body: `<h1>${escapeHtml(title)}</h1>
    <section class="card">
      <dl>
        <dt>Last check</dt><dd>${formatDateTime(page.lastCheck)}</dd>
        <dt>Checks in window</dt><dd>${page.numChecks}</dd>
        <dt>Check frequency</dt><dd>${formatDuration(page.checkFrequency)}</dd>
        <dt>Window</dt><dd>${formatDuration(page.cutoff)}</dd>
        <dt>Feed</dt><dd><a href="${jsonHref}">JSON</a></dd>
      </dl>
    </section>
    <h2>Out of Sync Mirrors</h2>
    <section class="card">
      <table>${URL_TABLE_HEAD}<tbody>${renderUrlRows(page.badUrls, { linkDetails: true }) || empty(8)}</tbody></table>
    </section>
    <h2>Successfully Syncing Mirrors</h2>
    <section class="card">
      <table>${URL_TABLE_HEAD}<tbody>${renderUrlRows(page.goodUrls, { linkDetails: true }) || empty(8)}</tbody></table>
    </section>
    <h2>Mirror Syncing Error Log</h2>
    <section class="card">
      <table>${ERROR_TABLE_HEAD}<tbody>${renderErrorRows(page.errorLogs) || empty(6)}</tbody></table>
    </section>`
  });
}
