import type { DisplayUrl, MirrorErrorSummary, MirrorListItem } from '../types.js';
import { tierLabel } from '../mirrors/reports.js';
import type { MirrorDetails, UrlDetails } from '../mirrors/views.js';
import {
  escapeHtml,
  formatCountry,
  formatDateTime,
  formatDuration,
  formatNumber,
  formatPercent,
  mirrorHref,
  renderLayout,
  yesNo
} from './html.js';

export function renderMirrorListPage(params: { mirrors: MirrorListItem[]; authorized: boolean }) {
  const { mirrors, authorized } = params;
  const rows = mirrors
    .map((mirror) => {
      const flags = authorized ? `<td>${yesNo(mirror.public)}</td><td>${yesNo(mirror.active)}</td>` : '';
      return `<tr>
        <td><a href="${mirrorHref(mirror.name)}">${escapeHtml(mirror.name)}</a></td>
        <td>${escapeHtml(tierLabel(mirror.tier))}</td>
        <td>${formatCountry(mirror.country)}</td>
        <td>${yesNo(mirror.isos)}</td>
        <td>${escapeHtml(mirror.protocols.join(', '))}</td>${flags}
      </tr>`;
    })
    .join('');
  const flagHeaders = authorized ? '<th>Public</th><th>Active</th>' : '';

  return renderLayout({
    title: 'Mirror Overview',
    body: `<h1>Mirror Overview</h1>
    <section class="card">
      <table>
        <thead><tr><th>Server</th><th>Tier</th><th>Country</th><th>ISOs</th><th>Protocols</th>${flagHeaders}</tr></thead>
        <tbody>${rows || '<tr><td class="muted" colspan="5">No mirrors.</td></tr>'}</tbody>
      </table>
    </section>`
  });
}

/** Rows for a table of URLs with their check figures. */
export function renderUrlRows(urls: DisplayUrl[], options: { linkDetails: boolean }) {
  return urls
    .map((item) => {
      const { url, status } = item;
      const label = options.linkDetails
        ? `<a href="${mirrorHref(url.mirror.name)}${url.id}/">${escapeHtml(url.url)}</a>`
        : escapeHtml(url.url);
      return `<tr>
        <td>${label}</td>
        <td>${escapeHtml(url.protocol.protocol)}</td>
        <td>${formatCountry(url.country)}</td>
        <td>${formatPercent(status?.completionPct ?? null)}</td>
        <td>${formatDuration(status?.delay ?? null)}</td>
        <td>${formatNumber(status?.durationAvg ?? null, 3)}</td>
        <td>${formatNumber(status?.durationStddev ?? null, 3)}</td>
        <td>${formatNumber(status?.score ?? null, 1)}</td>
      </tr>`;
    })
    .join('');
}

export const URL_TABLE_HEAD =
  '<thead><tr><th>Mirror URL</th><th>Protocol</th><th>Country</th><th>Completion %</th><th>μ Delay (hh:mm)</th><th>μ Duration (s)</th><th>σ Duration (s)</th><th>Score</th></tr></thead>';

export function renderErrorRows(errors: MirrorErrorSummary[]) {
  return errors
    .map(
      (item) => `<tr>
        <td><a href="${mirrorHref(item.url.mirror.name)}${item.url.id}/">${escapeHtml(item.url.url)}</a></td>
        <td>${escapeHtml(item.url.protocol.protocol)}</td>
        <td>${formatCountry(item.url.country)}</td>
        <td class="danger">${escapeHtml(item.error)}</td>
        <td>${formatDateTime(item.lastOccurred)}</td>
        <td>${item.errorCount}</td>
      </tr>`
    )
    .join('');
}

export const ERROR_TABLE_HEAD =
  '<thead><tr><th>Mirror URL</th><th>Protocol</th><th>Country</th><th>Error Message</th><th>Last Occurred</th><th>Occurrences</th></tr></thead>';

export function renderMirrorDetailsPage(params: MirrorDetails & { authorized: boolean }) {
  const { mirror, upstream, urls, cutoff, errorLogs, authorized } = params;
  const privateRows = authorized
    ? `<dt>Public</dt><dd>${yesNo(mirror.public)}</dd>
       <dt>Active</dt><dd>${yesNo(mirror.active)}</dd>
       <dt>Admin email</dt><dd>${escapeHtml(mirror.adminEmail) || '<span class="muted">none</span>'}</dd>
       <dt>Notes</dt><dd>${escapeHtml(mirror.notes)}</dd>`
    : '';
  const upstreamLink = upstream
    ? `<a href="${mirrorHref(upstream.name)}">${escapeHtml(upstream.name)}</a>`
    : '<span class="muted">none</span>';

  return renderLayout({
    title: `${mirror.name} - Mirror Details`,
    body: `<h1>Mirror Details: ${escapeHtml(mirror.name)}</h1>
    <section class="card">
      <dl>
        <dt>Tier</dt><dd>${escapeHtml(tierLabel(mirror.tier))}</dd>
        <dt>Upstream</dt><dd>${upstreamLink}</dd>
        <dt>ISOs</dt><dd>${yesNo(mirror.isos)}</dd>
        ${privateRows}
      </dl>
    </section>
    <h2>Available URLs</h2>
    <section class="card">
      <table>${URL_TABLE_HEAD}<tbody>${renderUrlRows(urls, { linkDetails: true })}</tbody></table>
    </section>
    <h2>Error Log</h2>
    <p class="muted">Errors from the last ${cutoff.days} days.</p>
    <section class="card">
      <table>${ERROR_TABLE_HEAD}<tbody>${
        renderErrorRows(errorLogs) || '<tr><td class="muted" colspan="6">No errors.</td></tr>'
      }</tbody></table>
    </section>`
  });
}

export function renderUrlDetailsPage(params: UrlDetails) {
  const { url, logs } = params;
  const rows = logs
    .map(
      (log) => `<tr>
        <td>${formatDateTime(log.checkTime)}</td>
        <td>${log.location ? escapeHtml(log.location.hostname) : ''}</td>
        <td>${log.location ? escapeHtml(log.location.sourceIp) : ''}</td>
        <td>${log.location ? formatCountry(log.location.country) : ''}</td>
        <td>${log.isSuccess ? '<span class="ok">Yes</span>' : '<span class="danger">No</span>'}</td>
        <td>${formatDateTime(log.lastSync)}</td>
        <td>${formatNumber(log.duration, 3)}</td>
        <td>${escapeHtml(log.error)}</td>
      </tr>`
    )
    .join('');

  return renderLayout({
    title: `${url.mirror.name} - ${url.url} - URL Details`,
    body: `<h1>URL Details: ${escapeHtml(url.url)}</h1>
    <section class="card">
      <dl>
        <dt>Mirror</dt><dd><a href="${mirrorHref(url.mirror.name)}">${escapeHtml(url.mirror.name)}</a></dd>
        <dt>Protocol</dt><dd>${escapeHtml(url.protocol.protocol)}</dd>
        <dt>Country</dt><dd>${formatCountry(url.country)}</dd>
        <dt>IPv4</dt><dd>${yesNo(url.hasIpv4)}</dd>
        <dt>IPv6</dt><dd>${yesNo(url.hasIpv6)}</dd>
        <dt>Active</dt><dd>${yesNo(url.active)}</dd>
      </dl>
    </section>
    <h2>Check Logs</h2>
    <section class="card">
      <table>
        <thead><tr><th>Check Time</th><th>Check Location</th><th>Check IP</th><th>Country</th><th>Success?</th><th>Last Sync</th><th>Duration (s)</th><th>Error</th></tr></thead>
        <tbody>${rows || '<tr><td class="muted" colspan="8">No checks in the last 7 days.</td></tr>'}</tbody>
      </table>
    </section>`
  });
}
