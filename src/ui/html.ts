import type { Country } from '../types.js';
import type { Duration } from '../mirrors/duration.js';

export function escapeHtml(value: string) {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function pad(value: number) {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD HH:MM` in UTC, or `unknown`. */
export function formatDateTime(date: Date | null) {
  if (!date) return 'unknown';
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ${pad(
    date.getUTCHours()
  )}:${pad(date.getUTCMinutes())}`;
}

/** Hours and minutes, e.g. `27:05`, or `unknown`. */
export function formatDuration(duration: Duration | null) {
  if (!duration) return 'unknown';
  const totalMinutes = Math.floor(duration.totalSeconds() / 60);
  return `${Math.floor(totalMinutes / 60)}:${pad(totalMinutes % 60)}`;
}

export function formatPercent(value: number | null) {
  return value === null ? '' : `${(value * 100).toFixed(1)}%`;
}

export function formatNumber(value: number | null, digits = 2) {
  return value === null ? '' : value.toFixed(digits);
}

export function formatCountry(country: Country | null) {
  return country && country.code ? escapeHtml(country.name) : '';
}

export function yesNo(value: boolean) {
  return value ? 'Yes' : 'No';
}

export function mirrorHref(name: string) {
  return `/mirrors/${encodeURIComponent(name)}/`;
}

export function renderLayout(params: { title: string; body: string }) {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>${escapeHtml(params.title)}</title>
  <style>
    :root { --bg:#0b1220; --panel:#101a2f; --line:#24334d; --fg:#e8eefc; --muted:#9fb0d1; --accent:#7dd3fc; --danger:#fca5a5; }
    *{box-sizing:border-box} body{margin:0;font-family:ui-sans-serif,system-ui,Segoe UI,Roboto,sans-serif;background:var(--bg);color:var(--fg)}
    .wrap{max-width:1180px;margin:0 auto;padding:28px 16px 56px}
    nav{display:flex;gap:16px;margin-bottom:16px}
    h1{margin:0 0 8px;font-size:26px} h2{margin:24px 0 8px;font-size:18px} .muted{color:var(--muted)}
    .card{border:1px solid var(--line);background:var(--panel);border-radius:12px;padding:16px;margin-top:16px;overflow-x:auto}
    table{border-collapse:collapse;width:100%;font-size:14px}
    th,td{text-align:left;padding:6px 8px;border-top:1px solid rgba(159,176,209,.12);white-space:nowrap}
    th{color:var(--muted);font-weight:600;border-top:none}
    a{color:#bfdbfe;text-decoration:none} a:hover{text-decoration:underline}
    .danger{color:var(--danger)} .ok{color:var(--accent)}
    dl{display:grid;grid-template-columns:max-content 1fr;gap:4px 16px;margin:0} dt{color:var(--muted)} dd{margin:0}
  </style>
</head>
<body>
  <div class="wrap">
    <nav><a href="/mirrors/">Mirrors</a><a href="/mirrors/status/">Status</a></nav>
    ${params.body}
  </div>
</body>
</html>`;
}

export function renderNotFoundPage() {
  return renderLayout({
    title: 'Not Found',
    body: '<h1>Not Found</h1><p class="muted">The requested page does not exist.</p>'
  });
}
