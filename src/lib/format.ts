// Shared lightweight formatting helpers for server-rendered pages
export const PLACEHOLDER = 'N/A';

export function escapeHtml(s: unknown): string {
  if (s === undefined || s === null) return '';
  return String(s)
    .replace(/&/g,'&amp;')
    .replace(/</g,'&lt;')
    .replace(/>/g,'&gt;')
    .replace(/"/g,'&quot;')
    .replace(/'/g,'&#39;');
}

/** Value as text, or the placeholder when absent. Not escaped. */
export function fmt(x: unknown, placeholder = PLACEHOLDER): string {
  return x === undefined || x === null ? placeholder : String(x);
}

/** 0..1 fraction as a percentage with `d` decimals, e.g. 0.92 -> "92.0%". */
export function fmtPct(x: unknown, d=2): string {
  if (x === undefined || x === null || x === '') return PLACEHOLDER;
  const n = Number(x);
  return Number.isFinite(n) ? (n*100).toFixed(d)+'%' : PLACEHOLDER;
}
