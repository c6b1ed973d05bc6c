import { describe, it } from 'node:test';
import assert from 'node:assert';
import { escapeHtml, fmt, fmtPct } from '../src/lib/format.js';

describe('format helpers', () => {
  it('escapes HTML special characters', () => {
    assert.strictEqual(escapeHtml(`<a href="x">Tom & Jerry's</a>`), '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;');
    assert.strictEqual(escapeHtml(undefined), '');
    assert.strictEqual(escapeHtml(42), '42');
  });

  it('prints N/A only for absent values', () => {
    assert.strictEqual(fmt(undefined), 'N/A');
    assert.strictEqual(fmt(null), 'N/A');
    assert.strictEqual(fmt(0), '0');
    assert.strictEqual(fmt(false), 'false');
    assert.strictEqual(fmt(''), '');
    assert.strictEqual(fmt(undefined, '-'), '-');
  });

  it('formats fractions as percentages', () => {
    assert.strictEqual(fmtPct(0.92, 1), '92.0%');
    assert.strictEqual(fmtPct(0.875), '87.50%');
    assert.strictEqual(fmtPct('0.5', 1), '50.0%');
    assert.strictEqual(fmtPct(0), '0.00%');
    assert.strictEqual(fmtPct(undefined), 'N/A');
    assert.strictEqual(fmtPct('high'), 'N/A');
  });
});
