import request from 'supertest';
import { describe, it, before, after } from 'node:test';
import assert from 'node:assert';
import type { Express } from 'express';
import { createApp } from '../src/app.js';
import { startFakeBackend, NEWS_OK, STOCK_OK, type FakeBackend } from './helpers/fakeBackend.js';

function appFor(backendUrl: string) {
  return createApp({
    config: {
      backend: { baseUrl: backendUrl, connectTimeoutMs: 2000, readTimeoutMs: 2000 },
      defaultSymbol: 'AAPL',
    },
  });
}

describe('dashboard app', () => {
  let fake: FakeBackend;
  let app: Express;

  before(async () => {
    fake = await startFakeBackend((b) => {
      b.get('/health', (_req, res) => { res.json({ status: 'ok' }); });
      b.get('/stock/AAPL', (_req, res) => { res.json({ live_price: 150.2, beta: 1.1 }); });
      b.get('/news/AAPL', (_req, res) => { res.json({ items: [] }); });
      b.get('/stock/MSFT', (_req, res) => { res.json(STOCK_OK); });
      b.get('/news/MSFT', (_req, res) => { res.json(NEWS_OK); });
      b.get('/stock/FAIL', (_req, res) => { res.status(500).send('Internal Error'); });
      b.post('/analyze_news', (_req, res) => {
        res.json({ user_sentiment: 'positive', user_score: 0.92, impact_summary_plain_english: 'Constructive outlook.' });
      });
    });
    app = appFor(fake.url);
  });

  after(async () => { await fake.close(); });

  it('renders the dashboard for the default symbol (scenario 1)', async () => {
    const res = await request(app).get('/');
    assert.strictEqual(res.status, 200);
    assert.match(res.headers['content-type'], /text\/html/);
    assert.ok(res.text.includes('<li><strong>Live Price:</strong> $150.2</li>'));
    assert.ok(res.text.includes('<li><strong>Idiosyncratic Risk:</strong> N/A</li>'));
    assert.ok(res.text.includes('<p class="muted">No recent news found for AAPL.</p>'));
  });

  it('renders a backend failure inline with status 200 (scenario 2)', async () => {
    const seen = fake.calls.length;
    const res = await request(app).get('/').query({ symbol: 'FAIL', user_text: 'ignored' });
    assert.strictEqual(res.status, 200);
    assert.ok(res.text.includes('<p>GET /stock/FAIL -&gt; 500 Internal Server Error</p>'));
    assert.ok(res.text.includes(`Make sure the sentiment backend is running on ${fake.url}`));
    assert.deepStrictEqual(fake.calls.slice(seen).map(c => c.path), ['/stock/FAIL']);
  });

  it('shows the custom analysis result (scenario 3)', async () => {
    const res = await request(app).get('/').query({ symbol: 'MSFT', user_text: 'Company beats earnings' });
    assert.strictEqual(res.status, 200);
    assert.ok(res.text.includes('(92.0% confidence)'));
    assert.ok(res.text.includes('Company beats earnings</textarea>'));
    assert.ok(res.text.includes('<td>87.50%</td>'));
  });

  it('returns the view model as JSON', async () => {
    const res = await request(app).get('/api/dashboard').query({ symbol: 'FAIL' });
    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.body.ok, true);
    assert.strictEqual(res.body.data.symbol, 'FAIL');
    assert.strictEqual(res.body.data.error, 'GET /stock/FAIL -> 500 Internal Server Error');
    assert.deepStrictEqual(res.body.data.news, []);
  });

  it('allows cross-origin reads of the JSON API', async () => {
    const res = await request(app).get('/api/dashboard').set('Origin', 'http://elsewhere.test');
    assert.strictEqual(res.headers['access-control-allow-origin'], '*');
  });

  it('uses the first value of a repeated query parameter', async () => {
    const res = await request(app).get('/api/dashboard?symbol=MSFT&symbol=FAIL');
    assert.strictEqual(res.body.data.symbol, 'MSFT');
    assert.strictEqual(res.body.data.error, undefined);
  });

  it('reports its own health', async () => {
    const res = await request(app).get('/health');
    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.body.ok, true);
    assert.strictEqual(res.body.data.status, 'ok');
    assert.strictEqual(typeof res.body.data.uptimeSec, 'number');
  });

  it('proxies the backend health probe', async () => {
    const res = await request(app).get('/health/backend');
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, { ok: true, data: { status: 'ok' } });
  });

  it('serves the stylesheet', async () => {
    const res = await request(app).get('/dashboard.css');
    assert.strictEqual(res.status, 200);
    assert.match(res.headers['content-type'], /text\/css/);
  });

  it('answers unknown paths with a JSON 404', async () => {
    const res = await request(app).get('/nope');
    assert.strictEqual(res.status, 404);
    assert.strictEqual(res.body.ok, false);
    assert.strictEqual(res.body.error, 'endpoint not found');
  });
});

describe('dashboard app with a backend lacking /health', () => {
  let fake: FakeBackend;

  before(async () => { fake = await startFakeBackend(() => {}); });
  after(async () => { await fake.close(); });

  it('answers 503 from the backend health probe', async () => {
    const res = await request(appFor(fake.url)).get('/health/backend');
    assert.strictEqual(res.status, 503);
    assert.deepStrictEqual(res.body, { ok: false, error: 'backend unavailable', message: 'GET /health -> 404 Not Found' });
  });
});
