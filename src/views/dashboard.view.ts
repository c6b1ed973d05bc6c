import type { DashboardViewModel, NewsItem, StockSnapshot, UserAnalysis } from '../types/dashboard.types.js';
import { escapeHtml, fmt, fmtPct } from '../lib/format.js';

export interface RenderOptions {
  /** Shown in the hint under a stock lookup error. */
  backendUrl: string;
}

const h = (x: unknown) => escapeHtml(fmt(x));

function symbolForm(symbol: string) {
  return `
    <form method="get" action="/">
      <label for="symbol">Enter Stock Symbol:</label>
      <input type="text" name="symbol" id="symbol" value="${escapeHtml(symbol)}" required>
      <button type="submit">Analyze Stock</button>
    </form>`;
}

export function renderErrorView(error: string, opts: RenderOptions) {
  return `
    <div class="error">
      <h3>Error</h3>
      <p>${escapeHtml(error)}</p>
      <p class="muted">Make sure the sentiment backend is running on ${escapeHtml(opts.backendUrl)}</p>
    </div>`;
}

function marketSection(symbol: string, s: StockSnapshot) {
  const asOf = s.asOf ? `\n        <p class="muted">As of ${escapeHtml(s.asOf)}</p>` : '';
  return `
      <div class="section">
        <h2>Live Market Data for ${escapeHtml(symbol)}</h2>
        <ul>
          <li><strong>Live Price:</strong> $${h(s.livePrice)}</li>
          <li><strong>Beta:</strong> ${h(s.beta)}</li>
          <li><strong>Idiosyncratic Risk:</strong> ${h(s.idiosyncraticRisk)}</li>
          <li><strong>Sentiment Impact:</strong> ${h(s.sentimentImpact)}%</li>
          <li><strong>Market Notes:</strong> ${h(s.notes)}</li>
        </ul>${asOf}
      </div>`;
}

function trendSection(s: StockSnapshot) {
  const t = s.sentimentTrend;
  return `
      <div class="section">
        <h2>10-Day Sentiment Trend</h2>
        <ul>
          <li>Bullish: ${h(t.bullish)}</li>
          <li>Bearish: ${h(t.bearish)}</li>
          <li>Neutral: ${h(t.neutral)}</li>
          <li>Overall Sentiment: ${h(t.dominantSentiment)}</li>
        </ul>
      </div>`;
}

// Feed links are only followed when they are plain web URLs
export function safeLink(link?: string): string | undefined {
  if (!link) return undefined;
  try {
    const { protocol } = new URL(link);
    return protocol === 'http:' || protocol === 'https:' ? link : undefined;
  } catch {
    return undefined;
  }
}

export function renderNewsRow(n: NewsItem) {
  const headline = escapeHtml(n.headline);
  const href = safeLink(n.link);
  const title = href
    ? `<a href="${escapeHtml(href)}" target="_blank" rel="noopener noreferrer">${headline}</a>`
    : headline;
  const source = n.source ? `<br><span class="muted">${escapeHtml(n.source)}</span>` : '';
  return `<tr><td>${title}${source}</td><td>${escapeHtml(n.sentiment)}</td><td>${fmtPct(n.confidence, 2)}</td><td>${escapeHtml(n.published)}</td></tr>`;
}

function newsSection(symbol: string, news: NewsItem[]) {
  const body = news.length
    ? `<table>
          <tr><th>Headline</th><th>Sentiment</th><th>Confidence</th><th>Published</th></tr>
          ${news.map(renderNewsRow).join('\n          ')}
        </table>`
    : `<p class="muted">No recent news found for ${escapeHtml(symbol)}.</p>`;
  return `
      <div class="section">
        <h2>Latest News Sentiment (Past 10 Days) for ${escapeHtml(symbol)}</h2>
        <p class="muted">Headlines scored by the sentiment backend.</p>
        ${body}
      </div>`;
}

export function renderUserAnalysis(a: UserAnalysis) {
  if (!a.ok) {
    const raw = a.rawBody ? `\n          <p class="muted">Backend response: ${escapeHtml(a.rawBody)}</p>` : '';
    return `
        <div class="error">
          <h3>Analysis Error</h3>
          <p>${escapeHtml(a.errorMessage)}</p>${raw}
        </div>`;
  }
  return `
        <div class="result-box success">
          <h3>Analysis Result</h3>
          <ul>
            <li><strong>User Sentiment:</strong> ${h(a.userSentiment)} (${fmtPct(a.userScore, 1)} confidence)</li>
          </ul>
        </div>
        <div class="result-box">
          <h3>Summary of Stock and Impact</h3>
          <p>${h(a.impactSummary)}</p>
        </div>`;
}

function analysisSection(vm: DashboardViewModel, symbol: string) {
  return `
      <div class="section">
        <h2>Analyze Your Own News Text</h2>
        <form method="get" action="/">
          <input type="hidden" name="symbol" value="${escapeHtml(vm.symbol)}">
          <textarea name="user_text" rows="4" placeholder="Paste a headline or news paragraph for ${escapeHtml(symbol)}...">${escapeHtml(vm.userText)}</textarea>
          <br>
          <button type="submit">Analyze Custom News</button>
        </form>${vm.userAnalysis ? renderUserAnalysis(vm.userAnalysis) : ''}
      </div>`;
}

function chartSection(symbol: string) {
  const src = `https://s.tradingview.com/widgetembed/?symbol=${encodeURIComponent(symbol)}&interval=D&hidesidetoolbar=1&symboledit=1&theme=dark&style=1&timezone=Etc/UTC&withdateranges=1&hideideas=1`;
  return `
      <div class="section">
        <h2>Live Stock Chart</h2>
        <iframe src="${escapeHtml(src)}" title="${escapeHtml(symbol)} chart" scrolling="no"></iframe>
      </div>`;
}

export function renderDashboardView(vm: DashboardViewModel, stock: StockSnapshot) {
  const display = vm.symbol.toUpperCase();
  return [
    marketSection(display, stock),
    trendSection(stock),
    newsSection(display, vm.news),
    analysisSection(vm, display),
    chartSection(vm.symbol),
  ].join('\n');
}

/** Whole HTML document for one dashboard request. */
export function renderDashboardPage(vm: DashboardViewModel, opts: RenderOptions): string {
  let content: string;
  if (vm.error !== undefined) content = renderErrorView(vm.error, opts);
  else if (vm.stock) content = renderDashboardView(vm, vm.stock);
  else content = renderErrorView('No stock data available', opts);
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>Stock Sentiment Dashboard</title>
  <link rel="stylesheet" href="/dashboard.css">
</head>
<body>
  <div class="container">
    <h1>Stock Sentiment Dashboard</h1>
    ${symbolForm(vm.symbol)}
    ${content}
  </div>
</body>
</html>
`;
}
