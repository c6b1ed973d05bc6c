/**
 * Builds the per-request dashboard view model from the backend service.
 */

import { z } from 'zod';
import type { BackendClient } from '../../clients/backendClient.js';
import type { BackendResult, JsonValue } from '../../types/backend.types.js';
import type { DashboardQuery, DashboardViewModel, NewsItem, StockSnapshot, UserAnalysis } from '../../types/dashboard.types.js';
import { logger } from '../../utils/logger.js';

// Every field falls back to undefined on a bad value so one odd field never blanks the page
const scalar = z.union([z.string(), z.number(), z.boolean()]).optional().catch(undefined);
const text = z.string().optional().catch(undefined);
// Numbers and numeric strings only; null, '' and booleans stay absent
const fraction = z.union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
  .pipe(z.number().finite())
  .optional()
  .catch(undefined);

const TrendSchema = z.object({
  bullish: scalar,
  bearish: scalar,
  neutral: scalar,
  dominant_sentiment: scalar,
}).catch({});

const StockPayloadSchema = z.object({
  live_price: scalar,
  beta: scalar,
  idiosyncratic_risk: scalar,
  sentiment_impact: scalar,
  notes: scalar,
  as_of: text,
  sentiment_trend_10_day: TrendSchema.optional().catch(undefined),
}).catch({});

const NewsItemSchema = z.object({
  headline: text,
  link: text,
  sentiment: text,
  confidence: fraction,
  published: text,
  source: text,
});

const NewsPayloadSchema = z.object({
  items: z.array(z.unknown()).catch([]),
}).catch({ items: [] });

const AnalysisPayloadSchema = z.object({
  user_sentiment: scalar,
  user_score: fraction,
  impact_summary_plain_english: text,
}).catch({});

const EmbeddedErrorSchema = z.object({
  error: z.unknown().refine(v => v !== undefined && v !== null && v !== false),
});

/**
 * The backend reports its own failures as `200 {"error": ...}`.
 * Any error value other than null or false counts; non-string values are shown as JSON.
 */
export function embeddedError(data: JsonValue): string | undefined {
  const parsed = EmbeddedErrorSchema.safeParse(data);
  if (!parsed.success) return undefined;
  const e = parsed.data.error;
  return typeof e === 'string' && e.length > 0 ? e : `Backend reported an error: ${JSON.stringify(e)}`;
}

export function toStockSnapshot(data: unknown): StockSnapshot {
  const p = StockPayloadSchema.parse(data);
  const t: z.infer<typeof TrendSchema> = p.sentiment_trend_10_day ?? {};
  return {
    livePrice: p.live_price,
    beta: p.beta,
    idiosyncraticRisk: p.idiosyncratic_risk,
    sentimentImpact: p.sentiment_impact,
    notes: p.notes,
    asOf: p.as_of,
    sentimentTrend: {
      bullish: t.bullish,
      bearish: t.bearish,
      neutral: t.neutral,
      dominantSentiment: t.dominant_sentiment,
    },
  };
}

export function toNewsItems(data: unknown): NewsItem[] {
  const { items } = NewsPayloadSchema.parse(data);
  const out: NewsItem[] = [];
  for (const raw of items) {
    const r = NewsItemSchema.safeParse(raw);
    if (r.success) out.push(r.data);
  }
  return out;
}

export function toUserAnalysis(result: BackendResult): UserAnalysis {
  if (!result.ok) {
    return { ok: false, errorMessage: result.errorMessage, rawBody: result.rawBody };
  }
  const err = embeddedError(result.data);
  if (err !== undefined) return { ok: false, errorMessage: err };
  const p = AnalysisPayloadSchema.parse(result.data);
  return {
    ok: true,
    userSentiment: p.user_sentiment,
    userScore: p.user_score,
    impactSummary: p.impact_summary_plain_english,
  };
}

export class DashboardService {
  protected logger = logger;

  constructor(private readonly backend: BackendClient, private readonly defaultSymbol = 'AAPL') {}

  resolveSymbol(symbol?: string): string {
    const s = (symbol ?? '').trim();
    return s || this.defaultSymbol;
  }

  /** Stock lookup gates everything else: when it fails, news and analysis are never requested. */
  async build(query: DashboardQuery): Promise<DashboardViewModel> {
    const symbol = this.resolveSymbol(query.symbol);
    const vm: DashboardViewModel = { symbol, news: [], userText: query.userText };
    const encoded = encodeURIComponent(symbol);

    const stock = await this.backend.get(`/stock/${encoded}`);
    if (!stock.ok) return this.withError(vm, stock.errorMessage);
    const stockError = embeddedError(stock.data);
    if (stockError !== undefined) return this.withError(vm, stockError);
    vm.stock = toStockSnapshot(stock.data);

    const news = await this.backend.get(`/news/${encoded}`);
    vm.news = news.ok ? toNewsItems(news.data) : [];

    const userText = query.userText ?? '';
    if (userText.trim().length > 0) {
      const analysis = await this.backend.post('/analyze_news', { text: userText, symbol });
      vm.userAnalysis = toUserAnalysis(analysis);
    }
    return vm;
  }

  private withError(vm: DashboardViewModel, error: string): DashboardViewModel {
    this.logger.warn({ symbol: vm.symbol, error }, 'dashboard_stock_failed');
    vm.error = error;
    return vm;
  }
}
