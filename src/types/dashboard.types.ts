export type Scalar = string | number | boolean;

export interface SentimentTrend {
  bullish?: Scalar;
  bearish?: Scalar;
  neutral?: Scalar;
  dominantSentiment?: Scalar;
}

export interface StockSnapshot {
  livePrice?: Scalar;
  beta?: Scalar;
  idiosyncraticRisk?: Scalar;
  sentimentImpact?: Scalar;
  notes?: Scalar;
  asOf?: string;
  sentimentTrend: SentimentTrend;
}

export interface NewsItem {
  headline?: string;
  link?: string;
  sentiment?: string;
  /** 0..1 */
  confidence?: number;
  published?: string;
  source?: string;
}

export type UserAnalysis =
  | { ok: false; errorMessage: string; rawBody?: string }
  | { ok: true; userSentiment?: Scalar; userScore?: number; impactSummary?: string };

export interface DashboardViewModel {
  symbol: string;
  error?: string;
  stock?: StockSnapshot;
  news: NewsItem[];
  userText?: string;
  userAnalysis?: UserAnalysis;
}

export interface DashboardQuery {
  symbol?: string;
  userText?: string;
}
