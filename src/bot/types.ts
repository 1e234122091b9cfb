export type Direction = 'UP' | 'DOWN';

export type MarketStatus = 'active' | 'closed';

// One BTC 15m up/down event. `id` is the event slug, which is also the URL path.
export type Market = {
  readonly id: string;
  readonly title: string;
  readonly startMs: number;
  readonly closeMs: number;
  readonly yesOdds: number;
  readonly noOdds: number;
  readonly volume: number;
  readonly status: MarketStatus;
};

export type PriceSourceKind = 'coingecko' | 'coinbase';

export type PricePoint = {
  price: number;
  change24hPct: number;
  fetchedAtMs: number;
  source: PriceSourceKind;
};

export type FactorKind = 'momentum' | 'sentiment' | 'volume';

export type Factor = {
  kind: FactorKind;
  label: string;
  // signed: positive pushes UP, negative pushes DOWN, 0 for no direction
  score: number;
  weight: number;
  detail: string;
};

export type ConfidenceLabel = 'HIGH' | 'MEDIUM' | 'LOW';

// 'critical' is a low-volume market below the critical threshold
export type VolumeTier = 'ok' | 'low' | 'critical';

export type Prediction = {
  direction: Direction;
  confidence: number;
  confidenceLabel: ConfidenceLabel;
  factors: Factor[];
  risk: boolean;
  volumeTier: VolumeTier;
  rationale: string;
  tieBroken: boolean;
};

export type NotifiedSet = Set<string>;

export interface MarketDataSource {
  fetchActiveMarkets(): Promise<Market[]>;
}

export interface PriceDataSource {
  fetchPrice(): Promise<PricePoint>;
}

export interface NotificationSink {
  send(text: string): Promise<void>;
}
