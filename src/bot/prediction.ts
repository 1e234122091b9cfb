import { DataUnavailable } from './errors.js';
import { fmtOdds, fmtSignedPct, fmtUsd, isNum } from './format.js';
import type { ConfidenceLabel, Direction, Factor, Market, Prediction, PricePoint, VolumeTier } from './types.js';

export type PredictionParams = {
  // |24h change| in percent at or above which momentum counts as strong
  strongMomentumPct: number;
  // below this, momentum is neutral and contributes nothing
  weakMomentumPct: number;
  strongMomentumWeight: number;
  weakMomentumWeight: number;
  sentimentWeight: number;
  // odds skew (yes - no) at which sentiment reaches its full weight
  sentimentSaturation: number;
  minVolume: number;
  // a risky market below this volume gets the critical warning
  criticalVolume: number;
  lowVolumeConfidenceCap: number;
  agreementBonus: number;
  disagreementPenalty: number;
  tieBreak: Direction;
};

export const DEFAULT_PREDICTION_PARAMS: PredictionParams = {
  strongMomentumPct: 2,
  weakMomentumPct: 0.5,
  strongMomentumWeight: 2,
  weakMomentumWeight: 1,
  sentimentWeight: 1,
  sentimentSaturation: 0.1,
  minVolume: 1000,
  criticalVolume: 100,
  lowVolumeConfidenceCap: 40,
  agreementBonus: 10,
  disagreementPenalty: 15,
  tieBreak: 'UP'
};

function clamp(n: number, lo: number, hi: number) {
  return Math.max(lo, Math.min(hi, n));
}

function momentumFactor(change: number, p: PredictionParams): Factor {
  const abs = Math.abs(change);
  const bull = change > 0;
  const detail = `(${fmtSignedPct(change)})`;

  if (abs >= p.strongMomentumPct) {
    return {
      kind: 'momentum',
      label: bull ? 'BTC strong bullish momentum' : 'BTC strong bearish momentum',
      score: bull ? p.strongMomentumWeight : -p.strongMomentumWeight,
      weight: p.strongMomentumWeight,
      detail
    };
  }
  if (abs >= p.weakMomentumPct) {
    return {
      kind: 'momentum',
      label: bull ? 'BTC bullish' : 'BTC bearish',
      score: bull ? p.weakMomentumWeight : -p.weakMomentumWeight,
      weight: p.weakMomentumWeight,
      detail
    };
  }
  return { kind: 'momentum', label: 'BTC neutral', score: 0, weight: 0, detail };
}

function sentimentFactor(market: Market, p: PredictionParams): Factor {
  const skew = market.yesOdds - market.noOdds;
  const score = p.sentimentWeight * clamp(skew / p.sentimentSaturation, -1, 1);
  const label = skew > 0 ? 'Crowd leans UP' : skew < 0 ? 'Crowd leans DOWN' : 'Crowd neutral';
  return {
    kind: 'sentiment',
    label,
    score,
    weight: score !== 0 ? p.sentimentWeight : 0,
    detail: `(${fmtOdds(market.yesOdds)} vs ${fmtOdds(market.noOdds)})`
  };
}

function volumeFactor(volume: number, p: PredictionParams): Factor {
  const risk = volume < p.minVolume;
  return {
    kind: 'volume',
    label: risk ? 'Low volume' : 'Good volume',
    score: 0,
    weight: 0,
    detail: risk ? `(${fmtUsd(volume)}) - high risk` : `(${fmtUsd(volume)})`
  };
}

/**
 * Direction for an exactly balanced score. The fired signal with the larger
 * configured weight wins; with no fired signal, or equal weights, the
 * configured tie-break applies.
 */
function breakTie(signals: Factor[], tieBreak: Direction): Direction {
  const fired = signals.filter(f => f.score !== 0).sort((a, b) => b.weight - a.weight);
  const [top, second] = fired;
  if (top && (!second || top.weight > second.weight)) return top.score > 0 ? 'UP' : 'DOWN';
  return tieBreak;
}

export function confidenceLabel(confidence: number): ConfidenceLabel {
  if (confidence >= 70) return 'HIGH';
  if (confidence >= 50) return 'MEDIUM';
  return 'LOW';
}

/**
 * Weighted heuristic over 24h momentum and crowd odds; volume only caps
 * confidence and sets the risk flag. Deterministic.
 *
 * @throws DataUnavailable when the price point or odds carry no usable numbers
 */
export function predict(market: Market, price: PricePoint, params: PredictionParams = DEFAULT_PREDICTION_PARAMS): Prediction {
  if (!isNum(price.price) || price.price <= 0 || !isNum(price.change24hPct)) {
    throw new DataUnavailable('BTC price or 24h change unavailable');
  }
  if (!isNum(market.yesOdds) || !isNum(market.noOdds)) {
    throw new DataUnavailable(`odds unavailable for ${market.id}`);
  }

  const momentum = momentumFactor(price.change24hPct, params);
  const sentiment = sentimentFactor(market, params);
  const vol = isNum(market.volume) ? market.volume : 0;
  const volume = volumeFactor(vol, params);
  const risk = isNum(market.volume) ? market.volume < params.minVolume : true;
  const volumeTier: VolumeTier = !risk ? 'ok' : vol < params.criticalVolume ? 'critical' : 'low';

  const combined = momentum.score + sentiment.score;
  const tieBroken = combined === 0;
  const direction: Direction = combined > 0 ? 'UP' : combined < 0 ? 'DOWN' : breakTie([momentum, sentiment], params.tieBreak);

  const maxScore = params.strongMomentumWeight + params.sentimentWeight;
  let raw = 50 + (maxScore > 0 ? (40 * Math.abs(combined)) / maxScore : 0);
  if (momentum.score !== 0 && sentiment.score !== 0) {
    raw += Math.sign(momentum.score) === Math.sign(sentiment.score) ? params.agreementBonus : -params.disagreementPenalty;
  }
  if (risk) raw = Math.min(raw, params.lowVolumeConfidenceCap);
  const confidence = clamp(Math.round(raw), 0, 100);

  const factors = [momentum, sentiment, volume];
  return {
    direction,
    confidence,
    confidenceLabel: confidenceLabel(confidence),
    factors,
    risk,
    volumeTier,
    rationale: factors.map(f => `• ${f.label} ${f.detail}`).join('\n'),
    tieBroken
  };
}
