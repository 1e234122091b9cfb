export const PLACEHOLDER = 'n/a';

export function isNum(n: number | null | undefined): n is number {
  return typeof n === 'number' && Number.isFinite(n);
}

export function fmtUsd(n: number | null | undefined): string {
  if (!isNum(n)) return PLACEHOLDER;
  return '$' + n.toLocaleString('en-US', { maximumFractionDigits: 0 });
}

export function fmtSignedPct(n: number | null | undefined, digits = 2): string {
  if (!isNum(n)) return PLACEHOLDER;
  return `${n >= 0 ? '+' : ''}${n.toFixed(digits)}%`;
}

// probability in [0,1] -> "65%"
export function fmtOdds(p: number | null | undefined): string {
  if (!isNum(p)) return PLACEHOLDER;
  return `${Math.round(p * 100)}%`;
}

export function fmtMinutes(ms: number | null | undefined): string {
  if (!isNum(ms)) return PLACEHOLDER;
  return `${(ms / 60_000).toFixed(1)} min`;
}
