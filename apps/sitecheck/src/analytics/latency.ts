export const LATENCY_BUCKETS_MS = [
  25, 50, 75, 100, 150, 200, 300, 400, 500, 750, 1000, 1500, 2000, 3000, 5000, 7500, 10000, 15000,
  20000, 30000, 60000,
] as const;

// One counter per bucket plus a trailing overflow bucket.
export type LatencyHistogram = number[];

export function createLatencyHistogram(): LatencyHistogram {
  return new Array<number>(LATENCY_BUCKETS_MS.length + 1).fill(0);
}

function bucketIndex(valueMs: number): number {
  const v = Math.max(0, Math.floor(valueMs));
  const idx = LATENCY_BUCKETS_MS.findIndex((upper) => v <= upper);
  return idx === -1 ? LATENCY_BUCKETS_MS.length : idx;
}

export function recordLatency(hist: LatencyHistogram, valueMs: number): void {
  if (!Number.isFinite(valueMs)) return;
  const idx = bucketIndex(valueMs);
  hist[idx] = (hist[idx] ?? 0) + 1;
}

/**
 * Upper bound of the bucket holding the nearest-rank `p` percentile (0 < p <= 1). Values in the
 * overflow bucket report the last configured bound.
 */
export function percentileFromHistogram(hist: LatencyHistogram, p: number): number | null {
  if (!Number.isFinite(p) || p <= 0 || p > 1) return null;

  const total = hist.reduce((acc, v) => acc + (Number.isFinite(v) ? v : 0), 0);
  if (total <= 0) return null;

  const target = Math.ceil(p * total);
  const lastBound = LATENCY_BUCKETS_MS[LATENCY_BUCKETS_MS.length - 1] ?? null;
  let acc = 0;

  for (let i = 0; i < hist.length; i++) {
    acc += hist[i] ?? 0;
    if (acc >= target) {
      return LATENCY_BUCKETS_MS[i] ?? lastBound;
    }
  }

  return lastBound;
}
