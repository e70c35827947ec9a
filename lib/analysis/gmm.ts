import type { MixtureComponent } from "@/types/core";
import { InsufficientDataError } from "@/lib/errors";

export interface MixtureOptions {
  components?: number;
  maxIterations?: number;
  tolerance?: number;
  regCovar?: number;
}

export interface MixtureFit {
  /** Ordered by ascending mean. */
  components: MixtureComponent[];
  /** Most probable component index for each input value. */
  labels: number[];
  logLikelihood: number;
  iterations: number;
  converged: boolean;
}

const EPS = Number.EPSILON;
const LOG_2PI = Math.log(2 * Math.PI);

function logSumExp(xs: number[]): number {
  const max = Math.max(...xs);
  if (!Number.isFinite(max)) return max;
  let sum = 0;
  for (const x of xs) sum += Math.exp(x - max);
  return max + Math.log(sum);
}

function nearest(value: number, centers: number[]): number {
  let best = 0;
  for (let j = 1; j < centers.length; j++) {
    if (Math.abs(value - centers[j]) < Math.abs(value - centers[best])) best = j;
  }
  return best;
}

/** Lloyd's k-means seeded at evenly spaced quantiles, which keeps the fit deterministic. */
export function kMeansLabels(values: number[], k: number, maxIterations = 100): { labels: number[]; centers: number[] } {
  const sorted = [...values].sort((a, b) => a - b);
  const n = values.length;
  const centers = Array.from({ length: k }, (_, j) => sorted[Math.min(n - 1, Math.floor(((j + 0.5) / k) * n))]);
  let labels = values.map((v) => nearest(v, centers));

  for (let iter = 0; iter < maxIterations; iter++) {
    for (let j = 0; j < k; j++) {
      let sum = 0;
      let count = 0;
      values.forEach((v, i) => {
        if (labels[i] !== j) return;
        sum += v;
        count++;
      });
      if (count > 0) centers[j] = sum / count;
    }
    const next = values.map((v) => nearest(v, centers));
    const changed = next.some((label, i) => label !== labels[i]);
    labels = next;
    if (!changed) break;
  }
  return { labels, centers };
}

function mStep(values: number[], resp: number[][], k: number, regCovar: number, fallbackMeans: number[]): MixtureComponent[] {
  const n = values.length;
  const overallMean = values.reduce((s, v) => s + v, 0) / n;
  const overallVar = values.reduce((s, v) => s + (v - overallMean) ** 2, 0) / n;

  const totals = Array.from({ length: k }, (_, j) => resp.reduce((s, r) => s + r[j], 0) + 10 * EPS);
  const weightSum = totals.reduce((s, t) => s + t, 0);

  return totals.map((nk, j) => {
    const assigned = nk - 10 * EPS;
    if (assigned <= 0) {
      return { mean: fallbackMeans[j], variance: overallVar + regCovar, weight: nk / weightSum };
    }
    const mean = values.reduce((s, v, i) => s + resp[i][j] * v, 0) / nk;
    const variance = values.reduce((s, v, i) => s + resp[i][j] * (v - mean) ** 2, 0) / nk + regCovar;
    return { mean, variance, weight: nk / weightSum };
  });
}

function eStep(values: number[], components: MixtureComponent[]): { resp: number[][]; meanLogLikelihood: number } {
  let total = 0;
  const resp = values.map((v) => {
    const logProb = components.map(
      (c) => Math.log(c.weight) - 0.5 * (LOG_2PI + Math.log(c.variance) + (v - c.mean) ** 2 / c.variance)
    );
    const norm = logSumExp(logProb);
    total += norm;
    return logProb.map((lp) => Math.exp(lp - norm));
  });
  return { resp, meanLogLikelihood: total / values.length };
}

function argmax(xs: number[]): number {
  let best = 0;
  for (let j = 1; j < xs.length; j++) if (xs[j] > xs[best]) best = j;
  return best;
}

/**
 * Fits a one-dimensional Gaussian mixture with expectation–maximisation and
 * labels every value with its most probable component.
 */
export function fitGaussianMixture(values: number[], options: MixtureOptions = {}): MixtureFit {
  const { components: k = 2, maxIterations = 100, tolerance = 1e-3, regCovar = 1e-6 } = options;
  if (!Number.isInteger(k) || k < 1) throw new RangeError(`Number of components must be a positive integer, got ${k}`);
  if (values.length < k) {
    throw new InsufficientDataError(`Cannot fit ${k} mixture components to ${values.length} values`);
  }

  const { labels: initialLabels, centers } = kMeansLabels(values, k);
  const oneHot = initialLabels.map((label) => Array.from({ length: k }, (_, j) => (j === label ? 1 : 0)));
  let params = mStep(values, oneHot, k, regCovar, centers);

  let previous = -Infinity;
  let logLikelihood = -Infinity;
  let converged = false;
  let iterations = 0;
  for (iterations = 1; iterations <= maxIterations; iterations++) {
    const { resp, meanLogLikelihood } = eStep(values, params);
    params = mStep(values, resp, k, regCovar, params.map((c) => c.mean));
    logLikelihood = meanLogLikelihood;
    if (Math.abs(meanLogLikelihood - previous) < tolerance) {
      converged = true;
      break;
    }
    previous = meanLogLikelihood;
  }

  const { resp } = eStep(values, params);
  const order = params.map((_, j) => j).sort((a, b) => params[a].mean - params[b].mean);
  const rank = new Map(order.map((j, r) => [j, r]));

  return {
    components: order.map((j) => params[j]),
    labels: resp.map((r) => rank.get(argmax(r)) ?? 0),
    logLikelihood,
    iterations: Math.min(iterations, maxIterations),
    converged,
  };
}

export function fitPredict(values: number[], components = 2): { components: MixtureComponent[]; labels: number[] } {
  const fit = fitGaussianMixture(values, { components });
  return { components: fit.components, labels: fit.labels };
}
