/**
 * Numeric helpers shared by the estimators
 */

export function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value));
}

/**
 * Error function, Abramowitz & Stegun 7.1.26 (|error| < 1.5e-7)
 */
export function erf(x: number): number {
	const sign = x < 0 ? -1 : 1;
	const z = Math.abs(x);
	const t = 1 / (1 + 0.3275911 * z);
	const poly =
		t * (0.254829592 + t * (-0.284496736 + t * (1.421413741 + t * (-1.453152027 + t * 1.061405429))));
	return sign * (1 - poly * Math.exp(-z * z));
}

/**
 * Standard normal cumulative distribution
 */
export function normalCdf(x: number): number {
	return 0.5 * (1 + erf(x / Math.SQRT2));
}

/**
 * P(X = k) for X ~ Poisson(lambda)
 */
export function poissonPmf(k: number, lambda: number): number {
	if (k < 0) return 0;
	let p = Math.exp(-lambda);
	for (let i = 1; i <= k && p > 0; i++) {
		p *= lambda / i;
	}
	return p;
}

/**
 * P(X <= k) for X ~ Poisson(lambda)
 */
export function poissonCdf(k: number, lambda: number): number {
	if (k < 0) return 0;
	let term = Math.exp(-lambda);
	let sum = term;
	// Once the terms underflow the tail adds nothing
	for (let i = 1; i <= k && term > 0; i++) {
		term *= lambda / i;
		sum += term;
	}
	return Math.min(1, sum);
}

export function logit(p: number): number {
	return Math.log(p / (1 - p));
}

export function logistic(x: number): number {
	return 1 / (1 + Math.exp(-x));
}

/**
 * Round to a fixed number of decimal places
 */
export function roundTo(value: number, decimals: number = 4): number {
	const factor = Math.pow(10, decimals);
	return Math.round(value * factor) / factor;
}
