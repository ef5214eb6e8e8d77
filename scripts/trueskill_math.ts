// Gaussian helpers for the TrueSkill update
// erfc follows the series / continued fraction split in Abramowitz & Stegun 7.1.6 and 7.1.14

const SQRT_PI = Math.sqrt(Math.PI);
const SQRT_2PI = Math.sqrt(2 * Math.PI);
const TWO_OVER_SQRT_PI = 2 / SQRT_PI;

// Below this the erf series is used, above it the continued fraction
const SERIES_LIMIT = 2.0;
const MAX_ITERATIONS = 2000;
const TINY = 1e-300;

// exp(z^2) * erfc(z) for z >= 0 without overflow or underflow
export function erfcx(z: number): number {
    if (z < 0) {
        throw new RangeError(`erfcx is only evaluated for z >= 0, got ${z}`);
    }
    if (z < SERIES_LIMIT) {
        return Math.exp(z * z) * (1 - erfSeries(z));
    }
    if (z === Infinity) return 0;
    return 1 /(SQRT_PI * continuedFraction(z));
}

export function erfc(x: number): number {
    if (Number.isNaN(x)) return NaN;
    if (x < 0) return 2 - erfc(-x);
    if (x === Infinity) return 0;
    return Math.exp(-x * x) * erfcx(x);
}

// Inverse of erfc on (0, 2)
export function erfcInv(y: number): number {
    if (!(y > 0 && y < 2)) {
        throw new RangeError(`erfcInv is defined on (0, 2), got ${y}`);
    }
    if (y === 1) return 0;

    const pp = y < 1 ? y : 2 - y;
    const t = Math.sqrt(-2 * Math.log(pp / 2));
    let x = -0.70711 * ((2.30753 + t * 0.27061) / (1 + t * (0.99229 + t * 0.04481)) - t);

    // Halley steps on f(x) = erfc(x) - pp
    for (let i = 0; i < 6; i++) {
        const err = erfc(x) - pp;
        const step = err / (TWO_OVER_SQRT_PI * Math.exp(-x * x) - x * err);
        x += step;
        if (Math.abs(step) <= 1e-16 * Math.max(1, Math.abs(x))) break;
    }

    return y < 1 ? x : -x;
}

export function pdf(x: number): number {
    return Math.exp(-0.5 * x * x) / SQRT_2PI;
}

export function cdf(x: number): number {
    return 0.5 * erfc(-x / Math.SQRT2);
}

export function inverseCdf(p: number): number {
    if (!(p > 0 && p < 1)) {
        throw new RangeError(`inverseCdf is defined on (0, 1), got ${p}`);
    }
    return -Math.SQRT2 * erfcInv(2 * p);
}

/**
 * pdf(x) / cdf(x), the mean correction for a win.
 *
 * For negative x both terms share the factor exp(-x^2 / 2), which is cancelled
 * analytically so the ratio stays finite when cdf(x) would underflow.
 */
export function pdfOverCdf(x: number): number {
    if (x >= 0) {
        return pdf(x) / cdf(x);
    }
    return 1 / cdfOverPdf(x);
}

// cdf(x) / pdf(x) for x <= 0, with the shared exp(-x^2 / 2) cancelled
export function cdfOverPdf(x: number): number {
    if (x > 0) {
        throw new RangeError(`cdfOverPdf is only evaluated for x <= 0, got ${x}`);
    }
    return Math.sqrt(Math.PI / 2) * erfcx(-x / Math.SQRT2);
}

// erf(z) = 2/sqrt(pi) * exp(-z^2) * sum 2^n z^(2n+1) / (1*3*...*(2n+1))
function erfSeries(z: number): number {
    let term = z;
    let sum = z;
    for (let n = 1; n < MAX_ITERATIONS; n++) {
        term *= (2 * z * z) / (2 * n + 1);
        sum += term;
        if (term <= sum * 1e-17) break;
    }
    return TWO_OVER_SQRT_PI * Math.exp(-z * z) * sum;
}

// z + (1/2)/(z + 1/(z + (3/2)/(z + ...))), modified Lentz
function continuedFraction(z: number): number {
    let f = z === 0 ? TINY : z;
    let c = f;
    let d = 0;
    for (let n = 1; n < MAX_ITERATIONS; n++) {
        const a = n / 2;
        d = z + a * d;
        if (Math.abs(d) < TINY) d = TINY;
        c = z + a / c;
        if (Math.abs(c) < TINY) c = TINY;
        d = 1 / d;
        const delta = c * d;
        f *= delta;
        if (Math.abs(delta - 1) < 1e-16) break;
    }
    return f;
}
