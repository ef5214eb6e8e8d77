import { cdf, cdfOverPdf, erfc, erfcInv, erfcx, inverseCdf, pdf, pdfOverCdf } from './trueskill_math';

function relativeError(actual: number, expected: number): number {
    return Math.abs(actual / expected - 1);
}

describe('Gaussian helpers', () => {
    test('should match tabulated erfc values across the series and continued fraction ranges', () => {
        expect(erfc(0)).toBe(1);
        expect(relativeError(erfc(0.5), 0.4795001221869535)).toBeLessThan(1e-12);
        expect(relativeError(erfc(1), 0.15729920705028513)).toBeLessThan(1e-12);
        expect(relativeError(erfc(3), 2.2090496998585438e-5)).toBeLessThan(1e-12);
        expect(relativeError(erfc(10), 2.088487583762545e-45)).toBeLessThan(1e-12);
    });

    test('should reflect erfc for negative arguments', () => {
        expect(erfc(-1)).toBeCloseTo(1.842700792949715, 14);
        expect(erfc(-Infinity)).toBe(2);
        expect(erfc(Infinity)).toBe(0);
    });

    test('should keep erfcx finite where erfc underflows', () => {
        // When / Then
        expect(erfcx(1)).toBeCloseTo(0.427583576155807, 14);
        expect(relativeError(erfcx(30), 0.018795888861416754)).toBeLessThan(1e-12);
        expect(erfc(30)).toBe(0);
    });

    test('should give the standard normal density from pdf', () => {
        expect(pdf(0)).toBeCloseTo(0.3989422804014327, 15);
        expect(pdf(1)).toBeCloseTo(0.24197072451914337, 15);
        expect(pdf(-1)).toBe(pdf(1));
    });

    test('should give the standard normal distribution function from cdf', () => {
        expect(cdf(0)).toBe(0.5);
        expect(cdf(1.96)).toBeCloseTo(0.9750021048517794, 14);
        expect(cdf(-1.96) + cdf(1.96)).toBeCloseTo(1, 15);
    });

    test('should undo cdf with inverseCdf', () => {
        expect(inverseCdf(0.975)).toBeCloseTo(1.9599639845400583, 12);
        expect(inverseCdf(0.55)).toBeCloseTo(0.12566134685507416, 12);
        expect(inverseCdf(0.1)).toBeCloseTo(-1.2815515655446006, 12);
        for (const p of [1e-10, 0.01, 0.3, 0.7, 0.999999]) {
            expect(relativeError(cdf(inverseCdf(p)), p)).toBeLessThan(1e-12);
        }
    });

    test('should make erfcInv odd around 1 and exact at the centre', () => {
        expect(erfcInv(1)).toBe(0);
        expect(erfcInv(0.5)).toBeCloseTo(0.4769362762044698, 13);
        expect(erfcInv(1.5)).toBeCloseTo(-0.4769362762044698, 13);
    });

    test('should reject arguments outside the inverse functions\' domains', () => {
        expect(() => inverseCdf(0)).toThrow(RangeError);
        expect(() => inverseCdf(1)).toThrow(RangeError);
        expect(() => inverseCdf(NaN)).toThrow(RangeError);
        expect(() => erfcInv(2)).toThrow(RangeError);
        expect(() => erfcx(-1)).toThrow(RangeError);
    });

    test('should agree with the direct ratio in pdfOverCdf and stay finite for extreme upsets', () => {
        expect(pdfOverCdf(1)).toBeCloseTo(pdf(1) / cdf(1), 14);
        expect(pdfOverCdf(-5)).toBeCloseTo(5.18650396712583, 11);
        expect(pdfOverCdf(-40)).toBeCloseTo(40.02496884720726, 10);
        expect(Number.isFinite(pdfOverCdf(-1e6))).toBe(true);
    });

    test('should give cdf / pdf in the lower tail without either term underflowing', () => {
        // Given
        const deep = -60;

        // When
        const ratio = cdfOverPdf(deep);

        // Then
        expect(cdf(deep) / pdf(deep)).toBeNaN();
        expect(ratio * -deep).toBeCloseTo(1, 3);
        expect(cdfOverPdf(-1)).toBeCloseTo(cdf(-1) / pdf(-1), 14);
        expect(cdfOverPdf(0)).toBe(Math.sqrt(Math.PI / 2));
        expect(() => cdfOverPdf(1)).toThrow(RangeError);
    });
});
