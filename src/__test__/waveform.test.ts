import { describe, expect, test } from "vitest";
import { encodeFrame } from "../dcf77/encode.js";
import { markSamples, synthesizeSignal } from "../util/waveform.js";

const FRAME = encodeFrame(
	{ hour: 12, minute: 30, day: 15, month: 6, year: 2024 },
	{ dstActive: false, dstTransitionImminent: false },
);

function carrier(k: number, frequency: number, sampleRate: number): number {
	return Math.sin((2 * Math.PI * frequency * k) / sampleRate);
}

describe("DCF77 signal synthesizer", () => {
	test("generates a Float32Array of 59 one-second bits", () => {
		const waveform = synthesizeSignal(FRAME, { sampleRate: 1_000, carrierFrequency: 50 });

		expect(waveform).toBeInstanceOf(Float32Array);
		expect(waveform.length).toBe(59 * 1_000);
		expect(waveform[0]).toBeCloseTo(0, 6);
	});

	test("defaults to 77.5 kHz at 44.1 kHz with one-second bits", () => {
		const waveform = synthesizeSignal(FRAME);
		expect(waveform.length).toBe(59 * 44_100);
		expect(waveform[1]).toBeCloseTo(0.1 * carrier(1, 77_500, 44_100), 6);
	});

	test.each([
		{ sampleRate: 12_345, bitDuration: 0.333, expected: 4_111 * 59 },
		{ sampleRate: 1_024, bitDuration: 1, expected: 1_024 * 59 },
		{ sampleRate: 8_000, bitDuration: 0.5, expected: 4_000 * 59 },
	])("length is round(rate * duration) * 59 for $sampleRate Hz, $bitDuration s", (c) => {
		const waveform = synthesizeSignal(FRAME, {
			sampleRate: c.sampleRate,
			bitDuration: c.bitDuration,
			carrierFrequency: 1_000,
		});
		expect(waveform.length).toBe(c.expected);
	});

	test("mark window is 100 ms for 0 and 200 ms for 1, floored to whole samples", () => {
		expect(markSamples(0, 1_000)).toBe(100);
		expect(markSamples(1, 1_000)).toBe(200);
		expect(markSamples(0, 1_024)).toBe(102);
		expect(markSamples(1, 1_024)).toBe(204);
	});

	test("each bit is 0.1x carrier during its mark and 0.9x for the rest of the span", () => {
		const sampleRate = 1_000;
		const frequency = 50;
		const waveform = synthesizeSignal(FRAME, { sampleRate, carrierFrequency: frequency });

		let maxError = 0;
		for (let i = 0; i < 59; i++) {
			const mark = FRAME[i] === 1 ? 200 : 100;
			for (let j = 0; j < 1_000; j++) {
				const k = i * 1_000 + j;
				const expected = carrier(k, frequency, sampleRate) * (j < mark ? 0.1 : 0.9);
				maxError = Math.max(maxError, Math.abs(waveform[k]! - expected));
			}
		}
		expect(maxError).toBeLessThan(1e-6);
	});

	test("a one-bit and a zero-bit differ between 100 ms and 200 ms into the second", () => {
		const sampleRate = 1_000;
		const waveform = synthesizeSignal(FRAME, { sampleRate, carrierFrequency: 50 });
		// bit 23 is 1, bit 21 is 0; sample 145 of a span sits on a carrier peak
		expect(FRAME[21]).toBe(0);
		expect(FRAME[23]).toBe(1);
		expect(waveform[21 * 1_000 + 145]).toBeCloseTo(0.9, 5);
		expect(waveform[23 * 1_000 + 145]).toBeCloseTo(0.1, 5);
	});

	test("mark is clamped to the span when bits are shorter than the mark", () => {
		const sampleRate = 1_000;
		const frequency = 50;
		const waveform = synthesizeSignal(FRAME, { sampleRate, carrierFrequency: frequency, bitDuration: 0.15 });
		expect(waveform.length).toBe(150 * 59);

		// bit 23 (a 1) is low for its whole 150-sample span
		const start = 23 * 150;
		expect(waveform[start + 145]).toBeCloseTo(carrier(start + 145, frequency, sampleRate) * 0.1, 6);
		// bit 21 (a 0) switches to high after 100 samples
		const start0 = 21 * 150;
		expect(waveform[start0 + 99]).toBeCloseTo(carrier(start0 + 99, frequency, sampleRate) * 0.1, 6);
		expect(waveform[start0 + 105]).toBeCloseTo(carrier(start0 + 105, frequency, sampleRate) * 0.9, 6);
	});

	test("rejects invalid options and frames", () => {
		expect(() => synthesizeSignal(FRAME, { sampleRate: 0 })).toThrow(
			"sampleRate must be a positive finite number",
		);
		expect(() => synthesizeSignal(FRAME, { carrierFrequency: Number.NaN })).toThrow(
			"carrierFrequency must be a positive finite number",
		);
		expect(() => synthesizeSignal(FRAME, { bitDuration: -1 })).toThrow(
			"bitDuration must be a positive finite number",
		);
		expect(() => synthesizeSignal(FRAME.slice(0, 58))).toThrow("frame must have 59 bits, got 58");
	});

	test("returns an empty buffer when rate * duration rounds to zero samples", () => {
		const waveform = synthesizeSignal(FRAME, { sampleRate: 1, bitDuration: 0.4 });
		expect(waveform).toBeInstanceOf(Float32Array);
		expect(waveform.length).toBe(0);
	});
});
