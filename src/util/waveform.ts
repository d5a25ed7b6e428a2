import {
	CARRIER_FREQUENCY,
	FRAME_BITS,
	HIGH_AMPLITUDE,
	LOW_AMPLITUDE,
	ONE_MARK_SECONDS,
	ZERO_MARK_SECONDS,
} from "../dcf77/constants.js";

const TWO_PI = 2 * Math.PI;
const DEFAULT_SAMPLE_RATE = 44_100;
const DEFAULT_BIT_DURATION = 1.0;

export interface SignalOptions {
	/** Carrier frequency (Hz), default 77500 */
	carrierFrequency?: number;
	/** Sample rate (Hz), default 44100 */
	sampleRate?: number;
	/** Seconds per frame bit, default 1 */
	bitDuration?: number;
}

function assertPositiveFinite(value: number, name: string): void {
	if (!Number.isFinite(value) || value <= 0) {
		throw new Error(`${name} must be a positive finite number`);
	}
}

export function samplesPerBit(sampleRate: number, bitDuration: number): number {
	return Math.round(sampleRate * bitDuration);
}

/** Length of the reduced-amplitude window that marks `bit`, in samples. */
export function markSamples(bit: number, sampleRate: number): number {
	return Math.floor((bit === 0 ? ZERO_MARK_SECONDS : ONE_MARK_SECONDS) * sampleRate);
}

/**
 * Amplitude-shift-keyed DCF77 carrier for one frame.
 *
 * Each bit occupies `round(sampleRate * bitDuration)` samples. The carrier is
 * dropped to 10% for the first 100 ms (bit 0) or 200 ms (bit 1) of the span
 * and held at 90% for the rest. The mark is clamped to the span when the bit
 * duration is shorter than the mark.
 */
export function synthesizeSignal(
	frame: readonly number[],
	options: SignalOptions = {},
): Float32Array {
	const carrierFrequency = options.carrierFrequency ?? CARRIER_FREQUENCY;
	const sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE;
	const bitDuration = options.bitDuration ?? DEFAULT_BIT_DURATION;

	assertPositiveFinite(carrierFrequency, "carrierFrequency");
	assertPositiveFinite(sampleRate, "sampleRate");
	assertPositiveFinite(bitDuration, "bitDuration");
	if (frame.length !== FRAME_BITS) {
		throw new Error(`frame must have ${FRAME_BITS} bits, got ${frame.length}`);
	}

	// rounds to 0 for tiny rate * duration; the result is then empty
	const nspb = samplesPerBit(sampleRate, bitDuration);
	const wave = new Float32Array(nspb * FRAME_BITS);
	const dphi = (TWO_PI * carrierFrequency) / sampleRate;

	for (let i = 0; i < FRAME_BITS; i++) {
		const start = i * nspb;
		const markEnd = start + Math.min(markSamples(frame[i]!, sampleRate), nspb);
		const end = start + nspb;

		for (let k = start; k < markEnd; k++) {
			wave[k] = Math.sin(dphi * k) * LOW_AMPLITUDE;
		}
		for (let k = markEnd; k < end; k++) {
			wave[k] = Math.sin(dphi * k) * HIGH_AMPLITUDE;
		}
	}

	return wave;
}
