/// <reference types="node" />

import { writeFileSync } from "node:fs";

const INT16_MAX = 0x7fff;

/** Scale samples so the largest absolute value becomes 1. All-zero input is returned as zeros. */
export function normalizeToPeak(samples: Float32Array): Float32Array {
	let peak = 0;
	for (let i = 0; i < samples.length; i++) {
		peak = Math.max(peak, Math.abs(samples[i]!));
	}

	const out = new Float32Array(samples.length);
	if (peak === 0) return out;
	for (let i = 0; i < samples.length; i++) {
		out[i] = samples[i]! / peak;
	}
	return out;
}

/**
 * Encode samples as a mono 16-bit PCM WAV buffer.
 * Samples are normalized to their peak first, then truncated toward zero
 * onto [-32767, 32767].
 */
export function encodeMono16Wav(samples: Float32Array, sampleRate: number): Buffer {
	const numChannels = 1;
	const bitsPerSample = 16;
	const blockAlign = numChannels * (bitsPerSample / 8);
	const dataSize = samples.length * blockAlign;
	const wav = Buffer.alloc(44 + dataSize);

	let offset = 0;
	wav.write("RIFF", offset);
	offset += 4;
	wav.writeUInt32LE(36 + dataSize, offset);
	offset += 4;
	wav.write("WAVE", offset);
	offset += 4;

	wav.write("fmt ", offset);
	offset += 4;
	wav.writeUInt32LE(16, offset);
	offset += 4; // PCM chunk size
	wav.writeUInt16LE(1, offset);
	offset += 2; // PCM format
	wav.writeUInt16LE(numChannels, offset);
	offset += 2;
	wav.writeUInt32LE(sampleRate, offset);
	offset += 4;
	wav.writeUInt32LE(sampleRate * blockAlign, offset);
	offset += 4;
	wav.writeUInt16LE(blockAlign, offset);
	offset += 2;
	wav.writeUInt16LE(bitsPerSample, offset);
	offset += 2;

	wav.write("data", offset);
	offset += 4;
	wav.writeUInt32LE(dataSize, offset);
	offset += 4;

	const normalized = normalizeToPeak(samples);
	for (let i = 0; i < normalized.length; i++) {
		wav.writeInt16LE(Math.trunc(normalized[i]! * INT16_MAX), offset + i * 2);
	}

	return wav;
}

export function writeMono16WavFile(
	filePath: string,
	samples: Float32Array,
	sampleRate: number,
): void {
	writeFileSync(filePath, encodeMono16Wav(samples, sampleRate));
}
