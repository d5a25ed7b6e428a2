/**
 * Bit-field helpers shared by the frame encoder and formatter.
 * Bits are plain 0/1 numbers, most significant bit first.
 */

export type Bit = 0 | 1;

/** Right-justify `value` into `width` bits, MSB first. Higher bits are dropped. */
export function intToBits(value: number, width: number): Bit[] {
	const bits: Bit[] = [];
	for (let b = width - 1; b >= 0; b--) {
		bits.push(((value >>> b) & 1) === 1 ? 1 : 0);
	}
	return bits;
}

export function bitsToInt(bits: readonly number[], offset: number, count: number): number {
	let val = 0;
	for (let i = 0; i < count; i++) {
		val = (val << 1) | (bits[offset + i] ?? 0);
	}
	return val;
}

/** Even parity over bits[start, end): 1 iff the range holds an odd number of ones. */
export function evenParity(bits: readonly number[], start: number, end: number): Bit {
	let sum = 0;
	for (let i = start; i < end; i++) sum += bits[i] ?? 0;
	return sum % 2 === 1 ? 1 : 0;
}
