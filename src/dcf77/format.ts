import { bitsToInt } from "../util/bits.js";
import {
	DATA_FIELDS,
	DATE_PARITY,
	DST_ACTIVE_BIT,
	DST_CHANGE_BIT,
	HOUR_PARITY,
	MINUTE_PARITY,
	WEEKDAY,
	WEEKDAY_NAMES,
} from "./constants.js";

function range(start: number, width: number): string {
	return width === 1 ? `${start}` : `${start}-${start + width - 1}`;
}

function row(name: string, start: number, width: number, bits: string, value: string): string {
	return `${name.padEnd(8)} ${range(start, width).padStart(5)}  ${bits.padEnd(8)} ${value}`;
}

/**
 * One line per field: name, bit range, bits, value.
 *
 * ```
 * dst         17  0        0
 * minute   21-27  0011110  30
 * ```
 */
export function formatFrame(frame: readonly number[]): string {
	const bit = (i: number): string => String(frame[i] ?? 0);
	const lines = [
		row("dst", DST_ACTIVE_BIT, 1, bit(DST_ACTIVE_BIT), bit(DST_ACTIVE_BIT)),
		row("dstChg", DST_CHANGE_BIT, 1, bit(DST_CHANGE_BIT), bit(DST_CHANGE_BIT)),
	];

	for (const field of DATA_FIELDS) {
		const bits = frame.slice(field.start, field.start + field.width).join("");
		const value = bitsToInt(frame, field.start, field.width);
		const shown =
			field === WEEKDAY ? `${value} (${WEEKDAY_NAMES[value - 1] ?? "?"})` : String(value);
		lines.push(row(field.name, field.start, field.width, bits, shown));
	}

	lines.push(row("P1", MINUTE_PARITY, 1, bit(MINUTE_PARITY), ""));
	lines.push(row("P2", HOUR_PARITY, 1, bit(HOUR_PARITY), ""));
	lines.push(row("P3", DATE_PARITY, 1, bit(DATE_PARITY), ""));

	return lines.map((l) => l.trimEnd()).join("\n");
}
