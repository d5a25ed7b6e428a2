import { type Bit, evenParity, intToBits } from "../util/bits.js";
import { isoWeekday } from "../util/calendar.js";
import { type SignalOptions, synthesizeSignal } from "../util/waveform.js";
import {
	DATE_PARITY,
	DAY,
	DST_ACTIVE_BIT,
	DST_CHANGE_BIT,
	type FieldSpec,
	FRAME_BITS,
	HOUR,
	HOUR_PARITY,
	MINUTE,
	MINUTE_PARITY,
	MONTH,
	WEEKDAY,
	YEAR,
} from "./constants.js";

export interface TimeDate {
	hour: number;
	minute: number;
	day: number;
	month: number;
	year: number;
}

export interface DstFlags {
	dstActive: boolean;
	/** A change to or from DST happens within the next hour. */
	dstTransitionImminent: boolean;
}

/** One minute of DCF77 time code, 59 bits indexed by second. */
export type Dcf77Frame = readonly Bit[];

function setField(bits: Bit[], field: FieldSpec, value: number): void {
	bits.splice(field.start, field.width, ...intToBits(value, field.width));
}

/**
 * Pack time, date and DST flags into a DCF77 frame.
 * Throws `InvalidDateError` when day/month/year is not a real date.
 */
export function encodeFrame(time: TimeDate, dst: DstFlags): Dcf77Frame {
	const weekday = isoWeekday(time.day, time.month, time.year);
	const bits = new Array<Bit>(FRAME_BITS).fill(0);

	bits[DST_ACTIVE_BIT] = dst.dstActive ? 1 : 0;
	bits[DST_CHANGE_BIT] = dst.dstTransitionImminent ? 1 : 0;

	setField(bits, MINUTE, time.minute);
	bits[MINUTE_PARITY] = evenParity(bits, MINUTE.start, MINUTE_PARITY);

	setField(bits, HOUR, time.hour);
	bits[HOUR_PARITY] = evenParity(bits, HOUR.start, HOUR_PARITY);

	setField(bits, DAY, time.day);
	setField(bits, WEEKDAY, weekday);
	setField(bits, MONTH, time.month);
	setField(bits, YEAR, time.year % 100);
	bits[DATE_PARITY] = evenParity(bits, DAY.start, DATE_PARITY);

	return Object.freeze(bits);
}

export function encode(time: TimeDate, dst: DstFlags, options: SignalOptions = {}): Float32Array {
	return synthesizeSignal(encodeFrame(time, dst), options);
}
