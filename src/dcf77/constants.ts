/** DCF77 frame layout and modulation constants. */

export const FRAME_BITS = 59;

export const DST_ACTIVE_BIT = 17;
export const DST_CHANGE_BIT = 18;

export interface FieldSpec {
	readonly name: string;
	readonly start: number;
	readonly width: number;
}

export const MINUTE: FieldSpec = { name: "minute", start: 21, width: 7 };
export const MINUTE_PARITY = 28; // P1
export const HOUR: FieldSpec = { name: "hour", start: 29, width: 6 };
export const HOUR_PARITY = 35; // P2
export const DAY: FieldSpec = { name: "day", start: 36, width: 6 };
export const WEEKDAY: FieldSpec = { name: "weekday", start: 42, width: 3 };
export const MONTH: FieldSpec = { name: "month", start: 45, width: 5 };
export const YEAR: FieldSpec = { name: "year", start: 50, width: 8 };
export const DATE_PARITY = 58; // P3, covers bits 36..57

/** Data fields in transmission order. */
export const DATA_FIELDS = [MINUTE, HOUR, DAY, WEEKDAY, MONTH, YEAR] as const;

export const WEEKDAY_NAMES = ["Mon", "Tue", "Wed", "Thu", "Fri", "Sat", "Sun"] as const;

/** Reduced-carrier window at the start of each second. */
export const ZERO_MARK_SECONDS = 0.1;
export const ONE_MARK_SECONDS = 0.2;

export const LOW_AMPLITUDE = 0.1;
export const HIGH_AMPLITUDE = 0.9;

export const CARRIER_FREQUENCY = 77_500;
