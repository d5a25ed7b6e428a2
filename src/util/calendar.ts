/**
 * Proleptic Gregorian calendar helpers used to derive the DCF77 weekday field.
 * Self-contained: no `Date`, no time zone or locale lookups.
 */

/** Thrown when (day, month, year) does not name a real calendar date. */
export class InvalidDateError extends Error {
	override readonly name = "InvalidDateError";

	constructor(
		readonly day: number,
		readonly month: number,
		readonly year: number,
	) {
		super(`Invalid date: ${day}/${month}/${year}`);
	}
}

/** Sakamoto's month offsets, January first. */
const MONTH_OFFSETS = [0, 3, 2, 5, 0, 3, 5, 1, 4, 6, 2, 4] as const;

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const;

export function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(month: number, year: number): number {
	if (month === 2 && isLeapYear(year)) return 29;
	return DAYS_IN_MONTH[month - 1] ?? 0;
}

export function isValidDate(day: number, month: number, year: number): boolean {
	if (!Number.isInteger(day) || !Number.isInteger(month) || !Number.isInteger(year)) {
		return false;
	}
	if (year < 1 || month < 1 || month > 12) return false;
	return day >= 1 && day <= daysInMonth(month, year);
}

/**
 * ISO weekday of a date: Monday = 1 … Sunday = 7.
 * Throws {@link InvalidDateError} if the date does not exist.
 */
export function isoWeekday(day: number, month: number, year: number): number {
	if (!isValidDate(day, month, year)) {
		throw new InvalidDateError(day, month, year);
	}

	// January and February count as months 13 and 14 of the previous year.
	const y = month < 3 ? year - 1 : year;
	const dow =
		(y + Math.floor(y / 4) - Math.floor(y / 100) + Math.floor(y / 400) + MONTH_OFFSETS[month - 1]! + day) %
		7;
	// dow: 0 = Sunday
	return dow === 0 ? 7 : dow;
}
