import { createInterface } from "node:readline";

/** Reads one line of user input for the given prompt. Rejects when input ends. */
export type Ask = (prompt: string) => Promise<string>;

export interface LineReader {
	ask: Ask;
	close(): void;
}

/** Line-by-line `Ask` over a pair of streams, typically stdin/stdout. */
export function createLineReader(
	input: NodeJS.ReadableStream,
	output: NodeJS.WritableStream,
): LineReader {
	const rl = createInterface({ input, terminal: false });
	const lines = rl[Symbol.asyncIterator]();

	return {
		async ask(prompt) {
			output.write(prompt);
			const next = await lines.next();
			if (next.done) {
				throw new Error("Input ended before a valid value was entered");
			}
			return next.value;
		},
		close() {
			rl.close();
		},
	};
}

export interface PromptField {
	/** Flag name on the command line, without the leading dashes. */
	flag: string;
	prompt: string;
	accept: (value: number) => boolean;
	errorMessage: string;
}

export type FieldKey = "hour" | "minute" | "day" | "month" | "year" | "dst" | "dstChange";

const inRange =
	(lo: number, hi: number) =>
	(x: number): boolean =>
		x >= lo && x <= hi;

export const FIELD_PROMPTS: Readonly<Record<FieldKey, PromptField>> = {
	hour: {
		flag: "hour",
		prompt: "Hour (0-23): ",
		accept: inRange(0, 23),
		errorMessage: "The hour must be between 0 and 23.",
	},
	minute: {
		flag: "minute",
		prompt: "Minute (0-59): ",
		accept: inRange(0, 59),
		errorMessage: "The minute must be between 0 and 59.",
	},
	day: {
		flag: "day",
		prompt: "Day (1-31): ",
		accept: inRange(1, 31),
		errorMessage: "The day must be between 1 and 31.",
	},
	month: {
		flag: "month",
		prompt: "Month (1-12): ",
		accept: inRange(1, 12),
		errorMessage: "The month must be between 1 and 12.",
	},
	year: {
		flag: "year",
		prompt: "Year: ",
		accept: (x) => x > 0,
		errorMessage: "The year must be a positive number.",
	},
	dst: {
		flag: "dst",
		prompt: "DST Status (0 for standard, 1 for DST): ",
		accept: inRange(0, 1),
		errorMessage: "The DST status must be 0 (standard) or 1 (DST).",
	},
	dstChange: {
		flag: "dst-change",
		prompt: "DST Change (0 for no change, 1 for change within 1 hour): ",
		accept: inRange(0, 1),
		errorMessage: "The DST change must be 0 (no change) or 1 (change within 1 hour).",
	},
};

/**
 * Parse a base-10 integer, allowing surrounding whitespace. `null` if the text
 * is not one or lies outside the safe integer range.
 */
export function parseInteger(text: string): number | null {
	const trimmed = text.trim();
	if (!/^[+-]?\d+$/.test(trimmed)) return null;
	const value = Number(trimmed);
	return Number.isSafeInteger(value) ? value : null;
}

/** Ask for `field` until the answer parses and passes `field.accept`. */
export async function promptWithValidation(
	ask: Ask,
	field: PromptField,
	log: (line: string) => void,
): Promise<number> {
	for (;;) {
		const value = parseInteger(await ask(field.prompt));
		if (value !== null && field.accept(value)) {
			return value;
		}
		log(field.errorMessage);
	}
}
