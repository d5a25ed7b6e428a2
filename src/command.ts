import { resolve } from "node:path";

import { type Dcf77Frame, encodeFrame } from "./dcf77/encode.js";
import { formatFrame } from "./dcf77/format.js";
import { CARRIER_FREQUENCY } from "./dcf77/constants.js";
import { type Ask, FIELD_PROMPTS, type FieldKey, parseInteger, promptWithValidation } from "./util/prompt.js";
import { synthesizeSignal } from "./util/waveform.js";
import { writeMono16WavFile } from "./util/wav.js";

const DEFAULT_OUTPUT = "dcf77_time_signal.wav";
const DEFAULT_SAMPLE_RATE = 1_024;
const DEFAULT_BIT_DURATION = 1.0;

const FIELD_ORDER: readonly FieldKey[] = ["hour", "minute", "day", "month", "year", "dst", "dstChange"];

export interface CliIO {
	out: (line: string) => void;
	err: (line: string) => void;
	ask: Ask;
	/** Base for relative output paths, default `process.cwd()` */
	cwd?: string;
}

interface SignalArgs {
	outputFile: string;
	sampleRate: number;
	carrierFrequency: number;
	bitDuration: number;
}

interface ParsedArgs {
	fields: Partial<Record<FieldKey, number>>;
	signal: SignalArgs;
}

const USAGE = `dcf77sim - DCF77 time code and signal simulator

Usage:
  dcf77sim encode [time options] [signal options]
  dcf77sim frame [time options]

Time options (prompted for when omitted):
  --hour <0-23>
  --minute <0-59>
  --day <1-31>
  --month <1-12>
  --year <n>
  --dst <0|1>          Daylight saving time in effect
  --dst-change <0|1>   DST change within the next hour

Signal options:
  --out <file>          Output WAV file (default: ${DEFAULT_OUTPUT})
  --rate <hz>           Sample rate (default: ${DEFAULT_SAMPLE_RATE})
  --carrier <hz>        Carrier frequency (default: ${CARRIER_FREQUENCY})
  --bit-duration <s>    Seconds per bit (default: ${DEFAULT_BIT_DURATION})
`;

function fieldForFlag(flag: string): FieldKey | undefined {
	return FIELD_ORDER.find((key) => `--${FIELD_PROMPTS[key].flag}` === flag);
}

function positiveNumber(flag: string, value: string): number {
	const parsed = Number(value);
	if (value.trim() === "" || !Number.isFinite(parsed) || parsed <= 0) {
		throw new Error(`Invalid ${flag} value: ${value}`);
	}
	return parsed;
}

function parseArgs(argv: string[], allowSignal: boolean): ParsedArgs {
	const fields: Partial<Record<FieldKey, number>> = {};
	const signal: SignalArgs = {
		outputFile: DEFAULT_OUTPUT,
		sampleRate: DEFAULT_SAMPLE_RATE,
		carrierFrequency: CARRIER_FREQUENCY,
		bitDuration: DEFAULT_BIT_DURATION,
	};

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i]!;
		const key = fieldForFlag(arg);
		const isSignal = ["--out", "--rate", "--carrier", "--bit-duration"].includes(arg);
		if (key === undefined && !(allowSignal && isSignal)) {
			throw new Error(`Unknown argument: ${arg}`);
		}

		i++;
		const value = argv[i];
		if (value === undefined) throw new Error(`Missing value for ${arg}`);

		if (key !== undefined) {
			const field = FIELD_PROMPTS[key];
			const parsed = parseInteger(value);
			if (parsed === null || !field.accept(parsed)) {
				throw new Error(`Invalid ${arg} value: ${value}`);
			}
			fields[key] = parsed;
		} else if (arg === "--out") {
			signal.outputFile = value;
		} else if (arg === "--rate") {
			const rate = parseInteger(value);
			if (rate === null || rate <= 0) throw new Error(`Invalid --rate value: ${value}`);
			signal.sampleRate = rate;
		} else if (arg === "--carrier") {
			signal.carrierFrequency = positiveNumber(arg, value);
		} else {
			signal.bitDuration = positiveNumber(arg, value);
		}
	}

	return { fields, signal };
}

async function buildFrame(fields: Partial<Record<FieldKey, number>>, io: CliIO): Promise<Dcf77Frame> {
	const values = { ...fields };
	for (const key of FIELD_ORDER) {
		if (values[key] === undefined) {
			values[key] = await promptWithValidation(io.ask, FIELD_PROMPTS[key], io.out);
		}
	}

	const get = (key: FieldKey): number => values[key] ?? 0;
	return encodeFrame(
		{
			hour: get("hour"),
			minute: get("minute"),
			day: get("day"),
			month: get("month"),
			year: get("year"),
		},
		{
			dstActive: get("dst") === 1,
			dstTransitionImminent: get("dstChange") === 1,
		},
	);
}

async function runFrame(argv: string[], io: CliIO): Promise<void> {
	const { fields } = parseArgs(argv, false);
	const frame = await buildFrame(fields, io);
	io.out(formatFrame(frame));
	io.out(frame.join(""));
}

async function runEncode(argv: string[], io: CliIO): Promise<void> {
	const { fields, signal } = parseArgs(argv, true);
	const frame = await buildFrame(fields, io);
	io.out(formatFrame(frame));

	const waveform = synthesizeSignal(frame, {
		carrierFrequency: signal.carrierFrequency,
		sampleRate: signal.sampleRate,
		bitDuration: signal.bitDuration,
	});

	const outPath = resolve(io.cwd ?? process.cwd(), signal.outputFile);
	writeMono16WavFile(outPath, waveform, signal.sampleRate);

	io.out(
		`Wrote ${outPath} (${waveform.length} samples, ${(waveform.length / signal.sampleRate).toFixed(3)} s)`,
	);
}

/** Run the command line and return the process exit code. */
export async function runCli(args: string[], io: CliIO): Promise<number> {
	const subcommand = args[0];
	const subArgs = args.slice(1);

	if (!subcommand || subcommand === "--help" || subcommand === "-h") {
		io.err(USAGE);
		return 0;
	}

	try {
		if (subcommand === "encode") {
			await runEncode(subArgs, io);
		} else if (subcommand === "frame") {
			await runFrame(subArgs, io);
		} else {
			io.err(`Error: unknown subcommand '${subcommand}'`);
			io.err(USAGE);
			return 1;
		}
	} catch (error) {
		const msg = error instanceof Error ? error.message : String(error);
		io.err(`Error: ${msg}`);
		io.err(USAGE);
		return 1;
	}
	return 0;
}
