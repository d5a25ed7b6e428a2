export { type Dcf77Frame, type DstFlags, encode, encodeFrame, type TimeDate } from "./dcf77/encode.js";
export { formatFrame } from "./dcf77/format.js";
export type { Bit } from "./util/bits.js";
export { InvalidDateError, isoWeekday, isValidDate } from "./util/calendar.js";
export { type SignalOptions, synthesizeSignal } from "./util/waveform.js";
export { encodeMono16Wav, normalizeToPeak, writeMono16WavFile } from "./util/wav.js";
