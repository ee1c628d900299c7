export { RiflError, isRiflError } from './errors';
export type { RiflErrorKind, RiflErrorDetails } from './errors';
export type { Logger } from './Logger';
export { decodeRifl, encodeRifl } from './rifl/codec';
export type { DecodedRifl } from './rifl/codec';
export { HeaderLayout, HEADER_SIZE, RIFL_MAGIC, RIFL_VERSION, checkHeader, decodeHeader, encodeHeader } from './rifl/layout';
export type { RiflHeader } from './rifl/layout';
export { Rifl, defaultHeader } from './rifl/rifl';
export { readVarints, writeVarint } from './rifl/varint';
export { checkPair, findFirstTransitionIndex, padToSignal, signalToPad } from './signal/pad';
export type { PulseAndDuration, PulseAndDurations, Signal } from './signal/pad';
export { autocorrelate, binarize, histogram, smooth } from './signal/analysis';
export { run } from './cli/main';
