import { RiflError } from '../errors';

// unsigned LEB128: 7 value bits per byte, lowest group first, bit 8 = more bytes follow
const MAX_VALUE = 0xFFFFFFFF;
const MAX_BYTES = 5;

/**
 * Read all varints in `buffer[start, end)`. The range has to end on a
 * complete varint.
 */
export function readVarints(buffer: Buffer, start = 0, end = buffer.length) {
    const values: number[] = [];
    let value = 0;
    let factor = 1;
    let valueStart = start;
    for (let position = start; position < end; position++) {
        const byte = buffer[position];
        value += (byte & 0x7F) * factor;
        factor *= 0x80;
        if (value > MAX_VALUE || position - valueStart >= MAX_BYTES) {
            throw new RiflError('MalformedPair', `varint at offset ${valueStart} exceeds 32 bits`, { offset: valueStart });
        }
        if ((byte & 0x80) === 0) {
            values.push(value);
            value = 0;
            factor = 1;
            valueStart = position + 1;
        }
    }

    if (valueStart !== end) {
        throw new RiflError('MisalignedPairData', `chunk ends inside the varint at offset ${valueStart}`, { offset: valueStart });
    }
    return values;
}

export function writeVarint(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > MAX_VALUE) {
        throw new RangeError(`varint value must be an unsigned 32-bit integer, got ${value}`);
    }

    const bytes: number[] = [];
    while (value >= 0x80) {
        bytes.push((value & 0x7F) | 0x80);
        value = Math.floor(value / 0x80);
    }
    bytes.push(value);
    return Buffer.from(bytes);
}
