import { RiflError } from '../errors';
import { checkPair, type PulseAndDuration, type PulseAndDurations } from '../signal/pad';
import {
    CHUNK_SIZE_WIDTH, ChunkSizeField, decodeHeader, encodeHeader,
    HEADER_SIZE, readField, type RiflHeader, writeField
} from './layout';
import { readVarints, writeVarint } from './varint';

export interface DecodedRifl {
    header: RiflHeader;
    pulseAndDurations: PulseAndDuration[];
}

function toBuffer(bytes: Uint8Array) {
    return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Decode a complete capture: the header, then chunks of varint encoded pulse
 * and duration values until the end of input. Fails on the first problem.
 */
export function decodeRifl(bytes: Uint8Array): DecodedRifl {
    const buffer = toBuffer(bytes);
    const header = decodeHeader(buffer);
    const pulseAndDurations: PulseAndDuration[] = [];

    let offset = HEADER_SIZE;
    while (offset < buffer.length) {
        const remaining = buffer.length - offset;
        if (remaining < CHUNK_SIZE_WIDTH) {
            throw new RiflError('MisalignedPairData', `${remaining} trailing bytes after pair data`, { offset });
        }

        const size = readField(buffer, ChunkSizeField, offset);
        if (size > header.maxBufferSize) {
            throw new RiflError('OversizedBuffer',
                `read pair: buffer size is too big ${size} > ${header.maxBufferSize}`, { offset });
        }
        offset += CHUNK_SIZE_WIDTH;

        if (offset + size > buffer.length) {
            throw new RiflError('TruncatedInput',
                `tried to read ${size} bytes got only ${buffer.length - offset}`, { offset });
        }

        const values = readVarints(buffer, offset, offset + size);
        if (values.length % 2 !== 0) {
            throw new RiflError('MisalignedPairData',
                `chunk at offset ${offset} holds an odd number of values (${values.length})`, { offset });
        }
        for (let i = 0; i < values.length; i += 2) {
            const pair = { pulse: values[i], duration: values[i + 1] };
            checkPair(pair, pulseAndDurations.length);
            pulseAndDurations.push(pair);
        }
        offset += size;
    }

    return { header, pulseAndDurations };
}

/**
 * Encode header and pairs. Pairs are packed into chunks of at most
 * `maxBufferSize` bytes and never split; the last chunk is written even when
 * empty.
 */
export function encodeRifl(header: RiflHeader, pulseAndDurations: PulseAndDurations) {
    const parts: Buffer[] = [encodeHeader(header)];
    let chunk: Buffer[] = [];
    let chunkSize = 0;

    const flush = () => {
        const size = Buffer.alloc(CHUNK_SIZE_WIDTH);
        writeField(size, ChunkSizeField, chunkSize);
        parts.push(size, ...chunk);
        chunk = [];
        chunkSize = 0;
    };

    pulseAndDurations.forEach((pair, index) => {
        checkPair(pair, index);
        const encoded = Buffer.concat([writeVarint(pair.pulse), writeVarint(pair.duration)]);
        if (encoded.length > header.maxBufferSize) {
            throw new RangeError(`pair ${index} needs ${encoded.length} bytes, max buffer size is ${header.maxBufferSize}`);
        }
        if (chunkSize + encoded.length > header.maxBufferSize) {
            flush();
        }
        chunk.push(encoded);
        chunkSize += encoded.length;
    });
    flush();

    return Buffer.concat(parts);
}
