import { RiflError } from '../errors';

type FieldType = 'uint32le' | 'float32le';

interface FieldSpec {
    offset: number;
    type: FieldType;
}

const FieldWidth: Record<FieldType, number> = {
    uint32le: 4,
    float32le: 4,
};

export const RIFL_MAGIC = 0x4C464952; // "RIFL"
export const RIFL_VERSION = 1;

/** Byte layout of the file header, all fields little-endian. */
export const HeaderLayout = {
    magic: { offset: 0, type: 'uint32le' },
    version: { offset: 4, type: 'uint32le' },
    frequency: { offset: 8, type: 'float32le' },
    dutyCycle: { offset: 12, type: 'float32le' },
    maxBufferSize: { offset: 16, type: 'uint32le' },
} as const satisfies Record<string, FieldSpec>;

export const HEADER_SIZE = 20;

/** Every chunk of pair data starts with its byte size. */
export const ChunkSizeField = { offset: 0, type: 'uint32le' } as const satisfies FieldSpec;
export const CHUNK_SIZE_WIDTH = FieldWidth[ChunkSizeField.type];

export interface RiflHeader {
    /** Version of the file format, only 1 is supported */
    version: number;
    /** Carrier frequency in Hz */
    frequency: number;
    /** Carrier duty cycle, 0..1 */
    dutyCycle: number;
    /** Largest chunk of pair data in bytes */
    maxBufferSize: number;
}

export function readField(buffer: Buffer, { offset, type }: FieldSpec, base = 0) {
    switch (type) {
        case 'uint32le': return buffer.readUInt32LE(base + offset);
        case 'float32le': return buffer.readFloatLE(base + offset);
    }
}

export function writeField(buffer: Buffer, { offset, type }: FieldSpec, value: number, base = 0) {
    switch (type) {
        case 'uint32le': return buffer.writeUInt32LE(value, base + offset);
        case 'float32le': return buffer.writeFloatLE(value, base + offset);
    }
}

export function decodeHeader(buffer: Buffer): RiflHeader {
    if (buffer.length < HEADER_SIZE) {
        throw new RiflError('TruncatedInput', `Not a RIFL file: header needs ${HEADER_SIZE} bytes, got ${buffer.length}`);
    }

    const magic = readField(buffer, HeaderLayout.magic);
    if (magic !== RIFL_MAGIC) {
        throw new RiflError('BadMagic', `Not a RIFL file: magic 0x${magic.toString(16).padStart(8, '0')}`, { offset: 0 });
    }

    const header: RiflHeader = {
        version: readField(buffer, HeaderLayout.version),
        frequency: readField(buffer, HeaderLayout.frequency),
        dutyCycle: readField(buffer, HeaderLayout.dutyCycle),
        maxBufferSize: readField(buffer, HeaderLayout.maxBufferSize),
    };
    checkHeader(header);
    return header;
}

/** Smallest chunk that still holds one pair, two single-byte varints. */
export const MIN_BUFFER_SIZE = 2;

/**
 * Throws unless the header can be written and read back: version 1, a finite
 * positive frequency and room for at least one pair per chunk.
 */
export function checkHeader({ version, frequency, maxBufferSize }: RiflHeader) {
    if (version !== RIFL_VERSION) {
        throw new RiflError('UnsupportedVersion', `Unsupported RIFL version ${version}`, { offset: HeaderLayout.version.offset });
    }
    if (!isFinite(frequency) || frequency <= 0) {
        throw new RiflError('InvalidHeader', `Invalid frequency ${frequency}`, { offset: HeaderLayout.frequency.offset });
    }
    if (!Number.isInteger(maxBufferSize) || maxBufferSize < MIN_BUFFER_SIZE || maxBufferSize > 0xFFFFFFFF) {
        throw new RiflError('InvalidHeader', `Invalid max buffer size ${maxBufferSize}`,
            { offset: HeaderLayout.maxBufferSize.offset });
    }
}

export function encodeHeader({ version, frequency, dutyCycle, maxBufferSize }: RiflHeader) {
    const buffer = Buffer.alloc(HEADER_SIZE);
    writeField(buffer, HeaderLayout.magic, RIFL_MAGIC);
    writeField(buffer, HeaderLayout.version, version);
    writeField(buffer, HeaderLayout.frequency, frequency);
    writeField(buffer, HeaderLayout.dutyCycle, dutyCycle);
    writeField(buffer, HeaderLayout.maxBufferSize, maxBufferSize);
    return buffer;
}
