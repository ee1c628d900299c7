export type RiflErrorKind =
    | 'TruncatedInput'
    | 'BadMagic'
    | 'UnsupportedVersion'
    | 'InvalidHeader'
    | 'MisalignedPairData'
    | 'OversizedBuffer'
    | 'MalformedPair';

export interface RiflErrorDetails {
    /** index of the offending pair, for `MalformedPair` */
    index?: number;
    /** byte offset into the input where the problem was found */
    offset?: number;
    path?: string;
}

export class RiflError extends Error {
    readonly index?: number;
    readonly offset?: number;
    readonly path?: string;

    constructor(
        readonly kind: RiflErrorKind,
        message: string,
        { index, offset, path }: RiflErrorDetails = {},
    ) {
        super(message);
        this.name = 'RiflError';
        this.index = index;
        this.offset = offset;
        this.path = path;
    }

    withPath(path: string) {
        return new RiflError(this.kind, this.message, { index: this.index, offset: this.offset, path });
    }
}

export function isRiflError(err: unknown): err is RiflError {
    return err instanceof RiflError;
}
