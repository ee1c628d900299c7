import { DEFAULT_TIME_BASE, readParamAsNumber } from '../util';

export type OutputFormat = 'pad' | 'signal';
const OutputFormats: ReadonlyArray<OutputFormat> = ['pad', 'signal'];

export type Command =
    | { command: 'convert'; rawFile: string; outputFile?: string; format: OutputFormat }
    | { command: 'info'; rawFile: string; timeBase: number }
    | { command: 'help' }
    | { command: 'version' };

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

function isOutputFormat(value: string): value is OutputFormat {
    return OutputFormats.some(f => f === value);
}

interface ParsedArgs {
    positional: string[];
    options: Map<string, string>;
    flags: Set<string>;
}

const ValueOptions = new Map([
    ['-f', 'format'],
    ['--format', 'format'],
    ['--time-base', 'time-base'],
]);

const FlagOptions = new Map([
    ['-h', 'help'],
    ['--help', 'help'],
    ['--version', 'version'],
]);

function split(argv: ReadonlyArray<string>): ParsedArgs {
    const parsed: ParsedArgs = { positional: [], options: new Map(), flags: new Set() };
    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
        const name = eq === -1 ? arg : arg.slice(0, eq);

        const option = ValueOptions.get(name);
        const flag = FlagOptions.get(name);

        if (option !== void 0) {
            const value = eq !== -1 ? arg.slice(eq + 1) : argv[++i];
            if (value === void 0) { throw new UsageError(`option ${name} needs a value`); }
            parsed.options.set(option, value);
        } else if (flag !== void 0) {
            parsed.flags.add(flag);
        } else if (arg.startsWith('-') && arg !== '-') {
            throw new UsageError(`unknown option ${arg}`);
        } else {
            parsed.positional.push(arg);
        }
    }
    return parsed;
}

export function parseArgs(argv: ReadonlyArray<string>): Command {
    const { positional, options, flags } = split(argv);
    if (flags.has('help')) { return { command: 'help' }; }
    if (flags.has('version')) { return { command: 'version' }; }

    const [command, rawFile, outputFile, ...rest] = positional;
    if (command === void 0) { throw new UsageError('missing command'); }
    if (rawFile === void 0) { throw new UsageError('missing RAW_FILE'); }

    switch (command) {
        case 'convert': {
            if (rest.length) { throw new UsageError(`unexpected argument ${rest[0]}`); }
            const format = options.get('format') ?? 'pad';
            if (!isOutputFormat(format)) {
                throw new UsageError(`Format must be one of: ${OutputFormats.join('/')} but was "${format}"`);
            }
            return { command, rawFile, outputFile, format };
        }
        case 'info': {
            if (outputFile !== void 0) { throw new UsageError(`unexpected argument ${outputFile}`); }
            const timeBaseParam = options.get('time-base');
            const timeBase = timeBaseParam === void 0 ? DEFAULT_TIME_BASE : readParamAsNumber(timeBaseParam);
            if (timeBase === void 0 || timeBase <= 0) {
                throw new UsageError(`time base must be positive but was "${timeBaseParam}"`);
            }
            return { command, rawFile, timeBase };
        }
        default:
            throw new UsageError(`unknown command ${command}`);
    }
}
