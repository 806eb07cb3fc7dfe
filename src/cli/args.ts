import { ConversationFilterError } from '../utils/errors';

// ============================================================================
// ARGUMENT PARSING
// ============================================================================

export interface CliArgs {
    input?: string;
    users?: string;
    user?: string;
    output?: string;
    includeHeader: boolean;
    list: boolean;
    interactive: boolean;
    help: boolean;
}

interface LongOption {
    name: string;
    value?: string;
}

/**
 * Parses the arguments that follow the script name. Accepts `--name value` and
 * `--name=value`; the first bare argument is taken as the input file.
 */
export function parseCliArgs(args: string[]): CliArgs {
    const parsed: CliArgs = {
        includeHeader: true,
        list: false,
        interactive: false,
        help: false
    };

    for (let index = 0; index < args.length; index += 1) {
        const arg = args[index];

        if (arg === '--help' || arg === '-h') {
            parsed.help = true;
            continue;
        }

        if (arg === '--interactive' || arg === '-i') {
            parsed.interactive = true;
            continue;
        }

        if (arg === '--list') {
            parsed.list = true;
            continue;
        }

        if (arg === '--no-header') {
            parsed.includeHeader = false;
            continue;
        }

        if (arg.startsWith('--')) {
            const option = parseLongOption(arg);
            switch (option.name) {
                case 'input':
                    parsed.input = requireValue(args, option, index);
                    index = advanceIndex(index, option);
                    continue;
                case 'users':
                    parsed.users = requireValue(args, option, index);
                    index = advanceIndex(index, option);
                    continue;
                case 'user':
                    parsed.user = requireValue(args, option, index);
                    index = advanceIndex(index, option);
                    continue;
                case 'output':
                    parsed.output = requireValue(args, option, index);
                    index = advanceIndex(index, option);
                    continue;
                default:
                    throw unknownOption(arg);
            }
        }

        if (arg.startsWith('-') && arg !== '-') {
            throw unknownOption(arg);
        }

        if (parsed.input !== undefined) {
            throw new ConversationFilterError("INVALID_ARGUMENT", `Unexpected argument '${arg}'.`);
        }
        parsed.input = arg;
    }

    return parsed;
}

function parseLongOption(arg: string): LongOption {
    const body = arg.slice(2);
    const equalsAt = body.indexOf('=');
    if (equalsAt === -1) {
        return { name: body };
    }
    return { name: body.slice(0, equalsAt), value: body.slice(equalsAt + 1) };
}

function requireValue(args: string[], option: LongOption, index: number): string {
    const raw = option.value ?? args[index + 1];
    const value = raw?.trim();
    if (!value || (option.value === undefined && value.startsWith('--'))) {
        throw new ConversationFilterError("INVALID_ARGUMENT", `Missing value for --${option.name}.`);
    }
    return value;
}

function advanceIndex(index: number, option: LongOption): number {
    return option.value === undefined ? index + 1 : index;
}

function unknownOption(arg: string): ConversationFilterError {
    return new ConversationFilterError(
        "INVALID_ARGUMENT",
        `Unknown option '${arg}'. Run 'conversation-filter --help' for available flags.`
    );
}
