// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: filepulse [command] [options]

Commands:
  logs                Print today's log file
  logs --follow, -f   Follow today's log file as it grows
  logs --date <day>   Print the log of another day (YYYY-MM-DD)

Options:
  --dir <path>        Directory to monitor (skips the directory prompt)
  --chime             Enable the audio chime (skips the chime prompt)
  --no-chime          Disable the audio chime (skips the chime prompt)
  --config <path>     Read settings from this JSON file
  --help, -h          Show this help message

Keys while monitoring:
  W/Up, S/Down        Scroll
  PgUp, PgDn          Page
  F                   Jump to the most recent event
  <number> Enter      Show the diff for that file; Q closes it
  Ctrl+C              Open the control menu

Examples:
  filepulse
  filepulse --dir ./src --no-chime
  filepulse logs --follow
`.trim();

export interface RunOptions {
    dir?: string;
    chimeEnabled?: boolean;
    configPath?: string;
}

export class CliUsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CliUsageError';
    }
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
    if (!argv.includes('--help') && !argv.includes('-h')) return false;

    console.log(HELP_TEXT);
    process.exitCode = 0;
    return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
    if (argv.length === 0) return false;

    const command = argv[0];
    if (command === 'logs' || command.startsWith('-')) {
        return false;
    }

    console.error(`[filepulse] Unknown command: '${command}'`);
    console.error(`Run 'filepulse --help' to see available commands.`);
    process.exitCode = 1;
    return true;
}

/** Parse the monitoring flags. Throws `CliUsageError` on anything unrecognised. */
export function parseRunArgs(argv: string[]): RunOptions {
    const options: RunOptions = {};

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];
        switch (arg) {
            case '--dir':
                options.dir = requireValue(argv, i, arg);
                i += 1;
                break;
            case '--config':
                options.configPath = requireValue(argv, i, arg);
                i += 1;
                break;
            case '--chime':
                options.chimeEnabled = true;
                break;
            case '--no-chime':
                options.chimeEnabled = false;
                break;
            default:
                throw new CliUsageError(`Unknown option: ${arg}`);
        }
    }

    return options;
}

function requireValue(argv: string[], index: number, flag: string): string {
    const value = argv[index + 1];
    if (value === undefined || value.startsWith('--')) {
        throw new CliUsageError(`Missing value for ${flag}`);
    }
    return value;
}
