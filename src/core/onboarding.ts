import * as readline from 'node:readline';
import { MISSING_CHIME_WARNING, resolveChimeFile } from '../services/chime-player.js';
import { ConfigurationError } from '../types/dashboard.js';
import { logThought } from '../utils/logger.js';
import { validateRoot } from './dashboard.js';

/** Line-oriented terminal I/O used while the dashboard is not on screen. */
export interface PromptIO {
    ask(question: string): Promise<string>;
    print(line: string): void;
}

/** Raised by `ask` when stdin ends (Ctrl+D) or the interface is closed. */
export class PromptClosedError extends Error {
    constructor() {
        super('Prompt input closed.');
        this.name = 'PromptClosedError';
    }
}

export interface StartupChoices {
    root: string;
    chimeEnabled: boolean;
}

export interface StartupDefaults {
    /** Directory given on the command line; skips the directory prompt. */
    dir?: string;
    /** Chime flag given on the command line; skips the chime prompt. */
    chimeEnabled?: boolean;
    /** Answer used for a blank chime reply. Defaults to on. */
    chimeDefault?: boolean;
    /** Configured `chime.soundFile`, checked when the chime ends up on. */
    chimeSoundFile?: string;
    cwd?: string;
}

/**
 * Prompt a single question and return the trimmed answer.
 * Rejects with `PromptClosedError` if the interface closes first.
 */
function prompt(rl: readline.Interface, question: string): Promise<string> {
    return new Promise((resolve, reject) => {
        const onClose = () => reject(new PromptClosedError());
        rl.once('close', onClose);
        rl.question(question, (answer) => {
            rl.off('close', onClose);
            resolve(answer.trim());
        });
    });
}

/** A readline-backed `PromptIO` plus its `close`. */
export function createPromptIO(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
): PromptIO & { close(): void } {
    const rl = readline.createInterface({ input, output });
    let closed = false;
    rl.on('close', () => {
        closed = true;
    });

    return {
        ask: (question) => (closed ? Promise.reject(new PromptClosedError()) : prompt(rl, question)),
        print: (line) => {
            output.write(`${line}\n`);
        },
        close: () => rl.close(),
    };
}

/** Parse a yes/no answer. Blank means `blank`, yes unless told otherwise. */
export function parseYesNo(answer: string, blank = true): boolean | undefined {
    const normalized = answer.trim().toLowerCase();
    if (normalized === '') return blank;
    if (normalized === 'y' || normalized === 'yes') return true;
    if (normalized === 'n' || normalized === 'no') return false;
    return undefined;
}

/**
 * Ask for the directory to monitor and whether to chime.
 * Answers already given on the command line are used as-is; a bad
 * command-line directory throws `ConfigurationError` instead of re-prompting.
 */
export async function runStartupPrompts(io: PromptIO, defaults: StartupDefaults = {}): Promise<StartupChoices> {
    io.print('File System Monitor');
    io.print('─'.repeat(50));

    const root = defaults.dir !== undefined
        ? await validateRoot(defaults.dir)
        : await askForDirectory(io, defaults.cwd ?? process.cwd());

    const chimeEnabled = defaults.chimeEnabled ?? await askForChime(io, defaults.chimeDefault ?? true);

    io.print('');
    io.print(`📁 Monitoring: ${root}`);
    io.print(`🔔 Audio chime: ${chimeEnabled ? 'ON' : 'OFF'}`);
    if (chimeEnabled && resolveChimeFile(defaults.chimeSoundFile ?? '', root) === undefined) {
        io.print(MISSING_CHIME_WARNING);
    }
    io.print('Press Ctrl+C at any time for the control menu.');

    await logThought(`Startup choices: root=${root}, chime=${chimeEnabled ? 'on' : 'off'}`);
    return { root, chimeEnabled };
}

async function askForDirectory(io: PromptIO, cwd: string): Promise<string> {
    io.print(`Current directory: ${cwd}`);
    for (;;) {
        const answer = await io.ask("📁 Enter directory path to monitor (or '.' for current directory): ");
        try {
            return await validateRoot(answer === '' ? '.' : answer);
        } catch (error) {
            if (!(error instanceof ConfigurationError)) throw error;
            io.print(`❌ ${error.message}`);
            io.print('Please try again.');
        }
    }
}

async function askForChime(io: PromptIO, fallback: boolean): Promise<boolean> {
    const hint = fallback ? 'y' : 'n';
    for (;;) {
        const answer = await io.ask(`🔔 Enable audio chime notifications? (y/n) [${hint}]: `);
        const parsed = parseYesNo(answer, fallback);
        if (parsed !== undefined) return parsed;
        io.print("Please enter 'y' for yes or 'n' for no.");
    }
}
