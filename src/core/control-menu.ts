import path from 'node:path';
import { MISSING_CHIME_WARNING } from '../services/chime-player.js';
import { formatDiffLine } from '../services/content-store.js';
import { ConfigurationError, type DiffLine, type DiffLineKind } from '../types/dashboard.js';
import { logThought } from '../utils/logger.js';
import type { Dashboard } from './dashboard.js';
import { PromptClosedError, type PromptIO } from './onboarding.js';

export type MenuOutcome = 'resume' | 'exit';

/** The slice of `Dashboard` the menu drives. */
export type MenuTarget = Pick<
    Dashboard,
    'root' | 'chimeEnabled' | 'checkRoot' | 'changeRoot' | 'toggleChime' | 'chimeFile' | 'listDiffs' | 'diffByIndex'
>;

const RULE = '─'.repeat(60);

const ANSI: Record<DiffLineKind, string> = {
    header: '\x1b[1;34m',
    hunk: '\x1b[1;36m',
    insert: '\x1b[32m',
    delete: '\x1b[31m',
    context: '\x1b[2m',
};

/** One diff line with its prefix, coloured for a plain terminal. */
export function colorDiffLine(line: DiffLine): string {
    return `${ANSI[line.kind]}${formatDiffLine(line)}\x1b[0m`;
}

/**
 * Interactive menu shown after Ctrl+C. Loops until the user resumes or exits.
 * A vanished root narrows the choices to "change directory" or "exit".
 */
export async function runControlMenu(target: MenuTarget, io: PromptIO): Promise<MenuOutcome> {
    try {
        return await menuLoop(target, io);
    } catch (error) {
        if (error instanceof PromptClosedError) return 'exit';
        throw error;
    }
}

async function menuLoop(target: MenuTarget, io: PromptIO): Promise<MenuOutcome> {
    for (;;) {
        if (!(await target.checkRoot())) {
            io.print('');
            io.print(`⚠️  Directory not found: ${target.root}`);
            io.print('  1. Change directory');
            io.print('  2. Exit');
            const choice = await io.ask('\nEnter choice (1-2): ');
            if (choice === '1') {
                if (await changeDirectory(target, io)) return 'resume';
            } else if (choice === '2') {
                return 'exit';
            } else {
                io.print('Invalid choice.');
            }
            continue;
        }

        io.print('');
        io.print('Control Menu');
        io.print(RULE);
        io.print(`Monitoring: ${target.root}`);
        io.print('  1. Change directory');
        io.print(`  2. Toggle chime (currently ${target.chimeEnabled ? 'ON' : 'OFF'})`);
        io.print('  3. View file diffs');
        io.print('  4. Resume monitoring');
        io.print('  5. Exit');

        const choice = await io.ask('\nEnter choice (1-5): ');
        switch (choice) {
            case '1':
                await changeDirectory(target, io);
                break;
            case '2':
                toggleChime(target, io);
                break;
            case '3':
                await showDiffs(target, io);
                break;
            case '4':
                return 'resume';
            case '5':
                return 'exit';
            default:
                io.print('Invalid choice.');
        }
    }
}

async function changeDirectory(target: MenuTarget, io: PromptIO): Promise<boolean> {
    const answer = await io.ask('Enter new directory path: ');
    if (answer === '') {
        io.print('No path entered.');
        return false;
    }

    try {
        await target.changeRoot(answer);
    } catch (error) {
        if (!(error instanceof ConfigurationError)) throw error;
        io.print(`Error: ${error.message}`);
        return false;
    }

    io.print(`Now monitoring: ${target.root}`);
    return true;
}

function toggleChime(target: MenuTarget, io: PromptIO): void {
    const enabled = target.toggleChime();
    io.print(`Chime ${enabled ? 'enabled' : 'disabled'}.`);
    if (enabled && target.chimeFile() === undefined) {
        io.print(MISSING_CHIME_WARNING);
    }
    void logThought(`[Menu] Chime toggled ${enabled ? 'on' : 'off'}.`);
}

async function showDiffs(target: MenuTarget, io: PromptIO): Promise<void> {
    const diffs = await target.listDiffs();
    if (diffs.length === 0) {
        io.print('No files with diffs available.');
        return;
    }

    io.print('');
    io.print('Files with diffs:');
    for (const { index, path: filePath } of diffs) {
        io.print(`  ${index}. ${path.relative(target.root, filePath) || path.basename(filePath)}`);
    }

    const answer = await io.ask("\nEnter file number (or 'q' to go back): ");
    if (answer.toLowerCase() === 'q') return;

    const number = Number.parseInt(answer, 10);
    if (Number.isNaN(number)) {
        io.print('Invalid input. Please enter a number.');
        return;
    }
    const selected = target.diffByIndex(number);
    if (!selected) {
        io.print('Invalid file number.');
        return;
    }

    io.print('');
    io.print(`Diff for ${path.basename(selected.path)}:`);
    io.print(RULE);
    for (const line of selected.lines) {
        io.print(colorDiffLine(line));
    }
    io.print(RULE);
    await io.ask('\nPress Enter to continue...');
}
