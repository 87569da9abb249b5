#!/usr/bin/env node
import { readConfig } from './config/json-config.js';
import { CliUsageError, handleHelpCli, handleUnknownCommand, parseRunArgs } from './core/cli.js';
import { handleLogsCli } from './core/logs-cli.js';
import { createPromptIO, PromptClosedError, runStartupPrompts, type StartupChoices } from './core/onboarding.js';
import { runSession } from './core/session.js';
import { ConfigurationError } from './types/dashboard.js';
import { logThought, setLogDir } from './utils/logger.js';

const argv = process.argv.slice(2);

// ── Early one-shot CLI commands ──────────────────────────────────────────────

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 1);
}

async function main(): Promise<void> {
    if (await handleLogsCli(argv)) return;

    const options = parseRunArgs(argv);
    const config = await readConfig(options.configPath);
    setLogDir(config.logging.dir);

    const io = createPromptIO();
    let choices: StartupChoices;
    try {
        choices = await runStartupPrompts(io, {
            dir: options.dir,
            chimeEnabled: options.chimeEnabled,
            chimeDefault: config.chime.enabled,
            chimeSoundFile: config.chime.soundFile,
        });
    } finally {
        io.close();
    }

    await runSession({ ...choices, config });
    await logThought('Session ended.');
}

main().then(
    () => {
        if (argv[0] !== 'logs') process.exit(process.exitCode ?? 0);
    },
    (error: unknown) => {
        if (error instanceof PromptClosedError) {
            process.exit(0);
        }
        if (error instanceof ConfigurationError || error instanceof CliUsageError) {
            console.error(`❌ ${error.message}`);
        } else {
            console.error('[filepulse] Fatal error:', error instanceof Error ? error.message : String(error));
        }
        process.exit(1);
    },
);
