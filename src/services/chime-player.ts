import { spawn, type SpawnOptions } from 'node:child_process';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { logThought } from '../utils/logger.js';

/** Fire-and-forget playback of a sound file. */
export interface ChimePlayer {
    play(soundFile: string): void;
}

export interface PlaybackCommand {
    command: string;
    args: string[];
}

/** The part of a spawned `ChildProcess` the player touches. */
export interface SpawnedPlayer {
    once(event: 'error', listener: (err: Error) => void): unknown;
    unref(): void;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => SpawnedPlayer;

export const MISSING_CHIME_WARNING = 'Warning: no chime sound file found; notifications will be silent.';

const LINUX_PLAYERS = ['mpg123', 'mpv', 'vlc', 'mplayer', 'ffplay'];

/** Candidate commands for a platform, tried in order until one spawns. */
export function playbackCommands(platform: NodeJS.Platform, soundFile: string): PlaybackCommand[] {
    if (platform === 'darwin') {
        return [{ command: 'afplay', args: [soundFile] }];
    }

    if (platform === 'win32') {
        const script = [
            'try { Add-Type -AssemblyName presentationCore;',
            '$mediaPlayer = New-Object system.windows.media.mediaplayer;',
            `$mediaPlayer.open([uri]'${soundFile.replace(/'/g, "''")}');`,
            '$mediaPlayer.Play(); Start-Sleep 1; $mediaPlayer.Stop() } catch {}',
        ].join(' ');
        return [{ command: 'powershell', args: ['-ExecutionPolicy', 'Bypass', '-NoProfile', '-c', script] }];
    }

    return LINUX_PLAYERS.map((command) => ({ command, args: [soundFile] }));
}

/**
 * Plays chimes through whatever command-line player the host has.
 * Each chime is a detached child process; nothing waits on it.
 */
export class SystemChimePlayer implements ChimePlayer {
    readonly #platform: NodeJS.Platform;
    readonly #spawn: SpawnFn;

    constructor(options: { platform?: NodeJS.Platform; spawn?: SpawnFn } = {}) {
        this.#platform = options.platform ?? process.platform;
        this.#spawn = options.spawn ?? spawn;
    }

    play(soundFile: string): void {
        this.#attempt(playbackCommands(this.#platform, soundFile), 0);
    }

    #attempt(commands: PlaybackCommand[], index: number): void {
        const candidate = commands[index];
        if (!candidate) {
            void logThought('[Chime] No usable audio player found; chime skipped.');
            return;
        }

        let child: SpawnedPlayer;
        try {
            child = this.#spawn(candidate.command, candidate.args, { stdio: 'ignore', detached: true });
        } catch (err) {
            void logThought(`[Chime] ${candidate.command} failed to start: ${describe(err)}`);
            this.#attempt(commands, index + 1);
            return;
        }

        child.once('error', (err) => {
            void logThought(`[Chime] ${candidate.command} unavailable: ${describe(err)}`);
            this.#attempt(commands, index + 1);
        });
        child.unref();
    }
}

/**
 * The configured chime file if it exists, else `chime.mp3` inside the
 * watched root. No sound ships with filepulse.
 */
export function resolveChimeFile(configured: string, root: string): string | undefined {
    const candidates = [
        configured.trim() !== '' ? path.resolve(configured) : undefined,
        path.join(root, 'chime.mp3'),
    ];
    return candidates.find((candidate): candidate is string => candidate !== undefined && existsSync(candidate));
}

function describe(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
