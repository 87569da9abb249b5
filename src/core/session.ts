import type { FilePulseConfig } from '../config/json-config.js';
import { TerminalDashboard, type TerminalCallbacks } from '../interfaces/tui-dashboard.js';
import { SystemChimePlayer, type ChimePlayer } from '../services/chime-player.js';
import { FileWatcherService } from '../services/file-watcher.js';
import type { DocumentRenderer } from '../types/document.js';
import type { WatchSource } from '../types/file-watcher.js';
import { logThought } from '../utils/logger.js';
import { runControlMenu, type MenuOutcome } from './control-menu.js';
import { Dashboard } from './dashboard.js';
import { createPromptIO, type PromptIO } from './onboarding.js';

export interface SessionOptions {
    root: string;
    chimeEnabled: boolean;
    config: FilePulseConfig;
}

/** Terminal pieces a session runs on; swapped out in tests. */
export interface SessionHost {
    watcher: WatchSource;
    player: ChimePlayer;
    createRenderer(callbacks: TerminalCallbacks): DocumentRenderer & { destroy(): void };
    openPrompt(): PromptIO & { close(): void };
}

export const terminalHost = (): SessionHost => ({
    watcher: new FileWatcherService(),
    player: new SystemChimePlayer(),
    createRenderer: (callbacks) => new TerminalDashboard(callbacks),
    openPrompt: () => createPromptIO(),
});

/**
 * Drive one monitoring session: live dashboard until Ctrl+C, then the
 * control menu, round and round until the user exits.
 */
export async function runSession(options: SessionOptions, host: SessionHost = terminalHost()): Promise<void> {
    const dashboard = new Dashboard({
        watcher: host.watcher,
        player: host.player,
        config: options.config,
        chimeEnabled: options.chimeEnabled,
    });

    await dashboard.start(options.root);

    try {
        for (;;) {
            await runLive(dashboard, host);
            dashboard.suspend();

            const io = host.openPrompt();
            let outcome: MenuOutcome;
            try {
                outcome = await runControlMenu(dashboard, io);
            } finally {
                io.close();
            }

            if (outcome === 'exit') break;
            dashboard.resume();
        }
    } finally {
        await dashboard.stop();
    }
}

/** Show the dashboard until the user interrupts. */
function runLive(dashboard: Dashboard, host: SessionHost): Promise<void> {
    return new Promise((resolve) => {
        const redraw = () => {
            dashboard.renderFrame().catch((err: unknown) =>
                logThought(`[Session] Frame failed: ${err instanceof Error ? err.message : String(err)}`));
        };

        const renderer = host.createRenderer({
            onNavigate: (command) => {
                dashboard.navigate(command);
                redraw();
            },
            onDigits: (buffer) => {
                dashboard.setDigitBuffer(buffer);
                redraw();
            },
            onInterrupt: () => {
                dashboard.attachRenderer(null);
                renderer.destroy();
                resolve();
            },
        });

        dashboard.attachRenderer(renderer);
        redraw();
    });
}
