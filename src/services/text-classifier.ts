import { open } from 'node:fs/promises';
import path from 'node:path';

const TEXT_EXTENSIONS: ReadonlySet<string> = new Set([
    '.txt', '.py', '.js', '.html', '.css', '.json', '.xml', '.md',
    '.yml', '.yaml', '.ini', '.cfg', '.conf', '.log', '.sql', '.sh',
    '.bat', '.ps1', '.c', '.cpp', '.h', '.java', '.cs', '.go', '.rs',
    '.php', '.rb', '.pl', '.r', '.swift', '.kt', '.dart', '.ts', '.jsx',
    '.tsx', '.vue', '.svelte', '.scss', '.sass', '.less', '.styl',
]);

const SNIFF_BYTES = 512;

/**
 * Decide whether a file's content should be tracked for diffs.
 *
 * Known text extensions are accepted without touching the disk. Files with
 * no extension are sniffed: the first 512 bytes must hold no NUL and decode
 * as strict UTF-8. Everything else, including any I/O failure, is rejected.
 */
export async function isTrackable(filePath: string): Promise<boolean> {
    const ext = path.extname(filePath).toLowerCase();
    if (ext !== '') {
        return TEXT_EXTENSIONS.has(ext);
    }

    try {
        const chunk = await readHead(filePath, SNIFF_BYTES);
        return looksLikeText(chunk);
    } catch {
        return false;
    }
}

export function looksLikeText(chunk: Uint8Array): boolean {
    if (chunk.includes(0)) return false;
    try {
        new TextDecoder('utf-8', { fatal: true }).decode(chunk);
        return true;
    } catch {
        return false;
    }
}

async function readHead(filePath: string, size: number): Promise<Buffer> {
    const handle = await open(filePath, 'r');
    try {
        const buffer = Buffer.alloc(size);
        const { bytesRead } = await handle.read(buffer, 0, size, 0);
        return buffer.subarray(0, bytesRead);
    } finally {
        await handle.close();
    }
}
