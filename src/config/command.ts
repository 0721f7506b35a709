import type { CommandSpec } from '../types/process.js';

export function createCommand(command: string, args: readonly string[] = [], cwd?: string): CommandSpec {
    const trimmed = command.trim();
    if (trimmed.length === 0) {
        throw new Error('Command must be a non-empty string.');
    }
    return Object.freeze({ command: trimmed, args: Object.freeze([...args]), cwd });
}
