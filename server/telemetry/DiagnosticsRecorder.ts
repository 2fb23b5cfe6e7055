/**
 * DiagnosticsRecorder
 *
 * Bounded per-device history of recent polls, stream messages, commands
 * and command replies. Each list keeps the newest entries only; entries
 * are redacted when recorded. A disabled recorder drops everything.
 *
 * @module server/telemetry/DiagnosticsRecorder
 */

import { redactValue } from '../utils/redact';

export const DIAGNOSTIC_KINDS = ['poll', 'stream', 'command', 'reply'] as const;
export type DiagnosticKind = typeof DIAGNOSTIC_KINDS[number];

export interface DiagnosticEntry {
    at: string;
    data: unknown;
}

export type DiagnosticsSnapshot = Record<DiagnosticKind, DiagnosticEntry[]>;

export const DEFAULT_DIAGNOSTICS_CAPACITY = 20;

export class DiagnosticsRecorder {
    private lists: DiagnosticsSnapshot = { poll: [], stream: [], command: [], reply: [] };

    constructor(
        readonly enabled: boolean,
        private readonly capacity: number = DEFAULT_DIAGNOSTICS_CAPACITY
    ) { }

    record(kind: DiagnosticKind, data: unknown): void {
        if (!this.enabled) return;

        const list = this.lists[kind];
        list.push({ at: new Date().toISOString(), data: redactValue(data) });
        if (list.length > this.capacity) {
            list.splice(0, list.length - this.capacity);
        }
    }

    snapshot(): DiagnosticsSnapshot {
        return {
            poll: [...this.lists.poll],
            stream: [...this.lists.stream],
            command: [...this.lists.command],
            reply: [...this.lists.reply],
        };
    }

    clear(): void {
        for (const kind of DIAGNOSTIC_KINDS) {
            this.lists[kind] = [];
        }
    }
}
