import * as crypto from 'crypto';

export interface RunContext {
    runId: string;
    startedAt: string;
    command: string;
}

export function createRunContext(command: string): RunContext {
    return {
        runId: crypto.randomUUID(),
        startedAt: new Date().toISOString(),
        command,
    };
}
