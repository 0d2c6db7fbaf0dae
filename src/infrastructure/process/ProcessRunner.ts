// src/infrastructure/process/ProcessRunner.ts

import { spawn } from 'child_process';
import { createInterface } from 'readline';

export type OutputStream = 'stdout' | 'stderr';

export interface RunOptions {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    /** Kill the child after this many milliseconds */
    timeoutMs?: number;
    /** Called for every line the child writes, as it arrives */
    onLine?: (line: string, stream: OutputStream) => void;
}

export interface RunResult {
    exitCode: number | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
}

/**
 * Runs a subprocess to completion. Implementations must not reject on a
 * non-zero exit; only a failure to spawn rejects.
 */
export interface ProcessRunner {
    run(command: string, args: readonly string[], options?: RunOptions): Promise<RunResult>;
}

export class NodeProcessRunner implements ProcessRunner {
    public async run(command: string, args: readonly string[], options: RunOptions = {}): Promise<RunResult> {
        return new Promise((resolve, reject) => {
            const child = spawn(command, [...args], {
                cwd: options.cwd,
                env: options.env ?? process.env,
                stdio: ['ignore', 'pipe', 'pipe'],
            });

            const stdoutLines: string[] = [];
            const stderrLines: string[] = [];
            let timedOut = false;

            const collect = (stream: OutputStream, target: string[]) => (line: string) => {
                target.push(line);
                options.onLine?.(line, stream);
            };
            const stdoutReader = createInterface({ input: child.stdout });
            const stderrReader = createInterface({ input: child.stderr });
            stdoutReader.on('line', collect('stdout', stdoutLines));
            stderrReader.on('line', collect('stderr', stderrLines));

            const timer = options.timeoutMs === undefined ? null : setTimeout(() => {
                timedOut = true;
                child.kill('SIGTERM');
            }, options.timeoutMs);

            child.on('error', (error: Error) => {
                if (timer) clearTimeout(timer);
                reject(error);
            });

            child.on('close', (exitCode: number | null) => {
                if (timer) clearTimeout(timer);
                resolve({
                    exitCode,
                    stdout: stdoutLines.join('\n'),
                    stderr: stderrLines.join('\n'),
                    timedOut,
                });
            });
        });
    }
}
