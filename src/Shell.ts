import { execFile, spawn } from 'child_process';
import { constants } from 'os';
import { Readable } from 'stream';

export interface ShellExecResult {
    stdout: string;
    stderr: string;
}

export const COMMAND_NOT_FOUND_EXIT_CODE = 127;

export class ShellCommandError extends Error {

    constructor(command: string, exitCode: number, stderr?: string) {
        super(`Command '${command}' exited with code ${exitCode}` + (stderr ? `: ${stderr.trim()}` : ""));
        this.name = "ShellCommandError";
        this.command = command;
        this.exitCode = exitCode;
        this.stderr = stderr;
    }

    readonly command: string;
    readonly exitCode: number;
    readonly stderr?: string;
}

export abstract class ProcessHandler {

    async onStdOut(_data: Buffer) {

    }

    async onStdErr(_data: Buffer) {

    }

    async onClose(_code: number) {

    }
}

export abstract class Shell {

    /**
     * Runs a command to completion and captures its output.
     * Rejects with a {@link ShellCommandError} on a non-zero exit.
     */
    abstract exec(command: string, args: string[]): Promise<ShellExecResult>;

    /**
     * Runs a command, streaming its output to the handler.
     * Rejects with a {@link ShellCommandError} on a non-zero exit.
     */
    abstract spawn(command: string, args: string[], handler: ProcessHandler): Promise<void>;

    abstract commandExists(command: string): Promise<boolean>;
}

export class DefaultShell extends Shell {

    async exec(command: string, args: string[]): Promise<ShellExecResult> {
        return new Promise<ShellExecResult>((resolve, reject) => {
            execFile(command, args, {}, (error, stdout, stderr) => {
                if (error) {
                    const exitCode = typeof error.code === "number" ? error.code
                        : error.signal ? exitCodeOfSignal(error.signal)
                        : exitCodeOfSpawnError(error);
                    reject(new ShellCommandError(commandLine(command, args), exitCode, stderr));
                } else {
                    resolve({
                        stdout,
                        stderr
                    });
                }
            });
        });
    }

    async spawn(command: string, args: string[], handler: ProcessHandler): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const child = spawn(command, args, { stdio: [ 'ignore', 'pipe', 'pipe' ] });
            let handlerError: unknown;
            const handle = async (stream: Readable, callback: () => Promise<void>) => {
                stream.pause();
                try {
                    await callback();
                } catch(e) {
                    handlerError = handlerError ?? e;
                    child.kill();
                } finally {
                    stream.resume();
                }
            };
            child.stdout.on('data', (data: Buffer) => handle(child.stdout, () => handler.onStdOut(data)));
            child.stderr.on('data', (data: Buffer) => handle(child.stderr, () => handler.onStdErr(data)));
            child.on('close', (code, signal) => {
                const exitCode = code ?? exitCodeOfSignal(signal);
                handle(child.stdout, () => handler.onClose(exitCode)).then(() => {
                    if(handlerError !== undefined) {
                        reject(handlerError);
                    } else if(exitCode === 0) {
                        resolve();
                    } else {
                        reject(new ShellCommandError(commandLine(command, args), exitCode));
                    }
                });
            });
            child.on('error', error => reject(new ShellCommandError(commandLine(command, args), exitCodeOfSpawnError(error))));
        });
    }

    async commandExists(command: string): Promise<boolean> {
        try {
            await this.exec("sh", [ "-c", 'command -v "$1"', "sh", command ]);
            return true;
        } catch {
            return false;
        }
    }
}

export function commandLine(command: string, args: string[]): string {
    return [ command, ...args ].join(" ");
}

function exitCodeOfSpawnError(error: Error & { code?: unknown }): number {
    return error.code === "ENOENT" ? COMMAND_NOT_FOUND_EXIT_CODE : 1;
}

function exitCodeOfSignal(signal: NodeJS.Signals | null): number {
    if(signal === null) {
        return 1;
    }
    const signalNumber = Object.entries(constants.signals).find(([ name ]) => name === signal)?.[1];
    return signalNumber === undefined ? 1 : 128 + signalNumber;
}
