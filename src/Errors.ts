import { ShellCommandError } from "./Shell";

export const GENERIC_FAILURE_EXIT_CODE = 1;

export class BackupError extends Error {

    constructor(message: string, exitCode: number, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
        this.exitCode = exitCode > 0 ? exitCode : GENERIC_FAILURE_EXIT_CODE;
    }

    readonly exitCode: number;
}

export class ConfigurationError extends BackupError {

    constructor(readonly problems: string[]) {
        super(problems.join("; "), GENERIC_FAILURE_EXIT_CODE);
    }
}

export class PreflightError extends BackupError {

    constructor(message: string) {
        super(message, GENERIC_FAILURE_EXIT_CODE);
    }
}

/**
 * A primary step (maintenance toggle, dump, archive create/prune/compact) failed.
 * The exit code is the one of the external command that failed.
 */
export class BackupStepError extends BackupError {

    constructor(readonly step: string, exitCode: number, options?: ErrorOptions) {
        super(`${step} failed with exit code ${exitCode}`, exitCode, options);
    }
}

// Structural checks: errors raised by Node's fs do not always pass `instanceof Error` (e.g. under Jest).
export function errorMessage(e: unknown): string {
    if(typeof e === "object" && e !== null && "message" in e && typeof e.message === "string") {
        return e.message;
    }
    return String(e);
}

export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
    return typeof e === "object" && e !== null && "code" in e;
}

export function exitCodeOf(e: unknown): number {
    if(e instanceof BackupError) {
        return e.exitCode;
    }
    return GENERIC_FAILURE_EXIT_CODE;
}

export function stepFailure(step: string, e: unknown): BackupStepError {
    if(e instanceof BackupStepError) {
        return e;
    }
    const exitCode = e instanceof ShellCommandError ? e.exitCode : GENERIC_FAILURE_EXIT_CODE;
    return new BackupStepError(step, exitCode, { cause: e });
}
