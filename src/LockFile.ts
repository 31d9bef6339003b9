import { errorMessage, isErrnoException, PreflightError } from "./Errors";
import { StateFile } from "./StateFile";
import { getLogger } from "./util/Log";

const logger = getLogger();

// An unreadable lock younger than this may still be in the hands of a starting run.
export const STALE_LOCK_AGE_MS = 60000;

export interface LockOwner {
    readonly pid: number;
    readonly timestamp: number;
}

export function parseLockContent(content: string): LockOwner | undefined {
    const lines = content.split("\n");
    const pid = Number.parseInt(lines[0] ?? "", 10);
    const timestamp = Number.parseInt(lines[1] ?? "", 10);
    if(Number.isNaN(pid) || Number.isNaN(timestamp)) {
        return undefined;
    }
    return { pid, timestamp };
}

export function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch(e) {
        // EPERM: the process exists but belongs to another user
        return isErrnoException(e) && e.code === "EPERM";
    }
}

/**
 * Guards a backup root against concurrent runs. A lock left behind by a dead
 * process, or unreadable for over a minute, is considered stale and taken over.
 */
export class LockFile {

    constructor(path: string, processAlive: (pid: number) => boolean = isProcessAlive) {
        this.file = new StateFile(path);
        this.processAlive = processAlive;
    }

    private readonly file: StateFile;
    private readonly processAlive: (pid: number) => boolean;
    private held = false;
    private content?: string;

    get path(): string {
        return this.file.path;
    }

    get isHeld(): boolean {
        return this.held;
    }

    async acquire(): Promise<void> {
        if(await this.tryCreate()) {
            return;
        }

        const content = await this.file.readFile();
        if(content !== undefined) {
            await this.ensureStale(content);
            logger.warn(`Removing stale lock ${this.path}`);
            if(!await this.file.removeIfUnchanged(content)) {
                throw new PreflightError(`Could not acquire lock ${this.path}`);
            }
        }
        if(!await this.tryCreate() || !await this.ownsLock()) {
            throw new PreflightError(`Could not acquire lock ${this.path}`);
        }
    }

    private async ensureStale(content: string) {
        const owner = parseLockContent(content);
        if(owner !== undefined) {
            if(this.processAlive(owner.pid)) {
                throw new PreflightError(`Another backup is already running (pid ${owner.pid}, lock ${this.path})`);
            }
            return;
        }

        const modifiedAt = await this.file.modifiedAt();
        if(modifiedAt !== undefined && Date.now() - modifiedAt < STALE_LOCK_AGE_MS) {
            throw new PreflightError(`Lock ${this.path} is unreadable and recent, another backup may be starting`);
        }
    }

    private async tryCreate(): Promise<boolean> {
        const content = `${process.pid}\n${Date.now()}`;
        try {
            await this.file.createExclusive(content);
            this.content = content;
            this.held = true;
            return true;
        } catch(e) {
            if(isErrnoException(e) && e.code === "EEXIST") {
                return false;
            }
            throw e;
        }
    }

    private async ownsLock(): Promise<boolean> {
        if(await this.file.readFile() === this.content) {
            return true;
        }
        this.held = false;
        return false;
    }

    async release(): Promise<boolean> {
        if(!this.held) {
            return true;
        }
        try {
            await this.file.remove();
            this.held = false;
            return true;
        } catch(e) {
            logger.warn(`Failed to remove lock ${this.path}: ${errorMessage(e)}`);
            return false;
        }
    }
}
