import { DateTime } from "luxon";

import { BackupConfiguration } from "./Config";
import { getLogger } from "./util/Log";

const logger = getLogger();

export type RunState =
    "INIT"
    | "PREFLIGHT_OK"
    | "MAINTENANCE_ON"
    | "DUMPED"
    | "ARCHIVED"
    | "PRUNED"
    | "COMPACTED"
    | "CLEANED_UP"
    | "DONE"
    | "FAILED";

export type MaintenanceState = "Off" | "Enabling" | "On" | "Disabling";

export type RunOutcome = { status: "success" } | { status: "failed", exitCode: number };

const NEXT_STATE: Partial<Record<RunState, RunState>> = {
    INIT: "PREFLIGHT_OK",
    PREFLIGHT_OK: "MAINTENANCE_ON",
    MAINTENANCE_ON: "DUMPED",
    DUMPED: "ARCHIVED",
    ARCHIVED: "PRUNED",
    PRUNED: "COMPACTED",
    COMPACTED: "CLEANED_UP",
    CLEANED_UP: "DONE",
};

/**
 * One execution of the backup. Holds everything the failure path needs to
 * know to unwind: maintenance state and the dump file written so far.
 */
export class BackupRun {

    constructor(startedAt: DateTime, configuration: BackupConfiguration) {
        this.startedAt = startedAt;
        this.configuration = configuration;
    }

    readonly startedAt: DateTime;
    readonly configuration: BackupConfiguration;
    readonly history: RunState[] = [ "INIT" ];
    maintenance: MaintenanceState = "Off";
    dumpFile?: string;
    private _outcome?: RunOutcome;

    get state(): RunState {
        return this.history[this.history.length - 1];
    }

    get outcome(): RunOutcome | undefined {
        return this._outcome;
    }

    get exitCode(): number {
        if(this._outcome === undefined) {
            throw new Error("Run has not terminated yet");
        }
        return this._outcome.status === "success" ? 0 : this._outcome.exitCode;
    }

    advance(next: RunState) {
        const expected = NEXT_STATE[this.state];
        if(next !== expected) {
            throw new Error(`Illegal transition ${this.state} -> ${next}`);
        }
        logger.debug(`Run state: ${this.state} -> ${next}`);
        this.history.push(next);
        if(next === "DONE") {
            this._outcome = { status: "success" };
        }
    }

    /**
     * Moves to FAILED. Only the first failure is recorded, later ones never override its exit code.
     */
    fail(exitCode: number) {
        if(this.state === "FAILED" || this.state === "DONE") {
            return;
        }
        logger.debug(`Run state: ${this.state} -> FAILED`);
        this.history.push("FAILED");
        this._outcome = { status: "failed", exitCode };
    }
}
