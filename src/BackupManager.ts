import { DateTime } from "luxon";

import { BackupRun } from "./BackupRun";
import { BorgRepository } from "./BorgRepository";
import { BackupConfiguration, describeConfiguration } from "./Config";
import { DatabaseDump } from "./DatabaseDump";
import { BackupError, errorMessage, exitCodeOf } from "./Errors";
import { FileManager } from "./FileManager";
import { LockFile } from "./LockFile";
import { MaintenanceController } from "./MaintenanceController";
import { Notifier } from "./Notifier";
import { Preflight } from "./Preflight";
import { getLogger } from "./util/Log";
import { VersionResolver } from "./VersionResolver";

const logger = getLogger();

export interface BackupManagerConfiguration {
    readonly configuration: BackupConfiguration;
    readonly preflight: Preflight;
    readonly lockFile: LockFile;
    readonly maintenance: MaintenanceController;
    readonly versionResolver: VersionResolver;
    readonly databaseDump: DatabaseDump;
    readonly repository: BorgRepository;
    readonly notifier: Notifier;
    readonly fileManager: FileManager;
    readonly clock?: () => DateTime;
}

/**
 * Drives one backup run through its states:
 *
 * INIT → PREFLIGHT_OK → MAINTENANCE_ON → DUMPED → ARCHIVED → PRUNED → COMPACTED → CLEANED_UP → DONE
 *
 * Any step failure moves the run to FAILED, after which maintenance mode is left (if it was entered),
 * the dump file is removed and the failure is reported. The exit code of the first failure is kept.
 */
export class BackupManager {

    constructor(configuration: BackupManagerConfiguration) {
        this.configuration = configuration;
        this.clock = configuration.clock ?? (() => DateTime.now());
    }

    readonly configuration: BackupManagerConfiguration;
    private readonly clock: () => DateTime;

    async trigger(date: DateTime): Promise<BackupRun> {
        const { notifier, lockFile } = this.configuration;
        const run = new BackupRun(date, this.configuration.configuration);

        logger.info("Starting Immich backup");
        // Result ignored: the backup goes on without monitoring.
        await notifier.started(date);

        try {
            await this.executeSteps(run);
            await this.cleanUp(run);
        } catch(e) {
            await this.handleFailure(run, e);
        } finally {
            await lockFile.release();
        }

        if(run.state === "CLEANED_UP") {
            run.advance("DONE");
            logger.info("Immich backup completed successfully");
            // Result ignored: a missed success ping does not turn the run into a failure.
            await notifier.succeeded(this.clock());
        }
        return run;
    }

    private async executeSteps(run: BackupRun) {
        const { preflight, lockFile, maintenance, versionResolver, databaseDump, repository } = this.configuration;

        await preflight.check();
        await lockFile.acquire();
        run.advance("PREFLIGHT_OK");

        for(const line of describeConfiguration(run.configuration)) {
            logger.info(line);
        }

        await maintenance.enable(run);
        run.advance("MAINTENANCE_ON");

        const versions = await versionResolver.resolve();
        await databaseDump.trigger(run, versions);
        run.advance("DUMPED");

        await repository.create(run);
        run.advance("ARCHIVED");

        await repository.prune();
        run.advance("PRUNED");

        await repository.compact();
        run.advance("COMPACTED");
    }

    private async cleanUp(run: BackupRun) {
        // Both best-effort: failures are logged as warnings and the run still succeeds.
        await this.deleteDumpFile(run);
        await this.configuration.maintenance.disable(run);
        run.advance("CLEANED_UP");
    }

    private async handleFailure(run: BackupRun, error: unknown) {
        const exitCode = exitCodeOf(error);
        if(!(error instanceof BackupError)) {
            logger.error(`Unexpected error: ${errorMessage(error)}`);
            if(error instanceof Error && error.stack) {
                logger.debug(error.stack);
            }
        }
        run.fail(exitCode);

        // Recovery is best-effort, its own failures never replace the original exit code.
        if(run.maintenance === "On") {
            await this.configuration.maintenance.disable(run);
        }
        await this.deleteDumpFile(run);
        await this.configuration.notifier.failed(exitCode, this.clock());

        logger.error(`Backup failed (exit ${exitCode})`);
    }

    private async deleteDumpFile(run: BackupRun): Promise<boolean> {
        const dumpFile = run.dumpFile;
        if(dumpFile === undefined) {
            logger.debug("No dump file to remove");
            return true;
        }
        const fileManager = this.configuration.fileManager;
        try {
            if(await fileManager.fileExists(dumpFile)) {
                await fileManager.deleteFile(dumpFile);
                logger.info(`Removed dump file ${dumpFile}`);
            }
            run.dumpFile = undefined;
            return true;
        } catch(e) {
            logger.warn(`Failed to remove dump file ${dumpFile}: ${errorMessage(e)}`);
            return false;
        }
    }
}
