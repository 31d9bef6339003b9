import { DateTime } from "luxon";
import path from "path";

import { BackupRun } from "./BackupRun";
import { errorMessage, stepFailure } from "./Errors";
import { ProcessHandler, Shell } from "./Shell";
import { getLogger } from "./util/Log";

const logger = getLogger();

export const ARCHIVE_CREATE_STEP = "Archive creation";
export const ARCHIVE_PRUNE_STEP = "Archive pruning";
export const ARCHIVE_COMPACT_STEP = "Repository compaction";

export const ARCHIVE_PREFIX = "immich-";

export const EXCLUDED_LIBRARY_DIRECTORIES = [ "thumbs", "encoded-video" ];

export interface RetentionPolicy {
    readonly keepDaily: number;
    readonly keepWeekly: number;
    readonly keepMonthly: number;
}

export interface BorgRepositoryConfiguration {
    readonly shell: Shell;
    readonly repositoryPath: string;
    readonly libraryPath: string;
    readonly dumpDirectory: string;
    readonly retention: RetentionPolicy;
}

export function archiveName(date: DateTime): string {
    return `${ARCHIVE_PREFIX}${ date.toFormat("yyyy-MM-dd'T'HH:mm:ss") }`;
}

// `--keep-last=1` keeps the archive just created whatever the configured windows.
export function retentionArguments(policy: RetentionPolicy): string[] {
    const args = [ "--keep-last=1" ];
    if(policy.keepDaily > 0) {
        args.push(`--keep-daily=${policy.keepDaily}`);
    }
    if(policy.keepWeekly > 0) {
        args.push(`--keep-weekly=${policy.keepWeekly}`);
    }
    if(policy.keepMonthly > 0) {
        args.push(`--keep-monthly=${policy.keepMonthly}`);
    }
    return args;
}

function isInside(directory: string, parent: string): boolean {
    const relative = path.relative(parent, directory);
    return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

export class BorgRepository {

    constructor(configuration: BorgRepositoryConfiguration) {
        this.configuration = configuration;
    }

    private readonly configuration: BorgRepositoryConfiguration;

    createArguments(name: string): string[] {
        const { repositoryPath, libraryPath, dumpDirectory } = this.configuration;
        const sources = isInside(dumpDirectory, libraryPath) ? [ libraryPath ] : [ libraryPath, dumpDirectory ];
        const excludes = EXCLUDED_LIBRARY_DIRECTORIES.flatMap(directory => [ "--exclude", path.join(libraryPath, directory) ]);
        return [
            "create",
            "--stats",
            ...excludes,
            `${repositoryPath}::${name}`,
            ...sources,
        ];
    }

    pruneArguments(): string[] {
        return [
            "prune",
            "--list",
            ...retentionArguments(this.configuration.retention),
            this.configuration.repositoryPath,
        ];
    }

    compactArguments(): string[] {
        return [ "compact", this.configuration.repositoryPath ];
    }

    async create(run: BackupRun): Promise<string> {
        const name = archiveName(run.startedAt);
        logger.info(`Creating Borg archive ${name}`);
        await this.borg(ARCHIVE_CREATE_STEP, this.createArguments(name));
        return name;
    }

    async prune(): Promise<void> {
        const { keepDaily, keepWeekly, keepMonthly } = this.configuration.retention;
        logger.info(`Pruning old archives (keep daily=${keepDaily}, weekly=${keepWeekly}, monthly=${keepMonthly})`);
        await this.borg(ARCHIVE_PRUNE_STEP, this.pruneArguments());
    }

    async compact(): Promise<void> {
        logger.info("Compacting repository");
        await this.borg(ARCHIVE_COMPACT_STEP, this.compactArguments());
    }

    private async borg(step: string, args: string[]) {
        try {
            await this.configuration.shell.spawn("borg", args, new BorgProcessHandler());
        } catch(e) {
            logger.error(`${step} failed: ${errorMessage(e)}`);
            throw stepFailure(step, e);
        }
    }
}

// Borg writes its statistics and listings to stderr.
class BorgProcessHandler extends ProcessHandler {

    async onStdOut(data: Buffer) {
        this.log(data);
    }

    async onStdErr(data: Buffer) {
        this.log(data);
    }

    private log(data: Buffer) {
        for(const line of data.toString("utf-8").split("\n")) {
            if(line.trim()) {
                logger.info(`borg: ${line.trimEnd()}`);
            }
        }
    }
}
