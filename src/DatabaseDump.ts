import { FileHandle, open, stat } from "fs/promises";
import path from "path";

import { BackupRun } from "./BackupRun";
import { errorMessage, stepFailure } from "./Errors";
import { ProcessHandler, Shell } from "./Shell";
import { getLogger } from "./util/Log";
import { ResolvedVersions, versionForFileName } from "./VersionResolver";

const logger = getLogger();

export const DATABASE_DUMP_STEP = "Database dump";

export interface DatabaseDumpConfiguration {
    readonly shell: Shell;
    readonly container: string;
    readonly user: string;
    readonly dumpDirectory: string;
}

export function dumpFileName(versions: ResolvedVersions): string {
    return `immich-${ versionForFileName(versions.application) }-postgres-${ versionForFileName(versions.database) }.sql`;
}

export class DatabaseDump {

    constructor(configuration: DatabaseDumpConfiguration) {
        this.configuration = configuration;
    }

    private readonly configuration: DatabaseDumpConfiguration;

    dumpFilePath(versions: ResolvedVersions): string {
        return path.join(this.configuration.dumpDirectory, dumpFileName(versions));
    }

    /**
     * Runs `pg_dumpall` in the database container and writes its output to the dump file.
     * The file path is recorded on the run before anything is written so that a failure
     * can always clean it up.
     */
    async trigger(run: BackupRun, versions: ResolvedVersions): Promise<void> {
        const { container, user, shell } = this.configuration;
        const dumpFile = this.dumpFilePath(versions);
        logger.info(`Dumping Postgres from container '${container}' to '${dumpFile}'`);

        run.dumpFile = dumpFile;
        let file: FileHandle;
        try {
            file = await open(dumpFile, 'w');
        } catch(e) {
            logger.error(`Cannot open dump file ${dumpFile}: ${errorMessage(e)}`);
            throw stepFailure(DATABASE_DUMP_STEP, e);
        }

        try {
            const parameters = [
                "exec", container,
                "pg_dumpall", "--clean", "--if-exists", `--username=${user}`
            ];
            await shell.spawn("docker", parameters, new PgDumpProcessHandler(file));
        } catch(e) {
            logger.error(`Database dump failed: ${errorMessage(e)}`);
            throw stepFailure(DATABASE_DUMP_STEP, e);
        } finally {
            await file.close();
        }

        const fileStat = await stat(dumpFile);
        logger.info(`Dump file is ${fileStat.size} bytes large.`);
    }
}

class PgDumpProcessHandler extends ProcessHandler {

    constructor(file: FileHandle) {
        super();
        this.file = file;
    }

    private file: FileHandle;

    async onStdOut(data: Buffer) {
        await this.file.write(data);
    }

    async onStdErr(data: Buffer) {
        logger.warn(data.toString("utf-8").trim());
    }
}
