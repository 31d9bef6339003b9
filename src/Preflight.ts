import { BackupConfiguration } from "./Config";
import { errorMessage, PreflightError } from "./Errors";
import { FileManager } from "./FileManager";
import { Shell } from "./Shell";
import { getLogger } from "./util/Log";

const logger = getLogger();

export const REQUIRED_TOOLS = [ "docker", "borg" ];

export interface PreflightConfiguration {
    readonly configuration: BackupConfiguration;
    readonly shell: Shell;
    readonly fileManager: FileManager;
}

/**
 * Checks run before any side effect on Immich or the repository. Each failure is a
 * {@link PreflightError}, which exits with code 1.
 */
export class Preflight {

    constructor(configuration: PreflightConfiguration) {
        this.configuration = configuration;
    }

    private readonly configuration: PreflightConfiguration;

    async check(): Promise<void> {
        const { configuration, fileManager, shell } = this.configuration;

        if(!await fileManager.directoryExists(configuration.backupPath)) {
            throw this.failure(`Backup path '${configuration.backupPath}' not found or not mounted`);
        }

        if(!await fileManager.directoryExists(configuration.libraryPath)) {
            throw this.failure(`Library path '${configuration.libraryPath}' not found`);
        }

        if(configuration.layout === "root") {
            for(const directory of [ configuration.dumpDirectory, configuration.repositoryPath ]) {
                try {
                    await fileManager.ensureDirectory(directory);
                } catch(e) {
                    throw this.failure(`Cannot create directory '${directory}': ${errorMessage(e)}`);
                }
            }
        } else if(!await fileManager.directoryExists(configuration.dumpDirectory)) {
            throw this.failure(`Dump directory '${configuration.dumpDirectory}' not found`);
        }

        for(const tool of REQUIRED_TOOLS) {
            if(!await shell.commandExists(tool)) {
                throw this.failure(`${tool} not found in PATH`);
            }
        }
    }

    private failure(message: string): PreflightError {
        logger.error(message);
        return new PreflightError(message);
    }
}
