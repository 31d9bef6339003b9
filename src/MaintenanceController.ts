import { BackupRun } from "./BackupRun";
import { errorMessage, stepFailure } from "./Errors";
import { Shell } from "./Shell";
import { getLogger } from "./util/Log";

const logger = getLogger();

export const ENABLE_MAINTENANCE_STEP = "Enable maintenance mode";

export interface MaintenanceControllerConfiguration {
    readonly shell: Shell;
    readonly container: string;
}

/**
 * Toggles Immich's maintenance mode through `immich-admin` in the server container.
 * The state lives on the run so that the failure path knows whether there is something to undo.
 */
export class MaintenanceController {

    constructor(configuration: MaintenanceControllerConfiguration) {
        this.configuration = configuration;
    }

    private readonly configuration: MaintenanceControllerConfiguration;

    async enable(run: BackupRun): Promise<void> {
        const { container } = this.configuration;
        logger.info(`Enabling maintenance mode in container '${container}'`);
        run.maintenance = "Enabling";
        try {
            await this.immichAdmin("enable-maintenance-mode");
        } catch(e) {
            run.maintenance = "Off";
            logger.error(`Failed to enable maintenance mode: ${errorMessage(e)}`);
            throw stepFailure(ENABLE_MAINTENANCE_STEP, e);
        }
        run.maintenance = "On";
        logger.info("Maintenance mode enabled");
    }

    /**
     * Best-effort: never throws. Returns `false` if maintenance mode could not be left,
     * in which case the run still records it as on.
     */
    async disable(run: BackupRun): Promise<boolean> {
        if(run.maintenance !== "On") {
            return true;
        }
        logger.info(`Disabling maintenance mode in container '${this.configuration.container}'`);
        run.maintenance = "Disabling";
        try {
            await this.immichAdmin("disable-maintenance-mode");
        } catch(e) {
            run.maintenance = "On";
            logger.warn(`Failed to disable maintenance mode, Immich may still refuse writes: ${errorMessage(e)}`);
            return false;
        }
        run.maintenance = "Off";
        logger.info("Maintenance mode disabled");
        return true;
    }

    private async immichAdmin(command: string) {
        await this.configuration.shell.exec("docker", [ "exec", this.configuration.container, "immich-admin", command ]);
    }
}
