import { errorMessage } from "./Errors";
import { Shell } from "./Shell";
import { getLogger } from "./util/Log";

const logger = getLogger();

export const VERSION_PLACEHOLDER = "unknown";

export interface ResolvedVersions {
    readonly application: string;
    readonly database: string;
}

/**
 * First dotted version number found in free text, e.g. `14.17` in
 * `postgres (PostgreSQL) 14.17 (Debian 14.17-1.pgdg120+1)`.
 */
export function extractVersion(output: string): string | undefined {
    const match = /\d+(?:\.\d+)+/.exec(output);
    return match?.[0];
}

/**
 * `v1.132.3` for `ghcr.io/immich-app/immich-server:v1.132.3`, `undefined` for untagged images.
 */
export function extractImageTagVersion(image: string): string | undefined {
    const name = image.split("@")[0];
    const lastSlash = name.lastIndexOf("/");
    const colon = name.indexOf(":", lastSlash + 1);
    if(colon === -1) {
        return undefined;
    }
    const match = /v?\d+(?:\.\d+)*/.exec(name.substring(colon + 1));
    return match?.[0];
}

export function versionForFileName(version: string): string {
    const sanitized = version.replace(/[^A-Za-z0-9._-]/g, "");
    return sanitized || VERSION_PLACEHOLDER;
}

export interface VersionResolverConfiguration {
    readonly shell: Shell;
    readonly applicationContainer: string;
    readonly databaseContainer: string;
}

export class VersionResolver {

    constructor(configuration: VersionResolverConfiguration) {
        this.configuration = configuration;
    }

    private readonly configuration: VersionResolverConfiguration;

    async resolve(): Promise<ResolvedVersions> {
        const { applicationContainer, databaseContainer } = this.configuration;
        const application = await this.resolveContainerVersion(applicationContainer, [ "immich-admin", "--version" ]);
        const database = await this.resolveContainerVersion(databaseContainer, [ "postgres", "--version" ]);
        logger.info(`Immich version: ${ application || VERSION_PLACEHOLDER }, PostgreSQL version: ${ database || VERSION_PLACEHOLDER }`);
        return { application, database };
    }

    private async resolveContainerVersion(container: string, versionCommand: string[]): Promise<string> {
        const shell = this.configuration.shell;
        try {
            const { stdout } = await shell.exec("docker", [ "exec", container, ...versionCommand ]);
            const version = extractVersion(stdout);
            if(version !== undefined) {
                return version;
            }
        } catch(e) {
            logger.debug(`Version query in '${container}' failed, trying image tag: ${errorMessage(e)}`);
        }

        try {
            const { stdout } = await shell.exec("docker", [ "inspect", "--format", "{{.Config.Image}}", container ]);
            const version = extractImageTagVersion(stdout.trim());
            if(version !== undefined) {
                return version;
            }
        } catch(e) {
            logger.debug(`Inspecting '${container}' failed: ${errorMessage(e)}`);
        }

        logger.debug(`Could not resolve version of container '${container}'`);
        return "";
    }
}
