import { DateTime } from 'luxon';
import path from 'path';

import { BackupManager } from "./BackupManager";
import { BorgRepository, RetentionPolicy } from './BorgRepository';
import { DatabaseDump } from './DatabaseDump';
import { ConfigurationError } from './Errors';
import { DefaultFileManager, FileManager } from './FileManager';
import { LockFile } from './LockFile';
import { MaintenanceController } from './MaintenanceController';
import { HealthcheckNotifier, Notifier } from './Notifier';
import { Preflight } from './Preflight';
import { DefaultShell, Shell } from './Shell';
import { VersionResolver } from './VersionResolver';

export const DEFAULT_MAINTENANCE_CONTAINER = "immich_server";
export const LOCK_FILE_NAME = ".immich-backup.lock";

/**
 * `ENV_FILE`, or `.env` at the installation root, two levels above the compiled entry point (`dist/src`).
 */
export function envFilePath(env: NodeJS.ProcessEnv, entryDirectory: string): string {
    return env.ENV_FILE || path.resolve(entryDirectory, "..", "..", ".env");
}

/**
 * - `root`: dump and Borg repository live under the backup root, both created when missing.
 * - `library`: dump goes to the library's pre-existing `backups` directory, the backup root is the Borg repository.
 */
export type BackupLayout = "root" | "library";

const BACKUP_LAYOUTS: BackupLayout[] = [ "root", "library" ];

export interface HealthcheckConfiguration {
    readonly url?: string;
    readonly timeoutMs: number;
    readonly retries: number;
}

export interface BackupConfiguration {
    readonly layout: BackupLayout;
    readonly libraryPath: string;
    readonly databaseDataDirectory?: string;
    readonly backupPath: string;
    readonly repositoryPath: string;
    readonly dumpDirectory: string;
    readonly postgresContainer: string;
    readonly databaseUser: string;
    readonly maintenanceContainer: string;
    readonly retention: RetentionPolicy;
    readonly healthcheck: HealthcheckConfiguration;
    readonly lockFile: string;
}

interface RequiredVariable {
    readonly name: string;
    readonly description: string;
}

const UPLOAD_LOCATION: RequiredVariable = { name: "UPLOAD_LOCATION", description: "path to Immich library" };
const DB_DATA_DIR: RequiredVariable = { name: "DB_DATA_DIR", description: "reference path to DB data/config" };
const BACKUP_PATH: RequiredVariable = { name: "BACKUP_PATH", description: "backup root" };
const POSTGRES_CONTAINER: RequiredVariable = { name: "POSTGRES_CONTAINER", description: "Docker container name" };
const DB_USER: RequiredVariable = { name: "DB_USER", description: "Postgres user" };

/**
 * Reads the configuration from environment variables. All problems are collected
 * and reported together in a single {@link ConfigurationError}.
 */
export function loadConfiguration(env: NodeJS.ProcessEnv = process.env): BackupConfiguration {
    const problems: string[] = [];

    const layoutValue = optional(env, "BACKUP_LAYOUT") ?? "root";
    const layout = BACKUP_LAYOUTS.find(candidate => candidate === layoutValue);
    if(layout === undefined) {
        problems.push(`BACKUP_LAYOUT must be one of ${BACKUP_LAYOUTS.join(", ")} (got '${layoutValue}')`);
    }

    const required = (variable: RequiredVariable): string => {
        const value = optional(env, variable.name);
        if(value === undefined) {
            problems.push(`${variable.name} is required (${variable.description})`);
            return "";
        }
        return value;
    };

    const libraryPath = required(UPLOAD_LOCATION);
    const databaseDataDirectory = layout === "library" ? optional(env, DB_DATA_DIR.name) : required(DB_DATA_DIR);
    const backupPath = required(BACKUP_PATH);
    const postgresContainer = required(POSTGRES_CONTAINER);
    const databaseUser = required(DB_USER);

    const nonNegativeInteger = (name: string, defaultValue: number): number => {
        const value = optional(env, name);
        if(value === undefined) {
            return defaultValue;
        }
        if(!/^\d+$/.test(value)) {
            problems.push(`${name} must be a non-negative integer (got '${value}')`);
            return defaultValue;
        }
        return parseInt(value, 10);
    };

    const retention: RetentionPolicy = {
        keepDaily: nonNegativeInteger("BORG_KEEP_DAILY", 0),
        keepWeekly: nonNegativeInteger("BORG_KEEP_WEEKLY", 4),
        keepMonthly: nonNegativeInteger("BORG_KEEP_MONTHLY", 3),
    };
    const timeoutSeconds = nonNegativeInteger("HEALTHCHECK_TIMEOUT_SECONDS", 10);
    if(timeoutSeconds === 0) {
        problems.push("HEALTHCHECK_TIMEOUT_SECONDS must be greater than 0");
    }
    const healthcheck: HealthcheckConfiguration = {
        url: optional(env, "HEALTHCHECK_URL"),
        timeoutMs: timeoutSeconds * 1000,
        retries: nonNegativeInteger("HEALTHCHECK_RETRIES", 2),
    };

    if(layout === undefined || problems.length > 0) {
        throw new ConfigurationError(problems);
    }

    const dumpDirectory = layout === "root" ? path.join(backupPath, "database") : path.join(libraryPath, "backups");
    const repositoryPath = layout === "root" ? path.join(backupPath, "files") : backupPath;
    return {
        layout,
        libraryPath,
        databaseDataDirectory,
        backupPath,
        repositoryPath,
        dumpDirectory,
        postgresContainer,
        databaseUser,
        maintenanceContainer: optional(env, "MAINTENANCE_CONTAINER") ?? DEFAULT_MAINTENANCE_CONTAINER,
        retention,
        healthcheck,
        lockFile: path.join(backupPath, LOCK_FILE_NAME),
    };
}

function optional(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}

export function describeConfiguration(configuration: BackupConfiguration): string[] {
    return [
        `Library path:  ${ configuration.libraryPath }`,
        `DB data dir:   ${ configuration.databaseDataDirectory ?? "-" }   (reference only)`,
        `Backup root:   ${ configuration.backupPath }`,
        `Borg repo:     ${ configuration.repositoryPath }`,
        `DB dump dir:   ${ configuration.dumpDirectory }`,
        `Container:     ${ configuration.postgresContainer }`,
        `Maintenance:   ${ configuration.maintenanceContainer }`,
        `DB user:       ${ configuration.databaseUser }`,
    ];
}

export interface BackupManagerDependencies {
    readonly shell: Shell;
    readonly fileManager: FileManager;
    readonly notifier: Notifier;
    readonly clock?: () => DateTime;
}

export function buildBackupManager(configuration: BackupConfiguration, dependencies: BackupManagerDependencies): BackupManager {
    const { shell, fileManager, notifier, clock } = dependencies;
    return new BackupManager({
        configuration,
        preflight: new Preflight({ configuration, shell, fileManager }),
        lockFile: new LockFile(configuration.lockFile),
        maintenance: new MaintenanceController({ shell, container: configuration.maintenanceContainer }),
        versionResolver: new VersionResolver({
            shell,
            applicationContainer: configuration.maintenanceContainer,
            databaseContainer: configuration.postgresContainer,
        }),
        databaseDump: new DatabaseDump({
            shell,
            container: configuration.postgresContainer,
            user: configuration.databaseUser,
            dumpDirectory: configuration.dumpDirectory,
        }),
        repository: new BorgRepository({
            shell,
            repositoryPath: configuration.repositoryPath,
            libraryPath: configuration.libraryPath,
            dumpDirectory: configuration.dumpDirectory,
            retention: configuration.retention,
        }),
        notifier,
        fileManager,
        clock,
    });
}

export function buildBackupManagerFromConfig(env: NodeJS.ProcessEnv = process.env): BackupManager {
    const configuration = loadConfiguration(env);
    return buildBackupManager(configuration, {
        shell: new DefaultShell(),
        fileManager: new DefaultFileManager(),
        notifier: new HealthcheckNotifier(configuration.healthcheck),
    });
}
