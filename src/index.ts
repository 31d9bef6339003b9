#!/usr/bin/env node
import dotenv from 'dotenv';
import { DateTime } from "luxon";

import type { BackupManager } from './BackupManager';
import { buildBackupManagerFromConfig, envFilePath } from './Config';
import { ConfigurationError, errorMessage, GENERIC_FAILURE_EXIT_CODE } from './Errors';
import { getLogger, setLogLevel } from './util/Log';

const envFile = envFilePath(process.env, __dirname);
const envResult = dotenv.config({ path: envFile });

setLogLevel(process.env.LOG_LEVEL || "info");
main()
    .then(exitCode => {
        process.exitCode = exitCode;
    })
    .catch(e => {
        getLogger().error(`Unexpected error: ${errorMessage(e)}`);
        process.exitCode = GENERIC_FAILURE_EXIT_CODE;
    });

async function main(): Promise<number> {
    const logger = getLogger();
    if(envResult.error) {
        logger.warn(`No .env found at: ${envFile}; proceeding with current env.`);
    }

    let backupManager: BackupManager;
    try {
        backupManager = buildBackupManagerFromConfig();
    } catch(e) {
        if(e instanceof ConfigurationError) {
            for(const problem of e.problems) {
                logger.error(problem);
            }
            return e.exitCode;
        }
        throw e;
    }

    const run = await backupManager.trigger(DateTime.now().set({ millisecond: 0 }));
    return run.exitCode;
}
