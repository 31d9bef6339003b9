import { mkdir, readFile, rm } from "fs/promises";
import { DateTime } from "luxon";
import os from "os";
import path from "path";

import { BackupRun } from "../src/BackupRun";
import { loadConfiguration } from "../src/Config";
import { DatabaseDump, dumpFileName } from "../src/DatabaseDump";
import { BackupStepError } from "../src/Errors";
import { FakeShell } from "./FakeShell";

const dumpDirectory = path.join(os.tmpdir(), "immich-backup-dump-test");
const versions = { application: "v1.132.3", database: "14.17" };

let shell: FakeShell;
let dump: DatabaseDump;
let run: BackupRun;

describe("DatabaseDump", () => {

    beforeEach(async () => {
        await rm(dumpDirectory, { force: true, recursive: true });
        await mkdir(dumpDirectory, { recursive: true });
        shell = new FakeShell();
        dump = new DatabaseDump({ shell, container: "immich_postgres", user: "postgres", dumpDirectory });
        run = new BackupRun(DateTime.fromISO("2026-10-19T03:00:00"), loadConfiguration({
            UPLOAD_LOCATION: "/srv/immich/library",
            DB_DATA_DIR: "/srv/immich/postgres",
            BACKUP_PATH: "/mnt/nas/immich",
            POSTGRES_CONTAINER: "immich_postgres",
            DB_USER: "postgres",
        }));
    });

    afterAll(async () => {
        await rm(dumpDirectory, { force: true, recursive: true });
    });

    it("names dump after versions", () => {
        expect(dumpFileName(versions)).toBe("immich-v1.132.3-postgres-14.17.sql");
    });

    it("names dump with placeholders", () => {
        expect(dumpFileName({ application: "", database: "" })).toBe("immich-unknown-postgres-unknown.sql");
    });

    it("writes pg_dumpall output to dump file", async () => {
        shell.on([ "docker", "exec", "immich_postgres", "pg_dumpall" ], { stdout: "CREATE ROLE postgres;\n" });

        await dump.trigger(run, versions);

        const dumpFile = path.join(dumpDirectory, "immich-v1.132.3-postgres-14.17.sql");
        expect(run.dumpFile).toBe(dumpFile);
        expect(await readFile(dumpFile, "utf-8")).toBe("CREATE ROLE postgres;\n");
        expect(shell.invocations).toEqual([{
            kind: "spawn",
            command: "docker",
            args: [ "exec", "immich_postgres", "pg_dumpall", "--clean", "--if-exists", "--username=postgres" ],
        }]);
    });

    it("fails with dump exit code and keeps track of partial file", async () => {
        shell.on([ "docker", "exec", "immich_postgres", "pg_dumpall" ], { stdout: "partial", exitCode: 2 });

        let error: unknown;
        try {
            await dump.trigger(run, versions);
        } catch(e) {
            error = e;
        }

        expect(error).toBeInstanceOf(BackupStepError);
        expect(error).toMatchObject({ exitCode: 2, step: "Database dump" });
        expect(run.dumpFile).toBe(path.join(dumpDirectory, "immich-v1.132.3-postgres-14.17.sql"));
    });

    it("fails when dump directory is missing", async () => {
        await rm(dumpDirectory, { force: true, recursive: true });

        await expect(dump.trigger(run, versions)).rejects.toMatchObject({ exitCode: 1, step: "Database dump" });
        expect(shell.invocations).toHaveLength(0);
    });
});
