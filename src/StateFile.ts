import { FileHandle, link, open, readFile, rename, rm, stat, writeFile } from "fs/promises";

import { isErrnoException } from "./Errors";

export class StateFile {

    constructor(path: string) {
        this.path = path;
    }

    readonly path: string;

    /**
     * Publishes the file with its whole content at once, failing with `EEXIST` if it already exists.
     */
    async createExclusive(content: string) {
        const temporary = `${this.path}.${process.pid}.tmp`;
        await writeFile(temporary, content, { encoding: "utf-8" });
        try {
            await link(temporary, this.path);
        } finally {
            await rm(temporary, { force: true });
        }
    }

    async readFile(): Promise<string | undefined> {
        let file: FileHandle;
        try {
            file = await open(this.path, 'r');
        } catch {
            return undefined;
        }

        try {
            const content = await file.readFile({ encoding: "utf-8" });
            return content.trim();
        } finally {
            await file.close();
        }
    }

    async modifiedAt(): Promise<number | undefined> {
        try {
            return (await stat(this.path)).mtimeMs;
        } catch {
            return undefined;
        }
    }

    /**
     * Removes the file only if it still has the expected content. A file replaced in
     * the meantime is put back and `false` is returned.
     */
    async removeIfUnchanged(expected: string): Promise<boolean> {
        const aside = `${this.path}.${process.pid}.stale`;
        try {
            await rename(this.path, aside);
        } catch(e) {
            if(isErrnoException(e) && e.code === "ENOENT") {
                return false;
            }
            throw e;
        }

        try {
            const content = (await readFile(aside, { encoding: "utf-8" })).trim();
            if(content === expected) {
                return true;
            }
            await this.restore(aside);
            return false;
        } finally {
            await rm(aside, { force: true });
        }
    }

    private async restore(aside: string) {
        try {
            await link(aside, this.path);
        } catch(e) {
            // EEXIST: another run published its lock meanwhile.
            if(!isErrnoException(e) || e.code !== "EEXIST") {
                throw e;
            }
        }
    }

    async remove() {
        await rm(this.path, { force: true });
    }
}
