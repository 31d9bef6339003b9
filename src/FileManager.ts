import { mkdir, rm, stat } from "fs/promises";

export abstract class FileManager {

    abstract deleteFile(file: string): Promise<void>;

    abstract fileExists(file: string): Promise<boolean>;

    abstract directoryExists(directory: string): Promise<boolean>;

    abstract ensureDirectory(directory: string): Promise<void>;
}

export class DefaultFileManager extends FileManager {

    async deleteFile(file: string): Promise<void> {
        await rm(file, { force: true });
    }

    async fileExists(file: string): Promise<boolean> {
        try {
            return (await stat(file)).isFile();
        } catch {
            return false;
        }
    }

    async directoryExists(directory: string): Promise<boolean> {
        try {
            return (await stat(directory)).isDirectory();
        } catch {
            return false;
        }
    }

    async ensureDirectory(directory: string): Promise<void> {
        await mkdir(directory, { recursive: true });
    }
}
