import path from 'path';
import fs from 'fs/promises';
import { constants } from 'fs';
import { StorageProvider } from './StorageProvider.js';

/**
 * Local filesystem storage provider for development.
 *
 * Stores uploaded files under the base directory organized by date. Files are
 * served by Express static middleware at /uploads/*.
 *
 * Directory structure: {baseDir}/YY/MM/filename.ext
 */
export class LocalStorageProvider extends StorageProvider {
    private readonly baseDir: string;

    /**
     * @param baseDir - Base storage directory (default: {cwd}/public/uploads)
     * @param publicBase - Prefix for returned URLs (default: none, giving root-relative links)
     */
    constructor(baseDir?: string, private readonly publicBase = '') {
        super();
        this.baseDir = baseDir || path.join(process.cwd(), 'public', 'uploads');
    }

    /**
     * Write a file to disk, creating the YY/MM directories as needed.
     *
     * @example
     * const url = await provider.upload(buffer, "my-image.png", "image/png");
     * // Returns: "/uploads/25/10/my-image.png"
     */
    async upload(file: Buffer, filename: string, _mimeType: string): Promise<string> {
        const now = new Date();
        const year = now.getFullYear().toString().slice(-2);
        const month = (now.getMonth() + 1).toString().padStart(2, '0');
        const uploadDir = path.join(this.baseDir, year, month);

        try {
            await fs.mkdir(uploadDir, { recursive: true });
        } catch (error) {
            throw new Error(
                `Failed to create upload directory: ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }

        try {
            await fs.writeFile(path.join(uploadDir, path.basename(filename)), file);
        } catch (error) {
            throw new Error(
                `Failed to write file to disk: ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }

        return `${this.publicBase}/uploads/${year}/${month}/${path.basename(filename)}`;
    }

    /**
     * Healthy when the base directory exists (or can be created) and is writable.
     */
    async checkHealth(): Promise<boolean> {
        try {
            await fs.mkdir(this.baseDir, { recursive: true });
            await fs.access(this.baseDir, constants.W_OK);
            return true;
        } catch {
            return false;
        }
    }
}
