import { v4 as uuid } from 'uuid';
import type { IStorageProvider } from '@keepsake/types';

/**
 * Build the name a file is stored under.
 *
 * The original name is reduced to a safe charset and prefixed with a uuid so
 * two uploads of `IMG_0001.jpg` never collide.
 *
 * @example
 * buildStoredFilename('Our Trip (1).JPG');
 * // '3f0c...-our-trip-1-.jpg'
 */
export function buildStoredFilename(originalName: string): string {
    const safe = originalName
        .toLowerCase()
        .replace(/[^a-z0-9._-]+/g, '-')
        .replace(/^[-.]+/, '')
        .slice(-80);
    return `${uuid()}-${safe || 'upload'}`;
}

/**
 * Abstract base class for asset store providers.
 *
 * The pages module receives a provider through dependency injection and
 * switches between the remote content store and local disk by configuration
 * without code changes.
 */
export abstract class StorageProvider implements IStorageProvider {
    /**
     * Upload a file to storage.
     *
     * @param file - Buffer containing file data
     * @param filename - Sanitized filename to use for storage
     * @param mimeType - MIME type of the file (e.g., "image/png")
     * @returns Public URL where the file can be retrieved
     *
     * @throws Error if upload fails
     */
    abstract upload(file: Buffer, filename: string, mimeType: string): Promise<string>;

    /**
     * Report whether the store can currently accept uploads.
     */
    abstract checkHealth(): Promise<boolean>;
}
