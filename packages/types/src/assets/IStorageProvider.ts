/**
 * Contract for the asset store that holds gallery files.
 *
 * Implementations can target the remote content store or the local filesystem.
 * The pages module receives one through dependency injection, so switching
 * providers needs no code change.
 */
export interface IStorageProvider {
    /**
     * Upload a file.
     *
     * @param file - File bytes
     * @param filename - Sanitized filename
     * @param mimeType - MIME type of the file (e.g., "image/png")
     * @returns Public URL where the file can be retrieved. Never carries storage credentials.
     *
     * @throws Error if the upload fails
     */
    upload(file: Buffer, filename: string, mimeType: string): Promise<string>;

    /**
     * Check whether the store is reachable.
     */
    checkHealth(): Promise<boolean>;
}
