import type { ITrackDescriptor } from './ITrackDescriptor.js';

/**
 * Best-effort music search used by the page editor.
 *
 * Never touches persisted state and never throws: any failure yields an empty
 * result.
 */
export interface IMusicLookupClient {
    /**
     * @param query - Free-text search
     * @param limit - Maximum number of tracks, clamped by the implementation
     */
    search(query: string, limit: number): Promise<ITrackDescriptor[]>;

    /**
     * @returns True when an access token can currently be obtained
     */
    checkConnectivity(): Promise<boolean>;

    /**
     * @returns False when no service credentials are configured
     */
    isConfigured(): boolean;
}
