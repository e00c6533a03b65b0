/**
 * A track returned by the music search.
 */
export interface ITrackDescriptor {
    id: string;
    name: string;

    /**
     * Name of the primary artist.
     */
    artist: string;

    /**
     * Album art URL, largest available size.
     */
    imageUrl: string | null;

    /**
     * Canonical embeddable link for the player.
     */
    embedUrl: string;

    previewUrl: string | null;
    durationMs: number | null;
}
