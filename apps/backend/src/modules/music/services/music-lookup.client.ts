import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { ILogger, IMusicLookupClient, ITrackDescriptor } from '@keepsake/types';
import type { AppConfig } from '../../../config/env.js';
import { createHttpClient } from '../../../lib/http-client.js';
import { buildEmbedUrl } from '../../pages/services/embed-url.js';

export const MAX_SEARCH_LIMIT = 20;

const tokenSchema = z.object({
    access_token: z.string().min(1)
});

const trackSchema = z.object({
    id: z.string(),
    name: z.string(),
    duration_ms: z.number().nullish(),
    preview_url: z.string().nullish(),
    artists: z.array(z.object({ name: z.string() })).default([]),
    album: z
        .object({
            images: z.array(z.object({ url: z.string() })).default([])
        })
        .nullish()
});

const searchSchema = z.object({
    tracks: z.object({
        items: z.array(trackSchema)
    })
});

type Track = z.infer<typeof trackSchema>;

/**
 * Clamp a requested result count to the range the search API accepts.
 */
export function clampLimit(limit: number): number {
    if (!Number.isFinite(limit)) {
        return MAX_SEARCH_LIMIT;
    }
    return Math.min(MAX_SEARCH_LIMIT, Math.max(1, Math.trunc(limit)));
}

function toDescriptor(track: Track): ITrackDescriptor {
    return {
        id: track.id,
        name: track.name,
        artist: track.artists[0]?.name ?? 'Unknown artist',
        imageUrl: track.album?.images[0]?.url ?? null,
        embedUrl: buildEmbedUrl('track', track.id),
        previewUrl: track.preview_url ?? null,
        durationMs: track.duration_ms ?? null
    };
}

/**
 * Track search against the music catalog API.
 *
 * Authenticates with the client-credentials grant on every call; tokens are
 * not cached. Search is an enhancement for the editor, so every failure is
 * logged and answered with an empty list.
 */
export class MusicLookupClient implements IMusicLookupClient {
    private readonly http: AxiosInstance;

    constructor(
        private readonly config: AppConfig['music'],
        private readonly logger: ILogger,
        http?: AxiosInstance
    ) {
        this.http = http ?? createHttpClient({ timeoutMs: 8000 });
    }

    isConfigured(): boolean {
        return Boolean(this.config.clientId && this.config.clientSecret);
    }

    /**
     * Exchange the client credentials for a bearer token.
     *
     * @returns The token, or null when credentials are missing or the exchange fails
     */
    private async fetchToken(): Promise<string | null> {
        const { clientId, clientSecret } = this.config;
        if (!clientId || !clientSecret) {
            return null;
        }

        try {
            const response = await this.http.post<unknown>(
                this.config.tokenUrl,
                new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
                {
                    headers: {
                        Authorization: `Basic ${Buffer.from(`${clientId}:${clientSecret}`).toString('base64')}`,
                        'Content-Type': 'application/x-www-form-urlencoded'
                    }
                }
            );
            const parsed = tokenSchema.safeParse(response.data);
            if (!parsed.success) {
                this.logger.warn('Music token response missing access_token');
                return null;
            }
            return parsed.data.access_token;
        } catch (error) {
            this.logger.warn({ error }, 'Music token request failed');
            return null;
        }
    }

    async search(query: string, limit: number): Promise<ITrackDescriptor[]> {
        const token = await this.fetchToken();
        if (!token) {
            return [];
        }

        try {
            const response = await this.http.get<unknown>(`${this.config.apiBase}/search`, {
                params: {
                    q: query,
                    type: 'track',
                    limit: clampLimit(limit),
                    market: this.config.market
                },
                headers: { Authorization: `Bearer ${token}` }
            });

            const parsed = searchSchema.safeParse(response.data);
            if (!parsed.success) {
                this.logger.warn({ issues: parsed.error.issues.length }, 'Unexpected music search response');
                return [];
            }
            return parsed.data.tracks.items.map(toDescriptor);
        } catch (error) {
            this.logger.warn({ error, query }, 'Music search failed');
            return [];
        }
    }

    async checkConnectivity(): Promise<boolean> {
        return (await this.fetchToken()) !== null;
    }
}
