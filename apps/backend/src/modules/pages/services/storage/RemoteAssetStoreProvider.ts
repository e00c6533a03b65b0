import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { ILogger } from '@keepsake/types';
import { createHttpClient } from '../../../../lib/http-client.js';
import { UpstreamError } from '../../../../lib/errors.js';
import { StorageProvider } from './StorageProvider.js';

const uploadResponseSchema = z.object({
    data: z.object({
        id: z.union([z.string().min(1), z.number()])
    })
});

export interface RemoteAssetStoreOptions {
    /**
     * Base URL of the content store API.
     */
    url: string;

    /**
     * Static bearer token with upload permission. Sent only server side.
     */
    token?: string;

    /**
     * Base for links handed to browsers. Defaults to `url`.
     */
    publicUrl?: string;
}

/**
 * Asset store provider backed by a headless content store's files API.
 *
 * Files are posted as multipart form data to `{url}/files`; the store answers
 * with the new file id and the file is then public at `{publicUrl}/assets/{id}`.
 * The token is never part of a returned URL.
 */
export class RemoteAssetStoreProvider extends StorageProvider {
    private readonly http: AxiosInstance;
    private readonly publicUrl: string;

    constructor(options: RemoteAssetStoreOptions, private readonly logger: ILogger, http?: AxiosInstance) {
        super();
        const baseURL = options.url.replace(/\/+$/, '');
        this.publicUrl = (options.publicUrl ?? baseURL).replace(/\/+$/, '');
        this.http =
            http ??
            createHttpClient({
                baseURL,
                timeoutMs: 30000
            });
        if (options.token) {
            this.http.defaults.headers.common['Authorization'] = `Bearer ${options.token}`;
        }
    }

    async upload(file: Buffer, filename: string, mimeType: string): Promise<string> {
        const form = new FormData();
        form.append('file', new Blob([new Uint8Array(file)], { type: mimeType }), filename);

        const response = await this.http.post<unknown>('/files', form);
        const parsed = uploadResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new UpstreamError('Asset store returned an unexpected upload response', {
                status: response.status
            });
        }

        const url = `${this.publicUrl}/assets/${encodeURIComponent(String(parsed.data.data.id))}`;
        this.logger.debug({ filename, url }, 'Asset uploaded');
        return url;
    }

    /**
     * Ping the store's health endpoint.
     */
    async checkHealth(): Promise<boolean> {
        try {
            const response = await this.http.get('/server/ping', { timeout: 5000 });
            return response.status === 200;
        } catch (error) {
            this.logger.warn({ error }, 'Asset store ping failed');
            return false;
        }
    }
}
