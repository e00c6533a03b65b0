/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { AxiosInstance } from 'axios';
import { MusicLookupClient, clampLimit } from '../services/music-lookup.client.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import { createTestConfig } from '../../../tests/vitest/mocks/config.js';

function createMockHttp() {
    return {
        post: vi.fn(),
        get: vi.fn()
    };
}

const configuredMusic = createTestConfig({
    MUSIC_CLIENT_ID: 'test-client',
    MUSIC_CLIENT_SECRET: 'test-secret',
    MUSIC_TOKEN_URL: 'https://auth.music.test/token',
    MUSIC_API_BASE: 'https://api.music.test/v1',
    MUSIC_MARKET: 'PT'
}).music;

describe('clampLimit', () => {
    it('should clamp into the accepted range', () => {
        expect(clampLimit(0)).toBe(1);
        expect(clampLimit(-4)).toBe(1);
        expect(clampLimit(7.9)).toBe(7);
        expect(clampLimit(50)).toBe(20);
        expect(clampLimit(Number.NaN)).toBe(20);
    });
});

describe('MusicLookupClient', () => {
    let http: ReturnType<typeof createMockHttp>;
    let client: MusicLookupClient;

    beforeEach(() => {
        http = createMockHttp();
        client = new MusicLookupClient(configuredMusic, createMockLogger(), http as unknown as AxiosInstance);
    });

    it('should report whether credentials are configured', () => {
        const unconfigured = new MusicLookupClient(createTestConfig().music, createMockLogger(), http as unknown as AxiosInstance);

        expect(client.isConfigured()).toBe(true);
        expect(unconfigured.isConfigured()).toBe(false);
    });

    it('should return an empty list without credentials and make no request', async () => {
        const unconfigured = new MusicLookupClient(createTestConfig().music, createMockLogger(), http as unknown as AxiosInstance);

        await expect(unconfigured.search('bossa nova', 5)).resolves.toEqual([]);
        expect(http.post).not.toHaveBeenCalled();
        expect(http.get).not.toHaveBeenCalled();
    });

    it('should authenticate with client credentials and map tracks', async () => {
        http.post.mockResolvedValue({ data: { access_token: 'test-access', token_type: 'Bearer' } });
        http.get.mockResolvedValue({
            data: {
                tracks: {
                    items: [
                        {
                            id: 'track1',
                            name: 'Garota de Ipanema',
                            duration_ms: 320000,
                            preview_url: 'https://preview.test/track1.mp3',
                            artists: [{ name: 'Tom Jobim' }, { name: 'Vinicius' }],
                            album: { images: [{ url: 'https://img.test/large.jpg' }, { url: 'https://img.test/small.jpg' }] }
                        },
                        { id: 'track2', name: 'Untitled', artists: [], album: null }
                    ]
                }
            }
        });

        const results = await client.search('ipanema', 50);

        expect(results).toEqual([
            {
                id: 'track1',
                name: 'Garota de Ipanema',
                artist: 'Tom Jobim',
                imageUrl: 'https://img.test/large.jpg',
                embedUrl: 'https://open.spotify.com/embed/track/track1',
                previewUrl: 'https://preview.test/track1.mp3',
                durationMs: 320000
            },
            {
                id: 'track2',
                name: 'Untitled',
                artist: 'Unknown artist',
                imageUrl: null,
                embedUrl: 'https://open.spotify.com/embed/track/track2',
                previewUrl: null,
                durationMs: null
            }
        ]);
        expect(http.post).toHaveBeenCalledWith('https://auth.music.test/token', 'grant_type=client_credentials', {
            headers: {
                Authorization: `Basic ${Buffer.from('test-client:test-secret').toString('base64')}`,
                'Content-Type': 'application/x-www-form-urlencoded'
            }
        });
        expect(http.get).toHaveBeenCalledWith('https://api.music.test/v1/search', {
            params: { q: 'ipanema', type: 'track', limit: 20, market: 'PT' },
            headers: { Authorization: 'Bearer test-access' }
        });
    });

    it('should return an empty list when the token exchange fails', async () => {
        http.post.mockRejectedValue(new Error('HTTP 401: Unauthorized'));

        await expect(client.search('ipanema', 5)).resolves.toEqual([]);
        expect(http.get).not.toHaveBeenCalled();
    });

    it('should return an empty list when the search fails', async () => {
        http.post.mockResolvedValue({ data: { access_token: 'test-access' } });
        http.get.mockRejectedValue(new Error('HTTP 500: Internal Server Error'));

        await expect(client.search('ipanema', 5)).resolves.toEqual([]);
    });

    it('should return an empty list for an unexpected response shape', async () => {
        http.post.mockResolvedValue({ data: { access_token: 'test-access' } });
        http.get.mockResolvedValue({ data: { artists: { items: [] } } });

        await expect(client.search('ipanema', 5)).resolves.toEqual([]);
    });

    it('should check connectivity through the token endpoint', async () => {
        http.post.mockResolvedValueOnce({ data: { access_token: 'test-access' } }).mockResolvedValueOnce({ data: {} });

        await expect(client.checkConnectivity()).resolves.toBe(true);
        await expect(client.checkConnectivity()).resolves.toBe(false);
    });
});
