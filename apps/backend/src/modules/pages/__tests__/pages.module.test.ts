/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { tmpdir } from 'os';
import type { Express } from 'express';
import { PagesModule } from '../index.js';
import { LocalStorageProvider } from '../services/storage/LocalStorageProvider.js';
import { RemoteAssetStoreProvider } from '../services/storage/RemoteAssetStoreProvider.js';
import { createMockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';
import { createTestConfig } from '../../../tests/vitest/mocks/config.js';

/**
 * Mock Express app for testing.
 */
class MockExpressApp {
    use = vi.fn();
    get = vi.fn();
    post = vi.fn();
}

describe('PagesModule', () => {
    let app: MockExpressApp;
    let uploadDir: string;

    beforeEach(() => {
        app = new MockExpressApp();
        uploadDir = path.join(tmpdir(), `keepsake-module-test-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    });

    afterEach(async () => {
        await fs.rm(uploadDir, { recursive: true, force: true });
    });

    it('should expose metadata', () => {
        const pagesModule = new PagesModule();

        expect(pagesModule.metadata.id).toBe('pages');
    });

    it('should throw when used before init', () => {
        const pagesModule = new PagesModule();

        expect(() => pagesModule.getStorageProvider()).toThrow('PagesModule not initialized - call init() first');
    });

    it('should store uploads on local disk when no asset store is configured', async () => {
        const database = createMockDatabaseService();
        const pagesModule = new PagesModule();

        await pagesModule.init({
            database,
            config: createTestConfig({ LOCAL_UPLOAD_DIR: uploadDir }),
            logger: createMockLogger(),
            app: app as unknown as Express
        });

        expect(pagesModule.getStorageProvider()).toBeInstanceOf(LocalStorageProvider);
        await expect(fs.stat(uploadDir)).resolves.toBeTruthy();
        expect(database.createIndex).toHaveBeenCalledWith('pages', { slug: 1 }, { unique: true, name: 'pages_slug_unique' });
    });

    it('should use the remote asset store when configured', async () => {
        const pagesModule = new PagesModule();

        await pagesModule.init({
            database: createMockDatabaseService(),
            config: createTestConfig({ ASSET_STORE_URL: 'https://assets.test', ASSET_STORE_TOKEN: 'test-token' }),
            logger: createMockLogger(),
            app: app as unknown as Express
        });

        expect(pagesModule.getStorageProvider()).toBeInstanceOf(RemoteAssetStoreProvider);
    });

    it('should not mount anything during init', async () => {
        const pagesModule = new PagesModule();

        await pagesModule.init({
            database: createMockDatabaseService(),
            config: createTestConfig({ LOCAL_UPLOAD_DIR: uploadDir }),
            logger: createMockLogger(),
            app: app as unknown as Express
        });

        expect(app.use).not.toHaveBeenCalled();
    });

    it('should mount the upload, public and admin routers on run', async () => {
        const pagesModule = new PagesModule();
        await pagesModule.init({
            database: createMockDatabaseService(),
            config: createTestConfig({ LOCAL_UPLOAD_DIR: uploadDir }),
            logger: createMockLogger(),
            app: app as unknown as Express
        });

        await pagesModule.run();

        const mountPaths = app.use.mock.calls.map(call => call[0]);
        expect(mountPaths).toEqual(['/uploads', '/api/pages', '/api/admin/pages']);
    });

    it('should not serve /uploads with an injected storage provider', async () => {
        const pagesModule = new PagesModule();
        await pagesModule.init({
            database: createMockDatabaseService(),
            config: createTestConfig(),
            logger: createMockLogger(),
            app: app as unknown as Express,
            storageProvider: { upload: vi.fn(), checkHealth: vi.fn() }
        });

        await pagesModule.run();

        expect(app.use.mock.calls.map(call => call[0])).toEqual(['/api/pages', '/api/admin/pages']);
    });
});
