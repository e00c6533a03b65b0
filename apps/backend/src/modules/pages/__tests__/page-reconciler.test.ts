/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { IPageEditRequest, IPageWithPhotos, IStorageProvider, IUploadedFile } from '@keepsake/types';
import { PageReconciler, sortTimeline } from '../services/page-reconciler.service.js';
import { PageRepository, generateDocumentId } from '../services/page.repository.js';
import { verifyCredential } from '../services/credential-hasher.js';
import { PHOTOS_COLLECTION } from '../page.constants.js';
import { NotFoundError, PageSaveError } from '../../../lib/errors.js';
import { createMockDatabaseService, type MockDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { createMockLogger } from '../../../tests/vitest/mocks/logger.js';

/**
 * Storage provider whose upload results are scripted per test.
 */
class MockStorageProvider implements IStorageProvider {
    upload = vi.fn(async (_file: Buffer, filename: string) => `https://assets.test/${filename}`);
    checkHealth = vi.fn(async () => true);
}

function editRequest(overrides: Partial<IPageEditRequest> = {}): IPageEditRequest {
    return { fields: {}, uploads: [], photoOrders: [], ...overrides };
}

function imageFile(name: string, size = 4): IUploadedFile {
    return { buffer: Buffer.alloc(size, 1), originalName: name, mimeType: 'image/jpeg', size };
}

describe('PageReconciler', () => {
    let mockDb: MockDatabaseService;
    let repository: PageRepository;
    let storage: MockStorageProvider;
    let reconciler: PageReconciler;

    async function createPage(slug: string): Promise<IPageWithPhotos> {
        await repository.create(slug, { credentialHash: 'hash-1' });
        return loadPage(slug);
    }

    async function loadPage(slug: string): Promise<IPageWithPhotos> {
        const page = await repository.findBySlug(slug);
        if (!page) throw new Error(`missing page ${slug}`);
        return page;
    }

    function seedPhotos(pageId: string, orders: number[]): string[] {
        const ids = orders.map(() => generateDocumentId());
        mockDb.seed(
            PHOTOS_COLLECTION,
            orders.map((displayOrder, index) => ({
                _id: ids[index],
                pageId,
                assetUrl: `/photo-${displayOrder}.jpg`,
                displayOrder,
                uploadedAt: new Date()
            }))
        );
        return ids;
    }

    beforeEach(async () => {
        mockDb = createMockDatabaseService();
        repository = new PageRepository(mockDb, createMockLogger());
        await repository.ensureIndexes();
        storage = new MockStorageProvider();
        reconciler = new PageReconciler(repository, storage, createMockLogger(), { maxUploadBytes: 1024 });
    });

    // ============================================================================
    // Save
    // ============================================================================

    describe('save', () => {
        it('should keep current values for blank fields and apply the rest', async () => {
            const page = await createPage('ana');

            const result = await reconciler.reconcile(page, editRequest({
                fields: { title: '', theme: 'romantic', galleryTitle: 'Our trips' }
            }));

            expect(result).toEqual({
                action: 'saved',
                uploaded: 0,
                failedUploads: [],
                reordered: 0,
                credentialChanged: false,
                timelineEventAdded: false
            });
            const saved = await loadPage('ana');
            expect(saved.title).toBe('Our page');
            expect(saved.theme).toBe('romantic');
            expect(saved.galleryTitle).toBe('Our trips');
        });

        it('should reorder photos by the submitted display orders', async () => {
            const page = await createPage('ana');
            const [p10, p20, p30] = seedPhotos(page._id, [10, 20, 30]);

            const result = await reconciler.reconcile(await loadPage('ana'), editRequest({
                photoOrders: [{ photoId: p20, displayOrder: 5 }]
            }));

            expect(result).toMatchObject({ action: 'saved', reordered: 1 });
            const saved = await loadPage('ana');
            expect(saved.photos.map(photo => photo._id)).toEqual([p20, p10, p30]);
            expect(page.photos).toEqual([]);
        });

        it('should ignore reorders for photos of other pages', async () => {
            await createPage('ana');
            const bia = await createPage('bia');
            const [foreign] = seedPhotos(bia._id, [0]);

            const result = await reconciler.reconcile(await loadPage('ana'), editRequest({
                photoOrders: [{ photoId: foreign, displayOrder: 7 }]
            }));

            expect(result).toMatchObject({ reordered: 0 });
            expect((await loadPage('bia')).photos[0].displayOrder).toBe(0);
        });

        it('should append uploads after the highest display order', async () => {
            const page = await createPage('ana');
            seedPhotos(page._id, [0, 4]);

            await reconciler.reconcile(await loadPage('ana'), editRequest({
                uploads: [imageFile('beach.jpg'), imageFile('party.jpg')]
            }));

            const saved = await loadPage('ana');
            expect(saved.photos.map(photo => photo.displayOrder)).toEqual([0, 4, 5, 6]);
            expect(saved.photos[2].assetUrl).toMatch(/^https:\/\/assets\.test\/[0-9a-f-]{36}-beach\.jpg$/);
        });

        it('should start at zero for a page without photos', async () => {
            const page = await createPage('ana');

            await reconciler.reconcile(page, editRequest({ uploads: [imageFile('first.jpg')] }));

            expect((await loadPage('ana')).photos.map(photo => photo.displayOrder)).toEqual([0]);
        });

        it('should number uploads after applied reorders', async () => {
            const page = await createPage('ana');
            const [photoId] = seedPhotos(page._id, [2]);

            await reconciler.reconcile(await loadPage('ana'), editRequest({
                photoOrders: [{ photoId, displayOrder: 8 }],
                uploads: [imageFile('next.jpg')]
            }));

            expect((await loadPage('ana')).photos.map(photo => photo.displayOrder)).toEqual([8, 9]);
        });

        it('should keep successful uploads when one upload fails', async () => {
            const page = await createPage('ana');
            storage.upload
                .mockResolvedValueOnce('https://assets.test/one.jpg')
                .mockRejectedValueOnce(new Error('store offline'))
                .mockResolvedValueOnce('https://assets.test/three.jpg');

            const result = await reconciler.reconcile(page, editRequest({
                fields: { title: 'Still saved' },
                uploads: [imageFile('one.jpg'), imageFile('two.jpg'), imageFile('three.jpg')]
            }));

            expect(result).toMatchObject({ action: 'saved', uploaded: 2, failedUploads: ['two.jpg'] });
            const saved = await loadPage('ana');
            expect(saved.title).toBe('Still saved');
            expect(saved.photos.map(photo => [photo.assetUrl, photo.displayOrder])).toEqual([
                ['https://assets.test/one.jpg', 0],
                ['https://assets.test/three.jpg', 1]
            ]);
        });

        it('should reject non-image, oversized and empty files without uploading them', async () => {
            const page = await createPage('ana');

            const result = await reconciler.reconcile(page, editRequest({
                uploads: [
                    { buffer: Buffer.from('hello'), originalName: 'notes.txt', mimeType: 'text/plain', size: 5 },
                    imageFile('huge.jpg', 2048),
                    imageFile('empty.jpg', 0)
                ]
            }));

            expect(result).toMatchObject({ uploaded: 0, failedUploads: ['notes.txt', 'huge.jpg', 'empty.jpg'] });
            expect(storage.upload).not.toHaveBeenCalled();
        });

        it('should hash a new credential and ignore a blank one', async () => {
            const page = await createPage('ana');

            const blank = await reconciler.reconcile(page, editRequest({ newCredential: '   ' }));
            expect(blank).toMatchObject({ credentialChanged: false });
            expect((await loadPage('ana')).credentialHash).toBe('hash-1');

            const changed = await reconciler.reconcile(await loadPage('ana'), editRequest({ newCredential: ' new-pass ' }));
            expect(changed).toMatchObject({ credentialChanged: true });
            await expect(verifyCredential('new-pass', (await loadPage('ana')).credentialHash)).resolves.toBe(true);
        });

        it('should normalize a music link and clear it on request', async () => {
            const page = await createPage('ana');

            await reconciler.reconcile(page, editRequest({
                musicUrl: 'https://open.spotify.com/track/4uLU6hMCjMI75M1A2tKUQC?si=x'
            }));
            expect((await loadPage('ana')).musicUrl).toBe('https://open.spotify.com/embed/track/4uLU6hMCjMI75M1A2tKUQC');

            await reconciler.reconcile(await loadPage('ana'), editRequest({ musicUrl: '' }));
            expect((await loadPage('ana')).musicUrl).toBe('https://open.spotify.com/embed/track/4uLU6hMCjMI75M1A2tKUQC');

            await reconciler.reconcile(await loadPage('ana'), editRequest({ clearMusic: true }));
            expect((await loadPage('ana')).musicUrl).toBeNull();
        });

        it('should add a timeline event only when date and title are both present', async () => {
            const page = await createPage('ana');

            const partial = await reconciler.reconcile(page, editRequest({
                newTimelineEvent: { date: '2020-02-14', title: '  ' }
            }));
            expect(partial).toMatchObject({ timelineEventAdded: false });

            const added = await reconciler.reconcile(await loadPage('ana'), editRequest({
                newTimelineEvent: { date: '2020-02-14', title: 'First date' }
            }));
            expect(added).toMatchObject({ timelineEventAdded: true });

            const timeline = (await loadPage('ana')).timeline;
            expect(timeline).toHaveLength(1);
            expect(timeline[0]).toMatchObject({ date: '2020-02-14', title: 'First date' });
        });

        it('should keep the timeline sorted by date', async () => {
            const page = await createPage('ana');
            await reconciler.reconcile(page, editRequest({ newTimelineEvent: { date: '2021-06-01', title: 'Moved in' } }));
            await reconciler.reconcile(await loadPage('ana'), editRequest({ newTimelineEvent: { date: '2019-03-10', title: 'Met' } }));
            await reconciler.reconcile(await loadPage('ana'), editRequest({ newTimelineEvent: { date: '2021-06-01', title: 'Adopted a cat' } }));

            expect((await loadPage('ana')).timeline.map(event => event.title)).toEqual(['Met', 'Moved in', 'Adopted a cat']);
        });

        it('should wrap commit failures and report the orphaned assets', async () => {
            const page = await createPage('ana');
            const logger = createMockLogger();
            reconciler = new PageReconciler(repository, storage, logger, { maxUploadBytes: 1024 });
            storage.upload.mockResolvedValueOnce('https://assets.test/orphan.jpg');
            mockDb.injectError(PHOTOS_COLLECTION, 'insertMany', new Error('write conflict'));

            await expect(
                reconciler.reconcile(page, editRequest({ uploads: [imageFile('orphan.jpg')] }))
            ).rejects.toBeInstanceOf(PageSaveError);

            expect(logger.error).toHaveBeenCalledWith(
                expect.objectContaining({ orphanedAssets: ['https://assets.test/orphan.jpg'] }),
                'Page commit failed'
            );
            expect((await loadPage('ana')).photos).toEqual([]);
        });
    });

    // ============================================================================
    // Deletions
    // ============================================================================

    describe('delete markers', () => {
        it('should delete only the marked photo and skip the rest of the request', async () => {
            const page = await createPage('ana');
            const [keep, drop] = seedPhotos(page._id, [0, 1]);

            const result = await reconciler.reconcile(await loadPage('ana'), editRequest({
                deletePhotoId: drop,
                fields: { title: 'Ignored' }
            }));

            expect(result).toEqual({ action: 'photo-deleted', deleted: true });
            const saved = await loadPage('ana');
            expect(saved.photos.map(photo => photo._id)).toEqual([keep]);
            expect(saved.title).toBe('Our page');
        });

        it('should not delete a photo owned by another page', async () => {
            const ana = await createPage('ana');
            const bia = await createPage('bia');
            const [foreign] = seedPhotos(bia._id, [0]);

            const result = await reconciler.reconcile(ana, editRequest({ deletePhotoId: foreign }));

            expect(result).toEqual({ action: 'photo-deleted', deleted: false });
            expect((await loadPage('bia')).photos).toHaveLength(1);
        });

        it('should delete a timeline event by id', async () => {
            const page = await createPage('ana');
            await reconciler.reconcile(page, editRequest({ newTimelineEvent: { date: '2019-03-10', title: 'Met' } }));
            await reconciler.reconcile(await loadPage('ana'), editRequest({ newTimelineEvent: { date: '2021-06-01', title: 'Moved in' } }));
            const [met] = (await loadPage('ana')).timeline;

            const result = await reconciler.reconcile(await loadPage('ana'), editRequest({ deleteTimelineEventId: met.id }));

            expect(result).toEqual({ action: 'timeline-event-deleted', event: met });
            expect((await loadPage('ana')).timeline.map(event => event.title)).toEqual(['Moved in']);
        });

        it('should delete a timeline event by position in the sorted list', async () => {
            const page = await createPage('ana');
            await reconciler.reconcile(page, editRequest({ newTimelineEvent: { date: '2021-06-01', title: 'Moved in' } }));
            await reconciler.reconcile(await loadPage('ana'), editRequest({ newTimelineEvent: { date: '2019-03-10', title: 'Met' } }));

            await reconciler.reconcile(await loadPage('ana'), editRequest({ deleteTimelineIndex: 1 }));

            expect((await loadPage('ana')).timeline.map(event => event.title)).toEqual(['Met']);
        });

        it('should reject an out-of-range timeline position', async () => {
            const page = await createPage('ana');
            await reconciler.reconcile(page, editRequest({ newTimelineEvent: { date: '2021-06-01', title: 'Moved in' } }));

            await expect(
                reconciler.reconcile(await loadPage('ana'), editRequest({ deleteTimelineIndex: 1 }))
            ).rejects.toBeInstanceOf(NotFoundError);
            await expect(
                reconciler.reconcile(await loadPage('ana'), editRequest({ deleteTimelineIndex: -1 }))
            ).rejects.toBeInstanceOf(NotFoundError);
            expect((await loadPage('ana')).timeline).toHaveLength(1);
        });

        it('should reject an unknown timeline event id', async () => {
            const page = await createPage('ana');

            await expect(
                reconciler.reconcile(page, editRequest({ deleteTimelineEventId: 'missing' }))
            ).rejects.toBeInstanceOf(NotFoundError);
        });
    });
});

describe('sortTimeline', () => {
    it('should sort by date and keep insertion order for equal dates', () => {
        const sorted = sortTimeline([
            { id: 'a', date: '2022-01-01', title: 'A' },
            { id: 'b', date: '2020-01-01', title: 'B' },
            { id: 'c', date: '2022-01-01', title: 'C' }
        ]);

        expect(sorted.map(event => event.id)).toEqual(['b', 'a', 'c']);
    });
});
