import { v4 as uuid } from 'uuid';
import type {
    ILogger,
    INewPhoto,
    IPage,
    IPageChangeSet,
    IPageEditRequest,
    IPageRepository,
    IPageWithPhotos,
    IPhotoOrderUpdate,
    IStorageProvider,
    ITimelineEvent,
    IUploadedFile,
    PageEditResult
} from '@keepsake/types';
import { NotFoundError, PageSaveError } from '../../../lib/errors.js';
import { mergePageFields } from '../page.constants.js';
import { hashCredential } from './credential-hasher.js';
import { normalizeEmbedUrl } from './embed-url.js';
import { buildStoredFilename } from './storage/StorageProvider.js';

export interface PageReconcilerOptions {
    maxUploadBytes: number;
}

/**
 * Sort timeline events ascending by ISO date. Events on the same date keep
 * their relative order.
 */
export function sortTimeline(events: readonly ITimelineEvent[]): ITimelineEvent[] {
    return [...events].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

function toPage(page: IPageWithPhotos): IPage {
    const { photos: _photos, ...rest } = page;
    return rest;
}

/**
 * Merges edit requests into page state and commits them.
 *
 * A request carrying a delete marker only performs that deletion. Any other
 * request is a save: presentation fields, credential, music link, timeline
 * addition, photo reorders and uploads are applied together and committed in
 * one repository call.
 *
 * Uploads go to the asset store before the transaction opens. A file that the
 * store rejects is reported back and does not abort the save.
 */
export class PageReconciler {
    constructor(
        private readonly repository: IPageRepository,
        private readonly storage: IStorageProvider,
        private readonly logger: ILogger,
        private readonly options: PageReconcilerOptions
    ) {}

    async reconcile(page: IPageWithPhotos, request: IPageEditRequest): Promise<PageEditResult> {
        if (request.deletePhotoId !== undefined) {
            const deleted = await this.repository.deletePhoto(request.deletePhotoId, page._id);
            this.logger.info({ slug: page.slug, photoId: request.deletePhotoId, deleted }, 'Photo delete requested');
            return { action: 'photo-deleted', deleted };
        }

        if (request.deleteTimelineEventId !== undefined || request.deleteTimelineIndex !== undefined) {
            return this.deleteTimelineEvent(page, request);
        }

        return this.save(page, request);
    }

    private async deleteTimelineEvent(page: IPageWithPhotos, request: IPageEditRequest): Promise<PageEditResult> {
        const timeline = sortTimeline(page.timeline);
        const index =
            request.deleteTimelineEventId !== undefined
                ? timeline.findIndex(event => event.id === request.deleteTimelineEventId)
                : request.deleteTimelineIndex ?? -1;

        if (!Number.isInteger(index) || index < 0 || index >= timeline.length) {
            throw new NotFoundError('Timeline event not found', {
                eventId: request.deleteTimelineEventId,
                index: request.deleteTimelineIndex
            });
        }

        const [event] = timeline.splice(index, 1);
        await this.commit({
            page: { ...toPage(page), timeline, updatedAt: new Date() },
            photoOrders: [],
            newPhotos: []
        });

        this.logger.info({ slug: page.slug, eventId: event.id }, 'Timeline event deleted');
        return { action: 'timeline-event-deleted', event };
    }

    private async save(page: IPageWithPhotos, request: IPageEditRequest): Promise<PageEditResult> {
        const updated: IPage = {
            ...toPage(page),
            ...mergePageFields(page, request.fields),
            updatedAt: new Date()
        };

        const newCredential = request.newCredential?.trim();
        const credentialChanged = Boolean(newCredential);
        if (newCredential) {
            updated.credentialHash = await hashCredential(newCredential);
        }

        const musicUrl = request.musicUrl?.trim();
        if (request.clearMusic) {
            updated.musicUrl = null;
        } else if (musicUrl) {
            updated.musicUrl = normalizeEmbedUrl(musicUrl);
        }

        const timelineEvent = this.buildTimelineEvent(request);
        if (timelineEvent) {
            updated.timeline = sortTimeline([...page.timeline, timelineEvent]);
        }

        const photoOrders = this.applicableOrders(page, request.photoOrders);
        const { newPhotos, failedUploads } = await this.uploadPhotos(page, photoOrders, request.uploads);

        await this.commit({ page: updated, photoOrders, newPhotos });

        this.logger.info(
            {
                slug: page.slug,
                uploaded: newPhotos.length,
                failedUploads: failedUploads.length,
                reordered: photoOrders.length,
                credentialChanged
            },
            'Page saved'
        );

        return {
            action: 'saved',
            uploaded: newPhotos.length,
            failedUploads,
            reordered: photoOrders.length,
            credentialChanged,
            timelineEventAdded: timelineEvent !== null
        };
    }

    private buildTimelineEvent(request: IPageEditRequest): ITimelineEvent | null {
        const date = request.newTimelineEvent?.date.trim();
        const title = request.newTimelineEvent?.title.trim();
        if (!date || !title) {
            return null;
        }
        return { id: uuid(), date, title };
    }

    /**
     * Keep only reorders that target photos of this page. Stale or foreign ids
     * are dropped without error.
     */
    private applicableOrders(page: IPageWithPhotos, orders: readonly IPhotoOrderUpdate[]): IPhotoOrderUpdate[] {
        const ownIds = new Set(page.photos.map(photo => photo._id));
        return orders.filter(order => ownIds.has(order.photoId) && Number.isInteger(order.displayOrder));
    }

    private async uploadPhotos(
        page: IPageWithPhotos,
        photoOrders: readonly IPhotoOrderUpdate[],
        uploads: readonly IUploadedFile[]
    ): Promise<{ newPhotos: INewPhoto[]; failedUploads: string[] }> {
        const orderById = new Map(page.photos.map(photo => [photo._id, photo.displayOrder]));
        for (const order of photoOrders) {
            orderById.set(order.photoId, order.displayOrder);
        }

        let nextOrder = orderById.size > 0 ? Math.max(...orderById.values()) + 1 : 0;
        const newPhotos: INewPhoto[] = [];
        const failedUploads: string[] = [];

        for (const file of uploads) {
            const rejection = this.rejectionReason(file);
            if (rejection) {
                this.logger.warn({ slug: page.slug, file: file.originalName, reason: rejection }, 'Upload rejected');
                failedUploads.push(file.originalName);
                continue;
            }

            try {
                const assetUrl = await this.storage.upload(file.buffer, buildStoredFilename(file.originalName), file.mimeType);
                newPhotos.push({ assetUrl, displayOrder: nextOrder });
                nextOrder++;
            } catch (error) {
                this.logger.warn({ slug: page.slug, file: file.originalName, error }, 'Asset upload failed');
                failedUploads.push(file.originalName);
            }
        }

        return { newPhotos, failedUploads };
    }

    private rejectionReason(file: IUploadedFile): string | null {
        if (!file.mimeType.startsWith('image/')) {
            return 'not an image';
        }
        if (file.size > this.options.maxUploadBytes) {
            return 'too large';
        }
        if (file.size === 0) {
            return 'empty';
        }
        return null;
    }

    private async commit(changes: IPageChangeSet): Promise<void> {
        try {
            await this.repository.save(changes);
        } catch (error) {
            if (error instanceof NotFoundError) {
                throw error;
            }
            this.logger.error(
                { slug: changes.page.slug, error, orphanedAssets: changes.newPhotos.map(photo => photo.assetUrl) },
                'Page commit failed'
            );
            throw new PageSaveError();
        }
    }
}
