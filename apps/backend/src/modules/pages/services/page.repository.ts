import type { Collection } from 'mongodb';
import { ObjectId } from 'mongodb';
import type {
    IDatabaseService,
    ILogger,
    IPage,
    IPageChangeSet,
    IPageCreateInput,
    IPageRepository,
    IPageWithPhotos,
    IPhoto
} from '@keepsake/types';
import { DuplicateSlugError, NotFoundError } from '../../../lib/errors.js';
import {
    DEFAULT_PAGE_FIELDS,
    PAGES_COLLECTION,
    PHOTOS_COLLECTION,
    mergePageFields,
    normalizeSlug
} from '../page.constants.js';

const OBJECT_ID_HEX = /^[a-f0-9]{24}$/;

/**
 * Generate a document id.
 *
 * Hex ObjectIds sort in creation order within a process, so photos that share
 * a display order keep their upload order.
 */
export function generateDocumentId(): string {
    return new ObjectId().toHexString();
}

function isDuplicateKeyError(error: unknown): boolean {
    return typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;
}

/**
 * MongoDB-backed store for pages and their gallery photos.
 *
 * Slug uniqueness is enforced by a unique index, so two concurrent signups for
 * the same slug cannot both succeed. Photos live in their own collection with
 * a `pageId` back-reference; every photo mutation filters on the owning page.
 */
export class PageRepository implements IPageRepository {
    private readonly pages: Collection<IPage>;
    private readonly photos: Collection<IPhoto>;

    constructor(private readonly database: IDatabaseService, private readonly logger: ILogger) {
        this.pages = database.getCollection<IPage>(PAGES_COLLECTION);
        this.photos = database.getCollection<IPhoto>(PHOTOS_COLLECTION);
    }

    /**
     * Create the indexes the repository depends on. Safe to call on every start.
     */
    async ensureIndexes(): Promise<void> {
        await this.database.createIndex(PAGES_COLLECTION, { slug: 1 }, { unique: true, name: 'pages_slug_unique' });
        await this.database.createIndex(PHOTOS_COLLECTION, { pageId: 1, displayOrder: 1 }, { name: 'photos_page_order' });
    }

    async findBySlug(slug: string): Promise<IPageWithPhotos | null> {
        const page = await this.pages.findOne({ slug: normalizeSlug(slug) });
        if (!page) {
            return null;
        }
        const photos = await this.listPhotos(page._id);
        return { ...page, photos };
    }

    async create(slug: string, input: IPageCreateInput): Promise<IPage> {
        const normalized = normalizeSlug(slug);
        const now = new Date();
        const page: IPage = {
            _id: generateDocumentId(),
            slug: normalized,
            ...mergePageFields(DEFAULT_PAGE_FIELDS, input),
            credentialHash: input.credentialHash,
            musicUrl: null,
            timeline: [],
            createdAt: now,
            updatedAt: now
        };

        try {
            await this.pages.insertOne(page);
        } catch (error) {
            if (isDuplicateKeyError(error)) {
                throw new DuplicateSlugError(normalized);
            }
            throw error;
        }

        this.logger.info({ slug: normalized }, 'Page created');
        return page;
    }

    async save(changes: IPageChangeSet): Promise<void> {
        const { page, photoOrders, newPhotos } = changes;

        await this.database.withTransaction(async session => {
            const result = await this.pages.updateOne(
                { _id: page._id },
                {
                    $set: {
                        title: page.title,
                        message: page.message,
                        backgroundColor: page.backgroundColor,
                        theme: page.theme,
                        fontStyle: page.fontStyle,
                        fontColor: page.fontColor,
                        titleColor: page.titleColor,
                        fontSize: page.fontSize,
                        aspectRatio: page.aspectRatio,
                        galleryTitle: page.galleryTitle,
                        layoutOrder: page.layoutOrder,
                        credentialHash: page.credentialHash,
                        musicUrl: page.musicUrl,
                        timeline: page.timeline,
                        updatedAt: page.updatedAt
                    }
                },
                { session }
            );

            if (result.matchedCount === 0) {
                throw new NotFoundError(`Page "${page.slug}" no longer exists`);
            }

            for (const order of photoOrders) {
                await this.photos.updateOne(
                    { _id: order.photoId, pageId: page._id },
                    { $set: { displayOrder: order.displayOrder } },
                    { session }
                );
            }

            if (newPhotos.length > 0) {
                const uploadedAt = new Date();
                await this.photos.insertMany(
                    newPhotos.map(photo => ({
                        _id: generateDocumentId(),
                        pageId: page._id,
                        assetUrl: photo.assetUrl,
                        displayOrder: photo.displayOrder,
                        uploadedAt
                    })),
                    { session }
                );
            }
        });

        this.logger.debug(
            { slug: page.slug, reordered: photoOrders.length, added: newPhotos.length },
            'Page changes committed'
        );
    }

    async deletePhoto(photoId: string, ownerPageId: string): Promise<boolean> {
        if (!OBJECT_ID_HEX.test(photoId)) {
            return false;
        }
        const result = await this.photos.deleteOne({ _id: photoId, pageId: ownerPageId });
        return result.deletedCount > 0;
    }

    async replaceCredential(slug: string, credentialHash: string): Promise<boolean> {
        const result = await this.pages.updateOne(
            { slug: normalizeSlug(slug) },
            { $set: { credentialHash, updatedAt: new Date() } }
        );
        return result.matchedCount > 0;
    }

    async listPhotos(pageId: string): Promise<IPhoto[]> {
        return this.photos.find({ pageId }).sort({ displayOrder: 1, _id: 1 }).toArray();
    }
}
