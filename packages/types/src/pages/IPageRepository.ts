import type { IPage, IPageFields, IPageWithPhotos } from './IPage.js';
import type { IPhoto } from './IPhoto.js';
import type { IPhotoOrderUpdate } from './IPageEditRequest.js';

/**
 * Fields accepted when a page is created. Presentation fields not given fall
 * back to the page defaults.
 */
export interface IPageCreateInput extends Partial<IPageFields> {
    credentialHash: string;
}

/**
 * A new photo to persist as part of a save.
 */
export interface INewPhoto {
    assetUrl: string;
    displayOrder: number;
}

/**
 * Everything a save transaction writes, in one call.
 */
export interface IPageChangeSet {
    /**
     * Page with its new scalar fields and timeline. Identified by `_id`.
     */
    page: IPage;
    photoOrders: IPhotoOrderUpdate[];
    newPhotos: INewPhoto[];
}

/**
 * Persistence contract for pages and their galleries.
 */
export interface IPageRepository {
    /**
     * Look up a page by slug after trimming and lowercasing it.
     *
     * @returns The page with its photos sorted by display order, or null
     */
    findBySlug(slug: string): Promise<IPageWithPhotos | null>;

    /**
     * Create a page.
     *
     * @throws DuplicateSlugError if the slug is taken
     */
    create(slug: string, input: IPageCreateInput): Promise<IPage>;

    /**
     * Persist scalar fields, reorders and new photos atomically.
     *
     * Reorders only touch photos owned by the page.
     *
     * @throws NotFoundError if the page no longer exists
     */
    save(changes: IPageChangeSet): Promise<void>;

    /**
     * Delete a photo when it belongs to the given page.
     *
     * @returns False when the photo is missing or owned by another page
     */
    deletePhoto(photoId: string, ownerPageId: string): Promise<boolean>;

    /**
     * Replace the stored credential hash of a page.
     *
     * @returns False when no page has that slug
     */
    replaceCredential(slug: string, credentialHash: string): Promise<boolean>;

    /**
     * @returns Photos of the page sorted by `(displayOrder, _id)`
     */
    listPhotos(pageId: string): Promise<IPhoto[]>;
}
