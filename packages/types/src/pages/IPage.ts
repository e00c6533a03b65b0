import type { IPhoto } from './IPhoto.js';
import type { ITimelineEvent } from './ITimelineEvent.js';

export type PageTheme = 'classic' | 'romantic' | 'minimal' | 'dark';

export type PageFontStyle = 'serif' | 'sans' | 'script' | 'mono';

export type PageFontSize = 'small' | 'medium' | 'large';

export type PageAspectRatio = 'square' | 'story';

/**
 * Identifiers of the page sections whose order the tenant controls.
 */
export type PageSection = 'message' | 'gallery' | 'music' | 'timeline';

/**
 * Editable presentation fields of a page.
 *
 * Shared by the persisted record, the creation input and the scalar part of an
 * edit request.
 */
export interface IPageFields {
    title: string;
    message: string;
    backgroundColor: string;
    theme: PageTheme;
    fontStyle: PageFontStyle;
    fontColor: string;
    titleColor: string;
    fontSize: PageFontSize;
    aspectRatio: PageAspectRatio;
    galleryTitle: string;

    /**
     * Duplicate-free subset of the known sections, in display order.
     */
    layoutOrder: PageSection[];
}

/**
 * A tenant page as held in memory by the services.
 *
 * Includes the credential hash, so it must never be serialized to clients
 * directly. Controllers convert it with `toPublicPage()`.
 */
export interface IPage extends IPageFields {
    _id: string;

    /**
     * Lowercase URL identifier. Unique and immutable after creation.
     */
    slug: string;

    /**
     * Salted scrypt hash of the admin credential.
     */
    credentialHash: string;

    /**
     * Canonical embeddable music link, or null when no player is shown.
     */
    musicUrl: string | null;

    /**
     * Sorted ascending by date after every mutation.
     */
    timeline: ITimelineEvent[];

    createdAt: Date;
    updatedAt: Date;
}

/**
 * A page together with its gallery, sorted by display order.
 */
export interface IPageWithPhotos extends IPage {
    photos: IPhoto[];
}

/**
 * Client-facing page representation. Carries no credential material.
 */
export interface IPublicPage extends IPageFields {
    slug: string;
    musicUrl: string | null;
    timeline: ITimelineEvent[];
    photos: Array<Pick<IPhoto, '_id' | 'assetUrl' | 'displayOrder'>>;
    createdAt: string;
    updatedAt: string;
}
