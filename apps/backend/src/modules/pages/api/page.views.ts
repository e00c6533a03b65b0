import type { IPageWithPhotos, IPublicPage } from '@keepsake/types';

/**
 * Shape a page for clients. The credential hash never leaves the server.
 */
export function toPublicPage(page: IPageWithPhotos): IPublicPage {
    return {
        slug: page.slug,
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
        layoutOrder: [...page.layoutOrder],
        musicUrl: page.musicUrl,
        timeline: page.timeline.map(event => ({ ...event })),
        photos: [...page.photos]
            .sort((a, b) => a.displayOrder - b.displayOrder || (a._id < b._id ? -1 : a._id > b._id ? 1 : 0))
            .map(photo => ({ _id: photo._id, assetUrl: photo.assetUrl, displayOrder: photo.displayOrder })),
        createdAt: page.createdAt.toISOString(),
        updatedAt: page.updatedAt.toISOString()
    };
}
