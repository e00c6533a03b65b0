/**
 * Page type definitions: page records, gallery photos, timeline events, edit
 * requests and the repository contract.
 */

export type {
    IPage,
    IPageFields,
    IPageWithPhotos,
    IPublicPage,
    PageAspectRatio,
    PageFontSize,
    PageFontStyle,
    PageSection,
    PageTheme
} from './IPage.js';
export type { IPhoto } from './IPhoto.js';
export type { ITimelineEvent } from './ITimelineEvent.js';
export type { IPageEditRequest, IPhotoOrderUpdate, IUploadedFile, PageEditResult } from './IPageEditRequest.js';
export type { IPageChangeSet, IPageCreateInput, IPageRepository, INewPhoto } from './IPageRepository.js';
export type { SlugOverride } from './ISlugOverride.js';
