import type { IPageFields } from './IPage.js';
import type { ITimelineEvent } from './ITimelineEvent.js';

/**
 * A file received with an edit request, held in memory until it is sent to the
 * asset store.
 */
export interface IUploadedFile {
    buffer: Buffer;
    originalName: string;
    mimeType: string;
    size: number;
}

/**
 * A reorder hint from the client's last rendered gallery.
 */
export interface IPhotoOrderUpdate {
    photoId: string;
    displayOrder: number;
}

/**
 * An incoming edit of one page, after form parsing and validation.
 *
 * Absent properties mean "leave unchanged". A request carrying `deletePhotoId`,
 * `deleteTimelineEventId` or `deleteTimelineIndex` is a delete-only request and
 * everything else in it is ignored.
 */
export interface IPageEditRequest {
    fields: Partial<IPageFields>;

    /**
     * Replacement admin credential, in plain text as typed by the tenant.
     */
    newCredential?: string;

    /**
     * Music link as submitted. An empty value leaves the current link in place.
     */
    musicUrl?: string;

    /**
     * Explicitly remove the music player.
     */
    clearMusic?: boolean;

    uploads: IUploadedFile[];
    photoOrders: IPhotoOrderUpdate[];

    deletePhotoId?: string;
    deleteTimelineEventId?: string;

    /**
     * Zero-based position in the current sorted timeline. Kept for forms that
     * predate event ids; prefer `deleteTimelineEventId`.
     */
    deleteTimelineIndex?: number;

    newTimelineEvent?: Omit<ITimelineEvent, 'id'>;
}

/**
 * Outcome of a reconciled edit.
 */
export type PageEditResult =
    | { action: 'photo-deleted'; deleted: boolean }
    | { action: 'timeline-event-deleted'; event: ITimelineEvent }
    | {
          action: 'saved';
          uploaded: number;
          failedUploads: string[];
          reordered: number;
          credentialChanged: boolean;
          timelineEventAdded: boolean;
      };
