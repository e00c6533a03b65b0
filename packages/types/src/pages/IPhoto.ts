/**
 * A gallery photo owned by a page.
 *
 * The bytes live in the asset store; this record keeps the public URL and the
 * gallery position. Gallery order is the sort by `(displayOrder, _id)`. Values do
 * not have to be contiguous or unique.
 */
export interface IPhoto {
    _id: string;

    /**
     * Id of the owning page. Every mutating photo operation filters on it.
     */
    pageId: string;

    /**
     * Public URL returned by the asset store.
     */
    assetUrl: string;

    displayOrder: number;

    uploadedAt: Date;
}
