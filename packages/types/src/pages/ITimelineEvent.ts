/**
 * A dated entry on a page's event timeline.
 *
 * Events are embedded in the page document. Each carries a generated id so edits
 * can address it directly instead of by list position, which shifts whenever
 * another tab adds or removes an event.
 */
export interface ITimelineEvent {
    /**
     * Generated UUID, stable for the lifetime of the event.
     */
    id: string;

    /**
     * Calendar date in ISO form (`YYYY-MM-DD`), so string order is date order.
     */
    date: string;

    title: string;
}
