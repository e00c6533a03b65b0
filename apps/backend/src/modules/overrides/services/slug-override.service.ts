import type { Collection } from 'mongodb';
import type { IDatabaseService, ILogger, SlugOverride } from '@keepsake/types';
import { normalizeSlug } from '../../pages/page.constants.js';

export const OVERRIDES_COLLECTION = 'slug_overrides';

/**
 * Stored form of an override, keyed by slug.
 */
export interface ISlugOverrideDocument {
    _id: string;
    type: SlugOverride['type'];
    redirectTo: string | null;
    message: string | null;
    updatedAt: Date;
}

export type SlugOverrideInput =
    | { type: 'redirect'; redirectTo: string }
    | { type: 'notice'; message: string };

function toOverride(doc: ISlugOverrideDocument): SlugOverride | null {
    if (doc.type === 'redirect' && doc.redirectTo) {
        return { type: 'redirect', slug: doc._id, redirectTo: doc.redirectTo };
    }
    if (doc.type === 'notice' && doc.message) {
        return { type: 'notice', slug: doc._id, message: doc.message };
    }
    return null;
}

/**
 * Routing decisions taken for a slug before the page is resolved.
 *
 * Overrides are independent of pages: a slug can be overridden whether or not
 * a page exists for it.
 */
export class SlugOverrideService {
    private readonly collection: Collection<ISlugOverrideDocument>;

    constructor(database: IDatabaseService, private readonly logger: ILogger) {
        this.collection = database.getCollection<ISlugOverrideDocument>(OVERRIDES_COLLECTION);
    }

    /**
     * @returns The override for a slug, or null when the slug resolves normally
     * @throws Error when the lookup itself fails
     */
    async find(slug: string): Promise<SlugOverride | null> {
        const doc = await this.collection.findOne({ _id: normalizeSlug(slug) });
        return doc ? toOverride(doc) : null;
    }

    async set(slug: string, input: SlugOverrideInput): Promise<SlugOverride> {
        const key = normalizeSlug(slug);
        await this.collection.replaceOne(
            { _id: key },
            {
                type: input.type,
                redirectTo: input.type === 'redirect' ? input.redirectTo : null,
                message: input.type === 'notice' ? input.message : null,
                updatedAt: new Date()
            },
            { upsert: true }
        );
        this.logger.info({ slug: key, type: input.type }, 'Slug override saved');
        return input.type === 'redirect'
            ? { type: 'redirect', slug: key, redirectTo: input.redirectTo }
            : { type: 'notice', slug: key, message: input.message };
    }

    /**
     * @returns False when no override existed
     */
    async remove(slug: string): Promise<boolean> {
        const key = normalizeSlug(slug);
        const result = await this.collection.deleteOne({ _id: key });
        if (result.deletedCount > 0) {
            this.logger.info({ slug: key }, 'Slug override removed');
        }
        return result.deletedCount > 0;
    }
}
