/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { createPageSchema, parseEditRequest } from '../api/pages.schemas.js';
import { ValidationError } from '../../../lib/errors.js';

describe('createPageSchema', () => {
    it('should lowercase the slug and drop a blank title', () => {
        const parsed = createPageSchema.parse({ slug: ' Ana-Bia ', credential: 'ana-pass', title: '  ' });

        expect(parsed).toEqual({ slug: 'ana-bia', credential: 'ana-pass', title: undefined });
    });

    it('should reject slugs with invalid characters', () => {
        expect(createPageSchema.safeParse({ slug: 'ana/bia', credential: 'ana-pass' }).success).toBe(false);
    });

    it('should reject short credentials', () => {
        expect(createPageSchema.safeParse({ slug: 'ana', credential: 'abc' }).success).toBe(false);
    });
});

describe('parseEditRequest', () => {
    it('should treat blank form fields as absent', () => {
        const request = parseEditRequest({ title: '', theme: '', backgroundColor: '', newCredential: '' });

        expect(request.fields.title).toBeUndefined();
        expect(request.fields.theme).toBeUndefined();
        expect(request.fields.backgroundColor).toBeUndefined();
        expect(request.newCredential).toBeUndefined();
        expect(request.clearMusic).toBe(false);
        expect(request.newTimelineEvent).toBeUndefined();
    });

    it('should parse nested photo orders and drop non-integer values', () => {
        const request = parseEditRequest({ photoOrder: { a1: '3', b2: 'x', c3: 1, d4: '2.5', e5: '' } });

        expect(request.photoOrders).toEqual([
            { photoId: 'a1', displayOrder: 3 },
            { photoId: 'c3', displayOrder: 1 }
        ]);
    });

    it('should parse photo orders sent as a JSON string', () => {
        const request = parseEditRequest({ photoOrder: '{"a1":0,"b2":"4"}' });

        expect(request.photoOrders).toEqual([
            { photoId: 'a1', displayOrder: 0 },
            { photoId: 'b2', displayOrder: 4 }
        ]);
    });

    it('should parse the layout order and ignore an empty result', () => {
        expect(parseEditRequest({ layoutOrder: 'timeline,message' }).fields.layoutOrder).toEqual(['timeline', 'message']);
        expect(parseEditRequest({ layoutOrder: 'bogus' }).fields.layoutOrder).toBeUndefined();
    });

    it('should coerce delete markers and the clear-music flag', () => {
        const request = parseEditRequest({ deleteTimelineIndex: '2', clearMusic: 'on', deletePhotoId: ' abc ' });

        expect(request.deleteTimelineIndex).toBe(2);
        expect(request.clearMusic).toBe(true);
        expect(request.deletePhotoId).toBe('abc');
    });

    it('should treat a null or false timeline index as no delete marker', () => {
        const request = parseEditRequest({ title: 'New title', deleteTimelineIndex: null });

        expect(request.deleteTimelineIndex).toBeUndefined();
        expect(request.fields.title).toBe('New title');
        expect(parseEditRequest({ deleteTimelineIndex: false }).deleteTimelineIndex).toBeUndefined();
        expect(parseEditRequest({ deleteTimelineIndex: 0 }).deleteTimelineIndex).toBe(0);
    });

    it('should reject timeline indexes that are not integers', () => {
        expect(() => parseEditRequest({ deleteTimelineIndex: [] })).toThrow(ValidationError);
        expect(() => parseEditRequest({ deleteTimelineIndex: '1.5' })).toThrow(ValidationError);
        expect(() => parseEditRequest({ deleteTimelineIndex: 'two' })).toThrow(ValidationError);
        expect(() => parseEditRequest({ deleteTimelineIndex: true })).toThrow(ValidationError);
    });

    it('should carry a partial timeline event for the reconciler to discard', () => {
        expect(parseEditRequest({ timelineTitle: 'Trip' }).newTimelineEvent).toEqual({ date: '', title: 'Trip' });
    });

    it('should map uploaded files', () => {
        const buffer = Buffer.from('img');
        const request = parseEditRequest({}, [{ buffer, originalname: 'a.png', mimetype: 'image/png', size: 3 }]);

        expect(request.uploads).toEqual([{ buffer, originalName: 'a.png', mimeType: 'image/png', size: 3 }]);
    });

    it('should reject malformed colors and dates', () => {
        expect(() => parseEditRequest({ fontColor: 'red' })).toThrow(ValidationError);
        expect(() => parseEditRequest({ timelineDate: '14/02/2020' })).toThrow(ValidationError);
        expect(() => parseEditRequest({ theme: 'neon' })).toThrow(ValidationError);
    });
});
