import { z } from 'zod';

export const PrTypeSchema = z.enum(['open', 'approved']);

export const ItemEventSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('multiselect'),
        prType: PrTypeSchema,
        prUrl: z.string().min(1),
    }),
    z.object({
        type: z.literal('approved-prs'),
    }),
]);

export const ItemEventRequestSchema = z.object({
    event: ItemEventSchema,
    selectedUrls: z.array(z.string().min(1)).default([]),
});
