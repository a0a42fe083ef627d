import { z } from 'zod';
import { DVD_RATINGS, ITEM_KINDS } from '../types/item.types';

/**
 * Item validation schemas
 */

const itemId = z.string().trim().min(1, 'Item ID is required').max(255, 'Item ID must be at most 255 characters');

const itemBase = {
  item_id: itemId,
  title: z.string().min(1, 'Title is required').max(500, 'Title must be at most 500 characters'),
};

// Add item request schema (discriminated on item type)
export const createItemSchema = z.object({
  body: z.discriminatedUnion('item_type', [
    z.object({
      ...itemBase,
      item_type: z.literal('Book'),
      author: z.string().min(1, 'Author is required'),
      isbn: z.string().min(1, 'ISBN is required'),
      pages: z.number().int('Pages must be an integer').nonnegative('Pages cannot be negative').optional(),
    }),
    z.object({
      ...itemBase,
      item_type: z.literal('Magazine'),
      issue_number: z.string().min(1, 'Issue number is required'),
      publisher: z.string().min(1, 'Publisher is required'),
      publication_date: z.string().datetime({ offset: true, message: 'Publication date must be ISO-8601' }).optional(),
    }),
    z.object({
      ...itemBase,
      item_type: z.literal('DVD'),
      duration: z
        .number({ required_error: 'Duration is required', invalid_type_error: 'Duration must be a number' })
        .int('Duration must be an integer')
        .positive('Duration must be positive'),
      genre: z.string().min(1, 'Genre is required'),
      director: z.string().nullish(),
      rating: z.enum(DVD_RATINGS).nullish(),
    }),
  ]),
});

// Get / remove item by ID schema
export const itemIdSchema = z.object({
  params: z.object({
    id: itemId,
  }),
});

// List items schema
export const listItemsSchema = z.object({
  query: z.object({
    type: z.enum(ITEM_KINDS).optional(),
    available: z.enum(['true', 'false']).transform((val) => val === 'true').optional(),
    q: z.string().min(1, 'Search query cannot be empty').optional(),
  }),
});

// Popular items schema
export const popularItemsSchema = z.object({
  query: z.object({
    limit: z.coerce.number().int('Limit must be an integer').min(1, 'Limit must be at least 1').max(100).default(10),
  }),
});

// Infer TypeScript types from schemas
export type CreateItemRequest = z.infer<typeof createItemSchema>;
