import { z } from 'zod';

/**
 * Loan validation schemas
 */

// Checkout, check-in and renewal all address a loan by (user, item)
export const loanActionSchema = z.object({
  body: z.object({
    user_id: z.string().trim().min(1, 'User ID is required').max(255, 'User ID must be at most 255 characters'),
    item_id: z.string().trim().min(1, 'Item ID is required').max(255, 'Item ID must be at most 255 characters'),
  }),
});

export const loanIdSchema = z.object({
  params: z.object({
    id: z.string().trim().min(1, 'Loan ID is required'),
  }),
});
