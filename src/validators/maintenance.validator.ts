import { z } from 'zod';

export const fineRateSchema = z.object({
  body: z.object({
    daily_fine_rate: z
      .number({ required_error: 'Daily fine rate is required', invalid_type_error: 'Daily fine rate must be a number' })
      .nonnegative('Daily fine rate cannot be negative'),
  }),
});
