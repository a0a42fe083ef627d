import { z } from 'zod';
import { STAFF_ROLES, USER_KINDS } from '../types/user.types';

/**
 * User validation schemas
 */

const userId = z.string().trim().min(1, 'User ID is required').max(255, 'User ID must be at most 255 characters');

const userBase = {
  user_id: userId,
  name: z.string().min(1, 'Name is required').max(255, 'Name must be at most 255 characters'),
  email: z.string().min(1, 'Email is required'),
};

export const createMemberSchema = z.object({
  body: z.object({
    ...userBase,
    phone: z.string().nullish(),
  }),
});

export const createStaffSchema = z.object({
  body: z.object({
    ...userBase,
    staff_role: z.enum(STAFF_ROLES).optional(),
    hire_date: z.string().datetime({ offset: true, message: 'Hire date must be ISO-8601' }).optional(),
  }),
});

export const userIdSchema = z.object({
  params: z.object({
    id: userId,
  }),
});

export const listUsersSchema = z.object({
  query: z.object({
    role: z.enum(USER_KINDS).optional(),
  }),
});

export const userLoansSchema = z.object({
  params: z.object({
    id: userId,
  }),
  query: z.object({
    active: z
      .enum(['true', 'false'])
      .default('true')
      .transform((val) => val === 'true'),
  }),
});

export const payFineSchema = z.object({
  params: z.object({
    id: userId,
  }),
  body: z.object({
    amount: z
      .number({ required_error: 'Amount is required', invalid_type_error: 'Amount must be a number' })
      .positive('Amount must be positive'),
  }),
});

export const extendMembershipSchema = z.object({
  params: z.object({
    id: userId,
  }),
  body: z.object({
    days: z
      .number({ required_error: 'Days is required', invalid_type_error: 'Days must be a number' })
      .int('Days must be an integer')
      .positive('Days must be positive'),
  }),
});

export const changeStaffRoleSchema = z.object({
  params: z.object({
    id: userId,
  }),
  body: z.object({
    staff_role: z.enum(STAFF_ROLES),
  }),
});
