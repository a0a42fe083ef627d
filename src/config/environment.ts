import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

const booleanString = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((val) => val === 'true');

// Define environment variable schema with Zod for type-safe validation
const envSchema = z
  .object({
    // Node environment
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Server configuration
    PORT: z.string().default('3000').transform(Number),

    // Storage configuration
    STORAGE_DRIVER: z.enum(['supabase', 'memory']).default('supabase'),
    SUPABASE_URL: z.string().url('Invalid Supabase URL').optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1, 'Supabase service role key is required').optional(),

    // Circulation policy
    LIBRARY_NAME: z.string().min(1).default('City Library'),
    DAILY_FINE_RATE: z.coerce.number().nonnegative('Daily fine rate cannot be negative').default(0.5),
    FINE_BLOCK_THRESHOLD: z.coerce.number().nonnegative().default(10),
    MEMBERSHIP_TERM_DAYS: z.coerce.number().int().positive().default(365),
    ENFORCE_MEMBERSHIP_EXPIRY: booleanString('true'),

    // Logging configuration
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

    // CORS configuration
    ALLOWED_ORIGINS: z.string().default('*'),
  })
  .superRefine((val, ctx) => {
    if (val.STORAGE_DRIVER !== 'supabase') return;
    if (!val.SUPABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message: 'SUPABASE_URL is required when STORAGE_DRIVER=supabase',
      });
    }
    if (!val.SUPABASE_SERVICE_ROLE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_SERVICE_ROLE_KEY'],
        message: 'SUPABASE_SERVICE_ROLE_KEY is required when STORAGE_DRIVER=supabase',
      });
    }
  });

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const errorMessage = `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
  console.error(errorMessage);
  throw new Error(errorMessage);
}

// Export validated environment variables
export const env = parsed.data;

export interface LibraryPolicy {
  libraryName: string;
  dailyFineRate: number;
  fineBlockThreshold: number;
  membershipTermDays: number;
  enforceMembershipExpiry: boolean;
}

export const libraryPolicy: LibraryPolicy = {
  libraryName: env.LIBRARY_NAME,
  dailyFineRate: env.DAILY_FINE_RATE,
  fineBlockThreshold: env.FINE_BLOCK_THRESHOLD,
  membershipTermDays: env.MEMBERSHIP_TERM_DAYS,
  enforceMembershipExpiry: env.ENFORCE_MEMBERSHIP_EXPIRY,
};

export const allowedOrigins = (): string[] | '*' =>
  env.ALLOWED_ORIGINS === '*' ? '*' : env.ALLOWED_ORIGINS.split(',').map((o) => o.trim());

// Log environment on startup
if (env.NODE_ENV !== 'test') {
  console.log('✅ Environment variables validated successfully');
  console.log(`📝 Environment: ${env.NODE_ENV}`);
  console.log(`🚀 Port: ${env.PORT}`);
  console.log(`💾 Storage: ${env.STORAGE_DRIVER}`);
  console.log(`💰 Daily fine rate: ${env.DAILY_FINE_RATE.toFixed(2)}`);
}
