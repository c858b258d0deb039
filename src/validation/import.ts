import { z } from 'zod';
import { MAX_LIBRARY_ID } from '../constants/index.js';

export const importOptionsSchema = z
  .object({
    rootFolder: z.string({ required_error: 'Root folder is required' }).min(1, 'Root folder is required'),
    libraryId: z
      .string({ required_error: 'Library id is required' })
      .regex(/^\d+$/, 'Library id must be a number')
      .pipe(
        z.coerce
          .number()
          .int()
          .positive('Library id must be positive')
          .max(MAX_LIBRARY_ID, `Library id must be at most ${MAX_LIBRARY_ID}`),
      ),
    databaseUrl: z.string().min(1).optional(),
    dryRun: z.boolean().default(false),
  })
  .refine((data) => data.dryRun || data.databaseUrl !== undefined, {
    message: 'A database URL is required unless --dry-run is given',
    path: ['databaseUrl'],
  });
