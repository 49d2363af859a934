/**
 * Configuration validation schemas using Zod
 */

import { z } from 'zod';

export const StoreKindSchema = z.enum(['eventkit', 'memory']);

export const ClientConfigSchema = z
  .object({
    store: StoreKindSchema.optional(),
    defaultCalendarName: z.string().min(1).optional(),
  })
  .strict();

export type StoreKind = z.infer<typeof StoreKindSchema>;
export type ClientConfigFile = z.infer<typeof ClientConfigSchema>;

/**
 * Validate a parsed configuration file
 */
export function validateClientConfig(config: unknown): {
  success: boolean;
  data?: ClientConfigFile;
  error?: z.ZodError;
} {
  const result = ClientConfigSchema.safeParse(config);

  if (result.success) {
    return {
      success: true,
      data: result.data,
    };
  }

  return {
    success: false,
    error: result.error,
  };
}
