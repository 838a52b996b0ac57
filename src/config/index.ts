import { z } from 'zod';
import { silentLogger, type Logger } from '../core/logger';

export const reorderConfigSchema = z.object({
  /** Refuse new drags; an in-flight drag can still be cancelled */
  disabled: z.boolean().default(false),
  /** Vibrate on lift, hover and drop where the device supports it */
  haptics: z.boolean().default(true),
  showInstructions: z.boolean().default(true),
  emptyMessage: z.string().min(1).default('No items to reorder'),
  instructions: z.string().min(1).default('Drag and drop to reorder • Touch and hold on mobile'),
});

export type ReorderConfigInput = z.input<typeof reorderConfigSchema>;
export type ReorderConfig = z.output<typeof reorderConfigSchema>;

/** Invalid options are logged and replaced by their defaults */
export function resolveReorderConfig(input: ReorderConfigInput = {}, logger: Logger = silentLogger): ReorderConfig {
  const result = reorderConfigSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const invalid = new Set(result.error.issues.map(issue => String(issue.path[0])));
  logger.warn('Ignoring invalid list options', { options: Array.from(invalid) });
  return reorderConfigSchema.parse(
    Object.fromEntries(Object.entries(input).filter(([key]) => !invalid.has(key)))
  );
}
