import { z } from 'zod';

/**
 * Settings for rendering payloads into diagnostics and `toString()` output.
 */
export const RenderConfigSchema = z.object({
  maxPayloadLength: z.number().int().min(8).default(200),
});

export type RenderConfig = z.infer<typeof RenderConfigSchema>;

export type RenderOptions = z.input<typeof RenderConfigSchema>;

export const DEFAULT_RENDER_CONFIG: RenderConfig = RenderConfigSchema.parse({});
