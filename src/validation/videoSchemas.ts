import { z } from 'zod';

/**
 * Video API Validation Schemas
 */

export const downloadModeSchema = z.enum(['video', 'audio']);

/**
 * POST /api/video/info body
 */
export const videoInfoRequestSchema = z.object({
  url: z.string({ required_error: 'URL is required' }).trim().min(1, 'URL is required'),
  mode: downloadModeSchema.default('video'),
});

/**
 * GET /api/video/download query
 */
export const downloadQuerySchema = z.object({
  url: z.string({ required_error: 'url and format required' }).trim().min(1, 'url and format required'),
  format: z
    .string({ required_error: 'url and format required' })
    .trim()
    .min(1, 'url and format required'),
  mode: downloadModeSchema.default('video'),
});

/**
 * GET /api/video/file/:id params
 */
export const fileParamsSchema = z.object({
  id: z.string().min(1),
});

/**
 * GET /api/video/thumb query
 */
export const thumbnailQuerySchema = z.object({
  url: z.string({ required_error: 'url required' }).min(1, 'url required'),
});
