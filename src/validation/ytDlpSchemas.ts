import { z } from 'zod';

/**
 * yt-dlp --dump-json Schemas
 *
 * Only the fields the pipeline reads. yt-dlp omits or nulls most fields
 * depending on the extractor, so nearly everything is optional.
 */

const optionalNumber = z.number().nullish();
const optionalString = z.string().nullish();

/**
 * Some extractors emit numeric ids
 */
const idSchema = z.union([z.string(), z.number()]).transform(String);

export const ytDlpFormatSchema = z.object({
  format_id: idSchema,
  ext: z.string().default(''),
  height: optionalNumber,
  vcodec: optionalString,
  acodec: optionalString,
  abr: optionalNumber,
  tbr: optionalNumber,
  filesize: optionalNumber,
  filesize_approx: optionalNumber,
});

export const ytDlpInfoSchema = z.object({
  id: idSchema,
  title: z.string().default(''),
  uploader: optionalString,
  channel: optionalString,
  duration: optionalNumber,
  thumbnail: optionalString,
  formats: z.array(ytDlpFormatSchema).nullish(),
});

export type YtDlpFormat = z.infer<typeof ytDlpFormatSchema>;
export type YtDlpInfo = z.infer<typeof ytDlpInfoSchema>;
