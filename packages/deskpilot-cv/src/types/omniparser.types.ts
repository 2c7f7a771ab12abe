import { z } from 'zod';

const coordinate = z.number().finite();

/**
 * One detection from the OmniParser service. `bbox` is [x, y, width, height]
 * in pixels of the image that was parsed.
 */
export const omniParserElementSchema = z.object({
  bbox: z.tuple([coordinate, coordinate, coordinate, coordinate]),
  center: z.tuple([coordinate, coordinate]).optional(),
  confidence: z.number().min(0).max(1).optional(),
  type: z.string().default('unknown'),
  content: z.string().nullish(),
  caption: z.string().nullish(),
  interactable: z.boolean().optional(),
  source: z.string().optional(), // 'box_ocr_content_ocr' or 'box_yolo_content_yolo'
});

export const omniParserResponseSchema = z.object({
  elements: z.array(omniParserElementSchema),
  count: z.number().int().nonnegative().optional(),
  processing_time_ms: z.number().optional(),
  image_size: z
    .object({ width: z.number().positive(), height: z.number().positive() })
    .optional(),
  device: z.string().optional(),
});

export const omniParserHealthSchema = z.object({
  status: z.string(),
  models_loaded: z.boolean().default(false),
});

export type OmniParserElement = z.infer<typeof omniParserElementSchema>;
export type OmniParserResponse = z.infer<typeof omniParserResponseSchema>;

/**
 * Parse request options
 */
export interface OmniParserOptions {
  includeCaptions?: boolean;
  minConfidence?: number;
  iouThreshold?: number; // IoU threshold for overlap removal
  /** Cancels the request alongside the client's own timeout */
  signal?: AbortSignal;
}
