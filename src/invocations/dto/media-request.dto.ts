import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';
import {
  FETCH_FORMATS,
  TRANSCODE_FORMATS,
  TRANSCODE_PRESETS,
  isAudioOnlyFormat,
} from '../../domain/value-objects/media-format.vo';

const SUPPORTED_PROTOCOLS: ReadonlySet<string> = new Set(['http:', 'https:', 'data:']);

function isSupportedUrl(value: string): boolean {
  try {
    return SUPPORTED_PROTOCOLS.has(new URL(value).protocol);
  } catch {
    return false;
  }
}

const MediaUrlSchema = z
  .string()
  .trim()
  .min(1)
  .refine(isSupportedUrl, 'must be an http(s) or data: URL');

export const FetchMediaRequestSchema = z.object({
  url: MediaUrlSchema,
  format: z.enum(FETCH_FORMATS).default('mp4'),
});

export const TranscodeMediaRequestSchema = z
  .object({
    url: MediaUrlSchema,
    format: z.enum(TRANSCODE_FORMATS),
    preset: z.enum(TRANSCODE_PRESETS).default('standard'),
    audioUrl: MediaUrlSchema.optional(),
  })
  .refine((body) => !(body.preset === 'vertical-short' && isAudioOnlyFormat(body.format)), {
    message: 'vertical-short needs a video format',
    path: ['preset'],
  });

export type FetchMediaRequestDto = z.infer<typeof FetchMediaRequestSchema>;
export type TranscodeMediaRequestDto = z.infer<typeof TranscodeMediaRequestSchema>;

export const INVALID_REQUEST_CODE = 'INVALID_REQUEST';

function parseOrReject<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const error = result.error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');

  throw new BadRequestException({ success: false, error, code: INVALID_REQUEST_CODE });
}

export function validateFetchMediaRequest(data: unknown): FetchMediaRequestDto {
  return parseOrReject(FetchMediaRequestSchema, data);
}

export function validateTranscodeMediaRequest(data: unknown): TranscodeMediaRequestDto {
  return parseOrReject(TranscodeMediaRequestSchema, data);
}
