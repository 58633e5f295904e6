import {
  FetchFormat,
  TranscodeFormat,
  TranscodePreset,
} from '../../domain/value-objects/media-format.vo';

export type InvocationKind = 'fetch' | 'transcode';

export interface FetchMediaRequest {
  url: string;
  format: FetchFormat;
}

export interface TranscodeMediaRequest {
  url: string;
  format: TranscodeFormat;
  preset: TranscodePreset;
  audioUrl?: string;
}

export type MediaJob =
  | { kind: 'fetch'; request: FetchMediaRequest }
  | { kind: 'transcode'; request: TranscodeMediaRequest };

/**
 * Unit of work handed to the worker pool. Must stay structured-clone safe:
 * it crosses the thread boundary by postMessage.
 */
export type InvocationTask = MediaJob & {
  invocationId: string;
  correlationId?: string;
  submittedAt: string;
};
