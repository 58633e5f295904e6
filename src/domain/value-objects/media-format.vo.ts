/**
 * Media Format Value Object
 * Output formats the downloader and the transcoder can produce.
 */

export const FETCH_FORMATS = ['best', 'mp4', 'webm', 'mp3', 'm4a'] as const;
export const TRANSCODE_FORMATS = ['mp4', 'webm', 'mkv', 'mov', 'mp3', 'm4a', 'wav'] as const;
export const TRANSCODE_PRESETS = ['standard', 'remux', 'vertical-short'] as const;

export type FetchFormat = (typeof FETCH_FORMATS)[number];
export type TranscodeFormat = (typeof TRANSCODE_FORMATS)[number];
export type TranscodePreset = (typeof TRANSCODE_PRESETS)[number];

const AUDIO_ONLY_FORMATS: ReadonlySet<string> = new Set(['mp3', 'm4a', 'wav', 'aac', 'opus', 'ogg']);

const CONTENT_TYPES: Readonly<Record<string, string>> = {
  mp4: 'video/mp4',
  webm: 'video/webm',
  mkv: 'video/x-matroska',
  mov: 'video/quicktime',
  mp3: 'audio/mpeg',
  m4a: 'audio/mp4',
  wav: 'audio/wav',
  aac: 'audio/aac',
  opus: 'audio/opus',
  ogg: 'audio/ogg',
};

const EXTENSIONS_BY_MIME: Readonly<Record<string, string>> = {
  'audio/mpeg': 'mp3',
  'audio/mp3': 'mp3',
  'audio/mp4': 'm4a',
  'audio/x-m4a': 'm4a',
  'audio/wav': 'wav',
  'audio/x-wav': 'wav',
  'audio/aac': 'aac',
  'audio/ogg': 'ogg',
  'audio/opus': 'opus',
  'video/mp4': 'mp4',
  'video/webm': 'webm',
  'video/quicktime': 'mov',
  'video/x-matroska': 'mkv',
};

export function isAudioOnlyFormat(format: string): boolean {
  return AUDIO_ONLY_FORMATS.has(format.toLowerCase());
}

export function contentTypeFor(format: string): string {
  return CONTENT_TYPES[format.toLowerCase()] ?? 'application/octet-stream';
}

export function extensionForMimeType(mimeType: string): string | undefined {
  return EXTENSIONS_BY_MIME[mimeType.toLowerCase()];
}

/**
 * Lowercased extension of a file path without the dot, or '' when absent.
 */
export function formatOfPath(filePath: string): string {
  const base = filePath.slice(filePath.lastIndexOf('/') + 1);
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot + 1).toLowerCase() : '';
}
