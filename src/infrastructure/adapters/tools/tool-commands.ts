/**
 * Argument builders for the external tools. Pure functions: no I/O, so the
 * exact command lines can be asserted in tests.
 */

import {
  FetchMediaRequest,
  TranscodeMediaRequest,
} from '../../../shared/interfaces/job-invocation.interface';
import { isAudioOnlyFormat } from '../../../domain/value-objects/media-format.vo';

export const DEFAULT_FFMPEG_BINARY = 'ffmpeg';

/** Best video plus best audio, falling back to the best single file */
const BEST_AV_SELECTOR = 'bv*+ba/b';

const VERTICAL_SHORT_FILTER =
  'scale=1080:1920:force_original_aspect_ratio=increase,crop=1080:1920,fps=30';

function formatSelection(format: FetchMediaRequest['format']): string[] {
  switch (format) {
    case 'best':
      return ['-f', BEST_AV_SELECTOR];
    case 'mp4':
    case 'webm':
      return ['-f', BEST_AV_SELECTOR, '--merge-output-format', format];
    case 'mp3':
    case 'm4a':
      return ['-f', 'ba/b', '-x', '--audio-format', format];
  }
}

/**
 * yt-dlp arguments. The final file path (after merge and audio extraction)
 * is printed on stdout as the last line.
 *
 * @param outputTemplate yt-dlp output template, e.g. `/tmp/x/<id>.%(ext)s`
 */
export function buildFetchArgs(
  request: FetchMediaRequest,
  outputTemplate: string,
  ffmpegPath: string = DEFAULT_FFMPEG_BINARY,
): string[] {
  const args = ['--no-playlist', '--no-progress', '--no-warnings', ...formatSelection(request.format)];

  if (ffmpegPath !== DEFAULT_FFMPEG_BINARY) {
    args.push('--ffmpeg-location', ffmpegPath);
  }

  args.push(
    '-o',
    outputTemplate,
    '--no-simulate',
    '--print',
    'after_move:filepath',
    '--',
    request.url,
  );

  return args;
}

function videoCodecArgs(format: string): string[] {
  if (format === 'webm') {
    return ['-c:v', 'libvpx-vp9', '-b:v', '0', '-crf', '32'];
  }
  return ['-c:v', 'libx264', '-preset', 'fast', '-crf', '23', '-pix_fmt', 'yuv420p'];
}

function audioCodecArgs(format: string): string[] {
  switch (format) {
    case 'webm':
      return ['-c:a', 'libopus', '-b:a', '128k'];
    case 'mp3':
      return ['-c:a', 'libmp3lame', '-b:a', '192k'];
    case 'wav':
      return ['-c:a', 'pcm_s16le'];
    default:
      return ['-c:a', 'aac', '-b:a', '192k'];
  }
}

function streamArgs(request: TranscodeMediaRequest): string[] {
  const audioOnly = isAudioOnlyFormat(request.format);
  const replacesAudio = request.audioUrl !== undefined;

  switch (request.preset) {
    case 'remux':
      if (audioOnly) return ['-vn', '-map', '0:a', '-c:a', 'copy'];
      if (replacesAudio) return ['-map', '0:v:0', '-map', '1:a:0', '-c', 'copy', '-shortest'];
      return ['-map', '0', '-c', 'copy'];

    case 'vertical-short': {
      if (audioOnly) {
        throw new Error(`Preset vertical-short needs a video format, got ${request.format}`);
      }
      const args = replacesAudio ? ['-map', '0:v:0', '-map', '1:a:0'] : [];
      args.push('-vf', VERTICAL_SHORT_FILTER, ...videoCodecArgs(request.format));
      if (replacesAudio) {
        args.push(...audioCodecArgs(request.format), '-shortest');
      } else {
        args.push('-an');
      }
      return args;
    }

    case 'standard': {
      if (audioOnly) {
        // audio track taken from the second input when one is given
        const map = replacesAudio ? ['-map', '1:a:0'] : [];
        return [...map, '-vn', ...audioCodecArgs(request.format)];
      }
      const args = replacesAudio ? ['-map', '0:v:0', '-map', '1:a:0'] : [];
      args.push(...videoCodecArgs(request.format), ...audioCodecArgs(request.format));
      if (replacesAudio) args.push('-shortest');
      return args;
    }
  }
}

/**
 * ffmpeg arguments writing `outputPath`. Inputs are read straight from their
 * URLs; ffmpeg handles http(s) and data: URLs itself.
 */
export function buildTranscodeArgs(request: TranscodeMediaRequest, outputPath: string): string[] {
  const args = ['-hide_banner', '-nostdin', '-y', '-loglevel', 'error'];

  // a short clip repeats until the voice track ends; -shortest cuts at the audio
  if (request.preset === 'vertical-short' && request.audioUrl !== undefined) {
    args.push('-stream_loop', '-1');
  }
  args.push('-i', request.url);

  if (request.audioUrl !== undefined) {
    args.push('-i', request.audioUrl);
  }

  args.push(...streamArgs(request));

  const fastStart =
    (request.format === 'mp4' || request.format === 'mov') && request.preset !== 'remux';
  if (fastStart) {
    args.push('-movflags', '+faststart');
  }

  args.push(outputPath);
  return args;
}

export function buildVersionArgs(tool: 'yt-dlp' | 'ffmpeg'): string[] {
  return tool === 'yt-dlp' ? ['--version'] : ['-version'];
}
