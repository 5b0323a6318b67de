// ============================================================================
// TutorPath — Transcript Service
// Video URL parsing, transcript fetch through a pluggable fetcher, cleanup
// ============================================================================
import { errorMessage } from '../errors.js';

export const MIN_TRANSCRIPT_LENGTH = 50;

const VIDEO_URL_MARKERS = ['youtube.com/watch', 'youtu.be/', 'youtube.com/embed/', 'm.youtube.com/watch'];

const VIDEO_ID_PATTERNS = [
  /(?:youtube\.com\/watch\?v=|youtu\.be\/|youtube\.com\/embed\/)([^&\n?#]+)/,
  /youtube\.com\/watch\?.*v=([^&\n?#]+)/,
];

export interface TranscriptSegment {
  text: string;
}

/** Returns the caption segments of a video, in order. */
export type TranscriptFetcher = (videoId: string) => Promise<TranscriptSegment[]>;

export type TranscriptResult = { ok: true; transcript: string } | { ok: false; error: string };

export function isVideoUrl(url: string): boolean {
  const lower = url.toLowerCase();
  return VIDEO_URL_MARKERS.some(marker => lower.includes(marker));
}

export function extractVideoId(url: string): string | null {
  for (const pattern of VIDEO_ID_PATTERNS) {
    const match = pattern.exec(url);
    if (match) return match[1];
  }
  return null;
}

/** Drops [Music] / (inaudible) style artifacts and collapses whitespace. */
export function cleanTranscript(text: string): string {
  return text
    .replace(/\[.*?\]/g, '')
    .replace(/\(.*?\)/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function validateTranscript(transcript: string | undefined | null): boolean {
  return !!transcript && transcript.trim().length >= MIN_TRANSCRIPT_LENGTH;
}

export class TranscriptService {
  constructor(private readonly fetcher: TranscriptFetcher) {}

  async getTranscript(url: string): Promise<TranscriptResult> {
    if (!isVideoUrl(url)) return { ok: false, error: 'Invalid YouTube URL format' };
    const videoId = extractVideoId(url);
    if (!videoId) return { ok: false, error: 'Invalid YouTube URL format' };

    try {
      const segments = await this.fetcher(videoId);
      const transcript = cleanTranscript(segments.map(s => s.text).join(' '));
      console.log(`🎬 Transcript: fetched ${segments.length} segments for ${videoId}`);
      return { ok: true, transcript };
    } catch (err) {
      return { ok: false, error: `Failed to extract transcript: ${errorMessage(err)}` };
    }
  }
}
