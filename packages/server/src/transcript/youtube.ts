import { YoutubeTranscript } from 'youtube-transcript';
import type { TranscriptFetcher } from './service.js';

export const fetchYoutubeTranscript: TranscriptFetcher = async (videoId) => {
  const segments = await YoutubeTranscript.fetchTranscript(videoId);
  return segments.map(segment => ({ text: segment.text }));
};
