import axios, { type AxiosInstance } from 'axios';
import { ApiError, Errors, errorMessage } from './errors.js';
import type { Transcript, TranscriptSource } from '../types/index.js';
import type { Logger } from '../config.js';

const YOUTUBE_BASE_URL = 'https://www.youtube.com';
const YOUTUBE_REFERER = 'https://www.youtube.com/';
const USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';
const CLIENT_VERSION = '2.20250626.01.00';
const REQUEST_TIMEOUT_MS = 20000;

const VIDEO_ID_MARKERS = ['v=', '/embed/', '/v/', '/shorts/', 'youtu.be/'];

export interface CaptionTrack {
  baseUrl: string;
  languageCode: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 11-character video id following the first recognised marker
 */
export function extractVideoId(url: string): string | null {
  for (const marker of VIDEO_ID_MARKERS) {
    const index = url.indexOf(marker);
    if (index !== -1) {
      const id = url.substring(index + marker.length, index + marker.length + 11);
      return id.length > 0 ? id : null;
    }
  }
  return null;
}

/**
 * Prefer a manual track, then punctuated ASR, then plain ASR
 */
export function selectBestTrack(tracks: CaptionTrack[], language: string): CaptionTrack | null {
  let punctuatedAsr: CaptionTrack | null = null;
  let plainAsr: CaptionTrack | null = null;

  for (const track of tracks) {
    if (track.languageCode !== language) continue;

    if (!track.baseUrl.includes('kind=asr')) {
      return track;
    }
    if (track.baseUrl.includes('variant=punctuated')) {
      punctuatedAsr ??= track;
    } else {
      plainAsr ??= track;
    }
  }

  return punctuatedAsr ?? plainAsr;
}

/**
 * Join the text segments of json3 caption events into one line of text
 */
export function joinCaptionEvents(events: unknown[]): string {
  const lines: string[] = [];

  for (const event of events) {
    if (!isRecord(event) || !Array.isArray(event.segs)) continue;

    const text = event.segs
      .map((seg) => (isRecord(seg) && typeof seg.utf8 === 'string' ? seg.utf8.trim() : ''))
      .filter((part) => part.length > 0)
      .join(' ');
    if (text.length > 0) {
      lines.push(text);
    }
  }

  return lines.join(' ');
}

function captionTracks(playerData: Record<string, unknown>): CaptionTrack[] | null {
  const captions = playerData.captions;
  if (!isRecord(captions)) return null;
  const renderer = captions.playerCaptionsTracklistRenderer;
  if (!isRecord(renderer) || !Array.isArray(renderer.captionTracks)) return null;

  const tracks: CaptionTrack[] = [];
  for (const track of renderer.captionTracks) {
    if (isRecord(track) && typeof track.baseUrl === 'string' && typeof track.languageCode === 'string') {
      tracks.push({ baseUrl: track.baseUrl, languageCode: track.languageCode });
    }
  }
  return tracks;
}

/**
 * Transcript source reading YouTube caption tracks through the player endpoint
 */
export class YouTubeTranscriptSource implements TranscriptSource {
  private logger: Logger;
  private http: AxiosInstance;

  constructor(logger: Logger, http: AxiosInstance = axios.create()) {
    this.logger = logger;
    this.http = http;
  }

  async fetchTranscript(reference: string, language: string): Promise<Transcript> {
    const videoId = extractVideoId(reference);
    if (!videoId) {
      throw Errors.invalidReference(reference);
    }

    try {
      return await this.fetchTranscriptAndTitle(videoId, language);
    } catch (error) {
      if (error instanceof ApiError) throw error;
      throw Errors.transcriptError(errorMessage(error));
    }
  }

  private async fetchTranscriptAndTitle(videoId: string, language: string): Promise<Transcript> {
    this.logger.debug('Fetching player data', { videoId, language });

    const player = await this.http.post<unknown>(
      `${YOUTUBE_BASE_URL}/youtubei/v1/player`,
      {
        context: { client: { clientName: 'WEB', clientVersion: CLIENT_VERSION } },
        videoId,
      },
      {
        headers: { 'User-Agent': USER_AGENT, Referer: YOUTUBE_REFERER },
        timeout: REQUEST_TIMEOUT_MS,
      }
    );

    const playerData: Record<string, unknown> = isRecord(player.data) ? player.data : {};
    const details = playerData.videoDetails;
    if (!isRecord(details) || typeof details.title !== 'string') {
      throw Errors.transcriptBlocked();
    }
    const title = details.title;

    const tracks = captionTracks(playerData);
    if (!tracks) {
      throw Errors.noCaptions(`No captions found for video ID: ${videoId}`);
    }

    const track = selectBestTrack(tracks, language);
    if (!track) {
      throw Errors.noCaptions(`No suitable captions found for language '${language}'`);
    }

    const captionsUrl = `${track.baseUrl.replaceAll('\\u0026', '&')}&fmt=json3`;
    const captions = await this.http.get<unknown>(captionsUrl, { timeout: REQUEST_TIMEOUT_MS });
    const captionData = captions.data;
    if (!isRecord(captionData) || !Array.isArray(captionData.events)) {
      throw Errors.transcriptError(`Failed to parse captions JSON for video ID: ${videoId}`);
    }

    const text = joinCaptionEvents(captionData.events);
    this.logger.debug('Transcript fetched', { videoId, title, length: text.length });
    return { text, title };
  }
}
