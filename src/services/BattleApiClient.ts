/**
 * Battle-log API client
 *
 * Bearer-token client for the public player API.
 *
 * Endpoints:
 *   GET /players/{tag}             player profile
 *   GET /players/{tag}/battlelog   recent battles, newest first
 *
 * Tags are sent with their leading '#', URL-encoded as %23.
 * Every failure is mapped to an ApiError kind (NotFound, RateLimited,
 * Transient); callers never see axios errors.
 */

import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import type { PlayerProfile, RawBattle } from '../types';
import { ApiError, errorMessage } from '../types/errors';
import { normalizeTag } from './BattleNormalizer';

export const DEFAULT_API_URL = 'https://api.clashroyale.com/v1';
const DEFAULT_TIMEOUT_MS = 30000;

export interface BattleApi {
  fetchProfile(tag: string): Promise<PlayerProfile>;
  fetchBattleLog(tag: string): Promise<RawBattle[]>;
}

export interface BattleApiClientConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}

export function encodeTag(tag: string): string {
  return encodeURIComponent(`#${normalizeTag(tag)}`);
}

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(header: unknown, now: number = Date.now()): number | undefined {
  if (typeof header !== 'string' && typeof header !== 'number') return undefined;
  const value = String(header).trim();
  if (/^\d+(\.\d+)?$/.test(value)) {
    return Math.round(parseFloat(value) * 1000);
  }
  const date = Date.parse(value);
  if (isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Entries are validated field by field in the normalizer
function isRawBattle(value: unknown): value is RawBattle {
  return isRecord(value);
}

export class BattleApiClient implements BattleApi {
  private http: AxiosInstance;

  constructor(config: BattleApiClientConfig) {
    this.http =
      config.http ||
      axios.create({
        baseURL: config.baseUrl || DEFAULT_API_URL,
        timeout: config.timeoutMs || DEFAULT_TIMEOUT_MS,
        headers: { Authorization: `Bearer ${config.apiKey}` },
      });
  }

  async fetchProfile(tag: string): Promise<PlayerProfile> {
    const data = await this.request(tag, `/players/${encodeTag(tag)}`);
    if (!isRecord(data)) {
      throw new ApiError('Transient', normalizeTag(tag), 'Profile response is not an object');
    }

    const arena = isRecord(data.arena) && typeof data.arena.name === 'string' ? data.arena.name : null;
    return {
      tag: normalizeTag(typeof data.tag === 'string' ? data.tag : tag),
      name: typeof data.name === 'string' ? data.name : 'Unknown',
      arena,
      trophies: typeof data.trophies === 'number' ? data.trophies : 0,
    };
  }

  async fetchBattleLog(tag: string): Promise<RawBattle[]> {
    const data = await this.request(tag, `/players/${encodeTag(tag)}/battlelog`);
    if (!Array.isArray(data)) {
      throw new ApiError('Transient', normalizeTag(tag), 'Battle log response is not an array');
    }
    return data.filter(isRawBattle);
  }

  private async request(tag: string, url: string): Promise<unknown> {
    const subject = normalizeTag(tag);
    let response: AxiosResponse<unknown>;
    try {
      // Status codes are classified below rather than thrown by axios
      response = await this.http.get<unknown>(url, { validateStatus: () => true });
    } catch (err) {
      throw new ApiError('Transient', subject, `Request failed for #${subject}: ${errorMessage(err)}`);
    }

    const status = response.status;
    if (status >= 200 && status < 300) {
      return response.data;
    }

    const reason =
      isRecord(response.data) && typeof response.data.reason === 'string'
        ? response.data.reason
        : isRecord(response.data) && typeof response.data.message === 'string'
          ? response.data.message
          : `HTTP ${status}`;

    if (status === 404) {
      throw new ApiError('NotFound', subject, `Player #${subject} not found`, { status });
    }
    if (status === 429) {
      throw new ApiError('RateLimited', subject, `Rate limited while fetching #${subject}`, {
        status,
        retryAfterMs: parseRetryAfter(response.headers['retry-after']),
      });
    }
    if (status === 401 || status === 403) {
      throw new ApiError(
        'Transient',
        subject,
        `API key rejected or IP not allowed (${status}): ${reason}`,
        { status },
      );
    }
    throw new ApiError('Transient', subject, `API error ${status} for #${subject}: ${reason}`, { status });
  }
}
