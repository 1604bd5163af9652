/**
 * FRED CLIENT
 *
 * Federal Reserve Economic Data (FRED) observations for policy and
 * money-market rate series.
 */

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

const FredObservationSchema = z.object({
  date: z.string(),
  value: z.string(),
});

const FredSeriesResponseSchema = z.object({
  observation_start: z.string().optional(),
  observation_end: z.string().optional(),
  units: z.string().optional(),
  count: z.number().optional(),
  observations: z.array(FredObservationSchema).default([]),
});

export interface FredDataPoint {
  date: string;
  value: number;
}

export interface FredClientOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

// Placeholder shipped in sample configs; never a real key
const PLACEHOLDER_KEY = 'your_fred_api_key_here';

/**
 * Check if a FRED API key is configured
 */
export function hasFredApiKey(apiKey: string): boolean {
  const key = apiKey.trim();
  return key.length > 0 && key !== PLACEHOLDER_KEY;
}

// ═══════════════════════════════════════════════════════════════
// FRED CLIENT
// ═══════════════════════════════════════════════════════════════

/**
 * Fetch observations for a FRED series
 *
 * @param seriesId - FRED series ID (e.g., "FEDFUNDS")
 * @param startDate - Start date (YYYY-MM-DD)
 * @param endDate - End date (YYYY-MM-DD) or undefined for latest
 */
export async function fetchFredSeries(
  seriesId: string,
  options: FredClientOptions,
  startDate?: string,
  endDate?: string
): Promise<FredDataPoint[]> {
  if (!hasFredApiKey(options.apiKey)) {
    throw new Error('FRED_API_KEY not configured. Get free key at https://fred.stlouisfed.org/docs/api/api_key.html');
  }

  const http = options.http ?? axios;
  const params: Record<string, string> = {
    series_id: seriesId,
    api_key: options.apiKey,
    file_type: 'json',
    sort_order: 'asc',
  };

  if (startDate) {
    params.observation_start = startDate;
  }

  if (endDate) {
    params.observation_end = endDate;
  }

  const response = await http.get<unknown>(
    `${options.baseUrl}/series/observations`,
    { params, timeout: options.timeoutMs }
  );

  return parseFredObservations(response.data);
}

/**
 * Keep numeric observations only; FRED uses "." for missing values
 */
export function parseFredObservations(payload: unknown): FredDataPoint[] {
  const { observations } = FredSeriesResponseSchema.parse(payload);
  const points: FredDataPoint[] = [];

  for (const obs of observations) {
    if (obs.value === '.' || obs.value === '') {
      continue;
    }

    const value = parseFloat(obs.value);
    if (!Number.isFinite(value)) {
      continue;
    }

    points.push({ date: obs.date, value });
  }

  return points;
}
