// Weather for a city on a particular date
// OpenWeatherMap geocoding, then current weather (today) or the 5-day / 3-hour forecast

import { z } from 'zod';
import { env } from '../../../env.js';
import { toIsoDate } from '../../../utils/normalizers.js';
import type { ExecutionContext, WeatherArgs } from '../types.js';
import { fetchJson } from './http.js';

const PROVIDER = 'OpenWeatherMap';

const GeocodeSchema = z.array(
  z.object({
    lat: z.number(),
    lon: z.number(),
    name: z.string().optional(),
    country: z.string().optional(),
  }),
);

const ConditionSchema = z.array(z.object({ description: z.string().optional() })).optional();

const MainSchema = z.object({
  temp: z.number().optional(),
  feels_like: z.number().optional(),
  humidity: z.number().optional(),
});

const CurrentWeatherSchema = z.object({
  main: MainSchema.optional(),
  weather: ConditionSchema,
  wind: z.object({ speed: z.number().optional() }).optional(),
});

const ForecastSchema = z.object({
  list: z.array(
    z.object({
      dt: z.number(),
      main: MainSchema.optional(),
      weather: ConditionSchema,
    }),
  ),
});

export interface CurrentWeather {
  date: string;
  city: string;
  country: string | null;
  type: 'current';
  temperature_c: number | null;
  feels_like_c: number | null;
  humidity: number | null;
  condition: string | null;
  wind_mps: number | null;
}

export interface ForecastWeather {
  date: string;
  city: string;
  country: string | null;
  type: 'forecast';
  temp_min_c: number | null;
  temp_max_c: number | null;
  temp_avg_c: number | null;
  feels_like_avg_c: number | null;
  humidity_avg: number | null;
  condition: string | null;
}

export type WeatherSummary = CurrentWeather | ForecastWeather;

interface Location {
  lat: number;
  lon: number;
  name: string;
  country: string | null;
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  return round1(values.reduce((sum, v) => sum + v, 0) / values.length);
}

function mostCommon(values: string[]): string | null {
  const counts = new Map<string, number>();
  let best: string | null = null;
  let bestCount = 0;

  for (const value of values) {
    const count = (counts.get(value) ?? 0) + 1;
    counts.set(value, count);
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }

  return best;
}

function requireApiKey(): string {
  if (!env.OPENWEATHER_API_KEY) {
    throw new Error('OPENWEATHER_API_KEY is not configured');
  }
  return env.OPENWEATHER_API_KEY;
}

async function geocodeCity(city: string, apiKey: string, signal: AbortSignal): Promise<Location> {
  const endpoint = new URL('/geo/1.0/direct', env.OPENWEATHER_BASE_URL);
  endpoint.searchParams.set('q', city);
  endpoint.searchParams.set('limit', '1');
  endpoint.searchParams.set('appid', apiKey);

  const matches = await fetchJson(endpoint, GeocodeSchema, { provider: PROVIDER, signal });
  const match = matches[0];
  if (!match) {
    throw new Error(`Could not geocode city "${city}"`);
  }

  return {
    lat: match.lat,
    lon: match.lon,
    name: match.name ?? city,
    country: match.country ?? null,
  };
}

function weatherEndpoint(path: string, location: Location, apiKey: string): URL {
  const endpoint = new URL(path, env.OPENWEATHER_BASE_URL);
  endpoint.searchParams.set('lat', String(location.lat));
  endpoint.searchParams.set('lon', String(location.lon));
  endpoint.searchParams.set('appid', apiKey);
  endpoint.searchParams.set('units', 'metric');
  return endpoint;
}

export async function getWeatherForDate(
  args: WeatherArgs,
  context: ExecutionContext,
): Promise<WeatherSummary> {
  const apiKey = requireApiKey();
  const location = await geocodeCity(args.city, apiKey, context.signal);

  if (args.date === toIsoDate(context.now)) {
    const current = await fetchJson(
      weatherEndpoint('/data/2.5/weather', location, apiKey),
      CurrentWeatherSchema,
      { provider: PROVIDER, signal: context.signal },
    );

    return {
      date: args.date,
      city: location.name,
      country: location.country,
      type: 'current',
      temperature_c: current.main?.temp ?? null,
      feels_like_c: current.main?.feels_like ?? null,
      humidity: current.main?.humidity ?? null,
      condition: current.weather?.[0]?.description ?? null,
      wind_mps: current.wind?.speed ?? null,
    };
  }

  const forecast = await fetchJson(
    weatherEndpoint('/data/2.5/forecast', location, apiKey),
    ForecastSchema,
    { provider: PROVIDER, signal: context.signal },
  );

  const entries = forecast.list.filter(entry => toIsoDate(new Date(entry.dt * 1000)) === args.date);
  if (entries.length === 0) {
    throw new Error(`${args.date} is outside the available forecast window (today and the next 5 days)`);
  }

  const readings = (key: 'temp' | 'feels_like' | 'humidity'): number[] =>
    entries.flatMap(e => {
      const value = e.main?.[key];
      return value === undefined ? [] : [value];
    });

  const temps = readings('temp');
  const feels = readings('feels_like');
  const humidity = readings('humidity');
  const conditions = entries.flatMap(e => {
    const description = e.weather?.[0]?.description?.toLowerCase();
    return description ? [description] : [];
  });

  return {
    date: args.date,
    city: location.name,
    country: location.country,
    type: 'forecast',
    temp_min_c: temps.length > 0 ? Math.min(...temps) : null,
    temp_max_c: temps.length > 0 ? Math.max(...temps) : null,
    temp_avg_c: average(temps),
    feels_like_avg_c: average(feels),
    humidity_avg: average(humidity),
    condition: mostCommon(conditions),
  };
}
