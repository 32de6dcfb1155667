import type Redis from "ioredis";
import { z } from "zod";
import { loadSettings } from "../config/settings.js";
import { K } from "./keys.js";
import type { Coordinates } from "./types.js";
import stateAliases from "../../data/us-states.json";

const EARTH_RADIUS_MILES = 3958.8;

const nominatimResults = z.array(z.object({ lat: z.string(), lon: z.string() }));

const STATE_ALIASES: Record<string, string> = stateAliases;

export function normalizeCityState(city: string, state: string): [string, string] {
  const c = (city || "").trim();
  let s = (state || "").trim();
  if (s.length > 2) s = STATE_ALIASES[s.toLowerCase()] ?? s;
  return [c, s];
}

/**
 * Look up a "City, ST" pair. Answers come from the Redis cache when
 * present, otherwise from one Nominatim request whose first hit is cached.
 * Lookup failures resolve to null.
 */
export async function geocodeCityState(
  r: Redis,
  rawCity: string,
  rawState: string,
  country = "USA",
): Promise<Coordinates | null> {
  const [city, state] = normalizeCityState(rawCity, rawState);
  if (!city || !state) return null;

  const cached = await r.hgetall(K.geocode(city, state));
  if (cached.lat && cached.lng) {
    return { lat: parseFloat(cached.lat), lng: parseFloat(cached.lng) };
  }

  const settings = loadSettings();
  const params = new URLSearchParams({ q: `${city}, ${state}, ${country}`, format: "json", limit: "1" });

  try {
    const response = await fetch(`${settings.geocoderUrl}?${params.toString()}`, {
      headers: { "User-Agent": settings.geocoderUserAgent, Accept: "application/json" },
      signal: AbortSignal.timeout(settings.geocoderTimeoutMs),
    });

    if (!response.ok) {
      console.warn(`[geocode] Nominatim returned ${response.status} for "${city}, ${state}"`);
      return null;
    }

    const parsed = nominatimResults.safeParse(await response.json());
    if (!parsed.success || parsed.data.length === 0) {
      console.log(`[geocode] No result for "${city}, ${state}"`);
      return null;
    }

    const coords = { lat: parseFloat(parsed.data[0].lat), lng: parseFloat(parsed.data[0].lon) };
    await r.hset(K.geocode(city, state), {
      city,
      state,
      lat: String(coords.lat),
      lng: String(coords.lng),
    });
    return coords;
  } catch (error) {
    console.error(`[geocode] Lookup failed for "${city}, ${state}":`, error);
    return null;
  }
}

export interface LocatedRecord {
  location: string;
  latitude: number | null;
  longitude: number | null;
}

/**
 * Coordinates a record should carry after its location is (re)written.
 * Remote or blank locations carry none; a location without a comma keeps
 * whatever it had; otherwise it is geocoded when the text changed or no
 * coordinates are known yet.
 */
export async function coordinatesForLocation(
  r: Redis,
  location: string,
  previous: LocatedRecord | null,
): Promise<{ latitude: number | null; longitude: number | null }> {
  const loc = location.trim();
  const keep = { latitude: previous?.latitude ?? null, longitude: previous?.longitude ?? null };

  if (!loc || loc.toLowerCase().startsWith("remote")) {
    return { latitude: null, longitude: null };
  }

  const parts = loc.split(",").map((p) => p.trim());
  if (parts.length < 2) return keep;

  const needsGeocode =
    previous === null ||
    previous.location.trim() !== loc ||
    previous.latitude === null ||
    previous.longitude === null;
  if (!needsGeocode) return keep;

  const coords = await geocodeCityState(r, parts[0], parts[1]);
  return coords ? { latitude: coords.lat, longitude: coords.lng } : { latitude: null, longitude: null };
}

/** Parse "City, ST" free text into a geocoded point */
export async function geocodeFreeText(r: Redis, text: string): Promise<Coordinates | null> {
  const parts = text.split(",").map((p) => p.trim());
  if (parts.length < 2) return null;
  return geocodeCityState(r, parts[0], parts[1]);
}

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180;
}

export function haversineMiles(a: Coordinates, b: Coordinates): number {
  const dLat = toRadians(b.lat - a.lat);
  const dLng = toRadians(b.lng - a.lng);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(a.lat)) * Math.cos(toRadians(b.lat)) * Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_MILES * Math.asin(Math.min(1, Math.sqrt(h)));
}
