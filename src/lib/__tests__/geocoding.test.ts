import { coordinatesForLocation, geocodeCityState, haversineMiles, normalizeCityState } from "../geocoding.js";
import { K } from "../keys.js";
import { makeRedis, nominatimResponse } from "./helpers.js";

const redis = makeRedis();

beforeEach(async () => {
  await redis.flushall();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("normalizeCityState", () => {
  it("maps full state names to postal codes", () => {
    expect(normalizeCityState(" Austin ", "Texas")).toEqual(["Austin", "TX"]);
    expect(normalizeCityState("Boston", "MA")).toEqual(["Boston", "MA"]);
    expect(normalizeCityState("Springfield", "Narnia")).toEqual(["Springfield", "Narnia"]);
  });
});

describe("geocodeCityState", () => {
  it("returns null without calling out when city or state is missing", async () => {
    const fetchSpy = jest.spyOn(global, "fetch");
    expect(await geocodeCityState(redis, "", "TX")).toBeNull();
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("serves cached coordinates case-insensitively", async () => {
    const fetchSpy = jest.spyOn(global, "fetch");
    await redis.hset(K.geocode("denver", "co"), { lat: "39.7392", lng: "-104.9903" });

    expect(await geocodeCityState(redis, "DENVER", "co")).toEqual({ lat: 39.7392, lng: -104.9903 });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("caches the first hit from the geocoder", async () => {
    const fetchSpy = jest.spyOn(global, "fetch").mockResolvedValue(nominatimResponse("47.6062", "-122.3321"));

    expect(await geocodeCityState(redis, "Seattle", "Washington")).toEqual({ lat: 47.6062, lng: -122.3321 });
    expect(await geocodeCityState(redis, "seattle", "wa")).toEqual({ lat: 47.6062, lng: -122.3321 });
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(await redis.hget(K.geocode("Seattle", "WA"), "lat")).toBe("47.6062");
  });

  it("resolves to null on HTTP errors, empty answers and network failures", async () => {
    jest.spyOn(console, "warn").mockImplementation(() => undefined);
    jest.spyOn(console, "log").mockImplementation(() => undefined);
    jest.spyOn(console, "error").mockImplementation(() => undefined);
    const fetchSpy = jest.spyOn(global, "fetch");

    fetchSpy.mockResolvedValueOnce(new Response("busy", { status: 503 }));
    expect(await geocodeCityState(redis, "Reno", "NV")).toBeNull();

    fetchSpy.mockResolvedValueOnce(new Response("[]", { status: 200 }));
    expect(await geocodeCityState(redis, "Reno", "NV")).toBeNull();

    fetchSpy.mockRejectedValueOnce(new Error("timeout"));
    expect(await geocodeCityState(redis, "Reno", "NV")).toBeNull();

    expect(await redis.exists(K.geocode("Reno", "NV"))).toBe(0);
  });
});

describe("coordinatesForLocation", () => {
  const previous = { location: "Boston, MA", latitude: 42.36, longitude: -71.06 };

  it("clears coordinates for remote or blank locations", async () => {
    expect(await coordinatesForLocation(redis, "Remote (US)", previous)).toEqual({ latitude: null, longitude: null });
    expect(await coordinatesForLocation(redis, "  ", previous)).toEqual({ latitude: null, longitude: null });
  });

  it("keeps what it had when the text has no comma", async () => {
    expect(await coordinatesForLocation(redis, "Boston", previous)).toEqual({ latitude: 42.36, longitude: -71.06 });
  });

  it("does not geocode an unchanged location that already has coordinates", async () => {
    const fetchSpy = jest.spyOn(global, "fetch");
    expect(await coordinatesForLocation(redis, "Boston, MA", previous)).toEqual({ latitude: 42.36, longitude: -71.06 });
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  it("geocodes a changed location", async () => {
    jest.spyOn(global, "fetch").mockResolvedValue(nominatimResponse("41.8781", "-87.6298"));
    expect(await coordinatesForLocation(redis, "Chicago, IL", previous)).toEqual({
      latitude: 41.8781,
      longitude: -87.6298,
    });
  });
});

describe("haversineMiles", () => {
  it("is zero for the same point", () => {
    expect(haversineMiles({ lat: 40, lng: -75 }, { lat: 40, lng: -75 })).toBe(0);
  });

  it("measures one degree of latitude at about 69 miles", () => {
    expect(haversineMiles({ lat: 0, lng: 0 }, { lat: 1, lng: 0 })).toBeCloseTo(69.09, 1);
  });
});
