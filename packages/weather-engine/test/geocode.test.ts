import { describe, expect, it, vi } from "vitest";
import { AmapGeocoder, MockGeocoder, geocodeCacheKey, parseGeoResult, parseLocation } from "../src/adapters/geocode.js";
import { MemoryCache } from "../src/cache/memory-cache.js";
import { ConfigError, FetchError, ResolutionError } from "../src/errors.js";

const jsonResponse = (body: unknown): Response =>
  new Response(JSON.stringify(body), { status: 200, headers: { "Content-Type": "application/json" } });

const amapSuccess = {
  status: "1",
  info: "OK",
  geocodes: [
    {
      formatted_address: "北京市朝阳区",
      province: "北京市",
      city: "北京市",
      district: "朝阳区",
      adcode: "110105",
      location: "116.443205,39.921506"
    },
    { formatted_address: "其他候选", location: "1,2" }
  ]
};

const makeGeocoder = (
  fetchImpl: typeof fetch,
  cache?: MemoryCache
): AmapGeocoder =>
  new AmapGeocoder({
    apiKey: "test-key",
    http: { timeoutMs: 1000, retries: 0, fetchImpl },
    cache: cache ? { cache, ttlSeconds: 3600, namespace: "live" } : undefined
  });

describe("AmapGeocoder", () => {
  it("returns the first candidate", async () => {
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () => jsonResponse(amapSuccess));

    const geo = await makeGeocoder(fetchImpl).resolve("北京市朝阳区");

    expect(geo).toEqual({
      query_place: "北京市朝阳区",
      resolved_address: "北京市朝阳区",
      lng: 116.443205,
      lat: 39.921506,
      province: "北京市",
      city: "北京市",
      district: "朝阳区",
      adcode: "110105"
    });
    const requested = new URL(String(fetchImpl.mock.calls[0][0]));
    expect(requested.origin + requested.pathname).toBe("https://restapi.amap.com/v3/geocode/geo");
    expect(requested.searchParams.get("address")).toBe("北京市朝阳区");
    expect(requested.searchParams.get("key")).toBe("test-key");
  });

  it("maps empty admin levels to null and falls back to the query as address", async () => {
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () =>
      jsonResponse({ status: "1", geocodes: [{ city: [], district: [], location: "121.47,31.23" }] })
    );

    const geo = await makeGeocoder(fetchImpl).resolve("上海");

    expect(geo.resolved_address).toBe("上海");
    expect(geo.city).toBeNull();
    expect(geo.district).toBeNull();
    expect(geo.lng).toBe(121.47);
    expect(geo.lat).toBe(31.23);
  });

  it("fails when the service reports an error status", async () => {
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () =>
      jsonResponse({ status: "0", info: "INVALID_USER_KEY" })
    );

    const attempt = makeGeocoder(fetchImpl).resolve("北京");
    await expect(attempt).rejects.toBeInstanceOf(ResolutionError);
    await expect(attempt).rejects.toThrow("INVALID_USER_KEY");
  });

  it("fails when no candidate is found", async () => {
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () =>
      jsonResponse({ status: "1", geocodes: [] })
    );

    await expect(makeGeocoder(fetchImpl).resolve("不存在的地方")).rejects.toThrow(
      "No coordinates found for place: 不存在的地方"
    );
  });

  it("fails on a malformed location", async () => {
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () =>
      jsonResponse({ status: "1", geocodes: [{ location: "116.4;39.9" }] })
    );

    await expect(makeGeocoder(fetchImpl).resolve("北京")).rejects.toBeInstanceOf(ResolutionError);
  });

  it("surfaces transport failures as FetchError", async () => {
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(makeGeocoder(fetchImpl).resolve("北京")).rejects.toBeInstanceOf(FetchError);
  });

  it("serves repeated lookups from the cache", async () => {
    const cache = new MemoryCache();
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () => jsonResponse(amapSuccess));
    const geocoder = makeGeocoder(fetchImpl, cache);

    const first = await geocoder.resolve("北京市朝阳区");
    const second = await geocoder.resolve("北京市朝阳区");

    expect(second).toEqual(first);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    await expect(cache.get("live:amap:北京市朝阳区", 60)).resolves.toEqual(first);
  });

  it("refetches when the cached entry is unusable", async () => {
    const cache = new MemoryCache();
    await cache.set("live:amap:北京市朝阳区", { lng: "bad" });
    const fetchImpl = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>(async () => jsonResponse(amapSuccess));

    const geo = await makeGeocoder(fetchImpl, cache).resolve("北京市朝阳区");

    expect(geo.lng).toBe(116.443205);
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it("requires an API key", () => {
    expect(() => new AmapGeocoder({ apiKey: "", http: { timeoutMs: 1000, retries: 0 } })).toThrow(ConfigError);
  });
});

describe("MockGeocoder", () => {
  it("resolves every place to the fixed point under the mock namespace", async () => {
    const cache = new MemoryCache();
    const geocoder = new MockGeocoder({ cache: { cache, ttlSeconds: 60, namespace: "mock" } });

    const geo = await geocoder.resolve("成都");

    expect(geo).toMatchObject({ query_place: "成都", resolved_address: "成都", lng: 116.397428, lat: 39.90923 });
    await expect(cache.get("mock:amap:成都", 60)).resolves.toEqual(geo);
  });
});

describe("geocode helpers", () => {
  it("builds namespaced keys", () => {
    expect(geocodeCacheKey("live", "上海")).toBe("live:amap:上海");
    expect(geocodeCacheKey("mock", "上海")).toBe("mock:amap:上海");
  });

  it.each([
    ["116.4,39.9", { lng: 116.4, lat: 39.9 }],
    [" -0.5 , 51.5", { lng: -0.5, lat: 51.5 }],
    ["116.4", null],
    ["116.4,39.9,10", null],
    ["abc,39.9", null],
    [",39.9", null],
    ["", null]
  ])("parses location %j", (input, expected) => {
    expect(parseLocation(input)).toEqual(expected);
  });

  it("rejects cached values without coordinates", () => {
    expect(parseGeoResult({ query_place: "x", lng: 1 })).toBeNull();
    expect(parseGeoResult([1, 2])).toBeNull();
  });
});
