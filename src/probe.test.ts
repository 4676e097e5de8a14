import { describe, expect, it } from "vitest";
import { classifyResponse, probePlace } from "./probe";
import { okReply, stubHttp } from "./stubHttp";

const BASE_URL = "https://places.test/textsearch/json";

describe("classifyResponse", () => {
  it("counts results when the upstream status is OK", () => {
    const body = JSON.stringify({ status: "OK", results: [{}, {}, {}] });
    expect(classifyResponse(200, body)).toEqual({ success: true, resultsCount: 3, apiStatus: "OK" });
  });

  it("treats OK without a results list as zero results", () => {
    expect(classifyResponse(200, '{"status":"OK"}')).toEqual({ success: true, resultsCount: 0, apiStatus: "OK" });
  });

  it("captures the upstream message for denied and invalid requests", () => {
    const denied = JSON.stringify({ status: "REQUEST_DENIED", error_message: "The provided API key is invalid." });
    expect(classifyResponse(200, denied)).toEqual({
      success: false,
      resultsCount: 0,
      apiStatus: "REQUEST_DENIED",
      error: "The provided API key is invalid.",
    });
    expect(classifyResponse(200, '{"status":"INVALID_REQUEST"}')).toEqual({
      success: false,
      resultsCount: 0,
      apiStatus: "INVALID_REQUEST",
      error: "API request denied",
    });
  });

  it("maps an exhausted quota to a fixed rate limit message", () => {
    expect(classifyResponse(200, '{"status":"OVER_QUERY_LIMIT"}')).toEqual({
      success: false,
      resultsCount: 0,
      apiStatus: "OVER_QUERY_LIMIT",
      error: "Rate limit exceeded",
    });
  });

  it("fails other labels without an error message", () => {
    expect(classifyResponse(200, '{"status":"ZERO_RESULTS","results":[]}')).toEqual({
      success: false,
      resultsCount: 0,
      apiStatus: "ZERO_RESULTS",
    });
    expect(classifyResponse(200, "{}")).toEqual({ success: false, resultsCount: 0, apiStatus: "UNKNOWN" });
  });

  it("reports bodies that are not a JSON object as invalid", () => {
    const invalid = { success: false, resultsCount: 0, apiStatus: "UNKNOWN", error: "Invalid JSON response" };
    expect(classifyResponse(200, "<html>busy</html>")).toEqual(invalid);
    expect(classifyResponse(200, "[1,2]")).toEqual(invalid);
    expect(classifyResponse(200, "")).toEqual(invalid);
    expect(classifyResponse(200, "null")).toEqual(invalid);
  });

  it("keeps the upstream label when other fields have unexpected types", () => {
    const quota = JSON.stringify({ status: "OVER_QUERY_LIMIT", error_message: null, results: [] });
    expect(classifyResponse(200, quota)).toEqual({
      success: false,
      resultsCount: 0,
      apiStatus: "OVER_QUERY_LIMIT",
      error: "Rate limit exceeded",
    });
    expect(classifyResponse(200, '{"status":"OK","results":null}')).toEqual({
      success: true,
      resultsCount: 0,
      apiStatus: "OK",
    });
    expect(classifyResponse(200, '{"status":"REQUEST_DENIED","error_message":42}')).toEqual({
      success: false,
      resultsCount: 0,
      apiStatus: "REQUEST_DENIED",
      error: "API request denied",
    });
    expect(classifyResponse(200, '{"status":7}')).toEqual({ success: false, resultsCount: 0, apiStatus: "UNKNOWN" });
  });

  it("maps transport statuses", () => {
    expect(classifyResponse(403, "").error).toBe("Forbidden (403)");
    expect(classifyResponse(429, "").error).toBe("Too Many Requests (429)");
    expect(classifyResponse(503, "").error).toBe("HTTP 503");
    expect(classifyResponse(503, "").apiStatus).toBe("UNKNOWN");
  });
});

describe("probePlace", () => {
  it("sends the built parameters and records a successful outcome", async () => {
    const stub = stubHttp(() => okReply(5));
    const record = await probePlace(stub.http, { baseUrl: BASE_URL, apiKey: "test-key", workerId: 4 });

    expect(stub.requests).toHaveLength(1);
    expect(stub.requests[0].url).toBe(BASE_URL);
    expect(stub.requests[0].params).toEqual({
      query: "hospital chile",
      key: "test-key",
      location: "-33.4489,-70.6693",
      radius: 50000,
      language: "es",
    });
    expect(record).toMatchObject({
      workerId: 4,
      query: "hospital chile",
      statusCode: 200,
      success: true,
      resultsCount: 5,
      apiStatus: "OK",
    });
    expect(record.error).toBeUndefined();
    expect(record.responseTimeMs).toBeGreaterThanOrEqual(0);
    expect(Number.isNaN(Date.parse(record.timestamp))).toBe(false);
  });

  it("records non-200 responses without throwing", async () => {
    const stub = stubHttp(() => ({ status: 429 }));
    const record = await probePlace(stub.http, { baseUrl: BASE_URL, apiKey: "test-key", workerId: 1 });
    expect(record).toMatchObject({ statusCode: 429, success: false, error: "Too Many Requests (429)" });
  });

  it("turns a connection failure into a status 0 record", async () => {
    const stub = stubHttp(() => ({ fail: "connect ECONNREFUSED 127.0.0.1:443", code: "ECONNREFUSED" }));
    const record = await probePlace(stub.http, { baseUrl: BASE_URL, apiKey: "test-key", workerId: 2 });

    expect(record).toMatchObject({
      workerId: 2,
      query: "pharmacy chile",
      responseTimeMs: 0,
      statusCode: 0,
      success: false,
      resultsCount: 0,
      error: "connect ECONNREFUSED 127.0.0.1:443",
    });
    expect(record.apiStatus).toBeUndefined();
  });

  it("turns a timeout into a status 0 record", async () => {
    const stub = stubHttp(() => ({ fail: "timeout of 30000ms exceeded", code: "ECONNABORTED" }));
    const record = await probePlace(stub.http, { baseUrl: BASE_URL, apiKey: "test-key", workerId: 3 });
    expect(record.statusCode).toBe(0);
    expect(record.error).toBe("timeout of 30000ms exceeded");
  });
});
