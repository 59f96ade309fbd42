import { describe, it, expect, vi, beforeEach } from "vitest";
import { buildFetcherUrl, createSimbriefClient } from "../simbrief-client";
import {
  buildOfp,
  PROVIDER_FMS,
  ROUTE_FILE_URL,
  toJson,
  toXml,
} from "@/test/ofp-fixtures";

function respondWith(body: string, status = 200) {
  return vi.fn<typeof fetch>(async () => new Response(body, { status }));
}

describe("simbrief-client", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  describe("buildFetcherUrl", () => {
    it("asks for JSON by default", () => {
      expect(buildFetcherUrl("123456")).toBe(
        "https://www.simbrief.com/api/xml.fetcher.php?userid=123456&json=1"
      );
    });

    it("leaves out the json flag for XML", () => {
      expect(buildFetcherUrl("123456", "http://localhost:8080/fetch", "xml")).toBe(
        "http://localhost:8080/fetch?userid=123456"
      );
    });
  });

  describe("fetchLatest", () => {
    it("returns the document and its OFP id", async () => {
      const body = toJson(buildOfp({ requestId: "2002" }));
      const fetchImpl = respondWith(body);
      const client = createSimbriefClient({ fetchImpl });

      const outcome = await client.fetchLatest("123456");

      expect(outcome).toEqual({ kind: "document", raw: body, ofpId: "2002" });
      expect(fetchImpl).toHaveBeenCalledTimes(1);
      expect(fetchImpl.mock.calls[0][0]).toBe(
        "https://www.simbrief.com/api/xml.fetcher.php?userid=123456&json=1"
      );
    });

    it("accepts an XML response", async () => {
      const body = toXml(buildOfp());
      const client = createSimbriefClient({
        format: "xml",
        fetchImpl: respondWith(body),
      });

      const outcome = await client.fetchLatest("123456");
      expect(outcome).toEqual({ kind: "document", raw: body, ofpId: "1001" });
    });

    it("reports a pilot without an OFP as not yet available", async () => {
      const body = JSON.stringify({
        fetch: { status: "Error: User 123456 has no flight plan on file" },
      });
      const client = createSimbriefClient({ fetchImpl: respondWith(body, 400) });

      expect(await client.fetchLatest("123456")).toEqual({
        kind: "not-yet-available",
        message: "Error: User 123456 has no flight plan on file",
      });
    });

    it("treats network failures as transient", async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => {
        throw new TypeError("fetch failed");
      });
      const client = createSimbriefClient({ fetchImpl });

      expect(await client.fetchLatest("123456")).toEqual({
        kind: "transient-error",
        message: "fetch failed",
      });
    });

    it("treats server errors and rate limiting as transient", async () => {
      for (const status of [500, 503, 429]) {
        const client = createSimbriefClient({
          fetchImpl: respondWith("<html>busy</html>", status),
        });
        expect(await client.fetchLatest("123456")).toEqual({
          kind: "transient-error",
          message: `SimBrief returned HTTP ${status}`,
        });
      }
    });

    it("reports an unreadable body as malformed", async () => {
      const client = createSimbriefClient({ fetchImpl: respondWith("oops") });
      expect(await client.fetchLatest("123456")).toEqual({
        kind: "malformed",
        message:
          "Unreadable SimBrief response (HTTP 200): Document is neither JSON nor XML",
      });
    });

    it("reports any other status as malformed", async () => {
      const body = JSON.stringify({ fetch: { status: "Error: Unknown UserID" } });
      const client = createSimbriefClient({ fetchImpl: respondWith(body, 400) });
      expect(await client.fetchLatest("123456")).toEqual({
        kind: "malformed",
        message: "SimBrief: Error: Unknown UserID",
      });
    });
  });

  describe("downloadRouteFile", () => {
    it("returns SimBrief's X-Plane route file", async () => {
      const fetchImpl = respondWith(PROVIDER_FMS);
      const client = createSimbriefClient({ fetchImpl });

      expect(await client.downloadRouteFile(ROUTE_FILE_URL)).toEqual({
        ok: true,
        content: PROVIDER_FMS,
      });
      expect(fetchImpl.mock.calls[0][0]).toBe(ROUTE_FILE_URL);
    });

    it("reports an HTTP failure", async () => {
      const client = createSimbriefClient({
        fetchImpl: respondWith("not found", 404),
      });
      expect(await client.downloadRouteFile(ROUTE_FILE_URL)).toEqual({
        ok: false,
        error: "HTTP 404",
      });
    });

    it("rejects a body that is not a route file", async () => {
      const client = createSimbriefClient({
        fetchImpl: respondWith("<html>login</html>"),
      });
      expect(await client.downloadRouteFile(ROUTE_FILE_URL)).toEqual({
        ok: false,
        error: "not an X-Plane route file",
      });
    });

    it("reports a network failure", async () => {
      const fetchImpl = vi.fn<typeof fetch>(async () => {
        throw new TypeError("fetch failed");
      });
      const client = createSimbriefClient({ fetchImpl });
      expect(await client.downloadRouteFile(ROUTE_FILE_URL)).toEqual({
        ok: false,
        error: "fetch failed",
      });
    });
  });
});
