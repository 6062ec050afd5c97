import { AxiosError, AxiosHeaders } from "axios";
import { TmdbClient } from "../../src/services/tmdb.client";
import { sampleDetails } from "../fixtures/tmdbDetails";

function makeClient(get: jest.Mock) {
  return new TmdbClient({ apiKey: "test-key" }, { get });
}

describe("TmdbClient.search", () => {
  test("sends the query, year and key and returns the results in order", async () => {
    const get = jest.fn().mockResolvedValue({
      data: { results: [{ id: 2, title: "B" }, { id: 1, title: "A" }] },
    });

    const res = await makeClient(get).search("Inception", "2010");

    expect(get).toHaveBeenCalledWith("/search/movie", {
      params: { api_key: "test-key", query: "Inception", year: "2010" },
    });
    expect(res).toEqual({ ok: true, value: [{ id: 2, title: "B" }, { id: 1, title: "A" }] });
  });

  test("omits the year when none is given", async () => {
    const get = jest.fn().mockResolvedValue({ data: { results: [] } });

    await makeClient(get).search("Inception");

    expect(get).toHaveBeenCalledWith("/search/movie", {
      params: { api_key: "test-key", query: "Inception" },
    });
  });

  test("a blank query never goes out", async () => {
    const get = jest.fn();
    expect(await makeClient(get).search("   ")).toEqual({ ok: true, value: [] });
    expect(get).not.toHaveBeenCalled();
  });

  test("HTTP failures become a failed result", async () => {
    const response = {
      status: 401,
      statusText: "Unauthorized",
      data: {},
      headers: {},
      config: { headers: new AxiosHeaders() },
    };
    const get = jest
      .fn()
      .mockRejectedValue(new AxiosError("Request failed", "ERR_BAD_REQUEST", undefined, null, response));

    expect(await makeClient(get).search("Inception")).toEqual({ ok: false, reason: "HTTP 401" });
  });

  test("timeouts become a failed result", async () => {
    const get = jest
      .fn()
      .mockRejectedValue(new AxiosError("timeout of 10000ms exceeded", "ECONNABORTED"));

    expect(await makeClient(get).search("Inception")).toEqual({
      ok: false,
      reason: "ECONNABORTED: timeout of 10000ms exceeded",
    });
  });

  test("hits without an id are skipped and the rest kept in order", async () => {
    const get = jest.fn().mockResolvedValue({
      data: { results: [{ title: "no id" }, { id: 7, title: "Good" }, { id: "8" }, { id: 9 }] },
    });
    expect(await makeClient(get).search("Inception")).toEqual({
      ok: true,
      value: [{ id: 7, title: "Good" }, { id: 9 }],
    });
  });

  test("a body without a results list is a failure", async () => {
    const get = jest.fn().mockResolvedValue({ data: { results: "nope" } });
    expect(await makeClient(get).search("Inception")).toEqual({
      ok: false,
      reason: "invalid search response",
    });
  });
});

describe("TmdbClient.details", () => {
  test("asks for videos and credits in one call", async () => {
    const details = sampleDetails();
    const get = jest.fn().mockResolvedValue({ data: details });

    const res = await makeClient(get).details(27205);

    expect(get).toHaveBeenCalledWith("/movie/27205", {
      params: { api_key: "test-key", append_to_response: "videos,credits" },
    });
    expect(res).toEqual({ ok: true, value: details });
  });

  test("network errors become a failed result", async () => {
    const get = jest.fn().mockRejectedValue(new Error("socket hang up"));
    expect(await makeClient(get).details(1)).toEqual({ ok: false, reason: "socket hang up" });
  });
});
