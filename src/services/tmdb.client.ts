import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import logger from "../utils/logger";

export type MetadataResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: string };

const CandidateSchema = z
  .object({
    id: z.number(),
    title: z.string().nullish(),
    release_date: z.string().nullish(),
  })
  .passthrough();

// hits are checked one by one so a single malformed entry does not sink the rest
const SearchResponseSchema = z.object({
  results: z.array(z.unknown()).default([]),
});

const NamedSchema = z.object({ name: z.string().nullish() }).passthrough();

const CrewSchema = NamedSchema.extend({ job: z.string().nullish() });

const VideoSchema = z
  .object({
    key: z.string().nullish(),
    site: z.string().nullish(),
    type: z.string().nullish(),
  })
  .passthrough();

// TMDB is loose about nulls; numeric fields are left unknown and coerced by
// the record builder
const DetailsSchema = z
  .object({
    id: z.number(),
    title: z.string().nullish(),
    overview: z.string().nullish(),
    tagline: z.string().nullish(),
    poster_path: z.string().nullish(),
    backdrop_path: z.string().nullish(),
    release_date: z.string().nullish(),
    runtime: z.unknown(),
    vote_average: z.unknown(),
    genres: z.array(NamedSchema).nullish(),
    credits: z
      .object({
        cast: z.array(NamedSchema).nullish(),
        crew: z.array(CrewSchema).nullish(),
      })
      .nullish(),
    videos: z.object({ results: z.array(VideoSchema).nullish() }).nullish(),
  })
  .passthrough();

export type MovieCandidate = z.infer<typeof CandidateSchema>;
export type MovieDetails = z.infer<typeof DetailsSchema>;

export interface MetadataProvider {
  search(query: string, year?: string | null): Promise<MetadataResult<MovieCandidate[]>>;
  details(id: number): Promise<MetadataResult<MovieDetails>>;
}

export interface TmdbClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export type HttpGetter = Pick<AxiosInstance, "get">;

function describeError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    if (err.response) return `HTTP ${err.response.status}`;
    return err.code ? `${err.code}: ${err.message}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Thin TMDB v3 client. Every call is a single attempt; failures come back as
 * `{ ok: false }` after being logged.
 */
export class TmdbClient implements MetadataProvider {
  private readonly http: HttpGetter;
  private readonly apiKey: string;

  constructor(options: TmdbClientOptions, http?: HttpGetter) {
    this.apiKey = options.apiKey;
    this.http =
      http ??
      axios.create({
        baseURL: options.baseUrl ?? "https://api.themoviedb.org/3",
        timeout: options.timeoutMs ?? 10000,
      });
  }

  async search(query: string, year?: string | null): Promise<MetadataResult<MovieCandidate[]>> {
    const q = query.trim();
    if (!q) return { ok: true, value: [] };

    const params: Record<string, string> = { api_key: this.apiKey, query: q };
    if (year) params.year = year;
    try {
      const res = await this.http.get<unknown>("/search/movie", { params });
      const parsed = SearchResponseSchema.safeParse(res.data);
      if (!parsed.success) {
        logger.error("TMDB search returned an unexpected body for %s", q);
        return { ok: false, reason: "invalid search response" };
      }
      const candidates = parsed.data.results.flatMap((hit) => {
        const candidate = CandidateSchema.safeParse(hit);
        return candidate.success ? [candidate.data] : [];
      });
      const dropped = parsed.data.results.length - candidates.length;
      if (dropped > 0) {
        logger.warn("TMDB search for %s: skipped %d hits without an id", q, dropped);
      }
      return { ok: true, value: candidates };
    } catch (err: unknown) {
      const reason = describeError(err);
      logger.error("TMDB search failed for %s: %s", q, reason);
      return { ok: false, reason };
    }
  }

  async details(id: number): Promise<MetadataResult<MovieDetails>> {
    try {
      const res = await this.http.get<unknown>(`/movie/${id}`, {
        params: { api_key: this.apiKey, append_to_response: "videos,credits" },
      });
      const parsed = DetailsSchema.safeParse(res.data);
      if (!parsed.success) {
        logger.error("TMDB details returned an unexpected body for id %d", id);
        return { ok: false, reason: "invalid details response" };
      }
      return { ok: true, value: parsed.data };
    } catch (err: unknown) {
      const reason = describeError(err);
      logger.error("TMDB details failed for id %d: %s", id, reason);
      return { ok: false, reason };
    }
  }
}
