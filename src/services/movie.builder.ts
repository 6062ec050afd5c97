import { MovieRecord } from "../models/movie";
import { Category } from "../utils/caption";
import { MovieDetails } from "./tmdb.client";

export const DEFAULT_IMAGE_BASE_URL = "https://image.tmdb.org/t/p/original";
const MAX_ACTORS = 10;

export interface BuildOptions {
  imageBaseUrl?: string;
  now?: Date;
}

export interface FullRecordInput {
  title: string;
  mediaFileId: string;
  category: Category;
}

export interface MinimalRecordInput extends FullRecordInput {
  year: string | null;
  caption: string;
}

function imageUrl(base: string, path?: string | null) {
  return path ? `${base}${path}` : "";
}

function toNumber(value: unknown): number {
  const n = typeof value === "string" ? Number(value.trim()) : Number(value ?? 0);
  return Number.isFinite(n) ? n : 0;
}

function firstCrewName(details: MovieDetails, job: string): string {
  const crew = details.credits?.crew ?? [];
  const member = crew.find((c) => (c.job ?? "").trim().toLowerCase() === job);
  return member?.name ?? "";
}

function trailerUrl(details: MovieDetails): string {
  const videos = details.videos?.results ?? [];
  const trailer = videos.find(
    (v) =>
      (v.type ?? "").toLowerCase() === "trailer" &&
      (v.site ?? "").toLowerCase() === "youtube" &&
      Boolean(v.key),
  );
  return trailer?.key ? `https://www.youtube.com/watch?v=${trailer.key}` : "";
}

/** Record assembled from TMDB details plus what was read off the post. */
export function buildFullRecord(
  details: MovieDetails,
  input: FullRecordInput,
  options: BuildOptions = {},
): MovieRecord {
  const base = options.imageBaseUrl ?? DEFAULT_IMAGE_BASE_URL;
  const now = (options.now ?? new Date()).toISOString();

  const actors = (details.credits?.cast ?? [])
    .slice(0, MAX_ACTORS)
    .map((c) => c.name ?? "")
    .filter(Boolean)
    .join(", ");

  const genres = (details.genres ?? []).flatMap((g) => (g.name ? [g.name] : []));

  return {
    title: input.title || details.title || "",
    posterUrl: imageUrl(base, details.poster_path),
    backdropUrl: imageUrl(base, details.backdrop_path),
    description: details.overview ?? "",
    category: input.category,
    actors,
    director: firstCrewName(details, "director"),
    producer: firstCrewName(details, "producer"),
    rating: toNumber(details.vote_average),
    downloadLinks: [],
    telegramLinks: [input.mediaFileId],
    seasons: [],
    trailerLink: trailerUrl(details),
    genres,
    releaseDate: details.release_date ?? "",
    runtime: Math.trunc(toNumber(details.runtime)),
    tagline: details.tagline ?? "",
    createdAt: now,
    updatedAt: now,
    schemaVersion: 0,
  };
}

/** Record for a post nothing could be found for; carries no metadata at all. */
export function buildMinimalRecord(
  input: MinimalRecordInput,
  options: BuildOptions = {},
): MovieRecord {
  const now = (options.now ?? new Date()).toISOString();
  return {
    title: input.title || input.caption,
    posterUrl: "",
    backdropUrl: "",
    description: "",
    category: input.category,
    actors: "",
    director: "",
    producer: "",
    rating: 0,
    downloadLinks: [],
    telegramLinks: [input.mediaFileId],
    seasons: [],
    trailerLink: "",
    genres: [],
    releaseDate: input.year ?? "",
    runtime: 0,
    tagline: "",
    createdAt: now,
    updatedAt: now,
    schemaVersion: 0,
  };
}
