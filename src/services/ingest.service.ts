import { MovieRecord, StoredMovie } from "../models/movie";
import { detectCategory, parseCaption } from "../utils/caption";
import { StoreError } from "../utils/httpError";
import logger from "../utils/logger";
import { buildFullRecord, buildMinimalRecord } from "./movie.builder";
import { MovieCollection, upsertMovie } from "./movie.store";
import { MetadataProvider, MovieCandidate } from "./tmdb.client";

export interface InboundMedia {
  mediaFileId: string;
  caption: string | null;
}

export interface IngestDeps {
  metadata: MetadataProvider;
  movies: MovieCollection;
  imageBaseUrl?: string;
  clock?: () => Date;
}

export type IngestOutcome =
  | { status: "saved"; mode: "full" | "minimal"; movie: StoredMovie }
  | { status: "skipped"; reason: "details-unavailable" }
  | { status: "failed"; reason: "store-error"; error: StoreError };

async function searchOnce(
  metadata: MetadataProvider,
  query: string,
  year?: string | null,
): Promise<MovieCandidate[]> {
  const res = year ? await metadata.search(query, year) : await metadata.search(query);
  return res.ok ? res.value : [];
}

/**
 * Year-qualified title, then bare title, then the raw caption. Stops at the
 * first query that finds anything; a failed call counts as no hits.
 */
export async function findCandidates(
  metadata: MetadataProvider,
  searchTitle: string,
  year: string | null,
  caption: string,
): Promise<MovieCandidate[]> {
  let results: MovieCandidate[] = [];
  if (year) {
    results = await searchOnce(metadata, searchTitle, year);
  }
  if (!results.length) {
    results = await searchOnce(metadata, searchTitle);
  }
  if (!results.length && caption && caption !== searchTitle) {
    results = await searchOnce(metadata, caption);
  }
  return results;
}

async function save(
  deps: IngestDeps,
  mode: "full" | "minimal",
  record: MovieRecord,
): Promise<IngestOutcome> {
  try {
    const movie = await upsertMovie(deps.movies, record);
    logger.info(
      "Saved %s movie: %s (%s) id: %s",
      mode,
      movie.title,
      movie.releaseDate || "no date",
      String(movie._id),
    );
    return { status: "saved", mode, movie };
  } catch (err: unknown) {
    const error =
      err instanceof StoreError
        ? err
        : new StoreError(err instanceof Error ? err.message : String(err));
    logger.error("Failed to save movie %s: %s (%s)", record.title, error.message, error.code);
    return { status: "failed", reason: "store-error", error };
  }
}

/**
 * Handles one channel post: parse the caption, look the movie up, build the
 * record and upsert it. Never throws; the outcome says what happened.
 */
export async function ingestMedia(
  deps: IngestDeps,
  inbound: InboundMedia,
): Promise<IngestOutcome> {
  const caption = inbound.caption ?? "";
  const parsed = parseCaption(caption);
  const category = detectCategory(caption);
  const searchTitle = parsed.title || caption;
  const now = deps.clock ? deps.clock() : new Date();
  const buildOptions = { imageBaseUrl: deps.imageBaseUrl, now };

  const candidates = await findCandidates(deps.metadata, searchTitle, parsed.year, caption);

  if (!candidates.length) {
    logger.info("No TMDB result for caption: %s", caption);
    const record = buildMinimalRecord(
      {
        title: parsed.title,
        year: parsed.year,
        caption,
        mediaFileId: inbound.mediaFileId,
        category,
      },
      buildOptions,
    );
    return save(deps, "minimal", record);
  }

  const candidateId = candidates[0].id;
  const details = await deps.metadata.details(candidateId);
  if (!details.ok) {
    logger.info("TMDB details not available for id: %d (%s)", candidateId, details.reason);
    return { status: "skipped", reason: "details-unavailable" };
  }

  const record = buildFullRecord(
    details.value,
    { title: parsed.title, mediaFileId: inbound.mediaFileId, category },
    buildOptions,
  );
  return save(deps, "full", record);
}
