import { Collection, Model } from "mongoose";
import {
  MovieDocument,
  MovieKey,
  MovieRecord,
  StoredMovie,
  movieKey,
  toMovieDocument,
} from "../models/movie";
import { StoreError } from "../utils/httpError";
import logger from "../utils/logger";

/**
 * The slice of a document collection the upsert needs. Mongo backs it in
 * production; tests hand in an in-memory one.
 */
export interface MovieCollection {
  findByKey(key: MovieKey): Promise<StoredMovie | null>;
  /** find-one-and-replace with upsert, returning the document after the write */
  replaceByKey(key: MovieKey, doc: MovieDocument): Promise<StoredMovie | null>;
}

type RawMovies = Pick<Collection<StoredMovie>, "findOne" | "findOneAndReplace">;

export class MongoMovieCollection implements MovieCollection {
  private readonly raw: RawMovies;

  constructor(raw: RawMovies) {
    this.raw = raw;
  }

  // raw driver collection: replacing through the model would re-cast the
  // document and mongoose decides the key order
  static fromModel(model: Model<MovieDocument>) {
    return new MongoMovieCollection(
      model.db.collection<StoredMovie>(model.collection.collectionName),
    );
  }

  findByKey(key: MovieKey) {
    return this.raw.findOne(movieKey(key));
  }

  replaceByKey(key: MovieKey, doc: MovieDocument) {
    return this.raw.findOneAndReplace(movieKey(key), doc, {
      upsert: true,
      returnDocument: "after",
    });
  }
}

function isDuplicateKey(err: unknown) {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === 11000
  );
}

/**
 * Writes a record under its (title, releaseDate) key. An existing record keeps
 * its createdAt; every other field is replaced.
 */
export async function upsertMovie(
  collection: MovieCollection,
  record: MovieRecord,
): Promise<StoredMovie> {
  const key = movieKey(record);
  try {
    const existing = await collection.findByKey(key);
    const toWrite: MovieRecord = existing?.createdAt
      ? { ...record, createdAt: existing.createdAt }
      : record;

    const stored = await collection.replaceByKey(key, toMovieDocument(toWrite));
    if (!stored) {
      throw new StoreError("upsert returned no document", "UPSERT_EMPTY", key);
    }
    logger.debug("upserted %s (%s) existing=%s", key.title, key.releaseDate, Boolean(existing));
    return stored;
  } catch (err: unknown) {
    if (err instanceof StoreError) throw err;
    // a concurrent insert of the same key won the unique index
    if (isDuplicateKey(err)) {
      throw new StoreError("write conflict on movie key", "WRITE_CONFLICT", key);
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new StoreError(`failed to upsert movie: ${message}`, "STORE_ERROR", key);
  }
}
