import { Types } from "mongoose";
import { MovieDocument, MovieKey, StoredMovie } from "../../src/models/movie";
import { MovieCollection } from "../../src/services/movie.store";

/** Map-backed stand-in for the movies collection. */
export class MemoryMovieCollection implements MovieCollection {
  readonly docs = new Map<string, StoredMovie>();
  writes: MovieDocument[] = [];
  failWith: Error | null = null;

  private static keyOf(key: MovieKey) {
    return JSON.stringify([key.title, key.releaseDate]);
  }

  async findByKey(key: MovieKey) {
    if (this.failWith) throw this.failWith;
    return this.docs.get(MemoryMovieCollection.keyOf(key)) ?? null;
  }

  async replaceByKey(key: MovieKey, doc: MovieDocument) {
    if (this.failWith) throw this.failWith;
    this.writes.push(doc);
    const k = MemoryMovieCollection.keyOf(key);
    const _id = this.docs.get(k)?._id ?? new Types.ObjectId();
    const stored: StoredMovie = { _id, ...doc };
    this.docs.set(k, stored);
    return stored;
  }
}
