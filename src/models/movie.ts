import { Schema, Connection, Model, Types } from "mongoose";
import { CATEGORIES, Category } from "../utils/caption";

export interface MovieRecord {
  title: string;
  posterUrl: string;
  backdropUrl: string;
  description: string;
  category: Category;
  actors: string;
  director: string;
  producer: string;
  rating: number;
  downloadLinks: string[];
  telegramLinks: string[];
  seasons: unknown[];
  trailerLink: string;
  genres: string[];
  releaseDate: string;
  runtime: number;
  tagline: string;
  createdAt: string;
  updatedAt: string;
  schemaVersion: 0;
}

// What lands in the collection. The website reading it is mongoose based and
// expects the version under __v.
export type MovieDocument = Omit<MovieRecord, "schemaVersion"> & { __v: 0 };

export type StoredMovie = MovieDocument & { _id: Types.ObjectId };

export type MovieKey = Pick<MovieRecord, "title" | "releaseDate">;

// Persisted key order. Consumers read documents positionally, so every write
// must emit exactly this sequence.
export const MOVIE_FIELDS = [
  "title",
  "posterUrl",
  "backdropUrl",
  "description",
  "category",
  "actors",
  "director",
  "producer",
  "rating",
  "downloadLinks",
  "telegramLinks",
  "seasons",
  "trailerLink",
  "genres",
  "releaseDate",
  "runtime",
  "tagline",
  "createdAt",
  "updatedAt",
  "__v",
] as const satisfies readonly (keyof MovieDocument)[];

export function movieKey(record: MovieKey): MovieKey {
  return { title: record.title, releaseDate: record.releaseDate };
}

/** Serializes a record into a plain document whose keys follow MOVIE_FIELDS. */
export function toMovieDocument(record: MovieRecord): MovieDocument {
  return {
    title: record.title,
    posterUrl: record.posterUrl,
    backdropUrl: record.backdropUrl,
    description: record.description,
    category: record.category,
    actors: record.actors,
    director: record.director,
    producer: record.producer,
    rating: record.rating,
    downloadLinks: [...record.downloadLinks],
    telegramLinks: [...record.telegramLinks],
    seasons: [...record.seasons],
    trailerLink: record.trailerLink,
    genres: [...record.genres],
    releaseDate: record.releaseDate,
    runtime: record.runtime,
    tagline: record.tagline,
    createdAt: record.createdAt,
    updatedAt: record.updatedAt,
    __v: record.schemaVersion,
  };
}

// Declared in the same order as MOVIE_FIELDS. Writes bypass mongoose casting
// (see movie.store.ts) so the schema mostly exists to own the indexes.
export const MovieSchema = new Schema<MovieDocument>(
  {
    title: { type: String, default: "" },
    posterUrl: { type: String, default: "" },
    backdropUrl: { type: String, default: "" },
    description: { type: String, default: "" },
    category: { type: String, enum: [...CATEGORIES], default: "hollywood" },
    actors: { type: String, default: "" },
    director: { type: String, default: "" },
    producer: { type: String, default: "" },
    rating: { type: Number, default: 0 },
    downloadLinks: { type: [String], default: [] },
    telegramLinks: { type: [String], default: [] },
    seasons: { type: [Schema.Types.Mixed], default: [] },
    trailerLink: { type: String, default: "" },
    genres: { type: [String], default: [] },
    releaseDate: { type: String, default: "" },
    runtime: { type: Number, default: 0 },
    tagline: { type: String, default: "" },
    createdAt: { type: String },
    updatedAt: { type: String },
  },
  { versionKey: "__v" },
);

// one record per (title, releaseDate); concurrent upserts of a new key cannot
// both insert
MovieSchema.index({ title: 1, releaseDate: 1 }, { unique: true });

export function getMovieModel(
  connection: Connection,
  collectionName: string,
): Model<MovieDocument> {
  return connection.model<MovieDocument>("Movie", MovieSchema, collectionName);
}
