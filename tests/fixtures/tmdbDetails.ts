import { MovieDetails } from "../../src/services/tmdb.client";

const castNames = [
  "Lead Actor",
  "Second Actor",
  "Third Actor",
  "Fourth Actor",
  "Fifth Actor",
  "Sixth Actor",
  "Seventh Actor",
  "Eighth Actor",
  "Ninth Actor",
  "Tenth Actor",
  "Eleventh Actor",
  "Twelfth Actor",
];

export function sampleDetails(overrides: Partial<MovieDetails> = {}): MovieDetails {
  return {
    id: 27205,
    title: "Inception",
    overview: "A thief who steals secrets through dreams.",
    tagline: "Your mind is the scene of the crime.",
    poster_path: "/poster.jpg",
    backdrop_path: "/backdrop.jpg",
    release_date: "2010-07-15",
    runtime: 148,
    vote_average: 8.4,
    genres: [
      { id: 28, name: "Action" },
      { id: 878, name: "Science Fiction" },
    ],
    credits: {
      cast: castNames.map((name) => ({ name })),
      crew: [
        { name: "Some Editor", job: "Editor" },
        { name: "First Producer", job: "Producer" },
        { name: "The Director", job: "Director" },
        { name: "Second Producer", job: "Producer" },
        { name: "Exec", job: "Executive Producer" },
      ],
    },
    videos: {
      results: [
        { key: "teaser1", site: "YouTube", type: "Teaser" },
        { key: "vimeo1", site: "Vimeo", type: "Trailer" },
        { key: "abc123", site: "youtube", type: "trailer" },
        { key: "later", site: "YouTube", type: "Trailer" },
      ],
    },
    ...overrides,
  };
}
