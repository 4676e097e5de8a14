import type { PlaceRequestParams } from "./types";

export type QueryTemplate = {
  readonly queries: readonly string[];
  readonly location: string;
  readonly radius: number;
  readonly language: string;
};

export const QUERY_TEMPLATE: QueryTemplate = Object.freeze({
  queries: Object.freeze([
    "copec",
    "restaurant santiago",
    "pharmacy chile",
    "bank santiago",
    "hospital chile",
    "shopping mall",
    "gas station",
    "coffee shop",
    "supermarket",
    "hotel santiago",
  ]),
  location: "-33.4489,-70.6693", // Santiago, Chile
  radius: 50_000,
  language: "es",
});

/**
 * Parameters for one request. Worker ids start at 1, so worker `i` gets
 * `queries[i % queries.length]`: worker 1 asks for the second seed query and
 * worker 10 wraps around to the first.
 */
export function buildRequestParams(
  workerId: number,
  apiKey: string,
  template: QueryTemplate = QUERY_TEMPLATE
): PlaceRequestParams {
  const { queries } = template;
  const query = queries[workerId % queries.length];
  return {
    query,
    key: apiKey,
    location: template.location,
    radius: template.radius,
    language: template.language,
  };
}
