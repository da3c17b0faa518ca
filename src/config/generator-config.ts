import { REQUEST_CATALOG } from "../catalog/requests.js";
import { RESPONSE_CATALOG } from "../catalog/responses.js";
import type { Catalog } from "../catalog/types.js";

export type FixtureKind = "request" | "response";

export interface GeneratorConfig {
  /** What the catalog holds; used in the summary line. */
  kind: FixtureKind;
  /** Directory the fixtures are written to, relative to the working directory unless absolute. */
  outputDir: string;
  /** Fixtures to write, in order. */
  catalog: Catalog;
}

export function requestGeneratorConfig(): GeneratorConfig {
  return {
    kind: "request",
    outputDir: "sample_requests",
    catalog: REQUEST_CATALOG,
  };
}

export function responseGeneratorConfig(): GeneratorConfig {
  return {
    kind: "response",
    outputDir: "sample_responses",
    catalog: RESPONSE_CATALOG,
  };
}
