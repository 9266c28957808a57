export class RiverRunnerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Location input is missing, ambiguous, or a seed lacks its chain. */
export class InvalidInputError extends RiverRunnerError {}

/** No flowline matched an id or an (expanded) bounding box. */
export class FeatureNotFoundError extends RiverRunnerError {}

/** The segment source failed to answer a query. */
export class ProviderError extends RiverRunnerError {}
