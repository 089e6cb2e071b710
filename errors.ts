export class PrStatsError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing, invalid or under-scoped GitHub token */
export class AuthError extends PrStatsError {}

export class RateLimitError extends PrStatsError {
  readonly resetAt: Date | null;

  constructor(message: string, resetAt: Date | null, options?: ErrorOptions) {
    super(message, options);
    this.resetAt = resetAt;
  }
}

/** The request never got an HTTP response */
export class NetworkError extends PrStatsError {}

export class GitHubApiError extends PrStatsError {
  readonly status: number | null;

  constructor(message: string, status: number | null, options?: ErrorOptions) {
    super(message, options);
    this.status = status;
  }
}

export class EmptyOrgError extends PrStatsError {
  readonly organization: string;

  constructor(organization: string) {
    super(`No repositories found in organization ${organization}`);
    this.organization = organization;
  }
}

export class ConfigError extends PrStatsError {}

export class SlackError extends PrStatsError {}
