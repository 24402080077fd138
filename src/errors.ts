import { redactUrl } from "./utils/query";

export class GelbooruError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised before any request is made when arguments are missing, conflicting
 * or out of range.
 */
export class GelbooruArgumentError extends GelbooruError {}

/**
 * Gelbooru returns at most 1000 posts per request.
 */
export class GelbooruLimitError extends GelbooruArgumentError {}

export class GelbooruHttpError extends GelbooruError {
  /** Request URL without credentials. */
  readonly url: string;

  constructor(
    readonly status: number,
    url: string,
  ) {
    const safeUrl = redactUrl(url);
    super(`HTTP ${status} for ${safeUrl}`);
    this.url = safeUrl;
  }
}

export class GelbooruResponseError extends GelbooruError {}
