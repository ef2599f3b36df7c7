/** Base class for every failure raised while fetching or reshaping data. */
export class ScraperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ScraperError'
  }
}

export class HttpError extends ScraperError {
  constructor(
    public url: string,
    public statusCode: number,
    public statusText: string,
  ) {
    super(`HTTP ${statusCode} ${statusText} fetching ${url}`)
    this.name = 'HttpError'
  }
}

/** The request never produced a response: timeout, DNS or connection failure. */
export class NetworkError extends ScraperError {
  constructor(
    public url: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'NetworkError'
  }
}

export class ConfigError extends ScraperError {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/** The source answered, but not in the shape we expected. */
export class ParseError extends ScraperError {
  constructor(
    public source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Unexpected response from ${source}: ${message}`, options)
    this.name = 'ParseError'
  }
}

export class NotFoundError extends ScraperError {
  constructor(message: string) {
    super(message)
    this.name = 'NotFoundError'
  }
}
