export type ScraperErrorCode = 'LOGIN_FIELD_NOT_FOUND' | 'LOGIN_TIMEOUT' | 'SESSION_LOST' | 'TOTAL_DATA_LOSS';

export type ErrorContext = Readonly<Record<string, string | number | boolean | null>>;

export class PortfolioScraperError extends Error {
  readonly code: ScraperErrorCode;
  readonly context: ErrorContext;

  constructor(code: ScraperErrorCode, message: string, context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

export class LoginFieldNotFound extends PortfolioScraperError {
  constructor(url: string) {
    super('LOGIN_FIELD_NOT_FOUND', `No identity input found on the login page (${url}).`, {
      url,
      stage: 'login',
    });
  }
}

export class LoginTimeout extends PortfolioScraperError {
  constructor(url: string, waitedMs: number) {
    super('LOGIN_TIMEOUT', `Authentication was not confirmed within ${waitedMs} ms (${url}).`, {
      url,
      stage: 'login',
      waitedMs,
    });
  }
}

export class SessionLost extends PortfolioScraperError {
  constructor(requestedUrl: string, landedUrl: string) {
    super('SESSION_LOST', `Redirected to the login surface while loading ${requestedUrl}.`, {
      url: requestedUrl,
      landedUrl,
      stage: 'scraping',
    });
  }
}

export class TotalDataLoss extends PortfolioScraperError {
  constructor(source: string) {
    super('TOTAL_DATA_LOSS', `Both sub-portfolios are empty after fallback (${source}).`, {
      source,
      stage: 'assembling',
    });
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
