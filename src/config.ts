export const DEFAULT_PORTAL_BASE_URL = 'https://carnivoretradedesk.com';
export const LOGIN_PATH = '/login';

// Every location whose path or hash mentions this token is treated as the login surface.
export const LOGIN_SURFACE_PATTERN = /login/i;

export const DEFAULT_OUTPUT_PATH = 'data/carnivore_portfolios.json';
export const DEFAULT_DIAGNOSTICS_DIR = 'data';
export const DEFAULT_LOG_DIR = 'logs';

export interface Timing {
  readonly pageLoadTimeoutMs: number;
  readonly selectorTimeoutMs: number;
  readonly loginPollIntervalMs: number;
  readonly loginPollTimeoutMs: number;
  readonly loginSettleMs: number;
  readonly postLoginSettleMs: number;
  readonly pageSettleMs: number;
  readonly keystrokeDelayMs: number;
  readonly tabSettleMs: number;
  /** Navigation attempts per portfolio URL; login navigates once. */
  readonly pageLoadAttempts: number;
  readonly pageRetryDelayMs: number;
}

export const DEFAULT_TIMING: Timing = {
  pageLoadTimeoutMs: 30_000,
  selectorTimeoutMs: 2_000,
  loginPollIntervalMs: 500,
  loginPollTimeoutMs: 15_000,
  loginSettleMs: 3_000,
  postLoginSettleMs: 2_000,
  pageSettleMs: 4_000,
  keystrokeDelayMs: 50,
  tabSettleMs: 300,
  pageLoadAttempts: 2,
  pageRetryDelayMs: 1_000,
};

export interface LaunchOptions {
  readonly headless: boolean;
  readonly userAgent: string;
  readonly locale: string;
  readonly viewport: { readonly width: number; readonly height: number };
}

export const defaultLaunchOptions: LaunchOptions = {
  headless: true,
  userAgent:
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36',
  locale: 'en-US',
  viewport: { width: 1440, height: 900 },
};

export const SESSION_MARKERS = {
  cookieKeywords: ['token', 'auth', 'session', 'jwt', 'access'],
  contentKeywords: ['dashboard', 'portfolio', 'sector', 'logout', 'sign out'],
  submitTexts: ['login', 'log in', 'sign in'],
} as const;

// Input types that can never hold the identity (email/username) value.
export const NON_IDENTITY_INPUT_TYPES: ReadonlySet<string> = new Set([
  'password',
  'hidden',
  'submit',
  'button',
  'checkbox',
  'radio',
  'file',
  'image',
  'reset',
]);

export const DIAGNOSTIC_TEXT_LIMIT = 5_000;

export type SubPortfolio = 'sectorRotation' | 'longTerm';

export const SUB_PORTFOLIOS: readonly SubPortfolio[] = ['sectorRotation', 'longTerm'];

export interface PageTarget {
  readonly portfolio: SubPortfolio;
  readonly label: string;
  readonly url: string;
  readonly alternateUrls: readonly string[];
}

export const buildPortalUrl = (baseUrl: string, path: string): string => new URL(path, baseUrl).toString();

export const buildLoginUrl = (baseUrl: string): string => buildPortalUrl(baseUrl, LOGIN_PATH);

export const defaultPageTargets = (baseUrl: string): readonly PageTarget[] => [
  {
    portfolio: 'sectorRotation',
    label: 'sector_rotation',
    url: buildPortalUrl(baseUrl, '/sector-heaters'),
    alternateUrls: [],
  },
  {
    portfolio: 'longTerm',
    label: 'long_term',
    url: buildPortalUrl(baseUrl, '/longterm'),
    alternateUrls: [buildPortalUrl(baseUrl, '/long-term')],
  },
];

/** Domain recorded as the snapshot `source`, without a leading `www.`. */
export const sourceDomain = (baseUrl: string): string => {
  try {
    return new URL(baseUrl).hostname.replace(/^www\./i, '');
  } catch {
    return baseUrl;
  }
};
