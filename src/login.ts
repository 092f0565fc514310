import type { Credential } from './bootstrap/env.js';
import type { Logger } from './bootstrap/logger.js';
import {
  DEFAULT_TIMING,
  LOGIN_SURFACE_PATTERN,
  NON_IDENTITY_INPUT_TYPES,
  SESSION_MARKERS,
  type Timing,
} from './config.js';
import type { DiagnosticSink } from './debugging.js';
import { describeError, LoginFieldNotFound, LoginTimeout } from './errors.js';
import type { ControlDescriptor, FillOptions, InputDescriptor, PortalPage, SessionCookie } from './page.js';
import { safeGoto } from './utils/navigation.js';

export enum SessionState {
  Unauthenticated = 'unauthenticated',
  Authenticating = 'authenticating',
  Authenticated = 'authenticated',
  Failed = 'failed',
}

export type AuthSignal = 'already-authenticated' | 'location' | 'cookie' | 'content';

const TRANSITIONS: Readonly<Record<SessionState, readonly SessionState[]>> = {
  [SessionState.Unauthenticated]: [SessionState.Authenticating, SessionState.Authenticated, SessionState.Failed],
  [SessionState.Authenticating]: [SessionState.Authenticated, SessionState.Failed],
  [SessionState.Authenticated]: [],
  [SessionState.Failed]: [],
};

export class Session {
  private current: SessionState = SessionState.Unauthenticated;
  private confirmedBy: AuthSignal | null = null;
  private pollAttempts = 0;

  get state(): SessionState {
    return this.current;
  }

  /** The signal that confirmed authentication, once authenticated. */
  get signal(): AuthSignal | null {
    return this.confirmedBy;
  }

  get attempts(): number {
    return this.pollAttempts;
  }

  get isAuthenticated(): boolean {
    return this.current === SessionState.Authenticated;
  }

  transition(next: SessionState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid session transition ${this.current} -> ${next}`);
    }
    this.current = next;
  }

  authenticate(signal: AuthSignal): void {
    this.transition(SessionState.Authenticated);
    this.confirmedBy = signal;
  }

  fail(): void {
    this.transition(SessionState.Failed);
  }

  recordAttempt(): void {
    this.pollAttempts += 1;
  }
}

export function isLoginSurface(url: string): boolean {
  try {
    const parsed = new URL(url);
    return LOGIN_SURFACE_PATTERN.test(parsed.pathname) || LOGIN_SURFACE_PATTERN.test(parsed.hash);
  } catch {
    return LOGIN_SURFACE_PATTERN.test(url);
  }
}

export function pickIdentityField(inputs: readonly InputDescriptor[]): InputDescriptor | null {
  return (
    inputs.find(
      (input) => input.visible && !input.disabled && !NON_IDENTITY_INPUT_TYPES.has(input.type.toLowerCase() || 'text'),
    ) ?? null
  );
}

/** Visible, enabled password inputs in document order. */
export function pickSecretFields(inputs: readonly InputDescriptor[]): InputDescriptor[] {
  return inputs.filter((input) => input.visible && !input.disabled && input.type.toLowerCase() === 'password');
}

const normalizeControlText = (text: string): string => text.replace(/\s+/g, ' ').trim().toLowerCase();

export function pickSubmitControl(controls: readonly ControlDescriptor[]): ControlDescriptor | null {
  const visible = controls.filter((control) => control.visible);
  const typed = visible.find((control) => control.type.toLowerCase() === 'submit');
  if (typed) {
    return typed;
  }

  return (
    visible.find((control) => {
      const text = normalizeControlText(control.text);
      return SESSION_MARKERS.submitTexts.some((marker) => text.includes(marker));
    }) ?? null
  );
}

export function hasSessionCookie(cookies: readonly SessionCookie[]): boolean {
  return cookies.some((cookie) => {
    const name = cookie.name.toLowerCase();
    return SESSION_MARKERS.cookieKeywords.some((keyword) => name.includes(keyword));
  });
}

export function matchesAuthenticatedContent(text: string): boolean {
  const lowered = text.toLowerCase();
  return SESSION_MARKERS.contentKeywords.some((keyword) => lowered.includes(keyword));
}

/** `trader@example.com` becomes `trad***@example.com`. */
export function maskIdentity(identity: string): string {
  const at = identity.indexOf('@');
  const domain = at >= 0 ? identity.slice(at) : '';
  return `${identity.slice(0, 4)}***${domain}`;
}

export interface LoginOptions {
  readonly logger: Logger;
  readonly diagnostics: DiagnosticSink;
  readonly timing?: Timing;
}

async function readSessionCookie(page: PortalPage, logger: Logger): Promise<boolean> {
  try {
    return hasSessionCookie(await page.cookies());
  } catch (error) {
    logger.warn('[login] cookie read failed', { url: page.url(), error });
    return false;
  }
}

async function readAuthenticatedContent(page: PortalPage, logger: Logger): Promise<boolean> {
  try {
    return matchesAuthenticatedContent(await page.bodyText());
  } catch (error) {
    logger.warn('[login] body read failed', { url: page.url(), error });
    return false;
  }
}

/**
 * Polls for the first authentication signal. Location and cookies are
 * checked on every tick; page content only once the polling window is
 * exhausted.
 */
export async function pollForAuthentication(
  page: PortalPage,
  session: Session,
  timing: Timing,
  logger: Logger,
): Promise<AuthSignal | null> {
  const maxAttempts = Math.max(1, Math.ceil(timing.loginPollTimeoutMs / timing.loginPollIntervalMs));

  for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
    await page.waitForTimeout(timing.loginPollIntervalMs);
    session.recordAttempt();

    if (!isLoginSurface(page.url())) {
      return 'location';
    }
    if (await readSessionCookie(page, logger)) {
      return 'cookie';
    }
  }

  return (await readAuthenticatedContent(page, logger)) ? 'content' : null;
}

/** Tries each password input in turn; one that cannot be filled in time is skipped. */
async function fillSecret(page: PortalPage, secret: string, typing: FillOptions, logger: Logger): Promise<boolean> {
  for (const field of pickSecretFields(await page.listInputs())) {
    try {
      await page.fillInput(field.index, secret, typing);
      return true;
    } catch (error) {
      logger.warn('[login] password input not fillable', { index: field.index, error: describeError(error) });
    }
  }
  return false;
}

async function submitCredentials(
  page: PortalPage,
  identityField: InputDescriptor,
  credential: Credential,
  timing: Timing,
  logger: Logger,
): Promise<void> {
  const typing: FillOptions = { delay: timing.keystrokeDelayMs, timeout: timing.selectorTimeoutMs };
  await page.fillInput(identityField.index, credential.identity, typing);

  if (!(await fillSecret(page, credential.secret, typing, logger))) {
    logger.info('[login] no fillable password input, typing the secret after Tab');
    await page.focusInput(identityField.index);
    await page.pressKey('Tab');
    await page.waitForTimeout(timing.tabSettleMs);
    await page.typeText(credential.secret, typing);
  }

  const control = pickSubmitControl(await page.listControls(timing.selectorTimeoutMs));
  if (control) {
    logger.debug('[login] clicking submit control', { type: control.type, text: control.text });
    await page.clickControl(control.index);
  } else {
    logger.debug('[login] no submit control, pressing Enter');
    await page.pressKey('Enter');
  }
}

export async function login(
  page: PortalPage,
  loginUrl: string,
  credential: Credential,
  options: LoginOptions,
): Promise<Session> {
  const { logger, diagnostics, timing = DEFAULT_TIMING } = options;
  const session = new Session();

  try {
    await safeGoto(page, loginUrl, { waitUntil: 'domcontentloaded', timeoutMs: timing.pageLoadTimeoutMs });
    await page.waitForTimeout(timing.loginSettleMs);
  } catch (error) {
    session.fail();
    throw error;
  }

  if (!isLoginSurface(page.url())) {
    session.authenticate('already-authenticated');
    logger.info('[login] already authenticated', { url: page.url() });
    return session;
  }

  session.transition(SessionState.Authenticating);
  logger.info('[login] submitting credentials', { url: page.url(), identity: maskIdentity(credential.identity) });

  const identityField = pickIdentityField(await page.listInputs());
  if (!identityField) {
    await diagnostics.capture('no_identity_field', page);
    session.fail();
    throw new LoginFieldNotFound(page.url());
  }

  try {
    await submitCredentials(page, identityField, credential, timing, logger);
  } catch (error) {
    session.fail();
    throw error;
  }

  const signal = await pollForAuthentication(page, session, timing, logger);
  if (!signal) {
    await diagnostics.capture('login_failed', page);
    session.fail();
    throw new LoginTimeout(page.url(), timing.loginPollTimeoutMs);
  }

  session.authenticate(signal);
  logger.info('[login] authenticated', { signal, attempts: session.attempts, url: page.url() });
  await page.waitForTimeout(timing.postLoginSettleMs);
  return session;
}
