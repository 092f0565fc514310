import type { Locator, Page } from 'playwright';

export type LoadState = 'domcontentloaded' | 'load' | 'networkidle';

export interface GotoOptions {
  readonly waitUntil: LoadState;
  readonly timeout: number;
}

export interface InputDescriptor {
  readonly index: number;
  readonly type: string;
  readonly visible: boolean;
  readonly disabled: boolean;
}

export interface ControlDescriptor {
  readonly index: number;
  readonly type: string;
  readonly text: string;
  readonly visible: boolean;
}

export interface SessionCookie {
  readonly name: string;
  readonly domain: string;
}

export interface TypingOptions {
  readonly delay: number;
}

export interface FillOptions extends TypingOptions {
  /** Bounds the click and each keystroke wait on the input. */
  readonly timeout: number;
}

/**
 * The slice of a browser page the scraper drives. Inputs and controls are
 * addressed by their document-order index so that selection rules stay pure
 * functions over descriptors.
 */
export interface PortalPage {
  goto(url: string, options: GotoOptions): Promise<void>;
  url(): string;
  waitForTimeout(ms: number): Promise<void>;
  content(): Promise<string>;
  bodyText(): Promise<string>;
  cookies(): Promise<readonly SessionCookie[]>;
  listInputs(): Promise<readonly InputDescriptor[]>;
  fillInput(index: number, value: string, options: FillOptions): Promise<void>;
  focusInput(index: number): Promise<void>;
  listControls(timeout: number): Promise<readonly ControlDescriptor[]>;
  clickControl(index: number): Promise<void>;
  pressKey(key: string): Promise<void>;
  typeText(text: string, options: TypingOptions): Promise<void>;
}

const INPUT_SELECTOR = 'input';
const CONTROL_SELECTOR = 'button, input[type="submit" i]';

async function describeControl(locator: Locator, index: number): Promise<ControlDescriptor> {
  const type = ((await locator.getAttribute('type')) ?? '').toLowerCase();
  const innerText = (await locator.innerText()).trim();
  const text = innerText || ((await locator.getAttribute('value')) ?? '').trim();
  return { index, type, text, visible: await locator.isVisible() };
}

export function createPortalPage(page: Page): PortalPage {
  const inputAt = (index: number): Locator => page.locator(INPUT_SELECTOR).nth(index);

  return {
    async goto(url, options) {
      await page.goto(url, { waitUntil: options.waitUntil, timeout: options.timeout });
    },
    url: () => page.url(),
    waitForTimeout: (ms) => page.waitForTimeout(ms),
    content: () => page.content(),
    bodyText: () => page.innerText('body'),
    async cookies() {
      const cookies = await page.context().cookies();
      return cookies.map((cookie) => ({ name: cookie.name, domain: cookie.domain }));
    },
    async listInputs() {
      const inputs = await page.locator(INPUT_SELECTOR).all();
      const descriptors: InputDescriptor[] = [];
      for (const [index, input] of inputs.entries()) {
        descriptors.push({
          index,
          type: ((await input.getAttribute('type')) ?? 'text').toLowerCase(),
          visible: await input.isVisible(),
          disabled: await input.isDisabled(),
        });
      }
      return descriptors;
    },
    async fillInput(index, value, options) {
      const input = inputAt(index);
      await input.click({ timeout: options.timeout });
      await input.fill('', { timeout: options.timeout });
      await input.pressSequentially(value, { delay: options.delay, timeout: options.timeout });
    },
    async focusInput(index) {
      await inputAt(index).focus();
    },
    async listControls(timeout) {
      const attached = await page
        .waitForSelector(CONTROL_SELECTOR, { state: 'attached', timeout })
        .then(() => true)
        .catch(() => false);
      if (!attached) {
        return [];
      }

      const controls = await page.locator(CONTROL_SELECTOR).all();
      const descriptors: ControlDescriptor[] = [];
      for (const [index, control] of controls.entries()) {
        descriptors.push(await describeControl(control, index));
      }
      return descriptors;
    },
    async clickControl(index) {
      await page.locator(CONTROL_SELECTOR).nth(index).click();
    },
    async pressKey(key) {
      await page.keyboard.press(key);
    },
    async typeText(text, options) {
      await page.keyboard.type(text, { delay: options.delay });
    },
  };
}
