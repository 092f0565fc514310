import type {
  ControlDescriptor,
  FillOptions,
  GotoOptions,
  InputDescriptor,
  PortalPage,
  SessionCookie,
  TypingOptions,
} from '../../src/page.js';

export type FakeRoute = {
  readonly html?: string;
  readonly body?: string;
  /** Where the page lands instead of the requested URL. */
  readonly redirectTo?: string;
  readonly error?: Error;
  /** Visits that throw `error` before the route loads; every visit throws when unset. */
  readonly failures?: number;
};

const EMPTY_DOCUMENT = '<html><body></body></html>';

export class FakePortalPage implements PortalPage {
  public currentUrl = 'about:blank';
  public html = EMPTY_DOCUMENT;
  public body = '';
  public inputs: InputDescriptor[] = [];
  public controls: ControlDescriptor[] = [];
  public cookieJar: SessionCookie[] = [];
  public cookieError: Error | null = null;
  public onSubmit: ((page: FakePortalPage) => void) | null = null;
  public readonly routes = new Map<string, FakeRoute>();
  public readonly actions: string[] = [];
  public readonly visited: Array<{ url: string; options: GotoOptions }> = [];
  public waitedMs = 0;
  /** Inputs whose fill times out, like a hidden field. */
  public readonly unfillable = new Set<number>();

  public async goto(url: string, options: GotoOptions): Promise<void> {
    this.visited.push({ url, options });
    const route = this.routes.get(url) ?? {};
    if (route.error && (route.failures === undefined || this.visited.filter((visit) => visit.url === url).length <= route.failures)) {
      throw route.error;
    }
    this.currentUrl = route.redirectTo ?? url;
    this.html = route.html ?? EMPTY_DOCUMENT;
    this.body = route.body ?? '';
  }

  public url(): string {
    return this.currentUrl;
  }

  public async waitForTimeout(ms: number): Promise<void> {
    this.waitedMs += ms;
  }

  public async content(): Promise<string> {
    return this.html;
  }

  public async bodyText(): Promise<string> {
    return this.body;
  }

  public async cookies(): Promise<readonly SessionCookie[]> {
    if (this.cookieError) {
      throw this.cookieError;
    }
    return this.cookieJar;
  }

  public async listInputs(): Promise<readonly InputDescriptor[]> {
    return this.inputs;
  }

  public async fillInput(index: number, value: string, options: FillOptions): Promise<void> {
    if (this.unfillable.has(index)) {
      throw new Error(`locator.click: Timeout ${options.timeout}ms exceeded.`);
    }
    this.actions.push(`fill:${index}:${value}`);
  }

  public async focusInput(index: number): Promise<void> {
    this.actions.push(`focus:${index}`);
  }

  public async listControls(timeout: number): Promise<readonly ControlDescriptor[]> {
    this.actions.push(`controls:${timeout}`);
    return this.controls;
  }

  public async clickControl(index: number): Promise<void> {
    this.actions.push(`click:${index}`);
    this.onSubmit?.(this);
  }

  public async pressKey(key: string): Promise<void> {
    this.actions.push(`press:${key}`);
    if (key === 'Enter') {
      this.onSubmit?.(this);
    }
  }

  public async typeText(text: string, _options: TypingOptions): Promise<void> {
    this.actions.push(`type:${text}`);
  }
}

export const input = (index: number, type: string, overrides: Partial<InputDescriptor> = {}): InputDescriptor => ({
  index,
  type,
  visible: true,
  disabled: false,
  ...overrides,
});

export const control = (
  index: number,
  type: string,
  text: string,
  overrides: Partial<ControlDescriptor> = {},
): ControlDescriptor => ({
  index,
  type,
  text,
  visible: true,
  ...overrides,
});
