// Narrow views of the Playwright objects the harness touches. Playwright's own
// Page, Route, Browser and BrowserContext satisfy them structurally.

export interface InterceptedRequest {
    url(): string;
    method(): string;
}

export interface FulfillOptions {
    status?: number;
    contentType?: string;
    body?: string;
}

export interface InterceptedRoute {
    request(): InterceptedRequest;
    fulfill(options: FulfillOptions): Promise<void>;
    continue(): Promise<void>;
}

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

export interface BrowserPage {
    route(url: string, handler: (route: InterceptedRoute) => Promise<void>): Promise<void>;
    goto(url: string, options?: { waitUntil?: LoadState; timeout?: number }): Promise<unknown>;
    waitForSelector(selector: string, options?: { timeout?: number }): Promise<unknown>;
    waitForTimeout(ms: number): Promise<void>;
    hover(selector: string, options?: { timeout?: number }): Promise<void>;
    click(selector: string, options?: { timeout?: number }): Promise<void>;
    screenshot(options: { path?: string; fullPage?: boolean }): Promise<unknown>;
    locator(selector: string): {
        isVisible(): Promise<boolean>;
    };
}

export interface Viewport {
    width: number;
    height: number;
}

export interface BrowserContextHandle {
    newPage(): Promise<BrowserPage>;
    close(): Promise<void>;
}

export interface BrowserHandle {
    newContext(options: {
        viewport: Viewport;
        recordVideo?: { dir: string; size: Viewport };
    }): Promise<BrowserContextHandle>;
    close(): Promise<void>;
}

export interface BrowserLauncher {
    launch(options: { headless: boolean; args: string[] }): Promise<BrowserHandle>;
}
