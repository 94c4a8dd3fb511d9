import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { withBrowserPage } from './browser';

const { launch, close, newPage } = vi.hoisted(() => ({
  launch: vi.fn(),
  close: vi.fn(async (): Promise<void> => undefined),
  newPage: vi.fn(async () => ({ url: () => 'about:blank' })),
}));

vi.mock('playwright-core', () => ({ chromium: { launch } }));

function fakeBrowser() {
  let connected = true;
  return {
    isConnected: () => connected,
    close: close.mockImplementation(async () => {
      connected = false;
    }),
    newContext: async () => ({ newPage }),
  };
}

describe('withBrowserPage', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    launch.mockReset();
    close.mockReset();
  });

  it('hands a page to the callback and closes the browser afterwards', async () => {
    launch.mockResolvedValue(fakeBrowser());
    const controller = new AbortController();

    const result = await withBrowserPage('Test', { signal: controller.signal, headless: true }, async page =>
      page.url(),
    );

    expect(result).toBe('about:blank');
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('closes the browser when the run was aborted during launch', async () => {
    const controller = new AbortController();
    launch.mockImplementation(async () => {
      controller.abort();
      return fakeBrowser();
    });
    const fn = vi.fn(async () => 'never');

    await expect(withBrowserPage('Test', { signal: controller.signal, headless: true }, fn)).rejects.toThrow(
      'Aborted while the browser was launching',
    );
    expect(close).toHaveBeenCalledTimes(1);
    expect(fn).not.toHaveBeenCalled();
  });
});
