import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import { chromium } from 'playwright-core';
import type { Page } from 'playwright-core';

import type {
  ActionProposal,
  ExecutionResult,
  ScreenState,
  ScrollDirection,
  Viewport,
} from '../schema/index.js';
import { TIMEOUTS, VIEWPORT } from '../config/defaults.js';
import type { BrowserCapability } from '../core/collaborators.js';
import { errorMessage } from '../utils/timeout.js';
import { resolveField, resolveText } from './locators.js';

// ── Public types ─────────────────────────────────────────────

export interface SessionConfig {
  headless: boolean;
  screenshotDir: string;
  viewport?: Viewport | undefined;
  startUrl?: string | undefined;
  /** Chromium binary to use instead of the one Playwright manages. */
  executablePath?: string | undefined;
  actionTimeoutMs?: number | undefined;
}

export interface BrowserSession extends BrowserCapability {
  readonly page: Page;
  close(): Promise<void>;
}

// ── Session launcher ─────────────────────────────────────────

export async function launchSession(
  config: SessionConfig,
): Promise<BrowserSession> {
  await mkdir(config.screenshotDir, { recursive: true });

  const viewport = config.viewport ?? { width: VIEWPORT.WIDTH, height: VIEWPORT.HEIGHT };
  const actionTimeout = config.actionTimeoutMs ?? TIMEOUTS.ACTION_TIMEOUT;

  const browser = await chromium.launch({
    headless: config.headless,
    ...(config.executablePath !== undefined ? { executablePath: config.executablePath } : {}),
  });
  const context = await browser.newContext({ viewport });
  const page = await context.newPage();
  page.setDefaultTimeout(actionTimeout);

  if (config.startUrl !== undefined) {
    await page.goto(config.startUrl, {
      timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
      waitUntil: 'domcontentloaded',
    });
  }

  let captureCount = 0;

  return {
    page,

    async captureScreen(): Promise<ScreenState> {
      captureCount++;
      const imageRef = path.join(
        config.screenshotDir,
        `screen-${String(captureCount).padStart(4, '0')}.png`,
      );
      await page.screenshot({ path: imageRef, type: 'png' });

      const size = page.viewportSize() ?? viewport;
      return {
        imageRef,
        width: size.width,
        height: size.height,
        capturedAt: new Date().toISOString(),
      };
    },

    async execute(proposal: ActionProposal): Promise<ExecutionResult> {
      try {
        await performAction(page, proposal, actionTimeout);
        return { status: 'executed' };
      } catch (err) {
        return { status: 'execution_error', detail: errorMessage(err) };
      }
    },

    async close(): Promise<void> {
      await browser.close();
    },
  };
}

// ── Action dispatch ──────────────────────────────────────────

async function performAction(
  page: Page,
  proposal: ActionProposal,
  timeout: number,
): Promise<void> {
  switch (proposal.action) {
    case 'click':
      await page.mouse.click(proposal.x, proposal.y);
      break;

    case 'click_text':
      await resolveText(page, proposal.text).click({ timeout });
      break;

    case 'type_text': {
      const field = await resolveField(page, proposal.fieldRef);
      await field.fill(proposal.value, { timeout });
      break;
    }

    case 'scroll': {
      const [dx, dy] = scrollDelta(proposal.direction, proposal.amount);
      await page.mouse.wheel(dx, dy);
      break;
    }

    case 'wait':
      await page.waitForTimeout(proposal.ms);
      break;

    case 'navigate':
      await page.goto(proposal.url, {
        timeout: TIMEOUTS.NAVIGATION_TIMEOUT,
        waitUntil: 'domcontentloaded',
      });
      break;

    case 'done':
    case 'fail':
      throw new Error(`${proposal.action} is a terminal signal, not a browser action`);
  }
}

export function scrollDelta(
  direction: ScrollDirection,
  amount: number,
): readonly [number, number] {
  switch (direction) {
    case 'up':
      return [0, -amount];
    case 'down':
      return [0, amount];
    case 'left':
      return [-amount, 0];
    case 'right':
      return [amount, 0];
  }
}
