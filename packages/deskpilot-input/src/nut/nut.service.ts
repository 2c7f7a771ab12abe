import { Injectable, Logger } from '@nestjs/common';
import {
  keyboard,
  mouse,
  Point,
  screen,
  Key,
  Button,
  FileType,
} from '@nut-tree-fork/nut-js';
import { promises as fs } from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  ClickKind,
  InputController,
  ScreenCaptureProvider,
  ScrollDirection,
  delay,
  errorMessage,
  isWindows,
  logPlatformInfo,
} from '@deskpilot/shared';
import { charToKeyInfo, resolveKey } from './key-mapping';

const KEYSTROKE_DELAY_MS = 50;
const COMBO_HOLD_MS = 100;
const WINDOWS_TYPING_PRE_DELAY_MS = 500;

/**
 * Drives the local mouse, keyboard and screen through nut-js.
 */
@Injectable()
export class NutService implements InputController, ScreenCaptureProvider {
  private readonly logger = new Logger(NutService.name);
  private readonly screenshotDir = path.join(
    os.tmpdir(),
    'deskpilot-screenshots',
  );

  constructor() {
    logPlatformInfo(this.logger);

    mouse.config.autoDelayMs = 100;
    keyboard.config.autoDelayMs = 100;
  }

  async moveAndClick(x: number, y: number, clickKind: ClickKind): Promise<void> {
    this.logger.debug(`Clicking (${clickKind}) at (${x}, ${y})`);
    try {
      await mouse.setPosition(new Point(x, y));
      switch (clickKind) {
        case 'left':
          await mouse.click(Button.LEFT);
          break;
        case 'right':
          await mouse.click(Button.RIGHT);
          break;
        case 'middle':
          await mouse.click(Button.MIDDLE);
          break;
        case 'double':
          await mouse.doubleClick(Button.LEFT);
          break;
      }
    } catch (error) {
      throw new Error(`Failed to click at (${x}, ${y}): ${errorMessage(error)}`);
    }
  }

  /**
   * Types text one keystroke at a time. `\r\n` is typed as a single Enter.
   */
  async typeText(text: string): Promise<void> {
    this.logger.log(
      `[KEYBOARD] Typing ${text.length} chars: "${text.substring(0, 100)}"`,
    );

    if (isWindows()) {
      await delay(WINDOWS_TYPING_PRE_DELAY_MS);
    }

    try {
      for (let i = 0; i < text.length; i++) {
        const char = text[i];
        if (char === '\r' && text[i + 1] === '\n') {
          continue;
        }

        const keyInfo = charToKeyInfo(char);
        if (!keyInfo) {
          throw new Error(`No key mapping found for character: ${char}`);
        }

        const keys = keyInfo.withShift
          ? [Key.LeftShift, keyInfo.keyCode]
          : [keyInfo.keyCode];
        await keyboard.pressKey(...keys);
        await delay(KEYSTROKE_DELAY_MS);
        await keyboard.releaseKey(...keys);
      }
    } catch (error) {
      this.logger.error(`[KEYBOARD] Failed to type text: ${errorMessage(error)}`);
      throw new Error(`Failed to type text: ${errorMessage(error)}`);
    }
  }

  /**
   * Holds every modifier plus the key, then releases them together.
   * All key names are resolved before anything is pressed.
   */
  async pressCombo(key: string, modifiers: readonly string[]): Promise<void> {
    const keys = [...modifiers, key].map(resolveKey);
    this.logger.debug(`Pressing ${[...modifiers, key].join('+')}`);

    try {
      await keyboard.pressKey(...keys);
      await delay(COMBO_HOLD_MS);
      await keyboard.releaseKey(...keys);
    } catch (error) {
      throw new Error(`Failed to press keys: ${errorMessage(error)}`);
    }
  }

  async scroll(direction: ScrollDirection, amount: number): Promise<void> {
    this.logger.debug(`Scrolling ${direction} x${amount}`);
    try {
      switch (direction) {
        case 'up':
          await mouse.scrollUp(amount);
          break;
        case 'down':
          await mouse.scrollDown(amount);
          break;
        case 'left':
          await mouse.scrollLeft(amount);
          break;
        case 'right':
          await mouse.scrollRight(amount);
          break;
      }
    } catch (error) {
      throw new Error(`Failed to scroll: ${errorMessage(error)}`);
    }
  }

  /**
   * Ratio of physical screenshot pixels to logical screen coordinates.
   * Falls back to 1 when the screen cannot be queried.
   */
  async getScalingFactor(): Promise<number> {
    try {
      const [grabbed, logicalWidth] = await Promise.all([
        screen.grab(),
        screen.width(),
      ]);
      const factor = grabbed.width / logicalWidth;
      return Number.isFinite(factor) && factor > 0 ? factor : 1;
    } catch (error) {
      this.logger.warn(
        `Could not determine display scaling, assuming 1: ${errorMessage(error)}`,
      );
      return 1;
    }
  }

  async captureScreen(signal?: AbortSignal): Promise<Buffer> {
    if (signal?.aborted) {
      throw new Error('Screen capture aborted');
    }
    await fs.mkdir(this.screenshotDir, { recursive: true });
    const filepath = await screen.capture(
      `screenshot-${Date.now()}`,
      FileType.PNG,
      this.screenshotDir,
    );

    try {
      return await fs.readFile(filepath);
    } finally {
      await fs.unlink(filepath).catch((unlinkError: unknown) => {
        this.logger.warn(
          `Failed to remove temporary screenshot file: ${errorMessage(unlinkError)}`,
        );
      });
    }
  }
}
