jest.mock('@nut-tree-fork/nut-js', () => ({
  keyboard: {
    config: { autoDelayMs: 0 },
    pressKey: jest.fn().mockResolvedValue(undefined),
    releaseKey: jest.fn().mockResolvedValue(undefined),
  },
  mouse: {
    config: { autoDelayMs: 0 },
    setPosition: jest.fn().mockResolvedValue(undefined),
    click: jest.fn().mockResolvedValue(undefined),
    doubleClick: jest.fn().mockResolvedValue(undefined),
    scrollUp: jest.fn().mockResolvedValue(undefined),
    scrollDown: jest.fn().mockResolvedValue(undefined),
    scrollLeft: jest.fn().mockResolvedValue(undefined),
    scrollRight: jest.fn().mockResolvedValue(undefined),
  },
  screen: {
    capture: jest.fn(),
    grab: jest.fn(),
    width: jest.fn(),
  },
  Point: class {
    constructor(
      public x: number,
      public y: number,
    ) {}
  },
  Key: {
    Enter: 1,
    LeftShift: 2,
    LeftControl: 3,
    LeftMeta: 4,
    C: 5,
    H: 6,
    I: 7,
    T: 8,
    Num1: 9,
    Space: 10,
  },
  Button: { LEFT: 0, MIDDLE: 1, RIGHT: 2 },
  FileType: { PNG: '.png' },
}));

import { existsSync, promises as fs } from 'fs';
import * as path from 'path';
import { Button, Key, keyboard, mouse, screen } from '@nut-tree-fork/nut-js';
import { NutService } from './nut.service';

type MockedKeyboard = {
  pressKey: jest.Mock;
  releaseKey: jest.Mock;
};

type MockedMouse = {
  setPosition: jest.Mock;
  click: jest.Mock;
  doubleClick: jest.Mock;
  scrollDown: jest.Mock;
};

type MockedScreen = {
  capture: jest.Mock;
  grab: jest.Mock;
  width: jest.Mock;
};

const keyboardMock = keyboard as unknown as MockedKeyboard;
const mouseMock = mouse as unknown as MockedMouse;
const screenMock = screen as unknown as MockedScreen;

describe('NutService', () => {
  let service: NutService;

  beforeEach(() => {
    jest.clearAllMocks();
    service = new NutService();
  });

  describe('moveAndClick', () => {
    it('moves to the point and clicks the left button', async () => {
      await service.moveAndClick(10, 20, 'left');

      expect(mouseMock.setPosition).toHaveBeenCalledWith(
        expect.objectContaining({ x: 10, y: 20 }),
      );
      expect(mouseMock.click).toHaveBeenCalledWith(Button.LEFT);
    });

    it('double-clicks with the left button', async () => {
      await service.moveAndClick(1, 2, 'double');

      expect(mouseMock.doubleClick).toHaveBeenCalledWith(Button.LEFT);
      expect(mouseMock.click).not.toHaveBeenCalled();
    });

    it('wraps input faults with the target point', async () => {
      mouseMock.setPosition.mockRejectedValueOnce(new Error('boom'));

      await expect(service.moveAndClick(10, 20, 'right')).rejects.toThrow(
        'Failed to click at (10, 20): boom',
      );
    });
  });

  describe('typeText', () => {
    it('holds shift for uppercase letters', async () => {
      await service.typeText('Hi');

      expect(keyboardMock.pressKey.mock.calls).toEqual([
        [Key.LeftShift, Key.H],
        [Key.I],
      ]);
      expect(keyboardMock.releaseKey.mock.calls).toEqual([
        [Key.LeftShift, Key.H],
        [Key.I],
      ]);
    });

    it('presses Enter once for a CRLF pair', async () => {
      await service.typeText('\r\n');

      expect(keyboardMock.pressKey).toHaveBeenCalledTimes(1);
      expect(keyboardMock.pressKey).toHaveBeenCalledWith(Key.Enter);
    });

    it('types shifted symbols through their base key', async () => {
      await service.typeText('!');

      expect(keyboardMock.pressKey).toHaveBeenCalledWith(
        Key.LeftShift,
        Key.Num1,
      );
    });

    it('rejects characters without a key mapping', async () => {
      await expect(service.typeText('é')).rejects.toThrow(
        'Failed to type text: No key mapping found for character: é',
      );
    });
  });

  describe('pressCombo', () => {
    it('presses modifiers before the key and releases them together', async () => {
      await service.pressCombo('c', ['Control']);

      expect(keyboardMock.pressKey).toHaveBeenCalledWith(
        Key.LeftControl,
        Key.C,
      );
      expect(keyboardMock.releaseKey).toHaveBeenCalledWith(
        Key.LeftControl,
        Key.C,
      );
    });

    it('resolves aliases case-insensitively', async () => {
      await service.pressCombo('t', ['Meta']);
      await service.pressCombo('RETURN', []);

      expect(keyboardMock.pressKey.mock.calls).toEqual([
        [Key.LeftMeta, Key.T],
        [Key.Enter],
      ]);
    });

    it('presses nothing when a key is unknown', async () => {
      await expect(service.pressCombo('Bogus', ['Control'])).rejects.toThrow(
        "Invalid key: 'Bogus'",
      );
      expect(keyboardMock.pressKey).not.toHaveBeenCalled();
    });
  });

  it('scrolls in the requested direction', async () => {
    await service.scroll('down', 3);

    expect(mouseMock.scrollDown).toHaveBeenCalledWith(3);
  });

  describe('getScalingFactor', () => {
    it('divides the grabbed width by the logical width', async () => {
      screenMock.grab.mockResolvedValue({ width: 2880 });
      screenMock.width.mockResolvedValue(1440);

      await expect(service.getScalingFactor()).resolves.toBe(2);
    });

    it('falls back to 1 when the screen cannot be grabbed', async () => {
      screenMock.grab.mockRejectedValue(new Error('no display'));
      screenMock.width.mockResolvedValue(1440);

      await expect(service.getScalingFactor()).resolves.toBe(1);
    });
  });

  it('returns the captured PNG bytes and removes the temporary file', async () => {
    let writtenPath = '';
    screenMock.capture.mockImplementation(
      async (name: string, extension: string, dir: string) => {
        writtenPath = path.join(dir, `${name}${extension}`);
        await fs.writeFile(writtenPath, 'png-bytes');
        return writtenPath;
      },
    );

    const buffer = await service.captureScreen();

    expect(buffer.toString()).toBe('png-bytes');
    expect(writtenPath.endsWith('.png')).toBe(true);
    expect(existsSync(writtenPath)).toBe(false);
  });

  it('does not capture once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(service.captureScreen(controller.signal)).rejects.toThrow(
      'Screen capture aborted',
    );
    expect(screenMock.capture).not.toHaveBeenCalled();
  });
});
