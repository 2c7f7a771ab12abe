import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import sharp from 'sharp';
import {
  DeskpilotEnv,
  Dimensions,
  PerceptionMalformedError,
  PerceptionUnavailableError,
  SCREEN_CAPTURE,
  ScreenCaptureProvider,
  ScreenState,
  errorMessage,
  findScreenStateViolation,
} from '@deskpilot/shared';
import { OmniParserClientService } from './omniparser-client.service';
import { mapDetections } from './element-mapper';

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new PerceptionUnavailableError('Perception aborted');
  }
}

interface ParseInput {
  image: Buffer;
  dimensions: Dimensions;
}

/**
 * Produces a fresh ScreenState on every call: one screenshot, one parse.
 * Nothing is cached between calls.
 */
@Injectable()
export class PerceptionService {
  private readonly logger = new Logger(PerceptionService.name);
  private readonly downsampleFactor: number;
  private readonly minElementPx: number;

  constructor(
    @Inject(SCREEN_CAPTURE)
    private readonly screenCapture: ScreenCaptureProvider,
    private readonly omniParser: OmniParserClientService,
    configService: ConfigService<DeskpilotEnv, true>,
  ) {
    this.downsampleFactor = configService.get('OMNIPARSER_DOWNSAMPLE_FACTOR', {
      infer: true,
    });
    this.minElementPx = configService.get('OMNIPARSER_MIN_ELEMENT_PX', {
      infer: true,
    });
  }

  /**
   * `signal` is forwarded to the screen capture and the parse request, and
   * is checked between the two.
   */
  async capture(signal?: AbortSignal): Promise<ScreenState> {
    throwIfAborted(signal);
    const timestamp = Date.now();
    const screenshot = await this.takeScreenshot(signal);
    const dimensions = await this.readDimensions(screenshot);
    const parseInput = await this.prepareParseInput(screenshot, dimensions);
    throwIfAborted(signal);

    const response = await this.omniParser.parseScreenshot(parseInput.image, {
      signal,
    });
    const { elements, skipped } = mapDetections(
      response.elements,
      parseInput.dimensions,
      { minElementPx: this.minElementPx },
    );

    const state: ScreenState = Object.freeze({
      elements: Object.freeze(elements),
      dimensions: Object.freeze(dimensions),
      timestamp,
      screenshot,
    });

    const violation = findScreenStateViolation(state);
    if (violation) {
      throw new PerceptionMalformedError(`Invalid screen state: ${violation}`);
    }

    this.logger.debug(
      `Captured ${elements.length} elements on a ${dimensions.width}x${dimensions.height} screen` +
        (skipped > 0 ? ` (${skipped} below ${this.minElementPx}px dropped)` : ''),
    );
    return state;
  }

  private async takeScreenshot(signal?: AbortSignal): Promise<Buffer> {
    try {
      return await this.screenCapture.captureScreen(signal);
    } catch (error) {
      throw new PerceptionUnavailableError(
        `Screen capture failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  private async readDimensions(screenshot: Buffer): Promise<Dimensions> {
    try {
      const { width, height } = await sharp(screenshot).metadata();
      if (width && height) {
        return { width, height };
      }
    } catch (error) {
      throw new PerceptionUnavailableError(
        `Screenshot could not be decoded: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    throw new PerceptionUnavailableError('Screenshot has no dimensions');
  }

  /**
   * Downsamples the screenshot when configured. Detections are normalized
   * against the image the parser actually saw.
   */
  private async prepareParseInput(
    screenshot: Buffer,
    dimensions: Dimensions,
  ): Promise<ParseInput> {
    if (this.downsampleFactor >= 1) {
      return { image: screenshot, dimensions };
    }

    const width = Math.max(1, Math.round(dimensions.width * this.downsampleFactor));
    const height = Math.max(
      1,
      Math.round(dimensions.height * this.downsampleFactor),
    );
    try {
      const image = await sharp(screenshot)
        .resize(width, height, { fit: 'fill' })
        .png()
        .toBuffer();
      return { image, dimensions: { width, height } };
    } catch (error) {
      throw new PerceptionUnavailableError(
        `Failed to downsample screenshot: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }
}
