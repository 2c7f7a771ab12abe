import sharp from 'sharp';
import { Dimensions } from '@deskpilot/shared';

export interface OverlayDescriptor
  extends Pick<sharp.OverlayOptions, 'top' | 'left' | 'blend' | 'density'> {
  input: Buffer | string;
}

/**
 * Collects overlays for a screenshot and composites them in one sharp pass.
 */
export class ScreenshotAnnotator {
  private readonly overlays: sharp.OverlayOptions[] = [];

  private constructor(
    private readonly baseImage: Buffer,
    private readonly width: number,
    private readonly height: number,
  ) {}

  static async from(image: Buffer): Promise<ScreenshotAnnotator> {
    const metadata = await sharp(image).metadata();
    return new ScreenshotAnnotator(
      image,
      metadata.width ?? 0,
      metadata.height ?? 0,
    );
  }

  get dimensions(): Dimensions {
    return { width: this.width, height: this.height };
  }

  addOverlay(descriptor: OverlayDescriptor): this {
    const { input, top = 0, left = 0, ...rest } = descriptor;
    this.overlays.push({ input, top, left, ...rest });
    return this;
  }

  /** SVG markup sized to the whole screenshot */
  addSvg(svg: string): this {
    return this.addOverlay({ input: Buffer.from(svg) });
  }

  async render(): Promise<Buffer> {
    if (!this.width || !this.height || this.overlays.length === 0) {
      return this.baseImage;
    }

    return sharp(this.baseImage).composite(this.overlays).png().toBuffer();
  }
}
