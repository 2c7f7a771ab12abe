import {
  GreyscaleImage,
  detectGridChanges,
  detectRegionChange,
  meanAbsoluteDifference,
  regionAroundBounds,
} from './visual-verification';

function solid(width: number, height: number, value: number): GreyscaleImage {
  return { data: Buffer.alloc(width * height, value), width, height };
}

describe('visual verification', () => {
  describe('regionAroundBounds', () => {
    it('pads normalized bounds in pixel space', () => {
      expect(
        regionAroundBounds(
          { x: 0.25, y: 0.25, width: 0.25, height: 0.25 },
          { width: 100, height: 100 },
        ),
      ).toEqual({ left: 17, top: 17, width: 41, height: 41 });
    });

    it('clips the padded region to the image', () => {
      expect(
        regionAroundBounds(
          { x: 0, y: 0, width: 0.5, height: 0.5 },
          { width: 40, height: 20 },
        ),
      ).toEqual({ left: 0, top: 0, width: 28, height: 18 });
    });
  });

  it('reports the size-mismatch difference as a finite value', () => {
    const change = detectGridChanges(solid(8, 8, 0), solid(4, 4, 0), 4);

    expect(change).toEqual({
      changes: [{ x: 0, y: 0, width: 1, height: 1 }],
      difference: 255,
      confidence: 1,
    });
    expect(JSON.parse(JSON.stringify(change)).difference).toBe(255);
  });

  it('treats an empty region as unchanged', () => {
    expect(
      meanAbsoluteDifference(solid(4, 4, 0), solid(4, 4, 200), {
        left: 0,
        top: 0,
        width: 0,
        height: 0,
      }),
    ).toBe(0);
  });

  describe('detectRegionChange', () => {
    const whole = { x: 0, y: 0, width: 1, height: 1 };

    it('reports a change above the threshold', () => {
      expect(
        detectRegionChange(solid(10, 10, 0), solid(10, 10, 10), whole, 4),
      ).toEqual({ changed: true, difference: 10, confidence: 1 });
    });

    it('scales confidence below the threshold', () => {
      expect(
        detectRegionChange(solid(10, 10, 0), solid(10, 10, 2), whole, 4),
      ).toEqual({ changed: false, difference: 2, confidence: 0.5 });
    });

    it('treats differently sized captures as changed', () => {
      expect(
        detectRegionChange(solid(10, 10, 0), solid(20, 10, 0), whole, 4),
      ).toEqual({
        changed: true,
        difference: 255,
        confidence: 1,
      });
    });
  });

  describe('detectGridChanges', () => {
    it('returns the normalized bounds of changed cells', () => {
      const before = solid(8, 8, 0);
      const after = solid(8, 8, 0);
      for (let y = 0; y < 2; y++) {
        for (let x = 0; x < 2; x++) {
          after.data[y * 8 + x] = 100;
        }
      }

      expect(detectGridChanges(before, after, 4)).toEqual({
        changes: [{ x: 0, y: 0, width: 0.25, height: 0.25 }],
        difference: 100,
        confidence: 1,
      });
    });

    it('reports nothing for identical captures', () => {
      expect(detectGridChanges(solid(8, 8, 50), solid(8, 8, 50), 4)).toEqual({
        changes: [],
        difference: 0,
        confidence: 0,
      });
    });
  });
});
