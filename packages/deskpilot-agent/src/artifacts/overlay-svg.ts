import { Bounds, Dimensions, Point, UIElement } from '@deskpilot/shared';

const BOX_COLOR = '#00c853';
const HIGHLIGHT_COLOR = '#ff1744';

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function toPixelRect(bounds: Bounds, dimensions: Dimensions) {
  return {
    x: Math.round(bounds.x * dimensions.width),
    y: Math.round(bounds.y * dimensions.height),
    width: Math.max(1, Math.round(bounds.width * dimensions.width)),
    height: Math.max(1, Math.round(bounds.height * dimensions.height)),
  };
}

function svgDocument(dimensions: Dimensions, body: string[]): string {
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${dimensions.width}" height="${dimensions.height}">`,
    ...body,
    '</svg>',
  ].join('\n');
}

/**
 * Outlines every element and labels it with its id.
 */
export function elementBoxesSvg(
  elements: readonly UIElement[],
  dimensions: Dimensions,
): string {
  const body = elements.flatMap((element) => {
    const rect = toPixelRect(element.bounds, dimensions);
    const labelY = Math.max(10, rect.y - 2);
    return [
      `<rect x="${rect.x}" y="${rect.y}" width="${rect.width}" height="${rect.height}" fill="none" stroke="${BOX_COLOR}" stroke-width="1"/>`,
      `<text x="${rect.x}" y="${labelY}" font-family="sans-serif" font-size="10" fill="${BOX_COLOR}">${escapeXml(String(element.id))}</text>`,
    ];
  });
  return svgDocument(dimensions, body);
}

/**
 * Highlights the acted-on element and, when given, the absolute pixel
 * point that was clicked.
 */
export function highlightSvg(
  target: UIElement,
  dimensions: Dimensions,
  clickPoint?: Point,
): string {
  const rect = toPixelRect(target.bounds, dimensions);
  const body = [
    `<rect x="${rect.x}" y="${rect.y}" width="${rect.width}" height="${rect.height}" fill="none" stroke="${HIGHLIGHT_COLOR}" stroke-width="3"/>`,
    `<text x="${rect.x}" y="${Math.max(12, rect.y - 4)}" font-family="sans-serif" font-size="12" fill="${HIGHLIGHT_COLOR}">${escapeXml(`${target.id}: ${target.content}`)}</text>`,
  ];
  if (clickPoint) {
    const cx = Math.round(clickPoint.x);
    const cy = Math.round(clickPoint.y);
    body.push(
      `<circle cx="${cx}" cy="${cy}" r="6" fill="none" stroke="${HIGHLIGHT_COLOR}" stroke-width="2"/>`,
      `<line x1="${cx - 10}" y1="${cy}" x2="${cx + 10}" y2="${cy}" stroke="${HIGHLIGHT_COLOR}" stroke-width="1"/>`,
      `<line x1="${cx}" y1="${cy - 10}" x2="${cx}" y2="${cy + 10}" stroke="${HIGHLIGHT_COLOR}" stroke-width="1"/>`,
    );
  }
  return svgDocument(dimensions, body);
}
