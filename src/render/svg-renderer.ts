/**
 * Kitchen Layout SVG Renderer
 * Renders planned walls as a 2D plan view: the wall line along the top,
 * cabinets hanging off it at their depth, reported gaps dashed.
 *
 * Positions and widths come only from the engine's output. Nothing here
 * recomputes placement.
 */

import { KitchenPlan, RenderableCabinet, WallPlan } from '../algorithm/types';
import {
  CABINET_COLORS,
  CABINET_DEFAULTS,
  DEFAULT_CABINET_COLOR,
  DEFAULT_SVG_SCALE,
  DIMENSION_COLOR,
  GAP_COLOR,
  PROBLEM_COLOR,
  TEXT_COLOR,
  WALL_COLOR
} from '../algorithm/constants';
import { bestFitWidth } from '../algorithm/gap-suggestions';
import {
  boundingBoxOf,
  createRectangle,
  rectangleCenter,
  rectangleIntersection,
  rectangleRight,
  rectanglesOverlap,
  scaleRectangle,
  translateRectangle
} from '../geometry/rectangle';
import { Rectangle } from '../types/geometry';

export interface SvgRenderOptions {
  scale?: number;            // Pixels per inch
  padding?: number;          // Padding around each wall (pixels)
  showLabels?: boolean;      // Cabinet kind and width
  showDimensions?: boolean;  // Wall length under the wall
  showGaps?: boolean;        // Dashed outline for each reported gap
}

// Height of the wall title row
const HEADER_HEIGHT = 24;
// Height of the dimension row under the cabinets
const DIMENSION_HEIGHT = 24;
const FONT_FAMILY = 'Arial, Helvetica, sans-serif';

interface RenderedBlock {
  markup: string;
  width: number;
  height: number;
}

/**
 * Escape text for use in SVG content and attribute values
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

// Two decimals max, no trailing zeros: 12.5 -> "12.5", 80 -> "80"
function n(value: number): string {
  return String(Number(value.toFixed(2)));
}

function cabinetColor(kind: string): string {
  return Object.hasOwn(CABINET_COLORS, kind) ? CABINET_COLORS[kind] : DEFAULT_CABINET_COLOR;
}

/**
 * Indexes of cabinets that run past the wall end or share area with another cabinet
 */
function findProblemCabinets(rects: Rectangle[], wallLength: number): Set<number> {
  const problems = new Set<number>();
  rects.forEach((rect, i) => {
    if (rectangleRight(rect) > wallLength) {
      problems.add(i);
    }
    for (let j = i + 1; j < rects.length; j++) {
      if (rectanglesOverlap(rect, rects[j])) {
        problems.add(i);
        problems.add(j);
      }
    }
  });
  return problems;
}

/**
 * Render one wall plan as an SVG group of known size
 */
function renderWallBlock(plan: WallPlan, options: SvgRenderOptions): RenderedBlock {
  const {
    scale = DEFAULT_SVG_SCALE,
    padding = 20,
    showLabels = true,
    showDimensions = true,
    showGaps = true
  } = options;

  const gapDepth = CABINET_DEFAULTS[plan.tier].depth;
  const cabinetRects = plan.cabinets.map(c => createRectangle(c.x, 0, c.width, c.depth));
  const gapRects = showGaps
    ? plan.result.gaps.map(g => createRectangle(g.start, 0, g.width, gapDepth))
    : [];
  const wallRect = createRectangle(0, 0, plan.wallLength, 0);

  // boundingBoxOf is never null here: the wall rectangle is always present
  const box = boundingBoxOf([wallRect, ...cabinetRects, ...gapRects]) ?? {
    minX: 0, minY: 0, maxX: plan.wallLength, maxY: 0
  };

  const originX = padding - box.minX * scale;
  const originY = padding + HEADER_HEIGHT;
  const toPixels = (rect: Rectangle): Rectangle =>
    translateRectangle(scaleRectangle(rect, scale), originX, originY);

  const width = (box.maxX - box.minX) * scale + 2 * padding;
  const height = HEADER_HEIGHT + box.maxY * scale + (showDimensions ? DIMENSION_HEIGHT : 0) + 2 * padding;

  const elements: string[] = [];
  const title = `${plan.wallName} (${plan.tier} cabinets, ${plan.wallLength}")`;
  elements.push(
    `<text class="wall-title" x="${n(padding)}" y="${n(padding + 14)}" font-size="13">${escapeXml(title)}</text>`
  );

  // Gaps first so cabinets draw over them
  gapRects.forEach((rect, i) => {
    const gap = plan.result.gaps[i];
    const px = toPixels(rect);
    const center = rectangleCenter(px);
    const fit = bestFitWidth(gap);
    elements.push(`<g class="gap">
      <rect x="${n(px.x)}" y="${n(px.y)}" width="${n(px.width)}" height="${n(px.height)}" fill="${GAP_COLOR}" stroke="${DIMENSION_COLOR}" stroke-width="1" stroke-dasharray="4 3"/>
      ${showLabels ? `<text class="gap-label" x="${n(center.x)}" y="${n(center.y)}" text-anchor="middle" dominant-baseline="middle" font-size="9">${n(gap.width)}"${fit ? ` (fits ${fit.width}")` : ''}</text>` : ''}
    </g>`);
  });

  const problems = findProblemCabinets(cabinetRects, plan.wallLength);
  plan.cabinets.forEach((cabinet, i) => {
    elements.push(renderCabinet(cabinet, toPixels(cabinetRects[i]), problems.has(i), showLabels));
  });

  // Shade the shared area of overlapping neighbours
  for (let i = 0; i + 1 < cabinetRects.length; i++) {
    const shared = rectangleIntersection(cabinetRects[i], cabinetRects[i + 1]);
    if (shared) {
      const px = toPixels(shared);
      elements.push(
        `<rect class="overlap" x="${n(px.x)}" y="${n(px.y)}" width="${n(px.width)}" height="${n(px.height)}" fill="${PROBLEM_COLOR}" opacity="0.4"/>`
      );
    }
  }

  // Wall line drawn last so it sits on top of cabinet edges
  const wallStart = toPixels(wallRect);
  elements.push(
    `<line class="wall" x1="${n(wallStart.x)}" y1="${n(originY)}" x2="${n(wallStart.x + wallStart.width)}" y2="${n(originY)}" stroke="${WALL_COLOR}" stroke-width="3"/>`
  );

  if (showDimensions) {
    const dimY = originY + box.maxY * scale + 16;
    elements.push(
      `<text class="dimension" x="${n(wallStart.x + wallStart.width / 2)}" y="${n(dimY)}" text-anchor="middle" font-size="11" fill="${DIMENSION_COLOR}">${n(plan.wallLength)}"</text>`
    );
  }

  return {
    markup: `<g class="wall-plan" data-wall="${escapeXml(plan.wallName)}" data-tier="${plan.tier}">\n${elements.join('\n')}\n</g>`,
    width,
    height
  };
}

/**
 * Render a single cabinet rectangle with its labels
 */
function renderCabinet(
  cabinet: RenderableCabinet,
  px: Rectangle,
  isProblem: boolean,
  showLabel: boolean
): string {
  const center = rectangleCenter(px);
  const stroke = isProblem ? PROBLEM_COLOR : '#000000';
  const strokeWidth = isProblem ? 2 : 1;
  const labelFontSize = Math.min(10, Math.max(6, px.width * 0.15));

  return `<g class="cabinet" data-kind="${escapeXml(cabinet.kind)}" data-index="${cabinet.index}">
      <rect x="${n(px.x)}" y="${n(px.y)}" width="${n(px.width)}" height="${n(px.height)}" fill="${cabinetColor(cabinet.kind)}" stroke="${stroke}" stroke-width="${strokeWidth}" opacity="0.8"/>
      ${showLabel ? `<text class="cabinet-label" x="${n(center.x)}" y="${n(center.y - 5)}" text-anchor="middle" font-size="${n(labelFontSize)}" font-weight="bold">${escapeXml(cabinet.kind)}</text>
      <text class="cabinet-width" x="${n(center.x)}" y="${n(center.y + 7)}" text-anchor="middle" font-size="${n(labelFontSize * 0.8)}">${n(cabinet.width)}"W</text>` : ''}
    </g>`;
}

function wrapSvg(body: string, width: number, height: number): string {
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${n(width)}" height="${n(height)}" viewBox="0 0 ${n(width)} ${n(height)}">
  <style>
    text { font-family: ${FONT_FAMILY}; fill: ${TEXT_COLOR}; }
  </style>
  <rect x="0" y="0" width="${n(width)}" height="${n(height)}" fill="#FFFFFF"/>
${body}
</svg>
`;
}

/**
 * Render one wall plan to a standalone SVG document
 */
export function renderWallSVG(plan: WallPlan, options: SvgRenderOptions = {}): string {
  const block = renderWallBlock(plan, options);
  return wrapSvg(block.markup, block.width, block.height);
}

/**
 * Render every wall of a kitchen plan, stacked top to bottom in plan order
 */
export function renderKitchenSVG(plan: KitchenPlan, options: SvgRenderOptions = {}): string {
  if (plan.walls.length === 0) {
    return renderEmptyKitchen(400, 120, `No cabinets in layout '${plan.layoutName}'`);
  }

  const blocks = plan.walls.map(wall => renderWallBlock(wall, options));
  const width = Math.max(...blocks.map(b => b.width));
  const height = blocks.reduce((sum, b) => sum + b.height, 0);

  let offset = 0;
  const groups = blocks.map(block => {
    const group = `<g transform="translate(0, ${n(offset)})">\n${block.markup}\n</g>`;
    offset += block.height;
    return group;
  });

  return wrapSvg(groups.join('\n'), width, height);
}

/**
 * Placeholder SVG when there is nothing to draw
 */
export function renderEmptyKitchen(width: number, height: number, message: string): string {
  return wrapSvg(
    `<text x="${n(width / 2)}" y="${n(height / 2)}" text-anchor="middle" dominant-baseline="middle" font-size="11" fill="#ABABAB">${escapeXml(message)}</text>`,
    width,
    height
  );
}
