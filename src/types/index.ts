/** Color with float channels in [0, 1]. */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  a: number;
}

export interface TextBounds {
  width: number;
  height: number;
}

/**
 * Anything that can measure text the way a Canvas 2D context does.
 * `CanvasRenderingContext2D` and `OffscreenCanvasRenderingContext2D` both fit.
 */
export interface TextMeasurer {
  font: string;
  measureText(text: string): { width: number };
}

export interface FontStyle {
  family: string;
  /** Pixel size. */
  size: number;
  weight?: string;
  lineHeight?: number;
}

/**
 * Host drawing context for the current frame.
 *
 * Coordinates are y-up with the origin at the viewport's bottom-left corner.
 */
export interface ToastSurface {
  readonly width: number;
  readonly height: number;
  fillCircle(centerX: number, centerY: number, radius: number, color: Rgba): void;
  /** `x`, `y` is the bottom-left corner. */
  fillRect(x: number, y: number, width: number, height: number, color: Rgba): void;
  /** Draws each line centred in `[x, x + width]`, the first one hanging from `top`. */
  drawText(lines: readonly string[], x: number, top: number, width: number, lineHeight: number, css: string, color: Rgba): void;
}
