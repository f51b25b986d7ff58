import type { Rgba, ToastSurface } from '../types';

/** The parts of a Canvas 2D context the surface draws with. */
export interface DrawingContext2D {
  readonly canvas: { width: number; height: number };
  fillStyle: string | CanvasGradient | CanvasPattern;
  font: string;
  textAlign: CanvasTextAlign;
  textBaseline: CanvasTextBaseline;
  save(): void;
  restore(): void;
  beginPath(): void;
  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void;
  fill(): void;
  fillRect(x: number, y: number, w: number, h: number): void;
  fillText(text: string, x: number, y: number): void;
  clearRect(x: number, y: number, w: number, h: number): void;
}

export function toCssColor(color: Rgba): string {
  const channel = (v: number) => Math.round(Math.min(Math.max(v, 0), 1) * 255);
  return `rgba(${channel(color.r)}, ${channel(color.g)}, ${channel(color.b)}, ${color.a})`;
}

/**
 * Draws toasts on a Canvas 2D context.
 *
 * Callers hand in y-up coordinates; the canvas is y-down, so every y is
 * mirrored against the canvas height before drawing.
 */
export class CanvasToastSurface implements ToastSurface {
  constructor(private readonly ctx: DrawingContext2D) {}

  get width(): number {
    return this.ctx.canvas.width;
  }

  get height(): number {
    return this.ctx.canvas.height;
  }

  clear(): void {
    this.ctx.clearRect(0, 0, this.width, this.height);
  }

  fillCircle(centerX: number, centerY: number, radius: number, color: Rgba): void {
    const ctx = this.ctx;
    ctx.fillStyle = toCssColor(color);
    ctx.beginPath();
    ctx.arc(centerX, this.height - centerY, radius, 0, Math.PI * 2);
    ctx.fill();
  }

  fillRect(x: number, y: number, width: number, height: number, color: Rgba): void {
    this.ctx.fillStyle = toCssColor(color);
    // Bottom-left in y-up is the top-left after flipping the top edge
    this.ctx.fillRect(x, this.height - (y + height), width, height);
  }

  drawText(lines: readonly string[], x: number, top: number, width: number, lineHeight: number, css: string, color: Rgba): void {
    const ctx = this.ctx;
    ctx.save();
    ctx.font = css;
    ctx.fillStyle = toCssColor(color);
    ctx.textAlign = 'center';
    ctx.textBaseline = 'top';

    const centerX = x + width / 2;
    const canvasTop = this.height - top;
    lines.forEach((line, i) => {
      ctx.fillText(line, centerX, canvasTop + i * lineHeight);
    });
    ctx.restore();
  }
}
