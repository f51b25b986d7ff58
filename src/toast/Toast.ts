import type { Rgba, ToastSurface } from '../types';
import { splitLines, type ToastFont } from '../render/ToastFont';
import type { ToastLength } from './ToastLength';

/** Text is not drawn at or below this opacity. */
const MIN_TEXT_OPACITY = 0.15;

export interface ToastConfig {
  text: string;
  length: ToastLength;
  font: ToastFont;
  surface: ToastSurface;
  backgroundColor: Rgba;
  fontColor: Rgba;
  fadingDuration: number;
  maxRelativeWidth: number;
  positionY: number;
  margin?: number;
}

/**
 * A single transient notification. Build these through `ToastFactory.create`.
 *
 * Layout is computed once here; afterwards only the remaining lifetime and the
 * opacity derived from it change.
 */
export class Toast {
  readonly message: string;
  readonly positionX: number;
  /** Bottom edge of the background box. */
  readonly positionY: number;
  readonly toastWidth: number;
  readonly toastHeight: number;
  readonly margin: number;
  readonly fontX: number;
  /** Top edge of the text block. */
  readonly fontY: number;
  readonly textWidth: number;
  readonly textHeight: number;
  readonly lines: readonly string[];

  private readonly font: ToastFont;
  private readonly surface: ToastSurface;
  private readonly backgroundColor: Rgba;
  private readonly fontColor: Rgba;
  private readonly fadingDuration: number;
  private _timeToLive: number;
  private _opacity = 1;
  private expired = false;

  constructor(config: ToastConfig) {
    const {
      text,
      length,
      font,
      surface,
      backgroundColor,
      fontColor,
      fadingDuration,
      maxRelativeWidth,
      positionY,
      margin = font.lineHeight * 2,
    } = config;

    this.message = text;
    this.font = font;
    this.surface = surface;
    this.backgroundColor = backgroundColor;
    this.fontColor = fontColor;
    this.fadingDuration = fadingDuration;
    this._timeToLive = length;

    let { width, height } = font.measure(text);
    let lines = splitLines(text);

    const viewportWidth = surface.width;
    const maxTextWidth = viewportWidth * maxRelativeWidth;
    if (width > maxTextWidth) {
      lines = font.wrap(text, maxTextWidth);
      ({ width, height } = font.measureLines(lines));
    }

    this.lines = lines;
    this.margin = margin;
    this.textWidth = width;
    this.textHeight = height;
    this.toastWidth = width + 2 * margin;
    this.toastHeight = height + 2 * margin;
    this.positionX = viewportWidth / 2 - this.toastWidth / 2;
    this.positionY = positionY;
    this.fontX = this.positionX + margin;
    this.fontY = positionY + margin + height;
  }

  get timeToLive(): number {
    return this._timeToLive;
  }

  get opacity(): number {
    return this._opacity;
  }

  get isExpired(): boolean {
    return this.expired;
  }

  /**
   * Advances the toast by `delta` seconds and draws it on the surface.
   * Call once per frame, after the rest of the frame has been drawn. A negative
   * or non-finite delta counts as no time passing.
   *
   * @returns false once the toast has run out of time; it draws nothing from then on
   */
  update(delta: number): boolean {
    if (this.expired) return false;

    // A bad frame delta must not add time or poison the countdown
    if (!Number.isFinite(delta) || delta < 0) delta = 0;
    this._timeToLive -= delta;
    if (this._timeToLive <= 0) {
      this.expired = true;
      return false;
    }

    if (this._timeToLive < this.fadingDuration) {
      this._opacity = this._timeToLive / this.fadingDuration;
    }

    this.drawBackground();
    if (this._opacity > MIN_TEXT_OPACITY) {
      this.drawText();
    }
    return true;
  }

  private drawBackground(): void {
    const radius = this.toastHeight / 2;
    const centerY = this.positionY + radius;
    this.surface.fillCircle(this.positionX, centerY, radius, this.backgroundColor);
    this.surface.fillRect(this.positionX, this.positionY, this.toastWidth, this.toastHeight, this.backgroundColor);
    this.surface.fillCircle(this.positionX + this.toastWidth, centerY, radius, this.backgroundColor);
  }

  private drawText(): void {
    const color = { ...this.fontColor, a: this.fontColor.a * this._opacity };
    this.surface.drawText(this.lines, this.fontX, this.fontY, this.textWidth, this.font.lineHeight, this.font.css, color);
  }
}
