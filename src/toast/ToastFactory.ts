import type { Rgba, ToastSurface } from '../types';
import type { ToastFont } from '../render/ToastFont';
import { Toast } from './Toast';
import { ToastConfigError } from './ToastConfigError';
import type { ToastLength } from './ToastLength';

const DEFAULT_BACKGROUND: Rgba = { r: 55 / 256, g: 55 / 256, b: 55 / 256, a: 1 };
const DEFAULT_FONT_COLOR: Rgba = { r: 1, g: 1, b: 1, a: 1 };
const DEFAULT_FADING_DURATION = 0.5;
const DEFAULT_MAX_RELATIVE_WIDTH = 0.65;
const BOTTOM_GAP = 100;

interface ToastFactorySettings {
  font: ToastFont;
  surface: ToastSurface;
  backgroundColor: Rgba;
  fontColor: Rgba;
  positionY: number;
  fadingDuration: number;
  maxRelativeWidth: number;
  margin: number | undefined;
}

/**
 * Creates toasts sharing one display configuration.
 *
 * Obtain one through `ToastFactory.builder(surface)`; it never changes after
 * `build()`.
 */
export class ToastFactory {
  private readonly settings: Readonly<ToastFactorySettings>;

  private constructor(settings: ToastFactorySettings) {
    this.settings = settings;
  }

  static builder(surface: ToastSurface): ToastFactoryBuilder {
    return new ToastFactoryBuilder(surface, settings => new ToastFactory(settings));
  }

  get font(): ToastFont { return this.settings.font; }
  get surface(): ToastSurface { return this.settings.surface; }
  get backgroundColor(): Rgba { return { ...this.settings.backgroundColor }; }
  get fontColor(): Rgba { return { ...this.settings.fontColor }; }
  get positionY(): number { return this.settings.positionY; }
  get fadingDuration(): number { return this.settings.fadingDuration; }
  get maxRelativeWidth(): number { return this.settings.maxRelativeWidth; }
  get margin(): number | undefined { return this.settings.margin; }

  /** The viewport width is read from the surface now, so each toast sees the current size. */
  create(text: string, length: ToastLength): Toast {
    const { font, surface, backgroundColor, fontColor, positionY, fadingDuration, maxRelativeWidth, margin } = this.settings;
    return new Toast({
      text,
      length,
      font,
      surface,
      backgroundColor,
      fontColor,
      fadingDuration,
      maxRelativeWidth,
      positionY,
      margin,
    });
  }
}

/**
 * Single-use builder: once `build()` succeeds every further call throws.
 * Get one from `ToastFactory.builder(surface)`; that is the only way to reach a factory.
 */
export class ToastFactoryBuilder {
  private readonly surface: ToastSurface;
  private readonly construct: (settings: ToastFactorySettings) => ToastFactory;
  private built = false;
  private _font: ToastFont | null = null;
  private _backgroundColor: Rgba = DEFAULT_BACKGROUND;
  private _fontColor: Rgba = DEFAULT_FONT_COLOR;
  private _positionY: number;
  private _fadingDuration = DEFAULT_FADING_DURATION;
  private _maxRelativeWidth = DEFAULT_MAX_RELATIVE_WIDTH;
  private _margin: number | undefined = undefined;

  /** @internal `construct` is how `ToastFactory.builder` hands over its private constructor. */
  constructor(surface: ToastSurface, construct: (settings: ToastFactorySettings) => ToastFactory) {
    this.surface = surface;
    this.construct = construct;
    // Near the bottom of the screen
    this._positionY = BOTTOM_GAP + (surface.height - BOTTOM_GAP) / 10;
  }

  font(font: ToastFont): this {
    this.check();
    this._font = font;
    return this;
  }

  /** Default: rgb(55, 55, 55). */
  backgroundColor(color: Rgba): this {
    this.check();
    this._backgroundColor = { ...color };
    return this;
  }

  /** Default: white. */
  fontColor(color: Rgba): this {
    this.check();
    this._fontColor = { ...color };
    return this;
  }

  /** Bottom edge of the toasts, y-up from the bottom of the viewport. */
  positionY(positionY: number): this {
    this.check();
    this._positionY = positionY;
    return this;
  }

  /** Seconds it takes a toast to disappear. Default: 0.5. */
  fadingDuration(seconds: number): this {
    this.check();
    if (seconds < 0) {
      throw new ToastConfigError('Duration must be non-negative number');
    }
    this._fadingDuration = seconds;
    return this;
  }

  /** Max text width relative to the viewport (0.5 = half the width). Default: 0.65. */
  maxTextRelativeWidth(fraction: number): this {
    this.check();
    this._maxRelativeWidth = fraction;
    return this;
  }

  /** Padding in px around the text. Default: twice the font's line height. */
  margin(margin: number): this {
    this.check();
    this._margin = margin;
    return this;
  }

  build(): ToastFactory {
    this.check();
    if (!this._font) {
      throw new ToastConfigError('Font is not set');
    }
    this.built = true;
    return this.construct({
      font: this._font,
      surface: this.surface,
      backgroundColor: this._backgroundColor,
      fontColor: this._fontColor,
      positionY: this._positionY,
      fadingDuration: this._fadingDuration,
      maxRelativeWidth: this._maxRelativeWidth,
      margin: this._margin,
    });
  }

  private check(): void {
    if (this.built) {
      throw new ToastConfigError('Builder can be used only once');
    }
  }
}
