import type { FontStyle, TextBounds, TextMeasurer } from '../types';

/**
 * Font used to measure and wrap toast text.
 *
 * Measurement goes through a Canvas 2D text measurer so the numbers match what
 * `CanvasToastSurface` later draws with the same CSS font.
 */
export class ToastFont {
  readonly css: string;
  readonly lineHeight: number;
  private readonly measurer: TextMeasurer;

  constructor(measurer: TextMeasurer, style: FontStyle) {
    this.measurer = measurer;
    const { family, size, weight, lineHeight = Math.round(size * 1.25) } = style;
    this.css = weight ? `${weight} ${size}px ${family}` : `${size}px ${family}`;
    this.lineHeight = lineHeight;
  }

  textWidth(line: string): number {
    this.measurer.font = this.css;
    return this.measurer.measureText(line).width;
  }

  /** Bounds with no width limit. Explicit newlines still break lines. */
  measure(text: string): TextBounds {
    return this.measureLines(splitLines(text));
  }

  measureWrapped(text: string, maxWidth: number): TextBounds {
    return this.measureLines(this.wrap(text, maxWidth));
  }

  /**
   * Greedy word wrap. A word wider than `maxWidth` on its own is broken
   * between characters; every line keeps at least one character.
   */
  wrap(text: string, maxWidth: number): string[] {
    const lines: string[] = [];
    for (const paragraph of splitLines(text)) {
      let current = '';
      for (const word of paragraph.split(' ').filter(w => w.length > 0)) {
        const candidate = current ? `${current} ${word}` : word;
        if (this.textWidth(candidate) <= maxWidth) {
          current = candidate;
          continue;
        }
        if (current) lines.push(current);
        current = '';
        for (const piece of this.breakWord(word, maxWidth)) {
          if (current) lines.push(current);
          current = piece;
        }
      }
      lines.push(current);
    }
    return lines;
  }

  private breakWord(word: string, maxWidth: number): string[] {
    if (this.textWidth(word) <= maxWidth) return [word];

    const pieces: string[] = [];
    let piece = '';
    for (const ch of word) {
      if (piece && this.textWidth(piece + ch) > maxWidth) {
        pieces.push(piece);
        piece = ch;
      } else {
        piece += ch;
      }
    }
    if (piece) pieces.push(piece);
    return pieces;
  }

  /** Widest line by the number of lines times the line height. */
  measureLines(lines: readonly string[]): TextBounds {
    let width = 0;
    for (const line of lines) {
      width = Math.max(width, this.textWidth(line));
    }
    return { width, height: lines.length * this.lineHeight };
  }
}

/** Lines of `text` split at explicit newlines; none for the empty string. */
export function splitLines(text: string): string[] {
  return text === '' ? [] : text.split('\n');
}
