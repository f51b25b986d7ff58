import { describe, it, expect, beforeEach } from 'vitest';
import { ToastFactory } from '../../src/toast/ToastFactory';
import { ToastLength } from '../../src/toast/ToastLength';
import { ToastFont } from '../../src/render/ToastFont';
import { fixedWidthMeasurer, RecordingSurface } from '../helpers/fakes';

describe('Toast lifecycle', () => {
  let surface: RecordingSurface;
  let factory: ToastFactory;

  beforeEach(() => {
    surface = new RecordingSurface(800, 600);
    factory = ToastFactory.builder(surface)
      .font(new ToastFont(fixedWidthMeasurer(), { family: 'sans-serif', size: 16 }))
      .fadingDuration(0.5)
      .maxTextRelativeWidth(0.65)
      .build();
  });

  it('shows a short toast at full opacity, fades it, then expires it', () => {
    const toast = factory.create('abc', ToastLength.SHORT);
    expect(toast.positionX).toBe(800 / 2 - toast.toastWidth / 2);

    // 12 frames of 0.125s bring the lifetime down to exactly the fading window
    for (let frame = 1; frame <= 12; frame++) {
      expect(toast.update(0.125)).toBe(true);
      expect(toast.opacity).toBe(1);
    }

    const faded: number[] = [];
    for (let frame = 13; frame <= 15; frame++) {
      expect(toast.update(0.125)).toBe(true);
      faded.push(toast.opacity);
    }
    expect(faded).toEqual([0.75, 0.5, 0.25]);

    surface.reset();
    expect(toast.update(0.125)).toBe(false);
    expect(surface.calls).toEqual([]);
    expect(toast.update(0.125)).toBe(false);
  });

  it('keeps a short toast active for any elapsed time under two seconds', () => {
    const toast = factory.create('abc', ToastLength.SHORT);
    expect(toast.update(1.75)).toBe(true);
    expect(toast.update(0.25)).toBe(false);
  });

  it('keeps a long toast for three and a half seconds', () => {
    const toast = factory.create('abc', ToastLength.LONG);
    expect(toast.update(3)).toBe(true);
    expect(toast.update(0.5)).toBe(false);
  });
});
