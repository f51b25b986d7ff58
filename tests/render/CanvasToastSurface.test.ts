import { describe, it, expect, beforeEach } from 'vitest';
import { CanvasToastSurface, toCssColor, type DrawingContext2D } from '../../src/render/CanvasToastSurface';

interface Recorded {
  op: string;
  args: unknown[];
  fillStyle: unknown;
}

function recordingContext(width: number, height: number): { ctx: DrawingContext2D; ops: Recorded[] } {
  const ops: Recorded[] = [];
  const ctx: DrawingContext2D = {
    canvas: { width, height },
    fillStyle: '',
    font: '',
    textAlign: 'start',
    textBaseline: 'alphabetic',
    save: () => ops.push({ op: 'save', args: [], fillStyle: ctx.fillStyle }),
    restore: () => ops.push({ op: 'restore', args: [], fillStyle: ctx.fillStyle }),
    beginPath: () => ops.push({ op: 'beginPath', args: [], fillStyle: ctx.fillStyle }),
    arc: (...args) => ops.push({ op: 'arc', args, fillStyle: ctx.fillStyle }),
    fill: () => ops.push({ op: 'fill', args: [], fillStyle: ctx.fillStyle }),
    fillRect: (...args) => ops.push({ op: 'fillRect', args, fillStyle: ctx.fillStyle }),
    fillText: (...args) => ops.push({ op: 'fillText', args, fillStyle: ctx.fillStyle }),
    clearRect: (...args) => ops.push({ op: 'clearRect', args, fillStyle: ctx.fillStyle }),
  };
  return { ctx, ops };
}

describe('toCssColor', () => {
  it('scales float channels to bytes', () => {
    expect(toCssColor({ r: 1, g: 0.5, b: 0, a: 0.25 })).toBe('rgba(255, 128, 0, 0.25)');
    expect(toCssColor({ r: 55 / 256, g: 55 / 256, b: 55 / 256, a: 1 })).toBe('rgba(55, 55, 55, 1)');
  });

  it('clamps out-of-range channels', () => {
    expect(toCssColor({ r: 2, g: -1, b: 0, a: 1 })).toBe('rgba(255, 0, 0, 1)');
  });
});

describe('CanvasToastSurface', () => {
  const red = { r: 1, g: 0, b: 0, a: 1 };
  let ctx: DrawingContext2D;
  let ops: Recorded[];
  let surface: CanvasToastSurface;

  beforeEach(() => {
    ({ ctx, ops } = recordingContext(200, 100));
    surface = new CanvasToastSurface(ctx);
  });

  it('reports the canvas size', () => {
    expect(surface.width).toBe(200);
    expect(surface.height).toBe(100);
    ctx.canvas.width = 300;
    expect(surface.width).toBe(300);
  });

  it('flips rectangles into canvas coordinates', () => {
    surface.fillRect(10, 20, 30, 40, red);
    expect(ops).toEqual([{ op: 'fillRect', args: [10, 40, 30, 40], fillStyle: 'rgba(255, 0, 0, 1)' }]);
  });

  it('flips circle centres', () => {
    surface.fillCircle(50, 30, 5, red);
    expect(ops.map(o => o.op)).toEqual(['beginPath', 'arc', 'fill']);
    expect(ops[1].args).toEqual([50, 70, 5, 0, Math.PI * 2]);
    expect(ops[2].fillStyle).toBe('rgba(255, 0, 0, 1)');
  });

  it('draws centred lines downwards from the top edge', () => {
    surface.drawText(['a', 'b'], 10, 80, 40, 20, '16px serif', { r: 1, g: 1, b: 1, a: 0.5 });

    const texts = ops.filter(o => o.op === 'fillText');
    expect(texts.map(o => o.args)).toEqual([
      ['a', 30, 20],
      ['b', 30, 40],
    ]);
    expect(texts[0].fillStyle).toBe('rgba(255, 255, 255, 0.5)');
    expect(ctx.font).toBe('16px serif');
    expect(ctx.textAlign).toBe('center');
    expect(ctx.textBaseline).toBe('top');
    expect(ops[0].op).toBe('save');
    expect(ops[ops.length - 1].op).toBe('restore');
  });

  it('clears the whole canvas', () => {
    surface.clear();
    expect(ops).toEqual([{ op: 'clearRect', args: [0, 0, 200, 100], fillStyle: '' }]);
  });
});
