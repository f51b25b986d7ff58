import * as THREE from 'three';
import { CanvasToastSurface, type DrawingContext2D } from './CanvasToastSurface';

/** What the overlay needs from a `THREE.WebGLRenderer`. */
export type HudRenderer = Pick<THREE.WebGLRenderer, 'autoClear' | 'clearDepth' | 'render'>;

/**
 * Screen-space layer drawn over the game scene.
 *
 * Toasts draw into an offscreen 2D canvas; each frame the canvas is uploaded
 * as a texture on a full-viewport quad seen by an orthographic camera whose
 * units are canvas pixels.
 */
export class HudOverlay {
  readonly scene = new THREE.Scene();
  readonly camera: THREE.OrthographicCamera;
  readonly surface: CanvasToastSurface;

  private readonly canvas: HTMLCanvasElement;
  private readonly texture: THREE.CanvasTexture;
  private readonly material: THREE.MeshBasicMaterial;
  private readonly quad: THREE.Mesh<THREE.PlaneGeometry, THREE.MeshBasicMaterial>;

  static create(width: number, height: number): HudOverlay {
    const canvas = document.createElement('canvas');
    canvas.width = width;
    canvas.height = height;
    const ctx = canvas.getContext('2d');
    if (!ctx) {
      throw new Error('2D canvas context is not available');
    }
    return new HudOverlay(canvas, ctx);
  }

  constructor(canvas: HTMLCanvasElement, ctx: DrawingContext2D) {
    this.canvas = canvas;
    this.surface = new CanvasToastSurface(ctx);

    this.texture = new THREE.CanvasTexture(canvas);
    this.texture.colorSpace = THREE.SRGBColorSpace;
    this.material = new THREE.MeshBasicMaterial({
      map: this.texture,
      transparent: true,
      depthTest: false,
      depthWrite: false,
    });
    this.quad = new THREE.Mesh(new THREE.PlaneGeometry(1, 1), this.material);
    this.scene.add(this.quad);

    this.camera = new THREE.OrthographicCamera(0, 1, 1, 0, 0.1, 10);
    this.camera.position.z = 1;

    this.layout(canvas.width, canvas.height);
  }

  get width(): number {
    return this.canvas.width;
  }

  get height(): number {
    return this.canvas.height;
  }

  /** Resizing the canvas also wipes whatever was drawn on it. */
  resize(width: number, height: number): void {
    this.canvas.width = width;
    this.canvas.height = height;
    this.layout(width, height);
  }

  beginFrame(): void {
    this.surface.clear();
  }

  /** Composites the HUD over what the renderer already drew this frame. */
  render(renderer: HudRenderer): void {
    this.texture.needsUpdate = true;

    const autoClear = renderer.autoClear;
    renderer.autoClear = false;
    renderer.clearDepth();
    renderer.render(this.scene, this.camera);
    renderer.autoClear = autoClear;
  }

  dispose(): void {
    this.scene.remove(this.quad);
    this.quad.geometry.dispose();
    this.material.dispose();
    this.texture.dispose();
  }

  private layout(width: number, height: number): void {
    this.quad.scale.set(width, height, 1);
    this.quad.position.set(width / 2, height / 2, 0);

    this.camera.left = 0;
    this.camera.right = width;
    this.camera.top = height;
    this.camera.bottom = 0;
    this.camera.updateProjectionMatrix();
  }
}
