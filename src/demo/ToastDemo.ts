import * as THREE from "three";
import { HudOverlay } from "../render/HudOverlay";
import { ToastFont } from "../render/ToastFont";
import { ToastFactory } from "../toast/ToastFactory";
import { ToastLength } from "../toast/ToastLength";
import { ToastQueue } from "../ui/ToastQueue";

const MESSAGES: { text: string; length: ToastLength }[] = [
  { text: "Game saved", length: ToastLength.SHORT },
  { text: "Achievement unlocked: cleared the first wave without losing a single unit", length: ToastLength.LONG },
  { text: "Connection restored", length: ToastLength.SHORT },
];

/** Spins a cube and cycles sample toasts over it. */
export class ToastDemo {
  private renderer: THREE.WebGLRenderer;
  private scene = new THREE.Scene();
  private camera: THREE.PerspectiveCamera;
  private cube: THREE.Mesh;
  private clock = new THREE.Clock();
  private hud: HudOverlay;
  private queue = new ToastQueue();
  private factory: ToastFactory;
  private nextMessage = 0;

  constructor(container: HTMLElement) {
    const w = window.innerWidth;
    const h = window.innerHeight;

    this.renderer = new THREE.WebGLRenderer({ antialias: true });
    this.renderer.setSize(w, h);
    this.renderer.setPixelRatio(Math.min(window.devicePixelRatio, 2));
    container.appendChild(this.renderer.domElement);

    this.camera = new THREE.PerspectiveCamera(60, w / h, 0.1, 100);
    this.camera.position.set(0, 1.5, 4);
    this.camera.lookAt(0, 0, 0);

    this.scene.background = new THREE.Color(0x304b35);
    this.scene.add(new THREE.AmbientLight(0xffffff, 0.5));
    const directional = new THREE.DirectionalLight(0xffffff, 0.8);
    directional.position.set(3, 5, 2);
    this.scene.add(directional);

    this.cube = new THREE.Mesh(
      new THREE.BoxGeometry(1, 1, 1),
      new THREE.MeshStandardMaterial({ color: 0xd4a373 }),
    );
    this.scene.add(this.cube);

    this.hud = HudOverlay.create(w, h);
    const measureCtx = document.createElement("canvas").getContext("2d");
    if (!measureCtx) {
      throw new Error("2D canvas context is not available");
    }
    this.factory = ToastFactory.builder(this.hud.surface)
      .font(new ToastFont(measureCtx, { family: "Arial, sans-serif", size: 18 }))
      .build();

    window.addEventListener("resize", this.onResize.bind(this));
  }

  private onResize(): void {
    const w = window.innerWidth;
    const h = window.innerHeight;
    this.renderer.setSize(w, h);
    this.camera.aspect = w / h;
    this.camera.updateProjectionMatrix();
    this.hud.resize(w, h);
  }

  private showNext(): void {
    const { text, length } = MESSAGES[this.nextMessage % MESSAGES.length];
    this.nextMessage++;
    this.queue.enqueue(this.factory.create(text, length));
    console.log(`Toast queued: ${text}`);
  }

  start(): void {
    const animate = () => {
      requestAnimationFrame(animate);
      const dt = this.clock.getDelta();
      this.cube.rotation.y += dt * 0.6;

      if (this.queue.size === 0) {
        this.showNext();
      }

      this.renderer.render(this.scene, this.camera);
      this.hud.beginFrame();
      this.queue.update(dt);
      this.hud.render(this.renderer);
    };
    animate();
  }
}
