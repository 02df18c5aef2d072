import type { HostObject } from "./document.js";

export type CameraType = "orthographic" | "perspective";

export type ViewPreset =
  | "axometric"
  | "axonometric"
  | "bottom"
  | "dimetric"
  | "front"
  | "isometric"
  | "left"
  | "rear"
  | "right"
  | "top"
  | "trimetric";

export interface HostView {
  setCameraType(camera: CameraType): void | Promise<void>;
  /** Returns false when the view does not know the preset. */
  applyViewPreset(preset: ViewPreset): boolean | Promise<boolean>;
  fitAll(): void | Promise<void>;
  saveImage(
    path: string,
    width: number,
    height: number,
    background: string
  ): void | Promise<void>;
  close?(): void | Promise<void>;
}

/**
 * Export primitives provided by the CAD host. They write straight to the path
 * they are given; callers are responsible for verifying the result.
 */
export interface HostPrimitives {
  recomputePage?(page: HostObject): void | Promise<void>;
  refreshGui?(): void | Promise<void>;
  exportPageAsPdf(page: HostObject, path: string): void | Promise<void>;
  exportStep(objects: readonly HostObject[], path: string): void | Promise<void>;
  exportStl(object: HostObject, path: string): void | Promise<void>;
  createView(): HostView | null | Promise<HostView | null>;
}
