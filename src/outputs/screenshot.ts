import path from "node:path";
import { collectShapes } from "../collect.js";
import type { ResolvedOutputSpec } from "../config.js";
import { describeObject, hasCapability, type HostDocument, type HostObject } from "../document.js";
import { ConfigError, ExecutionError } from "../errors.js";
import type { CameraType, HostPrimitives, HostView, ViewPreset } from "../host.js";
import { OutputRunner, type ExecuteResult, type RunnerOptions } from "../runner.js";
import {
  ensureArray,
  ensureFiniteNumber,
  ensureNonEmptyString,
  ensurePositiveInteger,
  isRecord,
  optionalString,
} from "../validate.js";

export type ViewPosition = {
  x: number;
  y: number;
  z: number;
  yaw: number;
  pitch: number;
  roll: number;
};

export type ScreenshotOptions = {
  camera: CameraType;
  view: ViewPreset | ViewPosition;
  resolution: [number, number];
  background: string;
};

const CAMERA_TYPES: ReadonlySet<string> = new Set<CameraType>(["orthographic", "perspective"]);

export const VIEW_PRESETS: readonly ViewPreset[] = [
  "axometric",
  "axonometric",
  "bottom",
  "dimetric",
  "front",
  "isometric",
  "left",
  "rear",
  "right",
  "top",
  "trimetric",
];

const PRESET_NAMES: ReadonlySet<string> = new Set(VIEW_PRESETS);

const POSITION_KEYS = ["x", "y", "z", "yaw", "pitch", "roll"] as const;

function isCameraType(value: string): value is CameraType {
  return CAMERA_TYPES.has(value);
}

function isViewPreset(value: string): value is ViewPreset {
  return PRESET_NAMES.has(value);
}

export function isViewPosition(view: ScreenshotOptions["view"]): view is ViewPosition {
  return typeof view === "object";
}

function parseView(value: unknown): ViewPreset | ViewPosition {
  if (typeof value === "string") {
    const preset = value.trim().toLowerCase();
    if (!isViewPreset(preset)) {
      throw new ConfigError("screenshot_view", `Unknown view preset "${value}"`, {
        allowed: VIEW_PRESETS,
      });
    }
    return preset;
  }
  if (isRecord(value)) {
    const coord = (key: (typeof POSITION_KEYS)[number]) =>
      ensureFiniteNumber(value[key], "screenshot_view", `options.view.${key} must be a number`);
    return {
      x: coord("x"),
      y: coord("y"),
      z: coord("z"),
      yaw: coord("yaw"),
      pitch: coord("pitch"),
      roll: coord("roll"),
    };
  }
  throw new ConfigError(
    "screenshot_view",
    "options.view must be a view preset or an {x, y, z, yaw, pitch, roll} position"
  );
}

export function parseScreenshotOptions(raw: Record<string, unknown>): ScreenshotOptions {
  const camera = ensureNonEmptyString(
    raw["camera"],
    "screenshot_camera",
    "options.camera must be a string"
  ).toLowerCase();
  if (!isCameraType(camera)) {
    throw new ConfigError("screenshot_camera", `Unknown camera type "${camera}"`, {
      allowed: [...CAMERA_TYPES],
    });
  }

  const resolution = ensureArray(
    raw["resolution"],
    "screenshot_resolution",
    "options.resolution must be [width, height]"
  );
  if (resolution.length !== 2) {
    throw new ConfigError("screenshot_resolution", "options.resolution must be [width, height]");
  }
  const width = ensurePositiveInteger(
    resolution[0],
    "screenshot_resolution",
    "options.resolution width must be a positive integer"
  );
  const height = ensurePositiveInteger(
    resolution[1],
    "screenshot_resolution",
    "options.resolution height must be a positive integer"
  );

  return {
    camera,
    view: parseView(raw["view"]),
    resolution: [width, height],
    background:
      optionalString(raw["background"], "screenshot_background", "options.background must be a string") ??
      "transparent",
  };
}

type SavedVisibility = {
  obj: HostObject;
  visibility: boolean;
};

export class ScreenshotOutputRunner extends OutputRunner<ScreenshotOptions> {
  constructor(spec: ResolvedOutputSpec, options: RunnerOptions = {}) {
    super(spec, options);
    if (!this.options) {
      throw new ConfigError(
        "screenshot_options_missing",
        `Output ${spec.name} of type screenshot requires "options"`
      );
    }
  }

  checkItem(obj: HostObject): boolean {
    if (!hasCapability(obj, "part_shape")) {
      this.log.debug(`Object ${describeObject(obj)} does not seem to be a solid`);
      return false;
    }
    return true;
  }

  protected loadOptions(raw: Record<string, unknown>): ScreenshotOptions {
    return parseScreenshotOptions(raw);
  }

  protected async execute(
    doc: HostDocument,
    items: HostObject[],
    host: HostPrimitives
  ): Promise<ExecuteResult> {
    const options = this.options;
    if (!options) {
      return {
        ok: false,
        error: new ExecutionError("screenshot_options_missing", "Screenshot options are missing"),
      };
    }
    const ext = path.extname(this.filename).slice(1) || "png";

    return this.exportWithCommit(
      async (exportDir) => {
        const exportFile = path.join(exportDir, `export.${ext}`);
        const saved = this.isolate(doc, items);
        let view: HostView | null = null;
        try {
          this.log.debug("Setting up new view");
          view = await host.createView();
          if (!view) {
            throw new ExecutionError("view_unavailable", "Host did not create a 3D view");
          }
          await this.captureTo(view, options, exportFile, items.length, ext);
          return exportFile;
        } finally {
          try {
            await view?.close?.();
          } finally {
            this.restore(saved);
          }
        }
      },
      { requireNonEmpty: true }
    );
  }

  /** Shows only `items` among the shape objects and records what it changed. */
  private isolate(doc: HostDocument, items: readonly HostObject[]): SavedVisibility[] {
    this.log.debug("Hiding other objects from view");
    const targets = new Set(items.map((item) => item.id));
    const saved: SavedVisibility[] = [];
    const shapes = collectShapes(doc, {
      checkItem: (obj) => this.checkItem(obj),
      logger: this.log,
    });
    for (const obj of shapes) {
      const visibility = targets.has(obj.id);
      if (visibility !== obj.visibility) {
        saved.push({ obj, visibility: obj.visibility });
        obj.visibility = visibility;
      }
    }
    return saved;
  }

  private restore(saved: readonly SavedVisibility[]): void {
    for (const entry of saved) {
      entry.obj.visibility = entry.visibility;
    }
  }

  private async captureTo(
    view: HostView,
    options: ScreenshotOptions,
    exportFile: string,
    count: number,
    ext: string
  ): Promise<void> {
    this.log.debug(`Setting camera type ${options.camera}`);
    await view.setCameraType(options.camera);

    if (isViewPosition(options.view)) {
      throw new ExecutionError(
        "view_position_unsupported",
        "Setting an arbitrary camera position is not supported",
        { ...options.view }
      );
    }
    if (!(await view.applyViewPreset(options.view))) {
      throw new ExecutionError(
        "view_preset_unsupported",
        `View preset ${options.view} is not supported by the host view`
      );
    }

    const [width, height] = options.resolution;
    this.log.info(
      `Capturing screenshot of ${count} items as ${ext.toUpperCase()} to ${this.filename}`
    );
    await view.fitAll();
    await view.saveImage(exportFile, width, height, options.background);
  }
}
