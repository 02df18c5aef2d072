import { writeFile } from "node:fs/promises";
import zlib from "node:zlib";
import { PDFDocument } from "pdf-lib";
import {
  PAGE_TYPE_ID,
  type HostDocument,
  type HostObject,
  type ObjectCapability,
  type ObjectId,
  type ParentEdge,
} from "./document.js";
import type { CameraType, HostPrimitives, HostView, ViewPreset } from "./host.js";

const DEFAULT_PAGE_SIZE: [number, number] = [595, 842];

export type MockObjectInit = {
  id: ObjectId;
  label?: string;
  typeId?: string;
  capabilities?: ObjectCapability[];
  visibility?: boolean;
  /** Page size used when a page is exported to PDF. */
  pageSize?: [number, number];
};

export class MockObject implements HostObject {
  readonly id: ObjectId;
  readonly label: string;
  readonly typeId: string;
  readonly capabilities: ReadonlySet<ObjectCapability>;
  readonly pageSize: [number, number];
  readonly parents: ParentEdge[] = [];
  visibility: boolean;

  constructor(init: MockObjectInit) {
    this.id = init.id;
    this.label = init.label ?? init.id;
    this.typeId = init.typeId ?? "Part::Feature";
    this.capabilities = new Set(init.capabilities ?? []);
    this.visibility = init.visibility ?? true;
    this.pageSize = init.pageSize ?? DEFAULT_PAGE_SIZE;
  }

  addParent(parent: HostObject, relation = "Group"): this {
    this.parents.push({ parent, relation });
    return this;
  }
}

export class MockDocument implements HostDocument {
  readonly name: string;
  private items: MockObject[] = [];

  constructor(name = "Unnamed") {
    this.name = name;
  }

  get objects(): readonly MockObject[] {
    return this.items;
  }

  add(init: MockObjectInit): MockObject {
    if (this.items.some((obj) => obj.id === init.id)) {
      throw new Error(`Duplicate object id ${init.id}`);
    }
    const obj = new MockObject(init);
    this.items.push(obj);
    return obj;
  }

  addPage(id: string, label?: string, pageSize?: [number, number]): MockObject {
    return this.add({ id, label, typeId: PAGE_TYPE_ID, capabilities: ["page"], pageSize });
  }

  addSolid(id: string, label?: string): MockObject {
    return this.add({ id, label, typeId: "Part::Feature", capabilities: ["shape", "part_shape"] });
  }

  getObjectsByLabel(label: string): MockObject[] {
    return this.items.filter((obj) => obj.label === label);
  }

  getObject(id: ObjectId): MockObject | undefined {
    return this.items.find((obj) => obj.id === id);
  }
}

export type MockPrimitive = "pdf" | "step" | "stl" | "image";

/**
 * `throw` raises from the primitive, `skip` returns without writing, `empty`
 * writes a zero-byte file.
 */
export type MockFailure = "throw" | "skip" | "empty";

export type MockHostOptions = {
  failures?: Partial<Record<MockPrimitive, MockFailure>>;
  /** Pages written per exported PDF file. */
  pagesPerExport?: number;
  /** When false, `createView` returns null. */
  views?: boolean;
  /** Presets the mock view does not know. */
  missingPresets?: ViewPreset[];
};

export class MockView implements HostView {
  readonly calls: string[] = [];
  closed = false;
  private readonly host: MockHost;

  constructor(host: MockHost) {
    this.host = host;
  }

  setCameraType(camera: CameraType): void {
    this.calls.push(`camera:${camera}`);
  }

  applyViewPreset(preset: ViewPreset): boolean {
    this.calls.push(`view:${preset}`);
    return !this.host.options.missingPresets?.includes(preset);
  }

  fitAll(): void {
    this.calls.push("fitAll");
  }

  async saveImage(path: string, width: number, height: number, background: string): Promise<void> {
    this.calls.push(`saveImage:${width}x${height}:${background}`);
    this.host.visibleAtCapture = this.host.document
      ? this.host.document.objects.filter((obj) => obj.visibility).map((obj) => obj.id)
      : [];
    await this.host.write("image", path, () => writePng(width, height, backgroundPixel(background)));
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * In-process stand-in for the CAD host. Writes small but well-formed files so
 * the export protocol can be exercised without the real application.
 */
export class MockHost implements HostPrimitives {
  readonly calls: string[] = [];
  readonly views: MockView[] = [];
  readonly options: MockHostOptions;
  readonly document: MockDocument | null;
  visibleAtCapture: ObjectId[] = [];

  constructor(document: MockDocument | null = null, options: MockHostOptions = {}) {
    this.document = document;
    this.options = options;
  }

  recomputePage(page: HostObject): void {
    this.calls.push(`recompute:${page.id}`);
  }

  refreshGui(): void {
    this.calls.push("refreshGui");
  }

  async exportPageAsPdf(page: HostObject, path: string): Promise<void> {
    this.calls.push(`pdf:${page.id}`);
    const size = page instanceof MockObject ? page.pageSize : DEFAULT_PAGE_SIZE;
    await this.write("pdf", path, async () => {
      const pdf = await PDFDocument.create();
      pdf.setTitle(page.label);
      const count = Math.max(1, this.options.pagesPerExport ?? 1);
      for (let i = 0; i < count; i += 1) pdf.addPage(size);
      return pdf.save();
    });
  }

  async exportStep(objects: readonly HostObject[], path: string): Promise<void> {
    this.calls.push(`step:${objects.map((obj) => obj.id).join(",")}`);
    await this.write("step", path, () =>
      [
        "ISO-10303-21;",
        "HEADER;",
        "ENDSEC;",
        "DATA;",
        ...objects.map((obj, i) => `#${i + 1}=PRODUCT('${obj.label}','${obj.id}');`),
        "ENDSEC;",
        "END-ISO-10303-21;",
        "",
      ].join("\n")
    );
  }

  async exportStl(object: HostObject, path: string): Promise<void> {
    this.calls.push(`stl:${object.id}`);
    await this.write("stl", path, () => `solid ${object.label}\nendsolid ${object.label}\n`);
  }

  createView(): MockView | null {
    this.calls.push("createView");
    if (this.options.views === false) return null;
    const view = new MockView(this);
    this.views.push(view);
    return view;
  }

  async write(
    primitive: MockPrimitive,
    path: string,
    render: () => Promise<Uint8Array | string> | Uint8Array | string
  ): Promise<void> {
    const failure = this.options.failures?.[primitive];
    if (failure === "throw") {
      throw new Error(`mock ${primitive} export failed`);
    }
    if (failure === "skip") return;
    await writeFile(path, failure === "empty" ? "" : await render());
  }
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

function backgroundPixel(background: string): [number, number, number, number] {
  const hex = /^#([0-9a-f]{6})$/i.exec(background.trim());
  if (hex?.[1]) {
    const value = parseInt(hex[1], 16);
    return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff, 255];
  }
  if (background === "transparent") return [0, 0, 0, 0];
  return [255, 255, 255, 255];
}

function writePng(width: number, height: number, pixel: [number, number, number, number]): Buffer {
  const stride = width * 4;
  const raw = Buffer.alloc((stride + 1) * height);
  for (let y = 0; y < height; y += 1) {
    const rowStart = y * (stride + 1);
    raw[rowStart] = 0;
    for (let x = 0; x < width; x += 1) {
      raw.set(pixel, rowStart + 1 + x * 4);
    }
  }
  return Buffer.concat([
    PNG_SIGNATURE,
    makeChunk("IHDR", makeIHDR(width, height)),
    makeChunk("IDAT", zlib.deflateSync(raw)),
    makeChunk("IEND", Buffer.alloc(0)),
  ]);
}

function makeIHDR(width: number, height: number): Buffer {
  const ihdr = Buffer.alloc(13);
  ihdr.writeUInt32BE(width, 0);
  ihdr.writeUInt32BE(height, 4);
  ihdr[8] = 8;
  ihdr[9] = 6;
  return ihdr;
}

function makeChunk(type: string, data: Buffer): Buffer {
  const typeBuf = Buffer.from(type, "ascii");
  const length = Buffer.alloc(4);
  length.writeUInt32BE(data.length, 0);
  const crc = Buffer.alloc(4);
  crc.writeUInt32BE(crc32(Buffer.concat([typeBuf, data])) >>> 0, 0);
  return Buffer.concat([length, typeBuf, data, crc]);
}

function crc32(buf: Buffer): number {
  let crc = 0xffffffff;
  for (let i = 0; i < buf.length; i += 1) {
    crc ^= buf[i] ?? 0;
    for (let j = 0; j < 8; j += 1) {
      const mask = -(crc & 1);
      crc = (crc >>> 1) ^ (0xedb88320 & mask);
    }
  }
  return (crc ^ 0xffffffff) >>> 0;
}
