export type ObjectId = string;

/**
 * Named capabilities the host reports for each object:
 * - `shape`: carries geometric data directly
 * - `page`: is a drawing page
 * - `part_shape`: exposes a part-shape property usable by solid exporters
 */
export type ObjectCapability = "shape" | "page" | "part_shape";

export const PAGE_TYPE_ID = "TechDraw::DrawPage";

export type ParentEdge = {
  parent: HostObject;
  relation: string;
};

export interface HostObject {
  readonly id: ObjectId;
  readonly label: string;
  readonly typeId: string;
  readonly parents: readonly ParentEdge[];
  readonly capabilities: ReadonlySet<ObjectCapability>;
  visibility: boolean;
}

export interface HostDocument {
  readonly name: string;
  readonly objects: readonly HostObject[];
  getObjectsByLabel(label: string): HostObject[];
  getObject(id: ObjectId): HostObject | undefined;
}

export function hasCapability(obj: HostObject, capability: ObjectCapability): boolean {
  return obj.capabilities.has(capability);
}

export function isDrawingPage(obj: HostObject): boolean {
  return obj.typeId === PAGE_TYPE_ID;
}

export function describeObject(obj: HostObject): string {
  return obj.label === obj.id ? obj.id : `${obj.label} (${obj.id})`;
}
