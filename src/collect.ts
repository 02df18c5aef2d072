import type { Selection } from "./config.js";
import {
  hasCapability,
  isDrawingPage,
  type HostDocument,
  type HostObject,
  type ObjectId,
} from "./document.js";
import type { Logger } from "./logging.js";

export type ItemCheck = (obj: HostObject) => boolean;

export type CollectContext = {
  checkItem: ItemCheck;
  logger: Logger;
};

/**
 * Objects are looked up by label in listed order. A label repeated in the list
 * yields its objects again; a label matching several objects yields all of them.
 */
export function collectLabels(
  doc: HostDocument,
  labels: readonly string[],
  ctx: CollectContext
): HostObject[] {
  const seen = new Set<string>();
  const items: HostObject[] = [];

  for (const label of labels) {
    if (seen.has(label)) {
      ctx.logger.warn({ label }, `Duplicate label ${label} included for export`);
    }
    seen.add(label);

    const matches = doc.getObjectsByLabel(label);
    if (matches.length === 0) {
      ctx.logger.warn({ label }, `No object found with label ${label}`);
      continue;
    }
    if (matches.length > 1) {
      ctx.logger.warn(
        { label, ids: matches.map((obj) => obj.id) },
        `Multiple objects found with label ${label}`
      );
    }
    for (const obj of matches) {
      if (ctx.checkItem(obj)) items.push(obj);
    }
  }
  return items;
}

export function collectPages(doc: HostDocument, ctx: CollectContext): HostObject[] {
  const items: HostObject[] = [];
  for (const obj of doc.objects) {
    if (!isDrawingPage(obj)) continue;
    if (ctx.checkItem(obj)) items.push(obj);
  }
  return items;
}

type WalkFrame = {
  node: HostObject;
  path: ObjectId[];
};

/**
 * Walks parent edges upward from `start` and returns the ancestors that have
 * no parents of their own, in depth-first order. A parent already on the
 * current path closes a cycle; that edge is reported and not followed.
 */
export function findTopParents(start: HostObject, logger: Logger): HostObject[] {
  const tops: HostObject[] = [];
  const visited = new Set<ObjectId>([start.id]);
  const stack: WalkFrame[] = [{ node: start, path: [start.id] }];

  while (stack.length > 0) {
    const frame = stack.pop();
    if (!frame) break;
    const { node, path } = frame;
    if (node.parents.length === 0) {
      tops.push(node);
      continue;
    }

    const next: WalkFrame[] = [];
    for (const edge of node.parents) {
      const parent = edge.parent;
      if (path.includes(parent.id)) {
        logger.error(
          { cycle: [...path, parent.id] },
          `Ownership cycle detected at ${parent.id}, skipping branch`
        );
        continue;
      }
      if (visited.has(parent.id)) continue;
      visited.add(parent.id);
      next.push({ node: parent, path: [...path, parent.id] });
    }
    // Reversed so the first parent edge is walked first.
    for (let i = next.length - 1; i >= 0; i -= 1) {
      const entry = next[i];
      if (entry) stack.push(entry);
    }
  }
  return tops;
}

export function collectShapes(doc: HostDocument, ctx: CollectContext): HostObject[] {
  const items: HostObject[] = [];
  const ids = new Set<ObjectId>();

  for (const obj of doc.objects) {
    if (!hasCapability(obj, "shape")) continue;

    const parents = findTopParents(obj, ctx.logger);
    ctx.logger.debug(`Found parents [${parents.map((p) => p.id).join(", ")}] for ${obj.id}`);

    for (const parent of parents) {
      if (ids.has(parent.id)) continue;
      if (ctx.checkItem(parent)) {
        ids.add(parent.id);
        items.push(parent);
      }
    }
  }
  return items;
}

export function collect(
  doc: HostDocument,
  selection: Selection,
  ctx: CollectContext
): HostObject[] {
  switch (selection.kind) {
    case "labels":
      ctx.logger.debug("Collecting outputs by label");
      return collectLabels(doc, selection.labels, ctx);
    case "pages":
      ctx.logger.debug("Collecting all pages as output");
      return collectPages(doc, ctx);
    case "shapes":
      ctx.logger.debug("Collecting all shapes as output");
      return collectShapes(doc, ctx);
    default:
      return unexpectedSelection(selection);
  }
}

function unexpectedSelection(selection: never): never {
  throw new TypeError(`Unexpected selection ${JSON.stringify(selection)}`);
}
