import path from "node:path";
import { describeObject, hasCapability, type HostDocument, type HostObject } from "../document.js";
import type { HostPrimitives } from "../host.js";
import { OutputRunner, executionFailure, type ExecuteResult } from "../runner.js";

/** Exports every collected part-shape object into one STEP file. */
export class StepOutputRunner extends OutputRunner {
  checkItem(obj: HostObject): boolean {
    if (!hasCapability(obj, "part_shape")) {
      this.log.debug(`Object ${describeObject(obj)} does not seem to be a solid`);
      return false;
    }
    return true;
  }

  protected async execute(
    _doc: HostDocument,
    items: HostObject[],
    host: HostPrimitives
  ): Promise<ExecuteResult> {
    return this.exportWithCommit(
      async (exportDir) => {
        const exportFile = path.join(exportDir, "export.step");
        this.log.info(`Exporting ${items.length} items as STEP to ${this.filename}`);
        await host.exportStep(items, exportFile);
        return exportFile;
      },
      { requireNonEmpty: true }
    );
  }
}

/** Exports the geometry of exactly one object as STL. */
export class StlOutputRunner extends OutputRunner {
  checkItem(obj: HostObject): boolean {
    if (!hasCapability(obj, "shape")) {
      this.log.debug(`Object ${describeObject(obj)} does not have a shape`);
      return false;
    }
    return true;
  }

  protected async execute(
    _doc: HostDocument,
    items: HostObject[],
    host: HostPrimitives
  ): Promise<ExecuteResult> {
    const [item, ...rest] = items;
    if (!item || rest.length > 0) {
      return executionFailure(
        "stl_multiple_objects",
        "Only one object may be output to STL at a time",
        { count: items.length }
      );
    }
    return this.exportWithCommit(async (exportDir) => {
      const exportFile = path.join(exportDir, "export.stl");
      this.log.info(`Exporting ${item.label} as STL to ${this.filename}`);
      await host.exportStl(item, exportFile);
      return exportFile;
    });
  }
}
