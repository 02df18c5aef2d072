import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { PDFDocument } from "pdf-lib";
import { describeObject, isDrawingPage, type HostDocument, type HostObject } from "../document.js";
import type { HostPrimitives } from "../host.js";
import type { Logger } from "../logging.js";
import {
  OutputRunner,
  executionFailure,
  verifyExport,
  type ExecuteResult,
} from "../runner.js";

/**
 * Appends every page of each file to one document, in the order given. The
 * exporter is expected to write exactly one page per file; anything else is
 * merged as-is with a warning.
 */
export async function mergePdfFiles(files: readonly string[], log: Logger): Promise<Uint8Array> {
  const merged = await PDFDocument.create();
  for (const file of files) {
    const source = await PDFDocument.load(await readFile(file));
    const count = source.getPageCount();
    if (count !== 1) {
      log.warn(
        { pages: count },
        `Exported PDF file for ${path.basename(file)} has ${count} pages, expected 1`
      );
    }
    const pages = await merged.copyPages(source, source.getPageIndices());
    pages.forEach((page, index) => {
      log.debug(`Appending page ${index + 1} from ${file}`);
      merged.addPage(page);
    });
  }
  return merged.save();
}

function pageFileName(index: number, page: HostObject): string {
  const safe = page.label.replace(/[^A-Za-z0-9._-]+/g, "_");
  return `${String(index).padStart(3, "0")}-${safe || page.id}.pdf`;
}

export class PdfOutputRunner extends OutputRunner {
  checkItem(obj: HostObject): boolean {
    if (!isDrawingPage(obj)) {
      this.log.debug(`Object ${describeObject(obj)} is not a drawing page`);
      return false;
    }
    return true;
  }

  protected async execute(
    _doc: HostDocument,
    items: HostObject[],
    host: HostPrimitives
  ): Promise<ExecuteResult> {
    for (const page of items) {
      if (!isDrawingPage(page)) {
        return executionFailure("pdf_not_page", `Object "${page.label}" is not a drawing page`);
      }
      this.log.debug(`Redrawing page ${page.label}`);
      await host.recomputePage?.(page);
    }
    await host.refreshGui?.();

    const first = items[0];
    if (items.length === 1 && first) {
      return this.exportWithCommit(async (exportDir) => {
        const exportFile = path.join(exportDir, "export.pdf");
        this.log.info(`Exporting ${first.label} as PDF to ${this.filename}`);
        await host.exportPageAsPdf(first, exportFile);
        return exportFile;
      });
    }

    return this.exportWithCommit(
      async (exportDir) => {
        const pageFiles: string[] = [];
        for (const [index, page] of items.entries()) {
          const pageFile = path.join(exportDir, pageFileName(index, page));
          this.log.info(`Exporting ${page.label} as PDF to ${path.basename(pageFile)}`);
          await host.exportPageAsPdf(page, pageFile);
          const problem = await verifyExport(pageFile, false);
          if (problem) throw problem;
          pageFiles.push(pageFile);
        }

        this.log.info(`Merging ${pageFiles.length} files into single PDF to ${this.filename}`);
        const exportFile = path.join(exportDir, "export.pdf");
        await writeFile(exportFile, await mergePdfFiles(pageFiles, this.log));
        return exportFile;
      },
      { requireNonEmpty: true }
    );
  }
}
