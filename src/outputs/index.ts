export { PdfOutputRunner, mergePdfFiles } from "./pdf.js";
export { StepOutputRunner, StlOutputRunner } from "./shape.js";
export {
  ScreenshotOutputRunner,
  VIEW_PRESETS,
  isViewPosition,
  parseScreenshotOptions,
} from "./screenshot.js";
export type { ScreenshotOptions, ViewPosition } from "./screenshot.js";
