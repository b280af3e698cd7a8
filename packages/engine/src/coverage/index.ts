export { CoverageGenerator, generateCoverage } from "./coverage-generator.js";
export {
  computeGridSteps,
  gridAxis,
  gridAxisSize,
  referenceLatitude,
  type GridSteps,
} from "./grid.js";
