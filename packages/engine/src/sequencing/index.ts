export { RouteSequencer, sequenceRoute, compareIds } from "./route-sequencer.js";
