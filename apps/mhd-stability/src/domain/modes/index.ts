export { kMODE_ORDER, kMODE_LABELS, type ModeName, type ModeResult } from "./ModeName.js";
