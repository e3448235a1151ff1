export { fitHorizontal, fitHorizontalCentered, applyHorizontal } from "./horizontal.js";
export { fitVertical, fitVerticalCentered, predictDiscrepancy, heightDiscrepancy } from "./vertical.js";
export { centerPairs } from "./pairs.js";
export type { CenteredPairs } from "./pairs.js";
