/**
 * Pipeline modules export
 */

export { parse } from "./parser";
export { link } from "./linker";
export { preview } from "./preview";
export { resolve } from "./resolver";
export { stats } from "./stats";
