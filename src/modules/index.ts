/**
 * Pipeline modules export
 */

export { enumerate } from "./enumerate";
export { resolve } from "./resolve";
export { download } from "./download";
export { list } from "./list";
export { stats } from "./stats";
