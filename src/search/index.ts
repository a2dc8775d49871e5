export { compile } from "./compile.js";
export { splitLines } from "./lines.js";
export { scan } from "./scan.js";
export { search, searchOrThrow } from "./search.js";
