export { compareLatexTool } from "./compare.ts";
export { parseLatexTool } from "./parse.ts";
export { simplifyLatexTool } from "./simplify.ts";
