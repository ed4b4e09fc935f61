/**
 * Custom Turndown Rules Index
 */

export { fileImageRule } from "./file-image";
