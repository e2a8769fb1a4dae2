/**
 * Geometry utilities
 */

export * from "./types";
export { triangulate } from "./tessellate";
