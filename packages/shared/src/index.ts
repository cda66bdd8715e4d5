export * from "./digest.js";
export * from "./segmenter.js";
export * from "./types.js";
