export * from "./byte-array-sink.js";
export * from "./byte-array-source.js";
