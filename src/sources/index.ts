export * from "./objectStore";
export * from "./s3Source";
export * from "./types";
export * from "./webSource";
