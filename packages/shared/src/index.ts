export type * from "./types/metrics.js";
export type * from "./types/nas.js";
export type * from "./types/config.js";
