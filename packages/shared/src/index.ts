export type * from "./types/usage.js";
