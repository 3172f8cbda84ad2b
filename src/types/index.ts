export type * from "./biomarker";
export type * from "./gates";
export type * from "./trial";
