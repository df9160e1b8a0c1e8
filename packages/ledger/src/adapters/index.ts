export * from "./clock";
export * from "./custody";
export * from "./oracle";
export * from "./vault";
