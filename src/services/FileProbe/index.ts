export * from "./FileProbe";
export * from "./FileProbeDefault";
