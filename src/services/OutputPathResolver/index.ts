export * from "./OutputPathResolver";
export * from "./OutputPathResolverDefault";
