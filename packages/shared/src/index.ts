export * from "./types/color";
export * from "./types/scheme";
