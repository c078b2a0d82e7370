export * from "./countryCodes";
export * from "./resultPageParser";
