export * from "./cache";
export * from "./cascade";
export * from "./diagnostics";
export * from "./engine";
export * from "./manualEntry";
export * from "./ocr";
export * from "./remoteSolver";
export * from "./terminalPrompt";
export * from "./types";
