export * from "./ocrEnsemble";
export * from "./preprocess";
export * from "./raster";
export * from "./recognizer";
