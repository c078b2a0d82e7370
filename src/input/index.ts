export * from "./csv";
export * from "./loader";
export * from "./workbook";
