export * from "./ast.js";
export * from "./diagnostic.js";
export * from "./evaluate.js";
export * from "./interpreter.js";
export * from "./parser.js";
export * from "./printer.js";
export * from "./tokenizer.js";
export * from "./value.js";
