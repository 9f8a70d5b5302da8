export * from "./kmd-format"
export * from "./import-result"
export * from "./binary-reader"
export * from "./preflight"
export * from "./kmd-loader"
export * from "./kmd-writer"
export * from "./manifest"
